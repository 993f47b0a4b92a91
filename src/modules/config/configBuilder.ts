import type { ProxyLink } from '../link/vlessLink';
import type { LocalBindings } from './bindings';
import {
  API_TAG,
  BLOCK_OUTBOUND_TAG,
  DIRECT_OUTBOUND_TAG,
  HTTP_INBOUND_TAG,
  PROXY_OUTBOUND_TAG,
  SOCKS_INBOUND_TAG,
  type ConfigPreset,
  type EngineLogLevel,
} from './config.constants';
import type {
  AuxiliaryOutbound,
  HttpInbound,
  ProxyConfigDocument,
  SniffingSettings,
  SocksInbound,
  VlessOutbound,
} from './configDocument';
import { mapQueryParams, toStreamSettings, type MappingPolicy } from './streamSettings';

export interface BuildDocumentOptions {
  policy?: MappingPolicy;
  preset?: ConfigPreset;
  engineLogLevel?: EngineLogLevel;
}

export function buildDocument(
  link: ProxyLink,
  bindings: LocalBindings,
  options: BuildDocumentOptions = {},
): ProxyConfigDocument {
  const preset = options.preset ?? 'basic';
  const proxy = buildProxyOutbound(link, options.policy ?? 'lenient');

  const document: ProxyConfigDocument = {
    log: {
      access: 'none',
      error: '',
      loglevel: options.engineLogLevel ?? 'warning',
      dnsLog: false,
    },
    inbounds: buildInbounds(bindings),
    outbounds: preset === 'full' ? [proxy, ...auxiliaryOutbounds()] : [proxy],
  };

  if (preset === 'full') {
    return { ...document, ...statsSections(), routing: fullRouting() };
  }

  return document;
}

function sniffing(): SniffingSettings {
  return {
    enabled: true,
    destOverride: ['http', 'tls'],
    routeOnly: true,
  };
}

function buildInbounds(bindings: LocalBindings): [HttpInbound, SocksInbound] {
  return [
    {
      tag: HTTP_INBOUND_TAG,
      protocol: 'http',
      listen: bindings.listen,
      port: bindings.httpProxyPort,
      sniffing: sniffing(),
      settings: {
        allowTransparent: false,
      },
    },
    {
      tag: SOCKS_INBOUND_TAG,
      protocol: 'socks',
      listen: bindings.listen,
      port: bindings.socks5ProxyPort,
      sniffing: sniffing(),
      settings: {
        auth: 'noauth',
        udp: true,
      },
    },
  ];
}

function buildProxyOutbound(link: ProxyLink, policy: MappingPolicy): VlessOutbound {
  const mapping = mapQueryParams(link.queryParams, policy);
  const hasUnmapped = Object.keys(mapping.unmappedParams).length > 0;

  return {
    tag: PROXY_OUTBOUND_TAG,
    protocol: 'vless',
    settings: {
      vnext: [
        {
          address: link.host,
          port: link.port,
          users: [
            {
              id: link.userId,
              encryption: mapping.user.encryption,
              ...(mapping.user.flow ? { flow: mapping.user.flow } : {}),
            },
          ],
        },
      ],
    },
    streamSettings: toStreamSettings(mapping),
    ...(hasUnmapped ? { unmappedParams: { ...mapping.unmappedParams } } : {}),
  };
}

function auxiliaryOutbounds(): AuxiliaryOutbound[] {
  return [
    {
      tag: DIRECT_OUTBOUND_TAG,
      protocol: 'freedom',
      settings: {},
    },
    {
      tag: BLOCK_OUTBOUND_TAG,
      protocol: 'blackhole',
    },
  ];
}

function statsSections(): Pick<ProxyConfigDocument, 'stats' | 'policy' | 'api'> {
  return {
    stats: {},
    policy: {
      levels: {
        '0': {
          statsUserUplink: true,
          statsUserDownlink: true,
        },
      },
      system: {
        statsOutboundUplink: true,
        statsOutboundDownlink: true,
      },
    },
    api: {
      tag: API_TAG,
      services: ['StatsService'],
    },
  };
}

function fullRouting(): NonNullable<ProxyConfigDocument['routing']> {
  return {
    domainStrategy: 'AsIs',
    rules: [
      {
        type: 'field',
        inboundTag: [API_TAG],
        outboundTag: API_TAG,
      },
      {
        type: 'field',
        ip: ['geoip:private'],
        outboundTag: BLOCK_OUTBOUND_TAG,
      },
      {
        type: 'field',
        protocol: ['bittorrent'],
        outboundTag: DIRECT_OUTBOUND_TAG,
      },
      {
        type: 'field',
        port: '6969,6881-6889',
        outboundTag: DIRECT_OUTBOUND_TAG,
      },
      {
        type: 'field',
        sourcePort: '6881-6889',
        outboundTag: DIRECT_OUTBOUND_TAG,
      },
      {
        type: 'field',
        domain: [
          'geosite:cn',
          'domain:cn',
          'domain:xn--fiqs8s',
          'domain:xn--fiqz9s',
          'domain:xn--55qx5d',
          'domain:xn--io0a7i',
          'domain:ru',
          'domain:xn--p1ai',
          'domain:by',
          'domain:xn--90ais',
          'domain:ir',
        ],
        outboundTag: DIRECT_OUTBOUND_TAG,
      },
      {
        type: 'field',
        ip: ['geoip:cn', 'geoip:ru', 'geoip:by', 'geoip:ir'],
        outboundTag: DIRECT_OUTBOUND_TAG,
      },
    ],
  };
}
