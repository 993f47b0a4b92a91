import type { EngineLogLevel } from './config.constants';
import type { StreamSettings } from './streamSettings';

export interface SniffingSettings {
  enabled: boolean;
  destOverride: string[];
  routeOnly: boolean;
}

export interface HttpInbound {
  tag: 'http';
  protocol: 'http';
  listen: string;
  port: number;
  sniffing: SniffingSettings;
  settings: { allowTransparent: boolean };
}

export interface SocksInbound {
  tag: 'socks';
  protocol: 'socks';
  listen: string;
  port: number;
  sniffing: SniffingSettings;
  settings: { auth: 'noauth'; udp: boolean };
}

export interface VlessUser {
  id: string;
  encryption: string;
  flow?: string;
}

export interface VlessOutbound {
  tag: 'proxy';
  protocol: 'vless';
  settings: {
    vnext: [
      {
        address: string;
        port: number;
        users: [VlessUser];
      },
    ];
  };
  streamSettings: StreamSettings;
  /** Link query params that had no mapping, kept verbatim in lenient mode. */
  unmappedParams?: Record<string, string>;
}

export interface FreedomOutbound {
  tag: 'direct';
  protocol: 'freedom';
  settings: Record<string, never>;
}

export interface BlackholeOutbound {
  tag: 'block';
  protocol: 'blackhole';
}

export type AuxiliaryOutbound = FreedomOutbound | BlackholeOutbound;

export interface RoutingRule {
  type: 'field';
  outboundTag: string;
  inboundTag?: string[];
  ip?: string[];
  domain?: string[];
  protocol?: string[];
  port?: string;
  sourcePort?: string;
}

export interface ProxyConfigDocument {
  log: {
    access: string;
    error: string;
    loglevel: EngineLogLevel;
    dnsLog: boolean;
  };
  stats?: Record<string, never>;
  policy?: {
    levels: Record<string, { statsUserUplink: boolean; statsUserDownlink: boolean }>;
    system: { statsOutboundUplink: boolean; statsOutboundDownlink: boolean };
  };
  api?: {
    tag: string;
    services: string[];
  };
  inbounds: [HttpInbound, SocksInbound];
  outbounds: [VlessOutbound, ...AuxiliaryOutbound[]];
  routing?: {
    domainStrategy: string;
    rules: RoutingRule[];
  };
}
