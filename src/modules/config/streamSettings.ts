import { UnsupportedTransportError } from '../../lib/errors';
import { assertNever } from '../../lib/validation';
import type { QueryParams } from '../link/queryString';
import {
  DEFAULT_REALITY_FINGERPRINT,
  DEFAULT_TRANSPORT_PATH,
  VLESS_FLOWS,
  XHTTP_MODES,
} from './config.constants';

export type MappingPolicy = 'lenient' | 'strict';

export type TransportVariant =
  | { kind: 'tcp' }
  | { kind: 'tcp-http'; host?: string; path?: string }
  | { kind: 'ws'; path: string; host?: string }
  | { kind: 'grpc'; serviceName: string; authority?: string; multiMode: boolean }
  | { kind: 'httpupgrade'; path: string; host?: string }
  | { kind: 'xhttp'; path: string; host?: string; mode: string }
  | { kind: 'verbatim'; network: string; headerType?: string };

export type SecurityVariant =
  | { kind: 'none' }
  | {
      kind: 'tls';
      serverName?: string;
      fingerprint?: string;
      alpn?: string[];
      allowInsecure?: boolean;
    }
  | {
      kind: 'reality';
      serverName?: string;
      fingerprint: string;
      publicKey?: string;
      shortId: string;
      spiderX?: string;
    }
  | { kind: 'verbatim'; security: string };

export interface UserSettings {
  encryption: string;
  flow?: string;
}

export interface LinkMapping {
  transport: TransportVariant;
  security: SecurityVariant;
  user: UserSettings;
  unmappedParams: Readonly<Record<string, string>>;
}

export interface TcpHeader {
  type: string;
  request?: {
    path: string[];
    headers?: { Host: string[] };
  };
}

export interface StreamSettings {
  network: string;
  security: string;
  tcpSettings?: { header: TcpHeader };
  wsSettings?: { path: string; host?: string };
  grpcSettings?: { serviceName: string; authority?: string; multiMode: boolean };
  httpupgradeSettings?: { path: string; host?: string };
  xhttpSettings?: { path: string; host?: string; mode: string };
  tlsSettings?: {
    serverName?: string;
    fingerprint?: string;
    alpn?: string[];
    allowInsecure?: boolean;
  };
  realitySettings?: {
    show: false;
    serverName?: string;
    fingerprint: string;
    publicKey?: string;
    shortId: string;
    spiderX?: string;
  };
}

const SUPPORTED_TYPES = 'tcp, ws, grpc, httpupgrade, xhttp';
const SUPPORTED_SECURITY = 'none, tls, reality';
const TRANSPORT_KEYS = ['host', 'path', 'serviceName', 'authority', 'mode'] as const;

/**
 * Tracks which query params the mapping used. Whatever is left once the
 * mapping is done either goes to `unmappedParams` or, in strict mode, fails.
 */
class ParamReader {
  private readonly consumed = new Set<string>();

  public constructor(
    private readonly params: QueryParams,
    private readonly policy: MappingPolicy,
  ) {}

  public take(key: string): string | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.params, key)) return undefined;
    this.consumed.add(key);
    return this.params[key];
  }

  public takeNonEmpty(key: string): string | undefined {
    const value = this.take(key);
    return value ? value : undefined;
  }

  public unsupported(key: string, value: string, reason: string): void {
    if (this.policy === 'strict') {
      throw new UnsupportedTransportError({
        field: `query.${key}`,
        message: `${key}=${value} has no mapping: ${reason}`,
        details: { key, value },
      });
    }
  }

  public release(key: string): void {
    this.consumed.delete(key);
  }

  /** Empty transport keys carry nothing for the chosen transport. */
  public discardEmpty(keys: readonly string[]): void {
    for (const key of keys) {
      if (this.params[key] === '') this.take(key);
    }
  }

  public leftovers(): Record<string, string> {
    const rest: [string, string][] = [];
    for (const key of Object.keys(this.params).sort()) {
      const value = this.params[key];
      if (this.consumed.has(key) || value === undefined) continue;
      rest.push([key, value]);
    }
    return Object.fromEntries(rest);
  }
}

export function mapQueryParams(params: QueryParams, policy: MappingPolicy): LinkMapping {
  const reader = new ParamReader(params, policy);

  const transport = readTransport(reader);
  reader.discardEmpty(TRANSPORT_KEYS);
  const security = readSecurity(reader, transport);
  const user = readUser(reader, transport, security);

  const unmappedParams = reader.leftovers();
  const [firstKey] = Object.keys(unmappedParams);
  if (firstKey !== undefined) {
    reader.unsupported(firstKey, unmappedParams[firstKey] ?? '', 'unknown query parameter');
  }

  return { transport, security, user, unmappedParams: Object.freeze(unmappedParams) };
}

function readTransport(reader: ParamReader): TransportVariant {
  const rawType = reader.take('type') ?? '';
  const headerType = reader.take('headerType') ?? '';
  const type = rawType.toLowerCase();

  if (type === '' || type === 'tcp' || type === 'raw') {
    if (headerType === 'http') {
      const host = reader.takeNonEmpty('host');
      const path = reader.takeNonEmpty('path');
      return { kind: 'tcp-http', ...(host ? { host } : {}), ...(path ? { path } : {}) };
    }
    if (headerType === '' || headerType === 'none') return { kind: 'tcp' };

    reader.unsupported('headerType', headerType, 'tcp supports headerType none or http');
    return { kind: 'verbatim', network: 'tcp', headerType };
  }

  if (headerType !== '' && headerType !== 'none') {
    reader.unsupported('headerType', headerType, `headerType is only mapped for tcp, not ${rawType}`);
    reader.release('headerType');
  }

  switch (type) {
    case 'ws':
    case 'httpupgrade': {
      const path = reader.takeNonEmpty('path') ?? DEFAULT_TRANSPORT_PATH;
      const host = reader.takeNonEmpty('host');
      const kind = type === 'ws' ? 'ws' : 'httpupgrade';
      return { kind, path, ...(host ? { host } : {}) };
    }
    case 'grpc':
    case 'gun': {
      const serviceName = reader.takeNonEmpty('serviceName') ?? reader.takeNonEmpty('path') ?? '';
      const authority = reader.takeNonEmpty('authority');
      const mode = reader.take('mode') ?? '';
      let multiMode = false;
      if (mode === 'multi') {
        multiMode = true;
      } else if (mode !== '' && mode !== 'gun') {
        reader.unsupported('mode', mode, 'grpc mode is gun or multi');
        reader.release('mode');
      }
      return { kind: 'grpc', serviceName, ...(authority ? { authority } : {}), multiMode };
    }
    case 'xhttp':
    case 'splithttp': {
      const path = reader.takeNonEmpty('path') ?? DEFAULT_TRANSPORT_PATH;
      const host = reader.takeNonEmpty('host');
      const mode = reader.takeNonEmpty('mode') ?? 'auto';
      if (!isOneOf(XHTTP_MODES, mode)) {
        reader.unsupported('mode', mode, `xhttp mode is one of ${XHTTP_MODES.join(', ')}`);
      }
      return { kind: 'xhttp', path, ...(host ? { host } : {}), mode };
    }
    default:
      reader.unsupported('type', rawType, `supported types are ${SUPPORTED_TYPES}`);
      return { kind: 'verbatim', network: rawType };
  }
}

function readSecurity(reader: ParamReader, transport: TransportVariant): SecurityVariant {
  const rawSecurity = reader.take('security') ?? '';
  const security = rawSecurity.toLowerCase();

  switch (security) {
    case '':
    case 'none':
      return { kind: 'none' };
    case 'tls': {
      const serverName = reader.takeNonEmpty('sni');
      const fingerprint = reader.takeNonEmpty('fp');
      const alpn = parseAlpn(reader.take('alpn'));
      const allowInsecure = readAllowInsecure(reader);
      return {
        kind: 'tls',
        ...(serverName ? { serverName } : {}),
        ...(fingerprint ? { fingerprint } : {}),
        ...(alpn ? { alpn } : {}),
        ...(allowInsecure !== undefined ? { allowInsecure } : {}),
      };
    }
    case 'reality': {
      if (transport.kind === 'ws' || transport.kind === 'httpupgrade') {
        reader.unsupported('security', rawSecurity, `reality is not available over ${transport.kind}`);
      }
      const serverName = reader.takeNonEmpty('sni');
      const fingerprint = reader.takeNonEmpty('fp') ?? DEFAULT_REALITY_FINGERPRINT;
      const publicKey = reader.takeNonEmpty('pbk');
      if (!publicKey) {
        reader.unsupported('pbk', '', 'reality requires a public key');
      }
      const shortId = reader.take('sid') ?? '';
      const spiderX = reader.takeNonEmpty('spx');
      return {
        kind: 'reality',
        ...(serverName ? { serverName } : {}),
        fingerprint,
        ...(publicKey ? { publicKey } : {}),
        shortId,
        ...(spiderX ? { spiderX } : {}),
      };
    }
    default:
      reader.unsupported('security', rawSecurity, `supported security is ${SUPPORTED_SECURITY}`);
      return { kind: 'verbatim', security: rawSecurity };
  }
}

function readUser(
  reader: ParamReader,
  transport: TransportVariant,
  security: SecurityVariant,
): UserSettings {
  const encryption = reader.takeNonEmpty('encryption') ?? 'none';
  if (encryption !== 'none') {
    reader.unsupported('encryption', encryption, 'vless encryption must be none');
  }

  const flow = reader.takeNonEmpty('flow');
  if (!flow) return { encryption };

  if (!isOneOf(VLESS_FLOWS, flow)) {
    reader.unsupported('flow', flow, `flow is one of ${VLESS_FLOWS.join(', ')}`);
  } else if (transport.kind !== 'tcp' || (security.kind !== 'tls' && security.kind !== 'reality')) {
    reader.unsupported('flow', flow, 'vision flow needs tcp with tls or reality');
  }

  return { encryption, flow };
}

function readAllowInsecure(reader: ParamReader): boolean | undefined {
  const value = reader.take('allowInsecure');
  if (value === undefined || value === '') return undefined;

  const normalized = value.toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;

  reader.unsupported('allowInsecure', value, 'allowInsecure is 1, true, 0 or false');
  reader.release('allowInsecure');
  return undefined;
}

function parseAlpn(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((item) => item === value);
}

export function toStreamSettings(mapping: Pick<LinkMapping, 'transport' | 'security'>): StreamSettings {
  return {
    ...transportSettings(mapping.transport),
    ...securitySettings(mapping.security),
  };
}

function transportSettings(
  transport: TransportVariant,
): Pick<
  StreamSettings,
  'network' | 'tcpSettings' | 'wsSettings' | 'grpcSettings' | 'httpupgradeSettings' | 'xhttpSettings'
> {
  switch (transport.kind) {
    case 'tcp':
      return { network: 'tcp' };
    case 'tcp-http':
      return {
        network: 'tcp',
        tcpSettings: {
          header: {
            type: 'http',
            request: {
              path: [transport.path ?? DEFAULT_TRANSPORT_PATH],
              ...(transport.host ? { headers: { Host: [transport.host] } } : {}),
            },
          },
        },
      };
    case 'ws':
      return {
        network: 'ws',
        wsSettings: { path: transport.path, ...(transport.host ? { host: transport.host } : {}) },
      };
    case 'grpc':
      return {
        network: 'grpc',
        grpcSettings: {
          serviceName: transport.serviceName,
          ...(transport.authority ? { authority: transport.authority } : {}),
          multiMode: transport.multiMode,
        },
      };
    case 'httpupgrade':
      return {
        network: 'httpupgrade',
        httpupgradeSettings: {
          path: transport.path,
          ...(transport.host ? { host: transport.host } : {}),
        },
      };
    case 'xhttp':
      return {
        network: 'xhttp',
        xhttpSettings: {
          path: transport.path,
          ...(transport.host ? { host: transport.host } : {}),
          mode: transport.mode,
        },
      };
    case 'verbatim':
      return {
        network: transport.network,
        ...(transport.headerType ? { tcpSettings: { header: { type: transport.headerType } } } : {}),
      };
    default:
      return assertNever(transport, 'Unknown transport variant');
  }
}

function securitySettings(
  security: SecurityVariant,
): Pick<StreamSettings, 'security' | 'tlsSettings' | 'realitySettings'> {
  switch (security.kind) {
    case 'none':
      return { security: 'none' };
    case 'tls': {
      const { kind, ...tlsSettings } = security;
      return { security: kind, tlsSettings };
    }
    case 'reality': {
      const { kind, ...rest } = security;
      return { security: kind, realitySettings: { show: false, ...rest } };
    }
    case 'verbatim':
      return { security: security.security };
    default:
      return assertNever(security, 'Unknown security variant');
  }
}
