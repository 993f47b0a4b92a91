import { MalformedLinkError } from '../../lib/errors';
import { MAX_PORT, MIN_PORT } from '../../lib/validation';
import { parseQueryString, type QueryParams } from './queryString';

export const VLESS_SCHEME = 'vless';

const LINK_SHAPE = 'vless://<uuid>@<host>:<port>[?query][#name]';

export interface ProxyLink {
  readonly scheme: typeof VLESS_SCHEME;
  readonly userId: string;
  readonly host: string;
  readonly port: number;
  readonly queryParams: QueryParams;
  readonly name?: string;
}

export function parseLink(raw: string): ProxyLink {
  const link = raw.trim();

  if (!/^vless:\/\//i.test(link)) {
    throw new MalformedLinkError({
      field: 'scheme',
      message: `link must start with vless://, expected ${LINK_SHAPE}`,
    });
  }

  let url: URL;
  try {
    url = new URL(link);
  } catch {
    throw diagnoseUnparsableLink(link);
  }

  const userId = decodeLinkComponent(url.username, 'userId');
  if (!userId) {
    throw new MalformedLinkError({
      field: 'userId',
      message: `user id is missing, expected ${LINK_SHAPE}`,
    });
  }

  const host = unbracketHost(url.hostname);
  if (!host) {
    throw new MalformedLinkError({
      field: 'host',
      message: `host is missing, expected ${LINK_SHAPE}`,
    });
  }

  const port = parseRemotePort(url.port);
  const queryParams = parseQueryString(url.search);
  const name = decodeName(url.hash);

  const parsed: ProxyLink = {
    scheme: VLESS_SCHEME,
    userId,
    host,
    port,
    queryParams,
    ...(name ? { name } : {}),
  };
  return Object.freeze(parsed);
}

function parseRemotePort(value: string): number {
  if (value.length === 0) {
    throw new MalformedLinkError({
      field: 'port',
      message: `port is missing, expected ${LINK_SHAPE}`,
    });
  }

  if (!/^\d+$/.test(value)) {
    throw new MalformedLinkError({
      field: 'port',
      message: `port "${value}" is not a number`,
    });
  }

  const port = Number(value);
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new MalformedLinkError({
      field: 'port',
      message: `port ${port} is out of range ${MIN_PORT}..${MAX_PORT}`,
    });
  }

  return port;
}

function decodeLinkComponent(value: string, field: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new MalformedLinkError({
      field,
      message: `cannot percent-decode "${value}"`,
    });
  }
}

function decodeName(hash: string): string | undefined {
  const fragment = hash.startsWith('#') ? hash.slice(1) : hash;
  if (!fragment) return undefined;

  try {
    return decodeURIComponent(fragment);
  } catch {
    return fragment;
  }
}

function unbracketHost(hostname: string): string {
  if (hostname.startsWith('[') && hostname.endsWith(']')) {
    return hostname.slice(1, -1);
  }
  return hostname;
}

/**
 * `URL` rejects a bad authority with a generic TypeError, so re-read the
 * authority by hand to name the part that is wrong.
 */
function diagnoseUnparsableLink(link: string): MalformedLinkError {
  const authority = /^[a-z]+:\/\/([^/?#]*)/i.exec(link)?.[1] ?? '';
  const at = authority.lastIndexOf('@');
  const userInfo = at === -1 ? '' : authority.slice(0, at);
  const hostPort = authority.slice(at + 1);

  if (!userInfo) {
    return new MalformedLinkError({
      field: 'userId',
      message: `user id is missing, expected ${LINK_SHAPE}`,
    });
  }

  const portMatch = /:([^:\]]*)$/.exec(hostPort);
  const hostPart = portMatch ? hostPort.slice(0, portMatch.index) : hostPort;
  if (!hostPart) {
    return new MalformedLinkError({
      field: 'host',
      message: `host is missing, expected ${LINK_SHAPE}`,
    });
  }

  const portText = portMatch?.[1];
  if (portText !== undefined) {
    try {
      parseRemotePort(portText);
    } catch (error) {
      if (error instanceof MalformedLinkError) return error;
      throw error;
    }
  }

  return new MalformedLinkError({
    field: 'link',
    message: `link is not a valid URI, expected ${LINK_SHAPE}`,
  });
}
