import { InvalidPortError } from '../../lib/errors';
import { isValidPort, MAX_PORT, MIN_PORT } from '../../lib/validation';
import {
  DEFAULT_HTTP_PROXY_PORT,
  DEFAULT_SOCKS5_PROXY_PORT,
  LOOPBACK_LISTEN,
} from './config.constants';

export interface LocalBindings {
  readonly listen: typeof LOOPBACK_LISTEN;
  readonly httpProxyPort: number;
  readonly socks5ProxyPort: number;
}

export interface DefaultPorts {
  httpProxyPort: number;
  socks5ProxyPort: number;
}

export const DEFAULT_PORTS: Readonly<DefaultPorts> = Object.freeze({
  httpProxyPort: DEFAULT_HTTP_PROXY_PORT,
  socks5ProxyPort: DEFAULT_SOCKS5_PROXY_PORT,
});

export function resolveBindings(
  httpPort?: number,
  socksPort?: number,
  defaults: Readonly<DefaultPorts> = DEFAULT_PORTS,
): LocalBindings {
  const httpProxyPort = checkPort('http-proxy', httpPort ?? defaults.httpProxyPort);
  const socks5ProxyPort = checkPort('socks5-proxy', socksPort ?? defaults.socks5ProxyPort);

  if (httpProxyPort === socks5ProxyPort) {
    throw new InvalidPortError({
      field: 'http-proxy',
      message: `HTTP and SOCKS5 proxies cannot share port ${httpProxyPort}`,
      details: { httpProxyPort, socks5ProxyPort },
    });
  }

  const bindings: LocalBindings = {
    listen: LOOPBACK_LISTEN,
    httpProxyPort,
    socks5ProxyPort,
  };
  return Object.freeze(bindings);
}

function checkPort(field: string, value: number): number {
  if (isValidPort(value)) return value;

  throw new InvalidPortError({
    field,
    message: `port ${String(value)} should be an integer in range ${MIN_PORT}..${MAX_PORT}`,
  });
}
