export const LOOPBACK_LISTEN = '127.0.0.1';

export const DEFAULT_HTTP_PROXY_PORT = 1080;
export const DEFAULT_SOCKS5_PROXY_PORT = 1090;

export const HTTP_INBOUND_TAG = 'http';
export const SOCKS_INBOUND_TAG = 'socks';
export const PROXY_OUTBOUND_TAG = 'proxy';
export const DIRECT_OUTBOUND_TAG = 'direct';
export const BLOCK_OUTBOUND_TAG = 'block';
export const API_TAG = 'api';

export const DEFAULT_REALITY_FINGERPRINT = 'chrome';
export const DEFAULT_TRANSPORT_PATH = '/';

export const ENGINE_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'none'] as const;
export type EngineLogLevel = (typeof ENGINE_LOG_LEVELS)[number];

export const CONFIG_PRESETS = ['basic', 'full'] as const;
export type ConfigPreset = (typeof CONFIG_PRESETS)[number];

export const VLESS_FLOWS = ['xtls-rprx-vision', 'xtls-rprx-vision-udp443'] as const;
export type VlessFlow = (typeof VLESS_FLOWS)[number];

export const XHTTP_MODES = ['auto', 'packet-up', 'stream-up', 'stream-one'] as const;
export type XhttpMode = (typeof XHTTP_MODES)[number];
