export * from './bindings';
export * from './config.constants';
export * from './configBuilder';
export * from './configDocument';
export * from './remoteEndpoint';
export * from './serializer';
export * from './streamSettings';
