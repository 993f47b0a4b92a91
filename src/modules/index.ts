export * from './config';
export * from './link';
