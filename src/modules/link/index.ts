export * from './queryString';
export * from './vlessLink';
