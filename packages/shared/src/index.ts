export * from './errors';
export * from './retry';
export * from './hash';
export * from './mutex';
export * from './logger';
