export * from './types';
export * from './token-storage';
export * from './browser';
export * from './auth-poller';
export * from './auth-manager';
