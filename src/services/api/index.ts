export * from './api-client';
export * from './types';
