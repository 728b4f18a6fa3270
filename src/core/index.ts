// Configuration, logging and error handling
export * from './constants';
export * from './logger';
export * from './formatting';
export * from './error-handler';
export * from './environment-config';
