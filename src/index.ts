// Library entry point shared by the token-retriever and smoke-tester CLIs

export * from './types';
export * from './core';
export * from './auth';
export * from './services/api';
export * from './services/smoke/smoke-test-runner';
