// Core constants and configuration defaults

export const DEFAULT_CONFIG = {
  API_BASE_URL: 'http://localhost:8080',
  TOKEN_FILE: '.jwt_token',
  POLL_INTERVAL: 2000, // 2 seconds
  AUTH_TIMEOUT: 300000, // 5 minutes
  ACCESSIBILITY_TIMEOUT: 5000,
  PRESIGNED_URL_EXPIRES_IN: 3600, // seconds
  SAMPLE_STORAGE_KEY: 'test.jpg',
  MAX_TASKS_CHECKED: 5,
  LOG_LEVEL: 'WARN' as const,
};

export const TOKEN_FILE_KEY = 'JWT_TOKEN';

export const AUTH_PROVIDERS = Object.freeze(['google', 'github'] as const);

export const API_ENDPOINTS = {
  HEALTH: '/health',
  AUTH: '/auth',
  AUTH_POLL: '/auth/poll',
  CURRENT_USER: '/me',
  PROJECTS: '/projects',
};

export const POLL_STATUS = {
  PENDING: 'pending',
  COMPLETED: 'completed',
} as const;

export const LOG_LEVELS = {
  ERROR: 'ERROR',
  WARN: 'WARN',
  INFO: 'INFO',
  DEBUG: 'DEBUG',
} as const;
