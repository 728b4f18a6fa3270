// Environment configuration loader and validator shared by both CLIs

import { ConfigValidationResult, LogLevel } from '../types';
import { DEFAULT_CONFIG } from './constants';
import { ConfigurationError } from './error-handler';
import { isLogLevel } from './logger';

export interface EnvironmentConfig {
  api: {
    baseUrl: string;
  };
  auth: {
    pollInterval: number;
    timeout: number;
  };
  tokenFile: string;
  logging: {
    level: string;
  };
}

export interface EnvironmentConfigValidationResult extends ConfigValidationResult {
  warnings: string[];
}

/**
 * Values given on the command line. They win over the environment.
 */
export interface ConfigOverrides {
  apiUrl?: string;
  tokenFile?: string;
  timeoutSeconds?: string;
  logLevel?: string;
}

type Env = Record<string, string | undefined>;

function parseSeconds(value: string | undefined, fallbackMs: number): number {
  if (value === undefined || value.trim() === '') {
    return fallbackMs;
  }
  const trimmed = value.trim();
  return /^\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) * 1000 : NaN;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Load configuration from environment variables
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  return {
    api: {
      baseUrl: stripTrailingSlash(env.API_BASE_URL || DEFAULT_CONFIG.API_BASE_URL),
    },
    auth: {
      pollInterval: DEFAULT_CONFIG.POLL_INTERVAL,
      timeout: parseSeconds(env.AUTH_TIMEOUT_SECONDS, DEFAULT_CONFIG.AUTH_TIMEOUT),
    },
    tokenFile: env.JWT_TOKEN_FILE || DEFAULT_CONFIG.TOKEN_FILE,
    logging: {
      level: (env.LOG_LEVEL || DEFAULT_CONFIG.LOG_LEVEL).toUpperCase(),
    },
  };
}

/**
 * Apply command line overrides on top of the environment
 */
export function createEnvironmentConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env
): EnvironmentConfig {
  const baseConfig = loadEnvironmentConfig(env);

  return {
    api: {
      baseUrl:
        overrides.apiUrl !== undefined ? stripTrailingSlash(overrides.apiUrl) : baseConfig.api.baseUrl,
    },
    auth: {
      ...baseConfig.auth,
      timeout:
        overrides.timeoutSeconds !== undefined
          ? parseSeconds(overrides.timeoutSeconds, NaN)
          : baseConfig.auth.timeout,
    },
    tokenFile: overrides.tokenFile ?? baseConfig.tokenFile,
    logging: {
      level: overrides.logLevel !== undefined ? overrides.logLevel.toUpperCase() : baseConfig.logging.level,
    },
  };
}

/**
 * Validate configuration completeness
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): EnvironmentConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let parsedUrl: URL | null = null;
  try {
    parsedUrl = new URL(config.api.baseUrl);
  } catch {
    errors.push(`Invalid API base URL "${config.api.baseUrl}"`);
  }
  if (parsedUrl && parsedUrl.protocol !== 'http:' && parsedUrl.protocol !== 'https:') {
    errors.push('API base URL must use http or https');
  }

  if (!Number.isFinite(config.auth.timeout) || config.auth.timeout <= 0) {
    errors.push('Authentication timeout must be a positive number of seconds');
  }

  if (!Number.isFinite(config.auth.pollInterval) || config.auth.pollInterval <= 0) {
    errors.push('Poll interval must be a positive number of milliseconds');
  }

  if (config.tokenFile.trim().length === 0) {
    errors.push('Token file path cannot be empty');
  }

  if (!isLogLevel(config.logging.level)) {
    warnings.push(`Invalid log level "${config.logging.level}", using ${DEFAULT_CONFIG.LOG_LEVEL} as default`);
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

export function resolveLogLevel(config: EnvironmentConfig): LogLevel {
  return isLogLevel(config.logging.level) ? config.logging.level : DEFAULT_CONFIG.LOG_LEVEL;
}

/**
 * Build and validate the configuration, throwing on errors
 */
export function loadValidatedConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env
): { config: EnvironmentConfig; warnings: string[] } {
  const config = createEnvironmentConfig(overrides, env);
  const validation = validateEnvironmentConfig(config);

  if (!validation.isValid) {
    throw new ConfigurationError(
      `Invalid configuration: ${validation.errors.join('; ')}`,
      'Check API_BASE_URL, JWT_TOKEN_FILE and AUTH_TIMEOUT_SECONDS or the matching command line options'
    );
  }

  return { config, warnings: validation.warnings };
}
