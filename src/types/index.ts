// Core interfaces and types shared by the token retriever and the smoke tester

export * from './utils';

export type AuthProvider = 'google' | 'github';

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

/**
 * Sink for the human-readable report the CLIs print.
 * Kept apart from Logger so diagnostics never interleave with the report.
 */
export interface Output {
  log(line?: string): void;
  write(text: string): void;
}

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}

// API response wrapper
export interface ApiResponse<T> {
  success: boolean;
  /** Body narrowed to the endpoint's expected shape; absent when it does not match */
  data?: T;
  /** Body parsed as JSON, whatever its shape */
  body?: unknown;
  /** Body as received */
  rawBody?: string;
  error?: string;
  statusCode?: number;
}
