// Error taxonomy and top-level handling for the CLIs

import { Logger } from '../types';

export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  TIMEOUT = 'timeout',
  FILE_SYSTEM = 'file_system',
}

/**
 * Terminal, user-facing error. The CLI prints `message` and `hint` and exits
 * with `exitCode`.
 */
export class CliError extends Error {
  readonly category: ErrorCategory;
  readonly exitCode: number;
  readonly hint?: string;
  readonly details?: unknown;

  constructor(
    message: string,
    category: ErrorCategory,
    options: { hint?: string; details?: unknown; exitCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CliError';
    this.category = category;
    this.exitCode = options.exitCode ?? 1;
    this.hint = options.hint;
    this.details = options.details;
  }
}

export class ConfigurationError extends CliError {
  constructor(message: string, hint?: string) {
    super(message, ErrorCategory.CONFIGURATION, { hint });
    this.name = 'ConfigurationError';
  }
}

export class ServerUnreachableError extends CliError {
  constructor(baseUrl: string, cause?: string) {
    super('Cannot connect to API server', ErrorCategory.NETWORK, {
      hint: `Make sure the API server is running at ${baseUrl}`,
      details: cause
    });
    this.name = 'ServerUnreachableError';
  }
}

export class MalformedResponseError extends CliError {
  constructor(message: string, body?: unknown) {
    super(message, ErrorCategory.VALIDATION, { details: body });
    this.name = 'MalformedResponseError';
  }
}

export class AuthenticationFailedError extends CliError {
  readonly status?: string;

  constructor(status: string | undefined, body?: unknown) {
    super(`Authentication failed (status: ${status ?? 'unknown'})`, ErrorCategory.AUTHENTICATION, {
      hint: 'Please retry authentication',
      details: body
    });
    this.name = 'AuthenticationFailedError';
    this.status = status;
  }
}

export class AuthTimeoutError extends CliError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timeout after ${Math.round(timeoutMs / 1000)} seconds`, ErrorCategory.TIMEOUT, {
      hint: 'Please retry authentication'
    });
    this.name = 'AuthTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class TokenFileError extends CliError {
  readonly filePath: string;

  constructor(message: string, filePath: string, hint?: string, cause?: unknown) {
    super(message, ErrorCategory.FILE_SYSTEM, { hint, cause });
    this.name = 'TokenFileError';
    this.filePath = filePath;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print a terminal error and return the process exit code
 */
export function reportFatalError(
  error: unknown,
  logger: Logger,
  printError: (line: string) => void = (line) => console.error(line)
): number {
  if (error instanceof CliError) {
    printError(`❌ Error: ${error.message}`);
    if (error.hint) {
      printError(`💡 ${error.hint}`);
    }
    if (error.details !== undefined) {
      logger.debug(`${error.name} details`, error.details);
    }
    return error.exitCode;
  }

  printError(`❌ Unexpected error: ${getErrorMessage(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  return 1;
}
