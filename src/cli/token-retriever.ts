#!/usr/bin/env node

// token-retriever: browser login against the API, token saved for smoke-tester
import { Argument, Command } from 'commander';
import { AuthProvider, SleepFn } from '../types';
import { loadValidatedConfig, resolveLogLevel } from '../core/environment-config';
import { AUTH_PROVIDERS, DEFAULT_CONFIG, TOKEN_FILE_KEY } from '../core/constants';
import { CliError, ErrorCategory, reportFatalError } from '../core/error-handler';
import { EnhancedLogger } from '../core/logger';
import { AuthManager } from '../auth/auth-manager';
import { BrowserOpener } from '../auth/browser';
import { TokenFileStorage } from '../auth/token-storage';
import { ApiClient } from '../services/api/api-client';
import { CliContext, createDefaultContext } from './context';

export interface TokenRetrieverOptions {
  apiUrl?: string;
  tokenFile?: string;
  timeout?: string;
  logLevel?: string;
  /** commander sets this to false for --no-browser */
  browser?: boolean;
}

export interface TokenRetrieverDependencies {
  openBrowser?: BrowserOpener;
  sleep?: SleepFn;
}

export function isAuthProvider(value: string): value is AuthProvider {
  const providers: readonly string[] = AUTH_PROVIDERS;
  return providers.includes(value);
}

function printUsageExamples(context: CliContext, baseUrl: string, tokenFile: string, token: string): void {
  const { output } = context;
  output.log('');
  output.log('=== Usage Examples ===');
  output.log('# Load token as environment variable');
  output.log(`source ${tokenFile}`);
  output.log('');
  output.log('# Call API');
  output.log(`curl -H "Authorization: Bearer $${TOKEN_FILE_KEY}" ${baseUrl}/projects`);
  output.log('');
  output.log('# Or use directly');
  output.log(`export ${TOKEN_FILE_KEY}="${token}"`);
  output.log(`curl -H "Authorization: Bearer $${TOKEN_FILE_KEY}" ${baseUrl}/projects`);
}

/**
 * Run the browser login and return the process exit code
 */
export async function runTokenRetriever(
  provider: string,
  options: TokenRetrieverOptions,
  context: CliContext = createDefaultContext(),
  dependencies: TokenRetrieverDependencies = {}
): Promise<number> {
  const { output } = context;
  let logger = new EnhancedLogger({ level: DEFAULT_CONFIG.LOG_LEVEL, component: 'token-retriever' });

  try {
    if (!isAuthProvider(provider)) {
      throw new CliError(
        `Auth provider must be one of: ${AUTH_PROVIDERS.join(', ')}`,
        ErrorCategory.VALIDATION,
        { hint: 'Usage: token-retriever [google|github]' }
      );
    }

    const { config, warnings } = loadValidatedConfig(
      {
        apiUrl: options.apiUrl,
        tokenFile: options.tokenFile,
        timeoutSeconds: options.timeout,
        logLevel: options.logLevel
      },
      context.env
    );
    logger = new EnhancedLogger({ level: resolveLogLevel(config), component: 'token-retriever' });
    warnings.forEach((warning) => logger.warn(warning));

    output.log('=== API JWT Token Retrieval ===');
    output.log(`Auth Provider: ${provider}`);
    output.log(`API URL: ${config.api.baseUrl}`);
    output.log('');

    const client = new ApiClient(config.api.baseUrl, logger.createChildLogger('api-client'));
    const tokenStorage = new TokenFileStorage(config.tokenFile);
    const authManager = new AuthManager(client, tokenStorage, logger, output, {
      launchBrowser: options.browser !== false,
      ...(dependencies.openBrowser ? { openBrowser: dependencies.openBrowser } : {}),
      poller: {
        interval: config.auth.pollInterval,
        timeout: config.auth.timeout,
        ...(dependencies.sleep ? { sleep: dependencies.sleep } : {})
      }
    });

    const result = await authManager.authenticate(provider);
    printUsageExamples(context, config.api.baseUrl, config.tokenFile, result.accessToken);
    return 0;
  } catch (error) {
    return reportFatalError(error, logger, context.printError);
  }
}

export function createTokenRetrieverProgram(
  context: CliContext = createDefaultContext(),
  dependencies: TokenRetrieverDependencies = {}
): Command {
  const program = new Command();

  program
    .name('token-retriever')
    .description('Log in through the browser and save the API bearer token to a file')
    .version('1.0.0')
    .addArgument(
      new Argument('[provider]', 'authentication provider').choices(AUTH_PROVIDERS).default('google')
    )
    .option('--api-url <url>', 'API base URL (env: API_BASE_URL)')
    .option('--token-file <path>', 'where to write the token (env: JWT_TOKEN_FILE)')
    .option('--timeout <seconds>', 'how long to wait for the browser login (env: AUTH_TIMEOUT_SECONDS)')
    .option('--no-browser', 'print the login URL without opening a browser')
    .option('--log-level <level>', 'ERROR, WARN, INFO or DEBUG (env: LOG_LEVEL)')
    .showHelpAfterError()
    .action(async (provider: string, options: TokenRetrieverOptions) => {
      const exitCode = await runTokenRetriever(provider, options, context, dependencies);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });

  return program;
}

if (require.main === module) {
  createTokenRetrieverProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('❌ token-retriever failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
