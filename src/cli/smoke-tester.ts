#!/usr/bin/env node

// smoke-tester: run read-only API calls with the stored token and print the responses
import { Command } from 'commander';
import { loadValidatedConfig, resolveLogLevel } from '../core/environment-config';
import { DEFAULT_CONFIG } from '../core/constants';
import { reportFatalError } from '../core/error-handler';
import { EnhancedLogger } from '../core/logger';
import { TokenFileStorage } from '../auth/token-storage';
import { ApiClient } from '../services/api/api-client';
import { SmokeTestRunner } from '../services/smoke/smoke-test-runner';
import { CliContext, createDefaultContext } from './context';

export interface SmokeTesterOptions {
  apiUrl?: string;
  tokenFile?: string;
  logLevel?: string;
}

/**
 * Run the smoke test sequence and return the process exit code.
 * A missing or malformed token file fails before any request is sent.
 */
export async function runSmokeTester(
  options: SmokeTesterOptions,
  context: CliContext = createDefaultContext()
): Promise<number> {
  const { output } = context;
  let logger = new EnhancedLogger({ level: DEFAULT_CONFIG.LOG_LEVEL, component: 'smoke-tester' });

  try {
    const { config, warnings } = loadValidatedConfig(options, context.env);
    logger = new EnhancedLogger({ level: resolveLogLevel(config), component: 'smoke-tester' });
    warnings.forEach((warning) => logger.warn(warning));

    const tokenStorage = new TokenFileStorage(config.tokenFile);
    const token = await tokenStorage.loadToken();
    output.log(`✓ JWT token loaded from ${tokenStorage.getFilePath()}`);

    const client = new ApiClient(config.api.baseUrl, logger.createChildLogger('api-client'), token);
    const runner = new SmokeTestRunner(client, logger, output);
    const report = await runner.run();

    const failed = report.steps.filter((step) => step.outcome === 'failed').map((step) => step.name);
    if (failed.length > 0) {
      logger.info(`Steps with failures: ${failed.join(', ')}`);
    }
    return 0;
  } catch (error) {
    return reportFatalError(error, logger, context.printError);
  }
}

export function createSmokeTesterProgram(context: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name('smoke-tester')
    .description('Call the API health, user, project, storage and task endpoints with the stored token')
    .version('1.0.0')
    .option('--api-url <url>', 'API base URL (env: API_BASE_URL)')
    .option('--token-file <path>', 'token file written by token-retriever (env: JWT_TOKEN_FILE)')
    .option('--log-level <level>', 'ERROR, WARN, INFO or DEBUG (env: LOG_LEVEL)')
    .action(async (options: SmokeTesterOptions) => {
      const exitCode = await runSmokeTester(options, context);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });

  return program;
}

if (require.main === module) {
  createSmokeTesterProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('❌ smoke-tester failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
