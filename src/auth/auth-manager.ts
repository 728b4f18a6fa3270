import { AuthProvider, Logger, Output } from '../types';
import { ApiClient } from '../services/api/api-client';
import { MalformedResponseError, ServerUnreachableError } from '../core/error-handler';
import { formatJson } from '../core/formatting';
import { AuthenticationResult, IAuthManager } from './types';
import { AuthPoller, AuthPollerOptions } from './auth-poller';
import { BrowserOpener, openBrowser } from './browser';
import { TokenFileStorage } from './token-storage';

export interface AuthManagerOptions {
  /** Try to open the login page in a browser; otherwise only print it */
  launchBrowser: boolean;
  openBrowser: BrowserOpener;
  poller: Partial<AuthPollerOptions>;
}

/**
 * Runs the browser login: fetch the provider's login URL, open it, wait for
 * the server to report completion, store the token and check it against /me
 */
export class AuthManager implements IAuthManager {
  private readonly client: ApiClient;
  private readonly tokenStorage: TokenFileStorage;
  private readonly logger: Logger;
  private readonly output: Output;
  private readonly options: AuthManagerOptions;

  constructor(
    client: ApiClient,
    tokenStorage: TokenFileStorage,
    logger: Logger,
    output: Output,
    options: Partial<AuthManagerOptions> = {}
  ) {
    this.client = client;
    this.tokenStorage = tokenStorage;
    this.logger = logger;
    this.output = output;
    this.options = {
      launchBrowser: true,
      openBrowser,
      poller: {},
      ...options
    };
  }

  async authenticate(provider: AuthProvider): Promise<AuthenticationResult> {
    const { pollToken, authUrl } = await this.requestAuthUrl(provider);

    await this.promptBrowserLogin(authUrl);

    const accessToken = await this.waitForCompletion(pollToken);

    this.output.log('');
    this.output.log('=== JWT Token Retrieved ===');
    this.output.log(`Token: ${accessToken}`);
    this.output.log('');

    await this.tokenStorage.storeToken(accessToken);
    this.output.log(`✓ Token saved to ${this.tokenStorage.getFilePath()}`);
    this.output.log('');

    this.output.log('4. Testing token...');
    const userInfo = await this.client.withToken(accessToken).getCurrentUser();
    if (userInfo.success) {
      this.output.log('✓ Token is valid');
      this.output.log(`User info: ${formatJson(userInfo.body)}`);
    } else {
      this.output.log('⚠️  Token validation failed');
      this.logger.debug('Token validation response', { statusCode: userInfo.statusCode, error: userInfo.error });
    }

    return {
      provider,
      accessToken,
      tokenFile: this.tokenStorage.getFilePath(),
      tokenValid: userInfo.success,
      userInfo: userInfo.success ? userInfo.body : undefined
    };
  }

  private async requestAuthUrl(provider: AuthProvider): Promise<{ authUrl: string; pollToken: string }> {
    this.output.log(`1. Getting ${provider} authentication URL...`);
    const response = await this.client.getAuthUrl(provider);

    if (!response.success && response.statusCode === undefined) {
      throw new ServerUnreachableError(this.client.getBaseUrl(), response.error);
    }
    if (!response.success) {
      throw new MalformedResponseError(`Failed to get authentication URL: ${response.error ?? ''}`, response.body);
    }

    const authUrl = response.data?.auth_url;
    const pollToken = response.data?.poll_token;
    if (!authUrl || !pollToken) {
      throw new MalformedResponseError(
        `Failed to get authentication URL. Response: ${response.rawBody ?? ''}`,
        response.body
      );
    }

    this.output.log('✓ Authentication URL retrieved');
    this.output.log('');
    return { authUrl, pollToken };
  }

  private async promptBrowserLogin(authUrl: string): Promise<void> {
    this.output.log('2. Please authenticate in your browser:');
    this.output.log(authUrl);
    this.output.log('');

    if (this.options.launchBrowser) {
      this.output.log('Opening browser automatically...');
      const opened = await this.options.openBrowser(authUrl);
      if (!opened) {
        this.output.log('Please copy the above URL to your browser and complete authentication');
      }
    }

    this.output.log('');
    this.output.log('This script will continue automatically after authentication...');
    this.output.log('');
  }

  private async waitForCompletion(pollToken: string): Promise<string> {
    this.output.write('3. Waiting for authentication completion...');

    const poller = new AuthPoller(this.client, this.logger, {
      ...this.options.poller,
      onAttempt: (attempt, elapsedMs) => {
        this.output.write('.');
        this.options.poller.onAttempt?.(attempt, elapsedMs);
      }
    });

    try {
      const token = await poller.waitForToken(pollToken);
      this.output.log('');
      this.output.log('✓ Authentication completed!');
      return token;
    } catch (error) {
      // terminate the progress line before the error is printed
      this.output.log('');
      throw error;
    }
  }
}
