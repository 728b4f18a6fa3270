import { ApiResponse, ClockFn, Logger, SleepFn } from '../types';
import { DEFAULT_CONFIG, POLL_STATUS } from '../core/constants';
import { AuthenticationFailedError, AuthTimeoutError, MalformedResponseError } from '../core/error-handler';
import { PollResponse } from '../services/api/types';

export interface PollClient {
  pollAuth(pollToken: string): Promise<ApiResponse<PollResponse>>;
}

export interface AuthPollerOptions {
  /** Delay between two status requests in ms */
  interval: number;
  /** Wall-clock budget in ms, measured from the first request */
  timeout: number;
  sleep: SleepFn;
  now: ClockFn;
  /** Called before each status request */
  onAttempt?: (attempt: number, elapsedMs: number) => void;
}

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Fixed-interval poll of the login status endpoint.
 *
 * A request that fails outright, returns a non-2xx status, an unreadable
 * body or a body without a string `status` counts as "still pending". The
 * loop stops on `completed` (yielding the token), on any other non-pending
 * status, or once more than `timeout` ms have elapsed before an attempt, so
 * it overshoots the budget by at most one interval plus one request.
 */
export class AuthPoller {
  private readonly client: PollClient;
  private readonly logger: Logger;
  private readonly options: AuthPollerOptions;

  constructor(client: PollClient, logger: Logger, options: Partial<AuthPollerOptions> = {}) {
    this.client = client;
    this.logger = logger;
    this.options = {
      interval: DEFAULT_CONFIG.POLL_INTERVAL,
      timeout: DEFAULT_CONFIG.AUTH_TIMEOUT,
      sleep: defaultSleep,
      now: Date.now,
      ...options
    };
  }

  async waitForToken(pollToken: string): Promise<string> {
    const { interval, timeout, sleep, now, onAttempt } = this.options;
    const startTime = now();
    let attempt = 0;

    while (true) {
      const elapsed = now() - startTime;
      if (elapsed > timeout) {
        this.logger.debug(`Giving up after ${attempt} poll attempts`);
        throw new AuthTimeoutError(timeout);
      }

      attempt++;
      onAttempt?.(attempt, elapsed);

      const response = await this.client.pollAuth(pollToken);
      const status = response.success ? response.data?.status : undefined;

      if (!response.success || !response.data || status === undefined) {
        this.logger.debug(`Poll attempt ${attempt} inconclusive: ${response.error ?? 'unexpected body'}`);
        await sleep(interval);
        continue;
      }

      if (status === POLL_STATUS.COMPLETED) {
        const jwt = response.data.jwt;
        if (!jwt) {
          throw new MalformedResponseError('Authentication completed but no token was returned', response.body);
        }
        this.logger.debug(`Authentication completed after ${attempt} poll attempts`);
        return jwt;
      }

      if (status === POLL_STATUS.PENDING) {
        await sleep(interval);
        continue;
      }

      throw new AuthenticationFailedError(status, response.body);
    }
  }
}
