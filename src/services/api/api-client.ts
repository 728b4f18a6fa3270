import { z } from 'zod';
import { ApiResponse, AuthProvider, Logger } from '../../types';
import { API_ENDPOINTS, DEFAULT_CONFIG } from '../../core/constants';
import { getErrorMessage } from '../../core/error-handler';
import {
  AccessibilityResult,
  AuthUrlResponse,
  AuthUrlResponseSchema,
  PollResponse,
  PollResponseSchema,
  PresignedUrlResponse,
  PresignedUrlResponseSchema,
  ProjectsListResponse,
  ProjectsListResponseSchema,
  TasksListResponse,
  TasksListResponseSchema
} from './types';

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface RequestOptions {
  authenticated?: boolean;
  headers?: Record<string, string>;
}

const USER_AGENT = 'api-smoke-tools/1.0';

/**
 * Describe a fetch failure, including the low-level cause node attaches
 * (ECONNREFUSED and friends)
 */
function describeFetchError(error: unknown): string {
  const message = getErrorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message}: ${error.cause.message}`;
  }
  return message;
}

/**
 * HTTP client for the API. Requests are sent one at a time and never
 * retried; failures come back as unsuccessful ApiResponse values.
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly token?: string;

  constructor(baseUrl: string, logger: Logger, token?: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.logger = logger;
    this.token = token;

    this.logger.debug(`ApiClient initialized with base URL: ${this.baseUrl}`);
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Client sending the given bearer token on authenticated endpoints
   */
  withToken(token: string): ApiClient {
    return new ApiClient(this.baseUrl, this.logger, token);
  }

  private async makeRequest<T>(
    endpoint: string,
    schema: ResponseSchema<T>,
    options: RequestOptions = {}
  ): Promise<ApiResponse<T>> {
    const url = `${this.baseUrl}${endpoint}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      ...options.headers
    };

    if (options.authenticated) {
      if (!this.token) {
        return {
          success: false,
          error: 'No bearer token available',
          statusCode: 401
        };
      }
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    this.logger.debug(`GET ${url}`);

    let response: Response;
    let rawBody: string;
    try {
      response = await fetch(url, { method: 'GET', headers });
      rawBody = await response.text();
    } catch (error) {
      const message = describeFetchError(error);
      this.logger.debug(`Request to ${url} failed: ${message}`);
      return {
        success: false,
        error: message
      };
    }

    let body: unknown;
    let parseError: string | undefined;
    try {
      body = JSON.parse(rawBody);
    } catch (error) {
      parseError = `Response is not valid JSON: ${getErrorMessage(error)}`;
    }

    const parsed = body === undefined ? undefined : schema.safeParse(body);
    const data = parsed?.success ? parsed.data : undefined;

    if (!response.ok) {
      this.logger.debug(`Request to ${url} returned HTTP ${response.status}`);
      return {
        success: false,
        data,
        body,
        rawBody,
        error: `HTTP ${response.status}: ${rawBody}`,
        statusCode: response.status
      };
    }

    return {
      success: parseError === undefined,
      data,
      body,
      rawBody,
      error: parseError,
      statusCode: response.status
    };
  }

  /**
   * Start a browser login with the given provider
   */
  async getAuthUrl(provider: AuthProvider): Promise<ApiResponse<AuthUrlResponse>> {
    return this.makeRequest(`${API_ENDPOINTS.AUTH}/${provider}`, AuthUrlResponseSchema);
  }

  /**
   * Ask whether the browser login behind the poll token has finished
   */
  async pollAuth(pollToken: string): Promise<ApiResponse<PollResponse>> {
    return this.makeRequest(
      `${API_ENDPOINTS.AUTH_POLL}/${encodeURIComponent(pollToken)}`,
      PollResponseSchema
    );
  }

  async getHealth(): Promise<ApiResponse<unknown>> {
    return this.makeRequest(API_ENDPOINTS.HEALTH, z.unknown());
  }

  async getCurrentUser(): Promise<ApiResponse<unknown>> {
    return this.makeRequest(API_ENDPOINTS.CURRENT_USER, z.unknown(), { authenticated: true });
  }

  async listProjects(): Promise<ApiResponse<ProjectsListResponse>> {
    return this.makeRequest(API_ENDPOINTS.PROJECTS, ProjectsListResponseSchema, {
      authenticated: true
    });
  }

  async listStorageObjects(projectId: string): Promise<ApiResponse<unknown>> {
    return this.makeRequest(`${this.projectPath(projectId)}/storage`, z.unknown(), {
      authenticated: true
    });
  }

  /**
   * Request a time-limited download URL for a storage object
   */
  async getPresignedUrl(
    projectId: string,
    key: string,
    expiresIn: number = DEFAULT_CONFIG.PRESIGNED_URL_EXPIRES_IN
  ): Promise<ApiResponse<PresignedUrlResponse>> {
    return this.makeRequest(
      `${this.projectPath(projectId)}/storage/${encodeURIComponent(key)}/url`,
      PresignedUrlResponseSchema,
      {
        authenticated: true,
        headers: { 'x-expires-in': String(expiresIn) }
      }
    );
  }

  async listTasks(projectId: string): Promise<ApiResponse<TasksListResponse>> {
    return this.makeRequest(`${this.projectPath(projectId)}/tasks`, TasksListResponseSchema, {
      authenticated: true
    });
  }

  /**
   * Plain GET against an arbitrary URL (a presigned download link), bounded by a timeout
   */
  async checkUrlAccessible(
    url: string,
    timeoutMs: number = DEFAULT_CONFIG.ACCESSIBILITY_TIMEOUT
  ): Promise<AccessibilityResult> {
    try {
      const response = await fetch(url, {
        method: 'GET',
        signal: AbortSignal.timeout(timeoutMs)
      });
      await response.body?.cancel();
      return { statusCode: response.status };
    } catch (error) {
      return { statusCode: 0, error: describeFetchError(error) };
    }
  }

  private projectPath(projectId: string): string {
    return `${API_ENDPOINTS.PROJECTS}/${encodeURIComponent(projectId)}`;
  }
}
