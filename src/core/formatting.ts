import { ApiResponse } from '../types';

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Printable form of a response body: indented JSON when it parsed,
 * the raw text otherwise
 */
export function formatResponseBody<T>(response: ApiResponse<T>): string {
  if (response.body !== undefined) {
    return formatJson(response.body);
  }
  if (response.rawBody !== undefined) {
    return response.rawBody;
  }
  return `Request failed: ${response.error ?? 'unknown error'}`;
}
