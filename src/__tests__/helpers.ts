import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Output } from '../types';
import { CliContext } from '../cli/context';

export interface RecordingOutput extends Output {
  text(): string;
  lines(): string[];
}

/**
 * Output sink that keeps everything printed
 */
export function createRecordingOutput(): RecordingOutput {
  let buffer = '';
  return {
    log(line = ''): void {
      buffer += `${line}\n`;
    },
    write(text: string): void {
      buffer += text;
    },
    text: () => buffer,
    lines: () => buffer.split('\n')
  };
}

export function createTestContext(env: Record<string, string | undefined> = {}): CliContext & {
  output: RecordingOutput;
  printError: jest.Mock<void, [string]>;
} {
  return {
    output: createRecordingOutput(),
    printError: jest.fn<void, [string]>(),
    env
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

type FetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

/**
 * Replace global fetch with a handler keyed on the URL string
 */
export function stubFetch(handler: FetchHandler) {
  return jest
    .spyOn(global, 'fetch')
    .mockImplementation(async (input, init) => handler(String(input), init));
}

/**
 * URLs requested through a stubbed fetch, in call order
 */
export function requestedUrls(fetchSpy: ReturnType<typeof stubFetch>): string[] {
  return fetchSpy.mock.calls.map(([input]) => String(input));
}

export function requestHeaders(
  fetchSpy: ReturnType<typeof stubFetch>,
  callIndex: number
): Record<string, string> {
  const init = fetchSpy.mock.calls[callIndex]?.[1];
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
