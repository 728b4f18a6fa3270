import * as fs from 'fs/promises';
import * as path from 'path';
import { TOKEN_FILE_KEY } from '../core/constants';
import { TokenFileError } from '../core/error-handler';

const ASSIGNMENT_PREFIXES = [`export ${TOKEN_FILE_KEY}=`, `${TOKEN_FILE_KEY}=`];

/**
 * Render the token as a shell-sourceable assignment line
 */
export function formatTokenFile(token: string): string {
  return `${TOKEN_FILE_KEY}="${token}"\n`;
}

/**
 * Extract the token from file content.
 * Accepts `JWT_TOKEN=...` and `export JWT_TOKEN=...`, quoted or not.
 * Returns null when the content is not a single token assignment.
 */
export function parseTokenFile(content: string): string | null {
  const line = content.trim();
  if (line.includes('\n')) {
    return null;
  }

  const prefix = ASSIGNMENT_PREFIXES.find((candidate) => line.startsWith(candidate));
  if (!prefix) {
    return null;
  }

  const token = line
    .slice(prefix.length)
    .trim()
    .replace(/^["']+|["']+$/g, '');

  return token.length > 0 ? token : null;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Plaintext token file in the working directory, readable with `source`
 */
export class TokenFileStorage {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async storeToken(token: string): Promise<void> {
    if (token.length === 0 || /["\r\n]/.test(token)) {
      throw new TokenFileError('Refusing to store an empty or multi-line token', this.filePath);
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, formatTokenFile(token), { mode: 0o600 });
    } catch (error) {
      throw new TokenFileError(
        `Failed to write token file ${this.filePath}`,
        this.filePath,
        'Check that the directory is writable',
        error
      );
    }
  }

  /**
   * Read the stored token. Null when the file does not exist.
   * Throws TokenFileError when the file exists but is malformed.
   */
  async getToken(): Promise<string | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new TokenFileError(`Failed to read token file ${this.filePath}`, this.filePath, undefined, error);
    }

    const token = parseTokenFile(content);
    if (token === null) {
      throw new TokenFileError(
        'Invalid token file format',
        this.filePath,
        `Expected a single line ${TOKEN_FILE_KEY}="<token>"`
      );
    }
    return token;
  }

  /**
   * Like getToken, but a missing file is an error too
   */
  async loadToken(): Promise<string> {
    const token = await this.getToken();
    if (token === null) {
      throw new TokenFileError(
        `JWT token file not found: ${this.filePath}`,
        this.filePath,
        'Run token-retriever first'
      );
    }
    return token;
  }
}
