import { Output } from '../types';
import { consoleOutput } from '../core/logger';

/**
 * What a CLI run touches outside its own code. Tests pass their own.
 */
export interface CliContext {
  output: Output;
  printError: (line: string) => void;
  env: Record<string, string | undefined>;
}

export function createDefaultContext(): CliContext {
  return {
    output: consoleOutput,
    printError: (line) => console.error(line),
    env: process.env
  };
}
