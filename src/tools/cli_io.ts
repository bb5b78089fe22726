/**
 * Shared CLI plumbing: output sinks, exit codes, entry-point detection
 * and error-to-exit-code mapping.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { isDocumentError } from '../document/errors.js';
import { ConfigError } from '../config/index.js';

// Exit codes
export const EXIT_OK = 0;
export const EXIT_IO_ERROR = 1;
export const EXIT_PARSE_ERROR = 2;
export const EXIT_DOCUMENT_ERROR = 3;
export const EXIT_ASSERTION_FAILED = 4;

/**
 * Where a tool writes. Lines are passed without a trailing newline.
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/**
 * Raised for bad command-line usage.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * True when the module at `moduleUrl` is the process entry point,
 * following symlinks (npm bin links).
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return moduleUrl === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return moduleUrl === pathToFileURL(entry).href;
  }
}

/**
 * Report an error on stderr and map it to an exit code.
 * Errors that are not from this project are rethrown.
 */
export function reportError(err: unknown, io: CliIO): number {
  if (isDocumentError(err)) {
    io.stderr(`${err.code}: ${err.message}`);
    switch (err.code) {
      case 'IO_ERROR':
        return EXIT_IO_ERROR;
      case 'PARSE_ERROR':
        return EXIT_PARSE_ERROR;
      case 'PATCH_ASSERTION_FAILED':
        return EXIT_ASSERTION_FAILED;
      default:
        return EXIT_DOCUMENT_ERROR;
    }
  }
  if (err instanceof UsageError || err instanceof ConfigError) {
    io.stderr(`ERROR: ${err.message}`);
    return EXIT_IO_ERROR;
  }
  throw err;
}

/**
 * Read the value following an option.
 */
export function takeValue(args: readonly string[], i: number, name: string): string {
  const value = args[i + 1];
  if (value === undefined || (value.startsWith('--') && value.length > 2)) {
    throw new UsageError(`${name} requires a value`);
  }
  return value;
}
