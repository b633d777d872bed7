/**
 * Custom error types for the filefollow CLI
 */

import { isFollowError } from '@filefollow/types';

export class CLIError extends Error {
  public details?: unknown;

  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'CLIError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigNotFoundError extends CLIError {
  constructor(searchedPaths: string[]) {
    const pathList = searchedPaths.map((p) => `  - ${p}`).join('\n');
    super(
      'No file_follow.toml configuration file found',
      'CONFIG_NOT_FOUND',
      2,
      `Pass --config <path>, or set FILEFOLLOW_CONFIG_PATH to specify the location.\n\nSearched paths:\n${pathList}`
    );
  }
}

/**
 * Configuration errors exit with 2, anything else with 1
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CLIError) return error.exitCode;
  if (isFollowError(error)) return 2;
  return 1;
}

/**
 * Machine-readable code for the JSON envelope
 */
export function errorCodeFor(error: unknown): string {
  if (error instanceof CLIError || isFollowError(error)) return error.code;
  return 'UNKNOWN_ERROR';
}
