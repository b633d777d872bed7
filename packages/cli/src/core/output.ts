/**
 * Output formatter for the filefollow CLI
 * Handles both pretty (human-readable) and JSON output modes
 */

import chalk from 'chalk';
import { isFollowError } from '@filefollow/types';
import type { CommandOutput } from './types.js';
import { CLIError, errorCodeFor, exitCodeFor } from './errors.js';

export class OutputFormatter {
  private readonly startTime: number;
  private configPath?: string;

  constructor(
    private readonly jsonMode: boolean,
    private readonly command: string,
    private readonly version: string,
    private readonly verbose: boolean = false
  ) {
    this.startTime = Date.now();
  }

  isJsonMode(): boolean {
    return this.jsonMode;
  }

  /**
   * Record the configuration file the command ended up using
   */
  setConfigPath(configPath: string): void {
    this.configPath = configPath;
  }

  /**
   * Output success result
   */
  success<T>(data: T): void {
    if (this.jsonMode) {
      this.outputJson({
        ok: true,
        command: this.command,
        data,
        meta: this.buildMeta(),
      });
    }
    // For pretty mode, commands handle their own output
  }

  /**
   * Output error and exit
   */
  error(error: unknown): never {
    if (this.jsonMode) {
      this.outputJson(this.buildErrorOutput(error));
    } else {
      this.prettyError(error);
    }

    process.exit(exitCodeFor(error));
  }

  buildErrorOutput(error: unknown): CommandOutput {
    return {
      ok: false,
      command: this.command,
      error: {
        code: errorCodeFor(error),
        message: error instanceof Error ? error.message : String(error),
        details: error instanceof CLIError || isFollowError(error) ? error.details : undefined,
      },
      meta: this.buildMeta(),
    };
  }

  private prettyError(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red.bold('✗ Error:'), message);

    if (isFollowError(error)) {
      console.error(chalk.dim(`  ${error.code}`));
    }

    if (error instanceof CLIError && error.suggestion) {
      console.error();
      console.error(chalk.yellow('Suggestion:'));
      console.error(this.indent(error.suggestion, 2));
    }

    if (this.verbose && error instanceof Error && error.stack) {
      console.error();
      console.error(chalk.dim('Stack trace:'));
      console.error(chalk.dim(error.stack));
    }
  }

  private outputJson(output: CommandOutput): void {
    console.log(JSON.stringify(output, null, 2));
  }

  private buildMeta(): CommandOutput['meta'] {
    return {
      timestamp: new Date().toISOString(),
      version: this.version,
      config_path: this.configPath,
      duration_ms: Date.now() - this.startTime,
    };
  }

  private indent(text: string, spaces: number): string {
    const prefix = ' '.repeat(spaces);
    return text
      .split('\n')
      .map((line) => prefix + line)
      .join('\n');
  }
}

/**
 * Helper functions for pretty output
 */
export const prettyOutput = {
  success(message: string): void {
    console.log(chalk.green('✓'), message);
  },

  info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  },

  warn(message: string): void {
    console.log(chalk.yellow('⚠'), message);
  },

  header(message: string): void {
    console.log();
    console.log(chalk.bold(message));
  },

  keyValue(key: string, value: string, spaces: number = 2): void {
    const prefix = ' '.repeat(spaces);
    console.log(`${prefix}${chalk.cyan(key)}: ${value}`);
  },

  list(items: string[], spaces: number = 2): void {
    const prefix = ' '.repeat(spaces);
    for (const item of items) {
      console.log(`${prefix}- ${item}`);
    }
  },

  blank(): void {
    console.log();
  },
};
