/**
 * Main CLI program definition using Commander.js
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { ConfigCommandOptions, GlobalOptions } from './core/types.js';

// Get CLI version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

const version = readVersion();

export function createProgram(): Command {
  const program = new Command();

  program
    .name('filefollow')
    .description('Validate and inspect file follower configuration')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose output');

  const globalOptions = (): GlobalOptions => program.opts<GlobalOptions>();

  // Config subcommands
  const configCmd = program.command('config').description('Configuration management');

  configCmd
    .command('validate')
    .description('Validate file_follow.toml configuration')
    .option('-c, --config <path>', 'Path to file_follow.toml')
    .action(async (options: ConfigCommandOptions) => {
      const { validateCommand } = await import('./commands/config/validate.js');
      await validateCommand({ ...globalOptions(), ...options });
    });

  configCmd
    .command('show')
    .description('Show the validated configuration with the ingest secret redacted')
    .option('-c, --config <path>', 'Path to file_follow.toml')
    .action(async (options: ConfigCommandOptions) => {
      const { showCommand } = await import('./commands/config/show.js');
      await showCommand({ ...globalOptions(), ...options });
    });

  return program;
}

/**
 * Get CLI version
 */
export function getVersion(): string {
  return version;
}
