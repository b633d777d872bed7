/**
 * Shared configuration loading for config commands
 */

import { loadAndValidateConfig, type FollowConfig } from '@filefollow/config';
import { createLogger, type Logger } from '@filefollow/utils';
import { resolveConfigPath } from './config-discovery.js';
import type { ConfigCommandOptions } from './types.js';

export interface LoadedConfig {
  config: FollowConfig;
  configPath: string;
  warnings: string[];
}

/**
 * Resolve, load and validate the configuration for a command.
 * Warnings raised during loading are captured for the command's own output.
 */
export function loadForCommand(
  options: ConfigCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): LoadedConfig {
  const configPath = resolveConfigPath(options.config, env);
  const warnings: string[] = [];
  const debug = createLogger('config', options.verbose && !options.json ? 'DEBUG' : 'OFF');

  const logger: Logger = {
    debug: (message, ...args) => debug.debug(message, ...args),
    info: (message, ...args) => debug.info(message, ...args),
    warn: (message) => {
      warnings.push(message);
    },
    error: (message, ...args) => debug.error(message, ...args),
  };

  const config = loadAndValidateConfig({ configPath, env, logger });
  return { config, configPath, warnings };
}
