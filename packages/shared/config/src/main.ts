/**
 * Main Configuration Loading
 *
 * Startup entry point: find the file, read it, apply environment
 * overrides, validate, and report warnings.
 */

import { createIOError } from '@filefollow/types';
import { createLogger, parseLogLevel, type Logger } from '@filefollow/utils';
import { FollowConfig } from './accessor.js';
import { decodeConfig } from './decoder.js';
import { applyEnvOverlay } from './env.js';
import { findConfigFile, getConfigSearchPaths, readConfigSource } from './loader.js';
import { collectWarnings, verifyConfig } from './validation.js';

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Path to file_follow.toml; searched for when omitted */
  configPath?: string;
  /** Whether to apply environment variable overrides (default: true) */
  applyEnv?: boolean;
  /** Environment to read overrides and the search path override from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Logger for warnings; defaults to a console logger at the configured Log-Level */
  logger?: Logger;
}

/**
 * Load, overlay, and validate configuration in one call
 *
 * @throws FollowError if the file cannot be found, read, decoded or validated
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): FollowConfig {
  const { applyEnv = true, env = process.env } = options;

  const searchPaths = getConfigSearchPaths(env);
  const configPath = options.configPath ?? findConfigFile(searchPaths);
  if (configPath === null) {
    throw createIOError(`No configuration file found in: ${searchPaths.join(', ')}`, {
      component: 'loader',
      details: { searchPaths },
    });
  }

  let raw = decodeConfig(readConfigSource(configPath));
  if (applyEnv) {
    raw = applyEnvOverlay(raw, env);
  }
  const config = new FollowConfig(verifyConfig(raw));

  const logger = options.logger ?? createLogger('config', parseLogLevel(config.logLevel()) ?? 'INFO');
  for (const warning of collectWarnings(config.toRawConfig())) {
    logger.warn(warning);
  }
  logger.info(
    `Loaded ${configPath}: ${Object.keys(config.followers()).length} follower(s), ${config.targets().length} target(s)`,
  );

  return config;
}
