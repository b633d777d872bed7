/**
 * Operator-facing summary of a loaded configuration
 */

import { formatDuration, type FollowConfig } from '@filefollow/config';
import type { ConfigSummary } from './types.js';

const REDACTED = '********';

/**
 * Mask a secret, keeping only whether one is set
 */
export function redactSecret(secret: string): string {
  return secret === '' ? '' : REDACTED;
}

export function summarizeConfig(
  config: FollowConfig,
  configPath: string,
  warnings: string[] = []
): ConfigSummary {
  const timeout = config.timeout();

  return {
    config_path: configPath,
    secret: redactSecret(config.secret()),
    targets: config.targets(),
    tags: config.tags(),
    timeout: timeout > 0 ? formatDuration(timeout) : 'none',
    verify_remote: config.verifyRemote(),
    log_level: config.logLevel() || 'INFO',
    state_path: config.statePath(),
    cache: {
      enabled: config.cacheEnabled(),
      path: config.cachePath(),
    },
    followers: config.followers(),
    warnings,
  };
}
