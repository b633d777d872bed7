/**
 * Config discovery for the CLI
 */

import * as path from 'node:path';
import { findConfigFile, getConfigSearchPaths } from '@filefollow/config';
import { ConfigNotFoundError } from './errors.js';

/**
 * Resolve the configuration file to use
 *
 * An explicit path wins; otherwise FILEFOLLOW_CONFIG_PATH, the current
 * directory and /etc/filefollow are searched in that order.
 *
 * @throws ConfigNotFoundError if nothing is found
 */
export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (explicit) {
    return path.resolve(explicit);
  }

  const searchPaths = getConfigSearchPaths(env);
  const found = findConfigFile(searchPaths);
  if (!found) {
    throw new ConfigNotFoundError(searchPaths);
  }
  return found;
}
