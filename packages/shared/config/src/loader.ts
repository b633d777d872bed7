/**
 * Configuration Loader
 *
 * Reads a bounded-size configuration file in one pass, decodes it and hands
 * back a validated FollowConfig.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  createConfigTooLargeError,
  createIOError,
  createIncompleteReadError,
} from '@filefollow/types';
import { FollowConfig } from './accessor.js';
import { decodeConfig } from './decoder.js';
import { verifyConfig } from './validation.js';

/** 2 MiB; configuration is operator-authored text, never bulk data */
export const MAX_CONFIG_SIZE = 1024 * 1024 * 2;

export const CONFIG_FILE_NAME = 'file_follow.toml';

const COMPONENT = 'loader';

function causeOf(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Search paths for file_follow.toml in order of precedence
 */
export function getConfigSearchPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const paths: string[] = [];

  // 1. Explicit override
  const override = env.FILEFOLLOW_CONFIG_PATH;
  if (override) {
    paths.push(path.resolve(override));
  }

  // 2. Current directory
  paths.push(path.join(process.cwd(), CONFIG_FILE_NAME));

  // 3. System location
  paths.push(path.join('/etc', 'filefollow', CONFIG_FILE_NAME));

  return paths;
}

/**
 * Find file_follow.toml in search paths
 */
export function findConfigFile(searchPaths?: string[]): string | null {
  const paths = searchPaths ?? getConfigSearchPaths();

  for (const configPath of paths) {
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Read a configuration file into memory
 *
 * The file is read with a single call into a buffer sized to the reported
 * length; a short read is an error, not a retry point.
 *
 * @throws FollowError IO (open or stat), CONFIG_TOO_LARGE, or INCOMPLETE_READ (read failed or
 *   came up short)
 */
export function readConfigSource(filePath: string): string {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    throw createIOError(`Failed to open config file ${filePath}: ${errorMessage(error)}`, {
      component: COMPONENT,
      details: { path: filePath },
      cause: causeOf(error),
    });
  }

  try {
    let stats: fs.Stats;
    try {
      stats = fs.fstatSync(fd);
    } catch (error) {
      throw createIOError(`Failed to stat config file ${filePath}: ${errorMessage(error)}`, {
        component: COMPONENT,
        details: { path: filePath },
        cause: causeOf(error),
      });
    }

    if (!stats.isFile()) {
      throw createIncompleteReadError(`Failed to read config file ${filePath}: not a regular file`, {
        component: COMPONENT,
        details: { path: filePath },
      });
    }

    const size = stats.size;
    if (size > MAX_CONFIG_SIZE) {
      throw createConfigTooLargeError(
        `Config file ${filePath} far too large: ${size} bytes exceeds ${MAX_CONFIG_SIZE}`,
        { component: COMPONENT, details: { path: filePath, size, limit: MAX_CONFIG_SIZE } },
      );
    }

    const content = Buffer.alloc(size);
    let bytesRead: number;
    try {
      bytesRead = fs.readSync(fd, content, 0, size, 0);
    } catch (error) {
      throw createIncompleteReadError(
        `Failed to read config file ${filePath}: ${errorMessage(error)}`,
        { component: COMPONENT, details: { path: filePath }, cause: causeOf(error) },
      );
    }

    if (bytesRead !== size) {
      throw createIncompleteReadError(
        `Failed to read config file ${filePath}: read ${bytesRead} of ${size} bytes`,
        { component: COMPONENT, details: { path: filePath, expected: size, read: bytesRead } },
      );
    }

    return content.toString('utf-8');
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Load, decode and validate a configuration file
 *
 * @throws FollowError for any I/O, decoding or validation failure
 */
export function loadConfig(filePath: string): FollowConfig {
  const raw = decodeConfig(readConfigSource(filePath));
  return new FollowConfig(verifyConfig(raw));
}
