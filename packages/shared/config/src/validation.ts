/**
 * Configuration Validation
 *
 * Enforces the cross-field rules the rest of the agent relies on. Validation
 * stops at the first violated rule, checking in a fixed order so the same
 * file always produces the same error.
 */

import * as path from 'node:path';
import {
  createInvalidTimeoutError,
  createInvalidTagNameError,
  createMissingBaseDirectoryError,
  createMissingSecretError,
  createNoBackendTargetsError,
  createNoFollowersError,
} from '@filefollow/types';
import { parseLogLevel } from '@filefollow/utils';
import { parseDuration } from './duration.js';
import { cloneRawConfig, sortedFollowerEntries, type FollowerEntry, type RawConfig } from './schema.js';
import { DEFAULT_TAG_NAME, findForbiddenTagChar } from './tags.js';

const COMPONENT = 'validator';

/**
 * Clean a directory path: collapse repeated separators, resolve `.` and `..`
 * segments and drop any trailing separator except on a root.
 */
export function cleanPath(dir: string): string {
  const normalized = path.normalize(dir);
  const { root } = path.parse(normalized);
  if (normalized.length > root.length && /[\\/]$/.test(normalized)) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Parse Connection_Timeout; blank means no timeout
 *
 * @throws FollowError (INVALID_TIMEOUT) if unparseable or negative
 */
export function parseConnectionTimeout(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '') {
    return 0;
  }

  let timeout: number;
  try {
    timeout = parseDuration(trimmed);
  } catch (error) {
    throw createInvalidTimeoutError(
      `Invalid connection timeout: ${error instanceof Error ? error.message : String(error)}`,
      {
        component: COMPONENT,
        details: { value },
        cause: error instanceof Error ? error : undefined,
      },
    );
  }

  if (timeout < 0) {
    throw createInvalidTimeoutError(`Invalid connection timeout "${value}": must not be negative`, {
      component: COMPONENT,
      details: { value },
    });
  }
  return timeout;
}

export function countTargets(config: RawConfig): number {
  return (
    config.Global.Cleartext_Backend_Target.length +
    config.Global.Encrypted_Backend_Target.length +
    config.Global.Pipe_Backend_Target.length
  );
}

/**
 * Validate a configuration tree
 *
 * The input is left untouched; the returned copy has tag names defaulted,
 * base directories cleaned and followers ordered by name. Validating an
 * already validated tree returns an equal tree.
 *
 * @throws FollowError for the first rule the tree violates
 */
export function verifyConfig(raw: RawConfig): RawConfig {
  const working = cloneRawConfig(raw);

  parseConnectionTimeout(working.Global.Connection_Timeout);

  if (working.Global.Ingest_Secret === '') {
    throw createMissingSecretError('Ingest-Secret not specified', { component: COMPONENT });
  }

  if (countTargets(working) === 0) {
    throw createNoBackendTargetsError('No backend targets specified', { component: COMPONENT });
  }

  const entries = sortedFollowerEntries(working.Follower);
  if (entries.length === 0) {
    throw createNoFollowersError('No followers specified', { component: COMPONENT });
  }

  const followers: Array<[string, FollowerEntry]> = [];
  for (const [name, entry] of entries) {
    if (entry.Base_Directory === '') {
      throw createMissingBaseDirectoryError(name, { component: COMPONENT });
    }
    if (entry.Tag_Name === '') {
      entry.Tag_Name = DEFAULT_TAG_NAME;
    }
    const forbidden = findForbiddenTagChar(entry.Tag_Name);
    if (forbidden !== undefined) {
      throw createInvalidTagNameError(name, entry.Tag_Name, {
        component: COMPONENT,
        details: { forbidden },
      });
    }
    entry.Base_Directory = cleanPath(entry.Base_Directory);
    followers.push([name, entry]);
  }
  working.Follower = Object.fromEntries(followers);

  return working;
}

/**
 * Non-fatal findings worth reporting at startup
 */
export function collectWarnings(config: RawConfig): string[] {
  const warnings: string[] = [];
  const global = config.Global;

  if (parseLogLevel(global.Log_Level) === null) {
    warnings.push(`Unknown Log-Level "${global.Log_Level}", using INFO`);
  }

  if (global.Encrypted_Backend_Target.length > 0 && !global.Verify_Remote_Certificates) {
    warnings.push('Encrypted backend targets configured with Verify-Remote-Certificates disabled');
  }

  const seen = new Set<string>();
  const groups: Array<[string, string[]]> = [
    ['Cleartext-Backend-Target', global.Cleartext_Backend_Target],
    ['Encrypted-Backend-Target', global.Encrypted_Backend_Target],
    ['Pipe-Backend-Target', global.Pipe_Backend_Target],
  ];
  for (const [label, targets] of groups) {
    for (const target of targets) {
      const key = `${label}=${target}`;
      if (seen.has(key)) {
        warnings.push(`Duplicate ${label} "${target}"`);
      }
      seen.add(key);
    }
  }

  for (const [name, entry] of sortedFollowerEntries(config.Follower)) {
    if (entry.File_Filter === '') {
      warnings.push(`Follower "${name}" has an empty File-Filter`);
    }
  }

  return warnings;
}
