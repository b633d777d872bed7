/**
 * Environment Variable Overlay
 *
 * Lets environment variables override [Global] values before validation,
 * mostly so the ingest secret can stay out of the file.
 */

import { createMalformedConfigError } from '@filefollow/types';
import {
  cloneRawConfig,
  type GlobalSection,
  type RawConfig,
  type StringGlobalField,
  type TargetListField,
} from './schema.js';

const STRING_VAR_MAPPINGS: Record<string, StringGlobalField> = {
  FILEFOLLOW_INGEST_SECRET: 'Ingest_Secret',
  FILEFOLLOW_CONNECTION_TIMEOUT: 'Connection_Timeout',
  FILEFOLLOW_LOG_LEVEL: 'Log_Level',
  FILEFOLLOW_STATE_STORE_LOCATION: 'State_Store_Location',
  FILEFOLLOW_INGEST_CACHE_PATH: 'Ingest_Cache_Path',
};

/** Comma-separated lists */
const LIST_VAR_MAPPINGS: Record<string, TargetListField> = {
  FILEFOLLOW_CLEARTEXT_BACKEND_TARGET: 'Cleartext_Backend_Target',
  FILEFOLLOW_ENCRYPTED_BACKEND_TARGET: 'Encrypted_Backend_Target',
  FILEFOLLOW_PIPE_BACKEND_TARGET: 'Pipe_Backend_Target',
};

const VERIFY_REMOTE_VAR = 'FILEFOLLOW_VERIFY_REMOTE_CERTIFICATES';

function parseBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw createMalformedConfigError(`${name} must be "true" or "false", got "${value}"`, {
        component: 'env',
        details: { variable: name },
      });
  }
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Create a [Global] overlay from environment variables; empty values are ignored
 *
 * @throws FollowError (MALFORMED_CONFIG) for an unparseable boolean
 */
export function createEnvOverlay(env: NodeJS.ProcessEnv = process.env): Partial<GlobalSection> {
  const overlay: Partial<GlobalSection> = {};

  for (const [name, field] of Object.entries(STRING_VAR_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      overlay[field] = value;
    }
  }

  for (const [name, field] of Object.entries(LIST_VAR_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      overlay[field] = parseList(value);
    }
  }

  const verify = env[VERIFY_REMOTE_VAR];
  if (verify !== undefined && verify !== '') {
    overlay.Verify_Remote_Certificates = parseBoolean(VERIFY_REMOTE_VAR, verify);
  }

  return overlay;
}

/**
 * Apply environment overrides to a configuration tree, returning a new tree
 */
export function applyEnvOverlay(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const result = cloneRawConfig(config);
  result.Global = { ...result.Global, ...createEnvOverlay(env) };
  return result;
}
