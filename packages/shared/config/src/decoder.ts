/**
 * TOML Configuration Decoder
 *
 * Turns configuration text into a RawConfig tree. Section and key names are
 * matched case-insensitively and dashes stand in for underscores, so
 * `Ingest-Secret` and `ingest_secret` both fill Global.Ingest_Secret.
 */

import * as TOML from '@iarna/toml';
import type { Static, TObject } from '@sinclair/typebox';
import {
  createMalformedConfigError,
  formatValidationErrors,
  validate,
  type FollowError,
} from '@filefollow/types';
import {
  FollowerSectionSchema,
  GlobalSectionSchema,
  emptyGlobalSection,
  type FollowerEntry,
  type FollowerSectionInput,
  type GlobalSection,
  type GlobalSectionInput,
  type RawConfig,
} from './schema.js';

const COMPONENT = 'decoder';

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function canonicalKey(key: string): string {
  return key.toLowerCase().replace(/-/g, '_');
}

function malformed(message: string, details?: Record<string, unknown>): FollowError {
  return createMalformedConfigError(message, { component: COMPONENT, details });
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Check if a key is safe to use (not a prototype pollution vector)
 */
function isSafeKey(key: string): boolean {
  return key !== '__proto__';
}

/**
 * Rename the keys of a section table to the field names of its schema and
 * check the values against it
 */
function decodeSection<T extends TObject>(label: string, table: unknown, schema: T): Static<T> {
  if (!isTable(table)) {
    throw malformed(`${label} must be a section`, { section: label });
  }

  const fields = new Map(Object.keys(schema.properties).map((field) => [canonicalKey(field), field]));
  const result: Table = {};

  for (const [key, value] of Object.entries(table)) {
    const field = fields.get(canonicalKey(key));
    if (field === undefined) {
      throw malformed(`Unknown key "${key}" in ${label}`, { section: label, key });
    }
    if (Object.hasOwn(result, field)) {
      throw malformed(`Duplicate key "${key}" in ${label}`, { section: label, key });
    }
    result[field] = value;
  }

  const checked = validate(schema, result);
  if (!checked.success) {
    throw malformed(`Invalid value in ${label}: ${formatValidationErrors(checked.errors)}`, {
      section: label,
    });
  }
  return checked.data;
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

function decodeGlobal(table: unknown): GlobalSection {
  const input: GlobalSectionInput = decodeSection('[Global]', table, GlobalSectionSchema);
  const defaults = emptyGlobalSection();

  return {
    State_Store_Location: input.State_Store_Location ?? defaults.State_Store_Location,
    Ingest_Secret: input.Ingest_Secret ?? defaults.Ingest_Secret,
    Connection_Timeout: input.Connection_Timeout ?? defaults.Connection_Timeout,
    Verify_Remote_Certificates:
      input.Verify_Remote_Certificates ?? defaults.Verify_Remote_Certificates,
    Cleartext_Backend_Target: toList(input.Cleartext_Backend_Target),
    Encrypted_Backend_Target: toList(input.Encrypted_Backend_Target),
    Pipe_Backend_Target: toList(input.Pipe_Backend_Target),
    Log_Level: input.Log_Level ?? defaults.Log_Level,
    Ingest_Cache_Path: input.Ingest_Cache_Path ?? defaults.Ingest_Cache_Path,
  };
}

function decodeFollower(name: string, table: unknown): FollowerEntry {
  const label = `[Follower "${name}"]`;
  const input: FollowerSectionInput = decodeSection(label, table, FollowerSectionSchema);

  return {
    Base_Directory: input.Base_Directory ?? '',
    File_Filter: input.File_Filter ?? '',
    Tag_Name: input.Tag_Name ?? '',
    Ignore_Timestamps: input.Ignore_Timestamps ?? false,
    Assume_Local_Timezone: input.Assume_Local_Timezone ?? false,
  };
}

/**
 * Parse TOML text without interpreting it. One leading byte order mark is
 * skipped.
 *
 * @throws FollowError (MALFORMED_CONFIG) carrying the parser message verbatim
 */
export function parseToml(content: string): Table {
  try {
    return TOML.parse(content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content);
  } catch (error) {
    if (error instanceof Error) {
      throw createMalformedConfigError(error.message, { component: COMPONENT, cause: error });
    }
    throw createMalformedConfigError('Failed to parse TOML', { component: COMPONENT });
  }
}

/**
 * Decode configuration text into a RawConfig tree
 *
 * Missing sections decode to empty defaults; unknown sections or keys and
 * values of the wrong kind are rejected.
 *
 * @throws FollowError (MALFORMED_CONFIG)
 */
export function decodeConfig(content: string): RawConfig {
  const document = parseToml(content);

  let global: GlobalSection | undefined;
  const followers: Record<string, FollowerEntry> = {};

  for (const [section, value] of Object.entries(document)) {
    switch (canonicalKey(section)) {
      case 'global':
        if (global !== undefined) {
          throw malformed('Duplicate [Global] section', { section });
        }
        global = decodeGlobal(value);
        break;
      case 'follower':
        if (!isTable(value)) {
          throw malformed('[Follower] must contain named sections', { section });
        }
        for (const [name, entry] of Object.entries(value)) {
          if (!isSafeKey(name)) {
            throw malformed(`Reserved follower name "${name}"`, { follower: name });
          }
          if (Object.hasOwn(followers, name)) {
            throw malformed(`Duplicate follower "${name}"`, { follower: name });
          }
          followers[name] = decodeFollower(name, entry);
        }
        break;
      default:
        throw malformed(`Unknown section [${section}]`, { section });
    }
  }

  return {
    Global: global ?? emptyGlobalSection(),
    Follower: followers,
  };
}
