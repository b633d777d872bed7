/**
 * Configuration Schema for filefollow
 *
 * Two views of the same file: the TypeBox schemas describe what the TOML
 * decoder may hand us (optional keys, single-or-list targets), and the
 * interfaces describe the normalized tree every later stage works on.
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Backend target lists accept a single string or an array of strings
 */
const TargetListSchema = Type.Union([Type.String(), Type.Array(Type.String())]);

export const GlobalSectionSchema = Type.Object(
  {
    State_Store_Location: Type.Optional(Type.String()),
    Ingest_Secret: Type.Optional(Type.String()),
    Connection_Timeout: Type.Optional(Type.String()),
    Verify_Remote_Certificates: Type.Optional(Type.Boolean()),
    Cleartext_Backend_Target: Type.Optional(TargetListSchema),
    Encrypted_Backend_Target: Type.Optional(TargetListSchema),
    Pipe_Backend_Target: Type.Optional(TargetListSchema),
    Log_Level: Type.Optional(Type.String()),
    Ingest_Cache_Path: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

export const FollowerSectionSchema = Type.Object(
  {
    Base_Directory: Type.Optional(Type.String()),
    File_Filter: Type.Optional(Type.String()),
    Tag_Name: Type.Optional(Type.String()),
    Ignore_Timestamps: Type.Optional(Type.Boolean()),
    Assume_Local_Timezone: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export type GlobalSectionInput = Static<typeof GlobalSectionSchema>;
export type FollowerSectionInput = Static<typeof FollowerSectionSchema>;

/**
 * [Global] section after decoding, every key present
 */
export interface GlobalSection {
  /** Location of the agent's state object */
  State_Store_Location: string;
  Ingest_Secret: string;
  /** Duration such as "30s" or "1m30s"; blank means no timeout */
  Connection_Timeout: string;
  Verify_Remote_Certificates: boolean;
  Cleartext_Backend_Target: string[];
  Encrypted_Backend_Target: string[];
  Pipe_Backend_Target: string[];
  Log_Level: string;
  /** Empty disables the on-disk ingest cache */
  Ingest_Cache_Path: string;
}

/**
 * One [Follower.<name>] section
 */
export interface FollowerEntry {
  /** Directory being watched */
  Base_Directory: string;
  /** Glob matched against file names under Base_Directory */
  File_Filter: string;
  Tag_Name: string;
  /** Stamp lines with arrival time instead of extracting timestamps */
  Ignore_Timestamps: boolean;
  Assume_Local_Timezone: boolean;
}

export interface RawConfig {
  Global: GlobalSection;
  Follower: Record<string, FollowerEntry>;
}

export type StringGlobalField =
  | 'State_Store_Location'
  | 'Ingest_Secret'
  | 'Connection_Timeout'
  | 'Log_Level'
  | 'Ingest_Cache_Path';

export type TargetListField =
  | 'Cleartext_Backend_Target'
  | 'Encrypted_Backend_Target'
  | 'Pipe_Backend_Target';

export function emptyGlobalSection(): GlobalSection {
  return {
    State_Store_Location: '',
    Ingest_Secret: '',
    Connection_Timeout: '',
    Verify_Remote_Certificates: false,
    Cleartext_Backend_Target: [],
    Encrypted_Backend_Target: [],
    Pipe_Backend_Target: [],
    Log_Level: '',
    Ingest_Cache_Path: '',
  };
}

export function cloneFollowerEntry(entry: FollowerEntry): FollowerEntry {
  return {
    Base_Directory: entry.Base_Directory,
    File_Filter: entry.File_Filter,
    Tag_Name: entry.Tag_Name,
    Ignore_Timestamps: entry.Ignore_Timestamps,
    Assume_Local_Timezone: entry.Assume_Local_Timezone,
  };
}

/**
 * Deep copy of a configuration tree; no arrays or records are shared
 */
export function cloneRawConfig(config: RawConfig): RawConfig {
  const global = config.Global;
  return {
    Global: {
      ...global,
      Cleartext_Backend_Target: [...global.Cleartext_Backend_Target],
      Encrypted_Backend_Target: [...global.Encrypted_Backend_Target],
      Pipe_Backend_Target: [...global.Pipe_Backend_Target],
    },
    Follower: Object.fromEntries(
      Object.entries(config.Follower).map(([name, entry]) => [name, cloneFollowerEntry(entry)]),
    ),
  };
}

/**
 * Follower entries ordered by name (code unit order), the single iteration
 * order used for validation errors and derived lists
 */
export function sortedFollowerEntries(
  followers: Record<string, FollowerEntry>,
): Array<[string, FollowerEntry]> {
  return Object.entries(followers).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
