/**
 * Shared TypeScript types for the filefollow CLI
 */

import type { FollowerEntry } from '@filefollow/config';

/**
 * Standard JSON output envelope for all CLI commands
 */
export interface CommandOutput<T = unknown> {
  /** Success flag */
  ok: boolean;
  /** Command name (e.g., "config validate") */
  command: string;
  /** Command-specific data (only present if ok=true) */
  data?: T;
  /** Error information (only present if ok=false) */
  error?: {
    /** Machine-readable error code */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Additional error context */
    details?: unknown;
  };
  /** Metadata about the command execution */
  meta: {
    /** ISO 8601 timestamp */
    timestamp: string;
    /** CLI version */
    version: string;
    /** Path to the configuration file used (if applicable) */
    config_path?: string;
    /** Command execution duration in milliseconds */
    duration_ms?: number;
  };
}

/**
 * Global flags shared by every command
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface ConfigCommandOptions extends GlobalOptions {
  /** Explicit path to file_follow.toml */
  config?: string;
}

/**
 * Loaded configuration as shown to operators; the secret is redacted
 */
export interface ConfigSummary {
  config_path: string;
  secret: string;
  targets: string[];
  tags: string[];
  timeout: string;
  verify_remote: boolean;
  log_level: string;
  state_path: string;
  cache: {
    enabled: boolean;
    path: string;
  };
  followers: Record<string, FollowerEntry>;
  warnings: string[];
}
