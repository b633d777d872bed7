/**
 * Read-only view over a configuration tree
 *
 * A FollowConfig owns a frozen deep copy of the tree it was built from.
 * Every method is a pure read; collections are freshly allocated per call.
 */

import { createNoConnectionsError, createNoTagsError } from '@filefollow/types';
import { tryParseDuration } from './duration.js';
import {
  cloneFollowerEntry,
  cloneRawConfig,
  sortedFollowerEntries,
  type FollowerEntry,
  type GlobalSection,
  type RawConfig,
} from './schema.js';

const COMPONENT = 'accessor';

export class FollowConfig {
  private readonly global: Readonly<GlobalSection>;
  private readonly entries: ReadonlyArray<readonly [string, Readonly<FollowerEntry>]>;

  constructor(config: RawConfig) {
    const copy = cloneRawConfig(config);
    Object.freeze(copy.Global.Cleartext_Backend_Target);
    Object.freeze(copy.Global.Encrypted_Backend_Target);
    Object.freeze(copy.Global.Pipe_Backend_Target);
    this.global = Object.freeze(copy.Global);
    this.entries = Object.freeze(
      sortedFollowerEntries(copy.Follower).map(
        ([name, entry]) => Object.freeze([name, Object.freeze(entry)] as const),
      ),
    );
  }

  /**
   * Connection URIs: cleartext targets as tcp://, encrypted as tls://, pipes
   * as pipe://, in that order
   *
   * @throws FollowError (NO_CONNECTIONS) when there are no targets at all
   */
  targets(): string[] {
    const conns = [
      ...this.global.Cleartext_Backend_Target.map((target) => `tcp://${target}`),
      ...this.global.Encrypted_Backend_Target.map((target) => `tls://${target}`),
      ...this.global.Pipe_Backend_Target.map((target) => `pipe://${target}`),
    ];
    if (conns.length === 0) {
      throw createNoConnectionsError('no connections specified', { component: COMPONENT });
    }
    return conns;
  }

  /**
   * Distinct tag names in follower order
   *
   * @throws FollowError (NO_TAGS) when no follower carries a tag
   */
  tags(): string[] {
    const tags: string[] = [];
    const seen = new Set<string>();
    for (const [, entry] of this.entries) {
      // unreachable after validation, which defaults every tag
      if (entry.Tag_Name === '') continue;
      if (!seen.has(entry.Tag_Name)) {
        seen.add(entry.Tag_Name);
        tags.push(entry.Tag_Name);
      }
    }
    if (tags.length === 0) {
      throw createNoTagsError('No tags specified', { component: COMPONENT });
    }
    return tags;
  }

  verifyRemote(): boolean {
    return this.global.Verify_Remote_Certificates;
  }

  /**
   * Connection timeout in milliseconds; 0 means none is enforced
   */
  timeout(): number {
    const trimmed = this.global.Connection_Timeout.trim();
    if (trimmed === '') return 0;
    const timeout = tryParseDuration(trimmed);
    return timeout !== null && timeout > 0 ? timeout : 0;
  }

  secret(): string {
    return this.global.Ingest_Secret;
  }

  logLevel(): string {
    return this.global.Log_Level;
  }

  cachePath(): string {
    return this.global.Ingest_Cache_Path;
  }

  cacheEnabled(): boolean {
    return this.global.Ingest_Cache_Path !== '';
  }

  statePath(): string {
    return this.global.State_Store_Location;
  }

  /**
   * Follower name to entry; entries are copies, so callers may modify them
   */
  followers(): Record<string, FollowerEntry> {
    return Object.fromEntries(this.entries.map(([name, entry]) => [name, cloneFollowerEntry(entry)]));
  }

  /**
   * Deep copy of the underlying tree
   */
  toRawConfig(): RawConfig {
    return cloneRawConfig({ Global: this.global, Follower: this.followers() });
  }
}
