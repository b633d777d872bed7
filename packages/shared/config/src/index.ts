/**
 * @filefollow/config - Configuration System
 *
 * Loads file_follow.toml, validates it, and exposes a read-only view of the
 * result to the rest of the agent.
 */

// Export schema types
export type {
  RawConfig,
  GlobalSection,
  FollowerEntry,
  GlobalSectionInput,
  FollowerSectionInput,
  StringGlobalField,
  TargetListField,
} from './schema.js';
export {
  GlobalSectionSchema,
  FollowerSectionSchema,
  emptyGlobalSection,
  cloneRawConfig,
  sortedFollowerEntries,
} from './schema.js';

// Export loader functions
export {
  loadConfig,
  readConfigSource,
  findConfigFile,
  getConfigSearchPaths,
  MAX_CONFIG_SIZE,
  CONFIG_FILE_NAME,
} from './loader.js';
export { decodeConfig, parseToml } from './decoder.js';

// Export validation functions
export {
  verifyConfig,
  collectWarnings,
  cleanPath,
  parseConnectionTimeout,
  countTargets,
} from './validation.js';

export { FollowConfig } from './accessor.js';
export { parseDuration, tryParseDuration, formatDuration, MAX_DURATION_MS } from './duration.js';
export { FORBIDDEN_TAG_SET, DEFAULT_TAG_NAME, findForbiddenTagChar, isValidTagName } from './tags.js';

// Export environment overlay functions
export { createEnvOverlay, applyEnvOverlay } from './env.js';

// Main convenience function that loads, overlays, and validates config
export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';
