// Shared types for filefollow

export {
  FollowError,
  FollowErrorCodes,
  createIOError,
  createConfigTooLargeError,
  createIncompleteReadError,
  createMalformedConfigError,
  createInvalidTimeoutError,
  createMissingSecretError,
  createNoBackendTargetsError,
  createNoFollowersError,
  createMissingBaseDirectoryError,
  createInvalidTagNameError,
  createNoConnectionsError,
  createNoTagsError,
  isFollowError,
  type FollowErrorCode,
  type FollowErrorData,
  type CreateErrorOptions,
} from './errors.js';

export {
  validate,
  formatValidationErrors,
  type ValidationError,
  type ValidationResult,
} from './validation.js';
