/**
 * filefollow Error Types and Factory Functions
 *
 * Every failure raised while loading or querying configuration is a
 * FollowError carrying a stable code, the component that raised it and
 * structured details for the operator-facing log.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * All filefollow error codes
 */
export const FollowErrorCodes = {
  /** Configuration file could not be opened or stat'ed */
  IO: 'FOLLOW_ERR_IO',
  /** Configuration source exceeds the size ceiling */
  CONFIG_TOO_LARGE: 'FOLLOW_ERR_CONFIG_TOO_LARGE',
  /** Bytes read differ from the reported file size */
  INCOMPLETE_READ: 'FOLLOW_ERR_INCOMPLETE_READ',
  /** Decoder rejected the file structure */
  MALFORMED_CONFIG: 'FOLLOW_ERR_MALFORMED_CONFIG',
  /** Connection timeout unparseable or negative */
  INVALID_TIMEOUT: 'FOLLOW_ERR_INVALID_TIMEOUT',
  /** Ingest secret not specified */
  MISSING_SECRET: 'FOLLOW_ERR_MISSING_SECRET',
  /** No backend targets in any target list */
  NO_BACKEND_TARGETS: 'FOLLOW_ERR_NO_BACKEND_TARGETS',
  /** No follower sections */
  NO_FOLLOWERS: 'FOLLOW_ERR_NO_FOLLOWERS',
  /** Follower without a base directory */
  MISSING_BASE_DIRECTORY: 'FOLLOW_ERR_MISSING_BASE_DIRECTORY',
  /** Follower tag name contains forbidden characters */
  INVALID_TAG_NAME: 'FOLLOW_ERR_INVALID_TAG_NAME',
  /** Accessor found no connection targets */
  NO_CONNECTIONS: 'FOLLOW_ERR_NO_CONNECTIONS',
  /** Accessor found no tag names */
  NO_TAGS: 'FOLLOW_ERR_NO_TAGS',
} as const;

export type FollowErrorCode = (typeof FollowErrorCodes)[keyof typeof FollowErrorCodes];

// ============================================================================
// Error Interface
// ============================================================================

/**
 * Structured filefollow error
 */
export interface FollowErrorData {
  /** Error code */
  code: FollowErrorCode;
  /** Human-readable error message */
  message: string;
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Original error if wrapping another error */
  cause?: Error;
}

// ============================================================================
// FollowError Class
// ============================================================================

/**
 * Base error class for all filefollow errors
 */
export class FollowError extends Error {
  /** Error code */
  readonly code: FollowErrorCode;
  /** Component that generated the error */
  readonly component: string;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  readonly timestamp: string;

  constructor(data: FollowErrorData) {
    super(data.message);
    this.name = 'FollowError';
    this.code = data.code;
    this.component = data.component;
    this.details = data.details;
    this.timestamp = data.timestamp;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FollowError);
    }

    if (data.cause) {
      this.cause = data.cause;
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message} (component: ${this.component})`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Options for creating errors
 */
export interface CreateErrorOptions {
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

function build(code: FollowErrorCode, message: string, options: CreateErrorOptions): FollowError {
  return new FollowError({
    code,
    message,
    timestamp: new Date().toISOString(),
    ...options,
  });
}

/**
 * Create an I/O error (open or stat failure)
 */
export function createIOError(message: string, options: CreateErrorOptions): FollowError {
  return build(FollowErrorCodes.IO, message, options);
}

export function createConfigTooLargeError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.CONFIG_TOO_LARGE, message, options);
}

export function createIncompleteReadError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.INCOMPLETE_READ, message, options);
}

/**
 * Create a malformed configuration error; the decoder message is kept verbatim
 */
export function createMalformedConfigError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.MALFORMED_CONFIG, message, options);
}

export function createInvalidTimeoutError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.INVALID_TIMEOUT, message, options);
}

export function createMissingSecretError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.MISSING_SECRET, message, options);
}

export function createNoBackendTargetsError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.NO_BACKEND_TARGETS, message, options);
}

export function createNoFollowersError(message: string, options: CreateErrorOptions): FollowError {
  return build(FollowErrorCodes.NO_FOLLOWERS, message, options);
}

/**
 * Create a missing base directory error naming the offending follower
 */
export function createMissingBaseDirectoryError(
  follower: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.MISSING_BASE_DIRECTORY, `No Base-Directory provided for ${follower}`, {
    ...options,
    details: { ...options.details, follower },
  });
}

/**
 * Create an invalid tag name error naming the follower and the rejected tag
 */
export function createInvalidTagNameError(
  follower: string,
  tag: string,
  options: CreateErrorOptions
): FollowError {
  return build(
    FollowErrorCodes.INVALID_TAG_NAME,
    `Invalid characters in the Tag-Name for ${follower}: "${tag}"`,
    {
      ...options,
      details: { ...options.details, follower, tag },
    }
  );
}

export function createNoConnectionsError(
  message: string,
  options: CreateErrorOptions
): FollowError {
  return build(FollowErrorCodes.NO_CONNECTIONS, message, options);
}

export function createNoTagsError(message: string, options: CreateErrorOptions): FollowError {
  return build(FollowErrorCodes.NO_TAGS, message, options);
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a FollowError
 */
export function isFollowError(error: unknown): error is FollowError {
  return error instanceof FollowError;
}
