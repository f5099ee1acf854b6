/**
 * Error types for backend access and ownership operations
 *
 * Every error carries a stable `code` for programmatic handling and an
 * optional context record that is safe to hand to the logger.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes raised by this package
 */
export type OwnershipErrorCode =
  | 'BACKEND_CONSTRUCTION'
  | 'SCHEMA_DISCOVERY'
  | 'BACKEND_REQUEST'
  | 'FETCH_FAILED'
  | 'TYPE_UNRESOLVED'
  | 'PATCH_FAILED'
  | 'INVALID_RELEASE_ID'
  | 'CONFIG_INVALID';

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for all errors raised by this package
 */
export class OwnershipError extends Error {
  public readonly code: OwnershipErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: OwnershipErrorCode,
    options?: {
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'OwnershipError';
    this.code = code;
    this.context = options?.context;
  }
}

// =============================================================================
// Setup Errors (fatal to the whole call)
// =============================================================================

/**
 * The backend handle could not be constructed from the connection config
 */
export class BackendConstructionError extends OwnershipError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super(message, 'BACKEND_CONSTRUCTION', options);
    this.name = 'BackendConstructionError';
  }
}

/**
 * The kind -> resource type table could not be built at all
 */
export class SchemaDiscoveryError extends OwnershipError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super(message, 'SCHEMA_DISCOVERY', options);
    this.name = 'SchemaDiscoveryError';
  }
}

// =============================================================================
// Request Errors
// =============================================================================

/**
 * A failed request against the backend, as reported by the transport
 *
 * `status` is the HTTP status (0 when no response was received), `reason` the
 * machine-readable reason from the backend's Status body when there is one.
 */
export class BackendRequestError extends OwnershipError {
  public readonly status: number;
  public readonly reason?: string;
  /** Suggested delay before retrying, in seconds */
  public readonly retryAfter?: number;
  /** Transport-level error code such as ECONNRESET */
  public readonly errno?: string;

  constructor(
    message: string,
    status: number,
    options?: {
      reason?: string;
      retryAfter?: number;
      errno?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, 'BACKEND_REQUEST', options);
    this.name = 'BackendRequestError';
    this.status = status;
    this.reason = options?.reason;
    this.retryAfter = options?.retryAfter;
    this.errno = options?.errno;
  }

  /**
   * Check if the backend reported the object as missing
   */
  isNotFound(): boolean {
    return this.status === 404;
  }
}

/**
 * Fetching a live object failed terminally, or every retry was used up
 */
export class FetchError extends OwnershipError {
  /** Whether the last observed error was classified as transient */
  public readonly transient: boolean;
  public readonly attempts: number;

  constructor(
    message: string,
    options: {
      transient: boolean;
      attempts: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, 'FETCH_FAILED', options);
    this.name = 'FetchError';
    this.transient = options.transient;
    this.attempts = options.attempts;
  }
}

/**
 * A resource's apiVersion and kind match no discovered resource type
 */
export class TypeResolutionError extends OwnershipError {
  constructor(message: string, options?: { context?: Record<string, unknown> }) {
    super(message, 'TYPE_UNRESOLVED', options);
    this.name = 'TypeResolutionError';
  }
}

/**
 * Patching a single resource failed during a claim
 */
export class PatchError extends OwnershipError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super(message, 'PATCH_FAILED', options);
    this.name = 'PatchError';
  }
}

/**
 * A release identifier string could not be parsed
 */
export class ReleaseIdError extends OwnershipError {
  constructor(message: string, value: string) {
    super(message, 'INVALID_RELEASE_ID', { context: { value } });
    this.name = 'ReleaseIdError';
  }
}

/**
 * Configuration could not be resolved
 */
export class ConfigError extends OwnershipError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', { context });
    this.name = 'ConfigError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
