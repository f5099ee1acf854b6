/**
 * Backend module
 *
 * Provides:
 * - Backend interfaces and the Kubernetes implementation
 * - Bounded retry of transient backend failures
 * - Structured logging with secret redaction
 * - Error hierarchy
 */

// Backend
export { KubernetesConnector, KubernetesSession } from './kubernetes.js';
export type { KubernetesConnectionConfig } from './kubernetes.js';

export type {
  BackendConnector,
  BackendSession,
  ResourceBackend,
  SchemaDiscovery,
  ResourceType,
  LiveObject,
  MergePatch,
  DiscoveredGroup,
  DiscoveredResource,
} from './types.js';

// Retry utilities
export {
  withRetry,
  isTransientBackendError,
  calculateDelay,
  DEFAULT_RETRY_SCHEDULE,
} from './retry.js';

export type { RetrySchedule, RetryOptions, RetryResult } from './retry.js';

// Logger utilities
export { logger, createLogger, ApiLogger } from './logger.js';

export type { LogLevel, LoggerConfig } from './logger.js';

// Errors
export {
  OwnershipError,
  BackendConstructionError,
  SchemaDiscoveryError,
  BackendRequestError,
  FetchError,
  TypeResolutionError,
  PatchError,
  ReleaseIdError,
  ConfigError,
} from './errors.js';

export type { OwnershipErrorCode } from './errors.js';
