/**
 * release-antecedent
 *
 * Verify and claim ownership of a release's Kubernetes resources through
 * the antecedent annotation.
 */

export {
  verifyOwnership,
  claimOwnership,
  antecedentPatch,
  formatReleaseId,
  parseReleaseId,
  isReleaseId,
  ANTECEDENT_ANNOTATION,
  CLUSTER_SCOPE,
  type ReleaseId,
  type VerifyOptions,
  type ClaimOptions,
  type OwnershipVerification,
  type OwnershipStatus,
  type ClaimOutcome,
  type ClaimResult,
  type ClaimFailureReason,
} from './ownership/index.js';

export {
  decomposeManifest,
  splitManifest,
  splitApiVersion,
  withDefaultNamespace,
  type ReleaseManifest,
  type ResourceDescriptor,
} from './manifest/index.js';

export { buildTypeResolver, createTypeResolver, type TypeResolver } from './discovery/index.js';

export * from './api/index.js';

export { resolveConfig, type ResolvedConfig } from './config/index.js';
