/**
 * Ownership module exports
 */

export { verifyOwnership } from './verify.js';
export { claimOwnership, antecedentPatch } from './claim.js';
export {
  formatReleaseId,
  parseReleaseId,
  isReleaseId,
  CLUSTER_SCOPE,
  RELEASE_ID_REGEX,
  type ReleaseId,
} from './release-id.js';
export {
  ANTECEDENT_ANNOTATION,
  type OwnershipOptions,
  type VerifyOptions,
  type ClaimOptions,
  type SetupError,
  type OwnershipVerification,
  type OwnershipStatus,
  type ClaimFailureReason,
  type ClaimOutcome,
  type ClaimResult,
} from './types.js';
