/**
 * Types for ownership verification and claiming
 */

import type { ApiLogger } from '../api/logger.js';
import type { RetrySchedule } from '../api/retry.js';
import type {
  BackendConstructionError,
  FetchError,
  PatchError,
  SchemaDiscoveryError,
  TypeResolutionError,
} from '../api/errors.js';
import type { ResourceDescriptor } from '../manifest/types.js';

/**
 * Annotation recording which release most recently claimed a resource
 *
 * Used instead of owner references, which cannot point across namespaces.
 */
export const ANTECEDENT_ANNOTATION = 'helm.fluxcd.io/antecedent';

/**
 * Options shared by verify and claim
 */
export interface OwnershipOptions {
  /** Custom logger instance */
  logger?: ApiLogger;
}

/**
 * Options for verification
 */
export interface VerifyOptions extends OwnershipOptions {
  /** Overrides for the fetch retry schedule */
  retry?: Partial<RetrySchedule>;
}

/**
 * Options for claiming
 */
export type ClaimOptions = OwnershipOptions;

/**
 * Setup failures that abort a whole call
 */
export type SetupError = BackendConstructionError | SchemaDiscoveryError;

/**
 * Result of verifying a release's ownership
 *
 * - `unclaimed`: no resource carries the annotation; safe to adopt
 * - `owned`: the first annotated resource names the expected release
 * - `foreign`: the first annotated resource names another release
 * - `error`: ownership could not be determined; do not adopt
 *
 * `owned` is true for `unclaimed` and `owned`.
 */
export type OwnershipVerification =
  | {
      status: 'unclaimed';
      owned: true;
      antecedent: '';
    }
  | {
      status: 'owned';
      owned: true;
      antecedent: string;
      /** The resource whose annotation decided the result */
      resource: ResourceDescriptor;
    }
  | {
      status: 'foreign';
      owned: false;
      antecedent: string;
      resource: ResourceDescriptor;
    }
  | {
      status: 'error';
      owned: false;
      antecedent: '';
      error: SetupError | FetchError;
      /** The resource whose fetch failed, when the failure was per-resource */
      resource?: ResourceDescriptor;
    };

export type OwnershipStatus = OwnershipVerification['status'];

/**
 * Why a single resource could not be claimed
 */
export type ClaimFailureReason = Extract<ClaimOutcome, { success: false }>['reason'];

/**
 * Outcome of claiming one resource
 */
export type ClaimOutcome =
  | {
      descriptor: ResourceDescriptor;
      success: true;
    }
  | {
      descriptor: ResourceDescriptor;
      success: false;
      reason: 'unresolved';
      error: TypeResolutionError;
    }
  | {
      descriptor: ResourceDescriptor;
      success: false;
      reason: 'patch_failed';
      error: PatchError;
    };

/**
 * Result of claiming a release's resources
 *
 * `success` only says the claim loop ran; individual resources may have
 * failed and are listed in `outcomes`.
 */
export type ClaimResult =
  | {
      success: true;
      outcomes: ClaimOutcome[];
      claimed: number;
      failed: number;
    }
  | {
      success: false;
      outcomes: [];
      error: SetupError;
    };
