/**
 * Ownership verification
 *
 * Decides whether the live resources of a release may be adopted by an
 * expected release identifier. Resources are fetched one at a time, in
 * manifest order; the first one carrying the antecedent annotation decides
 * the result. That assumes a release is annotated homogeneously. It is not a
 * quorum check: a partially annotated release is judged by whichever
 * annotated resource comes first.
 */

import {
  BackendConstructionError,
  FetchError,
  SchemaDiscoveryError,
} from '../api/errors.js';
import { logger as defaultLogger } from '../api/logger.js';
import { isTransientBackendError, withRetry } from '../api/retry.js';
import type { BackendConnector } from '../api/types.js';
import { decomposeManifest, withDefaultNamespace } from '../manifest/decompose.js';
import type { ReleaseManifest } from '../manifest/types.js';
import { addressNamespace, openCallScope, resourceContext, type CallScope } from './session.js';
import {
  ANTECEDENT_ANNOTATION,
  type OwnershipVerification,
  type VerifyOptions,
} from './types.js';

/**
 * Verify that a release's resources are unclaimed or owned by `expectedId`
 *
 * A result with status `error` means ownership could not be determined and
 * must block any destructive adoption.
 *
 * @param release - Rendered manifest and default namespace
 * @param expectedId - Release identifier expected in the annotation
 * @param connector - Opens a fresh backend session for this call
 * @param options - Logger and retry overrides
 */
export async function verifyOwnership(
  release: ReleaseManifest,
  expectedId: string,
  connector: BackendConnector,
  options: VerifyOptions = {}
): Promise<OwnershipVerification> {
  const log = (options.logger ?? defaultLogger).child({
    release: release.name,
    releaseNamespace: release.namespace,
  });

  let scope: CallScope;
  try {
    scope = await openCallScope(connector);
  } catch (err) {
    if (err instanceof BackendConstructionError || err instanceof SchemaDiscoveryError) {
      log.error('Cannot verify release ownership', err);
      return { status: 'error', owned: false, antecedent: '', error: err };
    }
    throw err;
  }

  const { session, resolver } = scope;
  const descriptors = decomposeManifest(release.manifest, { logger: log });

  for (const parsed of descriptors) {
    const descriptor = withDefaultNamespace(parsed, release.namespace);

    const type = resolver.resolve(descriptor.apiVersion, descriptor.kind);
    if (!type) {
      log.debug('Skipping resource with unknown type', resourceContext(descriptor));
      continue;
    }

    const namespace = addressNamespace(type, descriptor);
    const result = await withRetry(() => session.get(type, namespace, descriptor.name), {
      isRetryable: isTransientBackendError,
      schedule: options.retry,
      logger: log,
    });

    if (!result.success) {
      const error = new FetchError(
        `Failed to get ${descriptor.kind} '${descriptor.name}': ${result.error.message}`,
        {
          transient: result.exhausted,
          attempts: result.attempts,
          context: resourceContext(descriptor),
          cause: result.error,
        }
      );
      log.error('Cannot verify release ownership', error, resourceContext(descriptor));
      return { status: 'error', owned: false, antecedent: '', error, resource: descriptor };
    }

    const annotations = result.data.metadata?.annotations;
    if (annotations && Object.prototype.hasOwnProperty.call(annotations, ANTECEDENT_ANNOTATION)) {
      const antecedent = annotations[ANTECEDENT_ANNOTATION];
      if (antecedent === expectedId) {
        return { status: 'owned', owned: true, antecedent, resource: descriptor };
      }
      return { status: 'foreign', owned: false, antecedent, resource: descriptor };
    }
  }

  return { status: 'unclaimed', owned: true, antecedent: '' };
}
