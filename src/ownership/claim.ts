/**
 * Ownership claiming
 *
 * Stamps the antecedent annotation on every resource of a release with a
 * JSON merge patch. Per-resource failures are logged and recorded, and the
 * loop always runs to the end; resources left unannotated are picked up by
 * the next claim.
 */

import {
  BackendConstructionError,
  PatchError,
  SchemaDiscoveryError,
  TypeResolutionError,
} from '../api/errors.js';
import { logger as defaultLogger } from '../api/logger.js';
import type { BackendConnector, MergePatch } from '../api/types.js';
import { decomposeManifest, withDefaultNamespace } from '../manifest/decompose.js';
import type { ReleaseManifest } from '../manifest/types.js';
import { addressNamespace, openCallScope, resourceContext, type CallScope } from './session.js';
import {
  ANTECEDENT_ANNOTATION,
  type ClaimOptions,
  type ClaimOutcome,
  type ClaimResult,
} from './types.js';

/**
 * Merge patch that sets the antecedent annotation and nothing else
 */
export function antecedentPatch(id: string): MergePatch {
  return {
    metadata: {
      annotations: {
        [ANTECEDENT_ANNOTATION]: id,
      },
    },
  };
}

/**
 * Annotate every resource of a release with `id`
 *
 * @param release - Rendered manifest and default namespace
 * @param id - Release identifier to record
 * @param connector - Opens a fresh backend session for this call
 * @returns Per-resource outcomes, or the setup error that kept the loop from
 * running
 */
export async function claimOwnership(
  release: ReleaseManifest,
  id: string,
  connector: BackendConnector,
  options: ClaimOptions = {}
): Promise<ClaimResult> {
  const log = (options.logger ?? defaultLogger).child({
    release: release.name,
    releaseNamespace: release.namespace,
  });

  let scope: CallScope;
  try {
    scope = await openCallScope(connector);
  } catch (err) {
    if (err instanceof BackendConstructionError || err instanceof SchemaDiscoveryError) {
      log.error('Cannot claim release resources', err);
      return { success: false, outcomes: [], error: err };
    }
    throw err;
  }

  const { session, resolver } = scope;
  const patch = antecedentPatch(id);
  const outcomes: ClaimOutcome[] = [];

  for (const parsed of decomposeManifest(release.manifest, { logger: log })) {
    const descriptor = withDefaultNamespace(parsed, release.namespace);

    const type = resolver.resolve(descriptor.apiVersion, descriptor.kind);
    if (!type) {
      const error = new TypeResolutionError(
        `Failed to get resource type for ${descriptor.apiVersion}, Kind=${descriptor.kind}`,
        { context: resourceContext(descriptor) }
      );
      log.error(error.message, error, resourceContext(descriptor));
      outcomes.push({ descriptor, success: false, reason: 'unresolved', error });
      continue;
    }

    try {
      await session.patch(type, addressNamespace(type, descriptor), descriptor.name, patch);
      outcomes.push({ descriptor, success: true });
    } catch (err) {
      const error = new PatchError(
        `Failed to mark resource '${descriptor.kind}/${descriptor.name}' with antecedent annotation`,
        { context: resourceContext(descriptor), cause: err }
      );
      log.error(error.message, err instanceof Error ? err : undefined, resourceContext(descriptor));
      outcomes.push({ descriptor, success: false, reason: 'patch_failed', error });
    }
  }

  const failed = outcomes.filter((outcome) => !outcome.success).length;
  if (outcomes.length > 0) {
    log.info(`Claimed ${outcomes.length - failed}/${outcomes.length} resources`, {
      antecedent: id,
      failed,
    });
  }

  return {
    success: true,
    outcomes,
    claimed: outcomes.length - failed,
    failed,
  };
}
