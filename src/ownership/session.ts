/**
 * Per-call backend setup shared by verify and claim
 */

import { BackendConstructionError } from '../api/errors.js';
import type { BackendConnector, BackendSession, ResourceType } from '../api/types.js';
import { buildTypeResolver, type TypeResolver } from '../discovery/resolver.js';
import type { ResourceDescriptor } from '../manifest/types.js';

/**
 * A fresh backend session and the resolver built from its discovery
 */
export interface CallScope {
  session: BackendSession;
  resolver: TypeResolver;
}

/**
 * Open a session and build its resolver
 *
 * @throws BackendConstructionError when the connector fails
 * @throws SchemaDiscoveryError when discovery fails
 */
export async function openCallScope(connector: BackendConnector): Promise<CallScope> {
  let session: BackendSession;
  try {
    session = await connector.open();
  } catch (err) {
    if (err instanceof BackendConstructionError) {
      throw err;
    }
    throw new BackendConstructionError(
      `Failed to construct backend client: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  const resolver = await buildTypeResolver(session);
  return { session, resolver };
}

/**
 * Namespace to address a resource in; undefined for cluster-scoped types
 */
export function addressNamespace(type: ResourceType, descriptor: ResourceDescriptor): string | undefined {
  return type.namespaced ? descriptor.namespace : undefined;
}

/**
 * Log context identifying a resource
 */
export function resourceContext(descriptor: ResourceDescriptor): Record<string, unknown> {
  return {
    apiVersion: descriptor.apiVersion,
    kind: descriptor.kind,
    namespace: descriptor.namespace,
    name: descriptor.name,
  };
}
