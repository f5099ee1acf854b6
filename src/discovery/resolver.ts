/**
 * Kind -> resource type resolution from live schema discovery
 *
 * A resolver is built once per verify/claim call and thrown away with it;
 * the types a backend serves can change between calls.
 */

import { SchemaDiscoveryError } from '../api/errors.js';
import type { DiscoveredGroup, ResourceType, SchemaDiscovery } from '../api/types.js';
import { splitApiVersion } from '../manifest/decompose.js';

/**
 * Resolves a kind and apiVersion to a backend-addressable resource type
 */
export interface TypeResolver {
  /**
   * @returns the resource type, or undefined when the backend serves no
   * such kind in that group version
   */
  resolve(apiVersion: string, kind: string): ResourceType | undefined;
  /** Number of kinds in the table */
  readonly size: number;
}

function tableKey(group: string, version: string, kind: string): string {
  return `${group}/${version}/${kind}`;
}

/**
 * Build the resolution table from discovered groups
 *
 * Subresources (`deployments/scale`) are left out.
 */
export function createTypeResolver(groups: DiscoveredGroup[]): TypeResolver {
  const table = new Map<string, ResourceType>();
  const preferred = new Map<string, string>();

  for (const group of groups) {
    preferred.set(group.group, group.preferredVersion);
    for (const [version, resources] of Object.entries(group.versions)) {
      for (const resource of resources) {
        if (resource.name.includes('/')) {
          continue;
        }
        const key = tableKey(group.group, version, resource.kind);
        if (!table.has(key)) {
          table.set(key, {
            group: group.group,
            version,
            kind: resource.kind,
            plural: resource.name,
            namespaced: resource.namespaced,
          });
        }
      }
    }
  }

  return {
    resolve(apiVersion: string, kind: string): ResourceType | undefined {
      const { group, version } = splitApiVersion(apiVersion);
      const resolvedVersion = version || preferred.get(group);
      if (!resolvedVersion) {
        return undefined;
      }
      return table.get(tableKey(group, resolvedVersion, kind));
    },
    get size() {
      return table.size;
    },
  };
}

/**
 * Query live discovery and build a resolver
 *
 * @throws SchemaDiscoveryError when discovery fails
 */
export async function buildTypeResolver(discovery: SchemaDiscovery): Promise<TypeResolver> {
  let groups: DiscoveredGroup[];
  try {
    groups = await discovery.discover();
  } catch (err) {
    throw new SchemaDiscoveryError(
      `Failed to discover API resources: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return createTypeResolver(groups);
}
