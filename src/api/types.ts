/**
 * Backend types for the ownership core
 *
 * The backend is anything that can read and merge-patch objects by resource
 * type, namespace and name, and enumerate the resource types it serves.
 * `KubernetesConnector` is the production implementation; tests use an
 * in-process fake.
 */

// =============================================================================
// Objects
// =============================================================================

/**
 * Object metadata fields the ownership core reads
 */
export interface ObjectMeta {
  name?: string;
  namespace?: string;
  annotations?: Record<string, string>;
}

/**
 * A live object as returned by the backend
 *
 * Only the fields the core inspects are typed; everything else passes
 * through untouched.
 */
export interface LiveObject {
  apiVersion?: string;
  kind?: string;
  metadata?: ObjectMeta;
  [key: string]: unknown;
}

/**
 * Metadata portion of a merge patch
 */
export interface PatchMeta {
  annotations?: Record<string, string>;
  labels?: Record<string, string>;
}

/**
 * JSON merge patch document (RFC 7386)
 *
 * Fields other than metadata pass through as given.
 */
export interface MergePatch {
  metadata?: PatchMeta;
  [key: string]: unknown;
}

// =============================================================================
// Schema Discovery
// =============================================================================

/**
 * A resource served by one group version
 */
export interface DiscoveredResource {
  /** Plural resource name, e.g. `deployments` or `pods/status` */
  name: string;
  kind: string;
  namespaced: boolean;
}

/**
 * Resources served by one API group, by version
 */
export interface DiscoveredGroup {
  /** Group name; empty for the core group */
  group: string;
  /** Version served by preference when a caller names none */
  preferredVersion: string;
  versions: Record<string, DiscoveredResource[]>;
}

/**
 * Enumerates the resource types available on the connected backend
 */
export interface SchemaDiscovery {
  discover(): Promise<DiscoveredGroup[]>;
}

// =============================================================================
// Resource Access
// =============================================================================

/**
 * Backend-addressable resource type, resolved from a kind and version
 */
export interface ResourceType {
  group: string;
  version: string;
  kind: string;
  /** Plural resource name used in request paths */
  plural: string;
  namespaced: boolean;
}

/**
 * Reads and patches objects
 *
 * `namespace` is undefined for cluster-scoped types.
 */
export interface ResourceBackend {
  get(type: ResourceType, namespace: string | undefined, name: string): Promise<LiveObject>;
  patch(
    type: ResourceType,
    namespace: string | undefined,
    name: string,
    mergeDocument: MergePatch
  ): Promise<LiveObject>;
}

/**
 * A backend handle scoped to a single verify or claim call
 */
export interface BackendSession extends ResourceBackend, SchemaDiscovery {}

/**
 * Opens a fresh backend session from a connection configuration
 *
 * Called once per verify/claim; sessions are never pooled.
 */
export interface BackendConnector {
  open(): Promise<BackendSession>;
}
