/**
 * Types for release manifests and the resource descriptors decomposed
 * from them
 */

/**
 * Rendered manifest of a release
 *
 * Never mutated; decomposition and namespace defaulting produce copies.
 */
export interface ReleaseManifest {
  /** Multi-document YAML text */
  readonly manifest: string;
  /** Namespace given to resources that do not name one */
  readonly namespace: string;
  /** Release name, used only for log context */
  readonly name?: string;
}

/**
 * One resource described in a manifest
 *
 * `object` holds the whole parsed document so unknown fields survive.
 * `namespace` is empty when the document does not name one.
 */
export interface ResourceDescriptor {
  apiVersion: string;
  kind: string;
  name: string;
  namespace: string;
  annotations: Record<string, string>;
  object: Record<string, unknown>;
}

/**
 * Group and version parsed from an `apiVersion` string
 */
export interface GroupVersion {
  /** Empty for the core group */
  group: string;
  version: string;
}
