/**
 * Release identifiers
 *
 * The value written to the antecedent annotation identifies the release
 * object that owns a resource: `<namespace>:<kind>/<name>`, with the kind
 * lower-cased and `<cluster>` standing in for the namespace of a
 * cluster-scoped release object.
 *
 * Ownership checks compare these strings exactly; parsing is only needed to
 * validate input and to show the parts to a human.
 */

import { ReleaseIdError } from '../api/errors.js';

/**
 * Namespace placeholder for cluster-scoped release objects
 */
export const CLUSTER_SCOPE = '<cluster>';

/**
 * `<namespace>:<kind>/<name>`
 */
export const RELEASE_ID_REGEX = /^(<cluster>|[a-zA-Z0-9_-]+):([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_.:@-]+)$/;

/**
 * Parsed release identifier
 */
export interface ReleaseId {
  namespace: string;
  kind: string;
  name: string;
}

/**
 * Serialize a release identifier
 *
 * @example
 * formatReleaseId({ namespace: 'team-a', kind: 'HelmRelease', name: 'podinfo' })
 * // 'team-a:helmrelease/podinfo'
 */
export function formatReleaseId(id: ReleaseId): string {
  const namespace = id.namespace === '' ? CLUSTER_SCOPE : id.namespace;
  return `${namespace}:${id.kind.toLowerCase()}/${id.name}`;
}

/**
 * Parse a serialized release identifier
 *
 * @throws ReleaseIdError when the value is not `<namespace>:<kind>/<name>`
 */
export function parseReleaseId(value: string): ReleaseId {
  const match = RELEASE_ID_REGEX.exec(value);
  if (!match) {
    throw new ReleaseIdError(
      `Invalid release identifier "${value}": expected <namespace>:<kind>/<name>`,
      value
    );
  }
  const [, namespace, kind, name] = match;
  return {
    namespace,
    kind: kind.toLowerCase(),
    name,
  };
}

/**
 * Check whether a string is a well-formed release identifier
 */
export function isReleaseId(value: string): boolean {
  return RELEASE_ID_REGEX.test(value);
}
