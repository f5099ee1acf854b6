/**
 * In-process stand-in for a cluster
 *
 * Serves a fixed discovery document and an object store keyed by resource
 * type, namespace and name. Failures can be queued per object to exercise
 * the retry and error paths.
 */

import { BackendRequestError } from '../../src/api/errors.js';
import { createLogger, type ApiLogger, type LogLevel } from '../../src/api/logger.js';
import type {
  BackendConnector,
  BackendSession,
  DiscoveredGroup,
  LiveObject,
  MergePatch,
  ObjectMeta,
  ResourceType,
} from '../../src/api/types.js';

// =============================================================================
// Discovery Fixture
// =============================================================================

export const TEST_GROUPS: DiscoveredGroup[] = [
  {
    group: '',
    preferredVersion: 'v1',
    versions: {
      v1: [
        { name: 'configmaps', kind: 'ConfigMap', namespaced: true },
        { name: 'services', kind: 'Service', namespaced: true },
        { name: 'serviceaccounts', kind: 'ServiceAccount', namespaced: true },
        { name: 'namespaces', kind: 'Namespace', namespaced: false },
        { name: 'pods', kind: 'Pod', namespaced: true },
        { name: 'pods/status', kind: 'Pod', namespaced: true },
      ],
    },
  },
  {
    group: 'apps',
    preferredVersion: 'v1',
    versions: {
      v1: [
        { name: 'deployments', kind: 'Deployment', namespaced: true },
        { name: 'deployments/scale', kind: 'Scale', namespaced: true },
      ],
    },
  },
  {
    group: 'rbac.authorization.k8s.io',
    preferredVersion: 'v1',
    versions: {
      v1: [{ name: 'clusterroles', kind: 'ClusterRole', namespaced: false }],
    },
  },
];

// =============================================================================
// Fake Cluster
// =============================================================================

export interface RecordedCall {
  plural: string;
  namespace: string | undefined;
  name: string;
}

export function objectKey(plural: string, namespace: string | undefined, name: string): string {
  return `${plural}/${namespace ?? ''}/${name}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply a JSON merge patch (RFC 7386)
 */
export function applyMergePatch(target: unknown, patch: unknown): unknown {
  if (!isRecord(patch)) {
    return patch;
  }
  const result: Record<string, unknown> = isRecord(target) ? { ...target } : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      result[key] = applyMergePatch(result[key], value);
    }
  }
  return result;
}

export class FakeCluster implements BackendConnector {
  groups: DiscoveredGroup[] = TEST_GROUPS;
  readonly objects = new Map<string, LiveObject>();
  readonly getCalls: RecordedCall[] = [];
  readonly patchCalls: Array<RecordedCall & { patch: MergePatch }> = [];
  /** Errors thrown by successive gets of one object, before it is served */
  readonly getFailures = new Map<string, Error[]>();
  /** Objects whose patches always fail */
  readonly patchFailures = new Map<string, Error>();
  openError?: Error;
  discoverError?: Error;
  opened = 0;
  discovered = 0;

  /**
   * Store a live object
   */
  put(plural: string, namespace: string | undefined, name: string, annotations?: Record<string, string>): void {
    const metadata: ObjectMeta = { name };
    if (namespace !== undefined) {
      metadata.namespace = namespace;
    }
    if (annotations) {
      metadata.annotations = annotations;
    }
    this.objects.set(objectKey(plural, namespace, name), { metadata });
  }

  /**
   * Annotations of a stored object
   */
  annotationsOf(plural: string, namespace: string | undefined, name: string): Record<string, string> | undefined {
    return this.objects.get(objectKey(plural, namespace, name))?.metadata?.annotations;
  }

  failGet(plural: string, namespace: string | undefined, name: string, ...errors: Error[]): void {
    this.getFailures.set(objectKey(plural, namespace, name), errors);
  }

  failPatch(plural: string, namespace: string | undefined, name: string, error: Error): void {
    this.patchFailures.set(objectKey(plural, namespace, name), error);
  }

  async open(): Promise<BackendSession> {
    this.opened++;
    if (this.openError) {
      throw this.openError;
    }

    return {
      discover: async () => {
        this.discovered++;
        if (this.discoverError) {
          throw this.discoverError;
        }
        return this.groups;
      },
      get: async (type: ResourceType, namespace: string | undefined, name: string) => {
        this.getCalls.push({ plural: type.plural, namespace, name });
        const key = objectKey(type.plural, namespace, name);
        const failure = this.getFailures.get(key)?.shift();
        if (failure) {
          throw failure;
        }
        const object = this.objects.get(key);
        if (!object) {
          throw new BackendRequestError(`${type.plural} "${name}" not found`, 404, { reason: 'NotFound' });
        }
        return object;
      },
      patch: async (type: ResourceType, namespace: string | undefined, name: string, patch: MergePatch) => {
        this.patchCalls.push({ plural: type.plural, namespace, name, patch });
        const key = objectKey(type.plural, namespace, name);
        const failure = this.patchFailures.get(key);
        if (failure) {
          throw failure;
        }
        const object = this.objects.get(key);
        if (!object) {
          throw new BackendRequestError(`${type.plural} "${name}" not found`, 404, { reason: 'NotFound' });
        }
        const patched: LiveObject = { ...object };
        const metadata = applyMergePatch(object.metadata, patch.metadata);
        if (isRecord(metadata)) {
          const annotations = metadata.annotations;
          patched.metadata = {
            ...object.metadata,
            annotations: isRecord(annotations)
              ? Object.fromEntries(
                  Object.entries(annotations).filter(
                    (entry): entry is [string, string] => typeof entry[1] === 'string'
                  )
                )
              : undefined,
          };
        }
        this.objects.set(key, patched);
        return patched;
      },
    };
  }
}

// =============================================================================
// Logger Capture
// =============================================================================

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Logger that records lines instead of printing them
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: ApiLogger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger({
    level,
    timestamps: false,
    sink: (lineLevel, line) => lines.push({ level: lineLevel, line }),
  });
  return { logger, lines };
}
