/**
 * Kubernetes backend
 *
 * Implements `BackendConnector` on top of @kubernetes/client-node. Every
 * `open()` loads the kubeconfig again and builds new API clients, so a
 * session sees the cluster as it is at call time.
 */

import {
  ApiException,
  ApisApi,
  CoreV1Api,
  CustomObjectsApi,
  KubeConfig,
  KubernetesObjectApi,
  PatchStrategy,
  type KubernetesObject,
  type V1APIGroup,
  type V1APIResource,
} from '@kubernetes/client-node';
import { BackendConstructionError, BackendRequestError } from './errors.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';
import type {
  BackendConnector,
  BackendSession,
  DiscoveredGroup,
  DiscoveredResource,
  LiveObject,
  MergePatch,
  ResourceType,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Connection configuration
 */
export interface KubernetesConnectionConfig {
  /** Path to a kubeconfig file; the client's default loading when unset */
  kubeconfig?: string;
  /** Context to use instead of the kubeconfig's current context */
  context?: string;
}

/**
 * Status body returned by the API server on failure
 */
interface StatusBody {
  message?: string;
  reason?: string;
  retryAfterSeconds?: number;
}

// =============================================================================
// Error Translation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the fields we need from an API server Status body
 */
export function parseStatusBody(body: unknown): StatusBody {
  let value = body;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return {};
    }
  }
  if (!isRecord(value)) {
    return {};
  }

  const status: StatusBody = {};
  if (typeof value.message === 'string') {
    status.message = value.message;
  }
  if (typeof value.reason === 'string' && value.reason !== '') {
    status.reason = value.reason;
  }
  if (isRecord(value.details) && typeof value.details.retryAfterSeconds === 'number') {
    status.retryAfterSeconds = value.details.retryAfterSeconds;
  }
  return status;
}

/**
 * Parse a Retry-After header value
 *
 * @param value - Header value (seconds or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds : undefined;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date) && date > now) {
    return Math.ceil((date - now) / 1000);
  }

  return undefined;
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return value;
    }
  }
  return undefined;
}

/**
 * Translate a client failure into a BackendRequestError
 */
export function toBackendRequestError(err: unknown, operation: string): BackendRequestError {
  if (err instanceof ApiException) {
    const body: unknown = err.body;
    const headers: Record<string, string> = isRecord(err.headers) ? err.headers : {};
    const status = parseStatusBody(body);
    const retryAfter = status.retryAfterSeconds ?? parseRetryAfter(headerValue(headers, 'retry-after'));

    return new BackendRequestError(
      `${operation}: ${status.message ?? `HTTP ${err.code}`}`,
      err.code,
      { reason: status.reason, retryAfter, cause: err }
    );
  }

  const error = err instanceof Error ? err : new Error(String(err));
  const errno = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return new BackendRequestError(`${operation}: ${error.message}`, 0, { errno, cause: error });
}

// =============================================================================
// Discovery
// =============================================================================

function toDiscoveredResource(resource: V1APIResource): DiscoveredResource {
  return {
    name: resource.name,
    kind: resource.kind,
    namespaced: resource.namespaced,
  };
}

function apiVersionOf(type: ResourceType): string {
  return type.group === '' ? type.version : `${type.group}/${type.version}`;
}

// =============================================================================
// Session
// =============================================================================

/**
 * Backend session over one loaded kubeconfig
 */
export class KubernetesSession implements BackendSession {
  private readonly objects: KubernetesObjectApi;
  private readonly core: CoreV1Api;
  private readonly apis: ApisApi;
  private readonly custom: CustomObjectsApi;

  constructor(
    kubeConfig: KubeConfig,
    private readonly log: ApiLogger = defaultLogger
  ) {
    this.objects = KubernetesObjectApi.makeApiClient(kubeConfig);
    this.core = kubeConfig.makeApiClient(CoreV1Api);
    this.apis = kubeConfig.makeApiClient(ApisApi);
    this.custom = kubeConfig.makeApiClient(CustomObjectsApi);
  }

  /**
   * Enumerate the core group and every named group version
   *
   * A group version whose resources cannot be listed (an unavailable
   * aggregated API, typically) is left out with a warning; failing to list
   * the core resources or the groups themselves fails discovery.
   */
  async discover(): Promise<DiscoveredGroup[]> {
    let coreResources: V1APIResource[];
    let namedGroups: V1APIGroup[];
    try {
      coreResources = (await this.core.getAPIResources()).resources;
      namedGroups = (await this.apis.getAPIVersions()).groups;
    } catch (err) {
      throw toBackendRequestError(err, 'discover API groups');
    }

    const groups: DiscoveredGroup[] = [
      {
        group: '',
        preferredVersion: 'v1',
        versions: { v1: coreResources.map(toDiscoveredResource) },
      },
    ];

    for (const apiGroup of namedGroups) {
      const versions: Record<string, DiscoveredResource[]> = {};
      for (const groupVersion of apiGroup.versions) {
        try {
          const list = await this.custom.getAPIResources({
            group: apiGroup.name,
            version: groupVersion.version,
          });
          versions[groupVersion.version] = list.resources.map(toDiscoveredResource);
        } catch (err) {
          this.log.warn('Skipping group version that failed discovery', {
            groupVersion: groupVersion.groupVersion,
            error: toBackendRequestError(err, 'discover').message,
          });
        }
      }

      const preferredVersion =
        apiGroup.preferredVersion?.version ?? apiGroup.versions[0]?.version ?? '';
      groups.push({ group: apiGroup.name, preferredVersion, versions });
    }

    return groups;
  }

  async get(type: ResourceType, namespace: string | undefined, name: string): Promise<LiveObject> {
    try {
      const object: KubernetesObject = await this.objects.read({
        apiVersion: apiVersionOf(type),
        kind: type.kind,
        metadata: { name, namespace },
      });
      return { ...object };
    } catch (err) {
      throw toBackendRequestError(err, `get ${type.plural} ${name}`);
    }
  }

  async patch(
    type: ResourceType,
    namespace: string | undefined,
    name: string,
    mergeDocument: MergePatch
  ): Promise<LiveObject> {
    const body: KubernetesObject = {
      ...mergeDocument,
      apiVersion: apiVersionOf(type),
      kind: type.kind,
      metadata: { ...mergeDocument.metadata, name, namespace },
    };

    try {
      const object: KubernetesObject = await this.objects.patch(
        body,
        undefined,
        undefined,
        undefined,
        undefined,
        PatchStrategy.MergePatch
      );
      return { ...object };
    } catch (err) {
      throw toBackendRequestError(err, `patch ${type.plural} ${name}`);
    }
  }
}

// =============================================================================
// Connector
// =============================================================================

/**
 * Opens Kubernetes sessions from a connection configuration
 */
export class KubernetesConnector implements BackendConnector {
  constructor(
    private readonly config: KubernetesConnectionConfig = {},
    private readonly log: ApiLogger = defaultLogger
  ) {}

  /**
   * Load the kubeconfig and build fresh API clients
   *
   * @throws BackendConstructionError when the kubeconfig cannot be loaded or
   * names no usable cluster
   */
  async open(): Promise<BackendSession> {
    const kubeConfig = new KubeConfig();
    try {
      if (this.config.kubeconfig) {
        kubeConfig.loadFromFile(this.config.kubeconfig);
      } else {
        kubeConfig.loadFromDefault();
      }
      if (this.config.context) {
        kubeConfig.setCurrentContext(this.config.context);
      }
    } catch (err) {
      throw new BackendConstructionError(
        `Failed to load kubeconfig: ${err instanceof Error ? err.message : String(err)}`,
        { context: { kubeconfig: this.config.kubeconfig }, cause: err }
      );
    }

    if (!kubeConfig.getCurrentCluster()) {
      throw new BackendConstructionError('No cluster configured for the current context', {
        context: {
          kubeconfig: this.config.kubeconfig,
          context: kubeConfig.getCurrentContext(),
        },
      });
    }

    this.log.debug('Opened Kubernetes session', {
      context: kubeConfig.getCurrentContext(),
    });

    return new KubernetesSession(kubeConfig, this.log);
  }
}
