/**
 * Tests for manifest decomposition
 *
 * Covers:
 * - Document splitting and ordering
 * - Skipping of unparseable and kind-less documents
 * - List expansion at the wrapper's position
 * - Namespace defaulting
 */

import { describe, it, expect } from 'vitest';
import {
  decomposeManifest,
  splitApiVersion,
  splitManifest,
  toDescriptor,
  withDefaultNamespace,
} from '../../src/manifest/decompose.js';
import { captureLogger } from './fake-cluster.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const RELEASE_MANIFEST = `---
# Source: podinfo/templates/service.yaml
apiVersion: v1
kind: Service
metadata:
  name: podinfo
  labels:
    app: podinfo
spec:
  ports:
    - port: 9898
---
# Source: podinfo/templates/deployment.yaml
apiVersion: apps/v1
kind: Deployment
metadata:
  name: podinfo
  namespace: apps
  annotations:
    team: platform
spec:
  replicas: 2
`;

// =============================================================================
// Splitting
// =============================================================================

describe('splitManifest', () => {
  it('should split on separator lines and drop empty documents', () => {
    const docs = splitManifest('---\na: 1\n---\n\n---\n# only a comment\n---\nb: 2\n');

    expect(docs.map((doc) => doc.toJS())).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('should accept a comment after the separator', () => {
    const docs = splitManifest('a: 1\n--- # next\nb: 2');

    expect(docs.map((doc) => doc.toJS())).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('should keep documents with syntax errors for the caller to skip', () => {
    const docs = splitManifest('a: 1\na: 2\n---\nb: 2');

    expect(docs).toHaveLength(2);
    expect(docs[0].errors.length).toBeGreaterThan(0);
    expect(docs[1].errors).toEqual([]);
  });

  it('should not split on separators that are part of a line', () => {
    const docs = splitManifest('a: "---"\nb: ---x');

    expect(docs).toHaveLength(1);
  });
});

describe('splitApiVersion', () => {
  it('should split a grouped version', () => {
    expect(splitApiVersion('apps/v1')).toEqual({ group: 'apps', version: 'v1' });
  });

  it('should put core versions in the empty group', () => {
    expect(splitApiVersion('v1')).toEqual({ group: '', version: 'v1' });
  });
});

// =============================================================================
// Decomposition
// =============================================================================

describe('decomposeManifest', () => {
  it('should return descriptors in manifest order', () => {
    const descriptors = decomposeManifest(RELEASE_MANIFEST);

    expect(descriptors.map((d) => `${d.kind}/${d.name}`)).toEqual([
      'Service/podinfo',
      'Deployment/podinfo',
    ]);
  });

  it('should read identity fields and annotations', () => {
    const [service, deployment] = decomposeManifest(RELEASE_MANIFEST);

    expect(service.apiVersion).toBe('v1');
    expect(service.namespace).toBe('');
    expect(service.annotations).toEqual({});
    expect(deployment.apiVersion).toBe('apps/v1');
    expect(deployment.namespace).toBe('apps');
    expect(deployment.annotations).toEqual({ team: 'platform' });
  });

  it('should preserve fields it does not model', () => {
    const [service] = decomposeManifest(RELEASE_MANIFEST);

    expect(service.object.spec).toEqual({ ports: [{ port: 9898 }] });
    expect(service.object.metadata).toEqual({ name: 'podinfo', labels: { app: 'podinfo' } });
  });

  it('should return nothing for an empty manifest', () => {
    expect(decomposeManifest('')).toEqual([]);
    expect(decomposeManifest('---\n# only a comment\n---\n')).toEqual([]);
  });

  it('should skip documents that fail to parse', () => {
    const manifest = [
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: first',
      'kind: ConfigMap\nkind: Secret\nmetadata:\n  name: duplicate-key',
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: second',
    ].join('\n---\n');

    const descriptors = decomposeManifest(manifest);

    expect(descriptors.map((d) => d.name)).toEqual(['first', 'second']);
  });

  it('should skip documents whose aliases cannot be resolved', () => {
    const { logger, lines } = captureLogger();
    const manifest = [
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: *missing',
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: kept',
    ].join('\n---\n');

    const descriptors = decomposeManifest(manifest, { logger });

    expect(descriptors.map((d) => d.name)).toEqual(['kept']);
    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('debug');
    expect(lines[0].line).toMatch(/^\[DEBUG\] Skipping manifest document that failed to resolve \{"document":0,"error":"/);
  });

  it('should skip documents with too many aliases', () => {
    const seq = (alias: string, count: number) =>
      Array.from({ length: count }, () => `  - ${alias}`).join('\n');
    const manifest = [
      `apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: aliased\na: &a\n  - x\nb: &b\n${seq('*a', 10)}\nc:\n${seq('*b', 11)}`,
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: kept',
    ].join('\n---\n');

    const descriptors = decomposeManifest(manifest, { logger: captureLogger().logger });

    expect(descriptors.map((d) => d.name)).toEqual(['kept']);
  });

  it('should skip documents without a kind or that are not mappings', () => {
    const manifest = [
      'apiVersion: v1\nmetadata:\n  name: no-kind',
      '- just\n- a list',
      'plain scalar',
      'apiVersion: v1\nkind: Secret\nmetadata:\n  name: kept',
    ].join('\n---\n');

    const descriptors = decomposeManifest(manifest);

    expect(descriptors.map((d) => d.name)).toEqual(['kept']);
  });

  it('should keep duplicates as separate entries', () => {
    const doc = 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: same';

    const descriptors = decomposeManifest(`${doc}\n---\n${doc}`);

    expect(descriptors).toHaveLength(2);
    expect(descriptors[0]).not.toBe(descriptors[1]);
  });

  it('should not mutate the input manifest', () => {
    const manifest = RELEASE_MANIFEST;

    decomposeManifest(manifest);

    expect(manifest).toBe(RELEASE_MANIFEST);
  });
});

// =============================================================================
// List Expansion
// =============================================================================

describe('decomposeManifest list expansion', () => {
  it('should replace a list with its members at the same position', () => {
    const manifest = `apiVersion: v1
kind: ServiceAccount
metadata:
  name: before
---
apiVersion: v1
kind: List
items:
  - apiVersion: v1
    kind: ConfigMap
    metadata:
      name: member-one
  - apiVersion: v1
    kind: Secret
    metadata:
      name: member-two
---
apiVersion: v1
kind: Service
metadata:
  name: after
`;

    const descriptors = decomposeManifest(manifest);

    expect(descriptors.map((d) => `${d.kind}/${d.name}`)).toEqual([
      'ServiceAccount/before',
      'ConfigMap/member-one',
      'Secret/member-two',
      'Service/after',
    ]);
  });

  it('should never emit the list wrapper itself', () => {
    const manifest = 'apiVersion: v1\nkind: ConfigMapList\nitems: []';

    expect(decomposeManifest(manifest)).toEqual([]);
  });

  it('should drop a list whose members are not all objects and log it', () => {
    const { logger, lines } = captureLogger();
    const manifest = [
      'apiVersion: v1\nkind: List\nitems:\n  - apiVersion: v1\n    kind: ConfigMap\n    metadata:\n      name: dropped\n  - not-an-object',
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: kept',
    ].join('\n---\n');

    const descriptors = decomposeManifest(manifest, { logger });

    expect(descriptors.map((d) => d.name)).toEqual(['kept']);
    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('warn');
    expect(lines[0].line).toBe(
      '[WARN] Dropping list document with a member that is not an object {"kind":"List"}'
    );
  });

  it('should skip list members without a kind', () => {
    const manifest = 'kind: List\nitems:\n  - metadata:\n      name: nameless\n  - kind: ConfigMap\n    metadata:\n      name: named';

    const descriptors = decomposeManifest(manifest);

    expect(descriptors.map((d) => d.name)).toEqual(['named']);
  });
});

// =============================================================================
// Descriptors
// =============================================================================

describe('toDescriptor', () => {
  it('should default missing identity fields to empty strings', () => {
    const descriptor = toDescriptor({ kind: 'Namespace' });

    expect(descriptor).toEqual({
      apiVersion: '',
      kind: 'Namespace',
      name: '',
      namespace: '',
      annotations: {},
      object: { kind: 'Namespace' },
    });
  });

  it('should ignore annotations that are not strings', () => {
    const descriptor = toDescriptor({
      kind: 'ConfigMap',
      metadata: { annotations: { keep: 'yes', drop: 3 } },
    });

    expect(descriptor?.annotations).toEqual({ keep: 'yes' });
  });
});

describe('withDefaultNamespace', () => {
  it('should fill an empty namespace from the release', () => {
    const [service] = decomposeManifest(RELEASE_MANIFEST);

    const defaulted = withDefaultNamespace(service, 'release-ns');

    expect(defaulted.namespace).toBe('release-ns');
    expect(service.namespace).toBe('');
  });

  it('should leave an explicit namespace unchanged', () => {
    const [, deployment] = decomposeManifest(RELEASE_MANIFEST);

    const defaulted = withDefaultNamespace(deployment, 'release-ns');

    expect(defaulted.namespace).toBe('apps');
  });
});
