/**
 * Tests for kind -> resource type resolution
 */

import { describe, it, expect } from 'vitest';
import { buildTypeResolver, createTypeResolver } from '../../src/discovery/resolver.js';
import { SchemaDiscoveryError } from '../../src/api/errors.js';
import type { DiscoveredGroup } from '../../src/api/types.js';
import { TEST_GROUPS } from './fake-cluster.js';

describe('createTypeResolver', () => {
  const resolver = createTypeResolver(TEST_GROUPS);

  it('should resolve core kinds', () => {
    expect(resolver.resolve('v1', 'ConfigMap')).toEqual({
      group: '',
      version: 'v1',
      kind: 'ConfigMap',
      plural: 'configmaps',
      namespaced: true,
    });
  });

  it('should resolve grouped kinds', () => {
    expect(resolver.resolve('apps/v1', 'Deployment')?.plural).toBe('deployments');
  });

  it('should report cluster scope', () => {
    expect(resolver.resolve('v1', 'Namespace')?.namespaced).toBe(false);
    expect(resolver.resolve('rbac.authorization.k8s.io/v1', 'ClusterRole')?.namespaced).toBe(false);
  });

  it('should ignore subresources', () => {
    expect(resolver.resolve('apps/v1', 'Scale')).toBeUndefined();
    expect(resolver.resolve('v1', 'Pod')?.plural).toBe('pods');
    expect(resolver.size).toBe(7);
  });

  it('should miss unknown kinds and versions', () => {
    expect(resolver.resolve('v1', 'Widget')).toBeUndefined();
    expect(resolver.resolve('apps/v1beta1', 'Deployment')).toBeUndefined();
    expect(resolver.resolve('example.com/v1', 'Deployment')).toBeUndefined();
  });

  it('should use the preferred version when none is given', () => {
    const groups: DiscoveredGroup[] = [
      {
        group: 'example.com',
        preferredVersion: 'v2',
        versions: {
          v1: [{ name: 'widgets', kind: 'Widget', namespaced: true }],
          v2: [{ name: 'widgets', kind: 'Widget', namespaced: false }],
        },
      },
    ];

    const widgets = createTypeResolver(groups);

    expect(widgets.resolve('example.com/', 'Widget')).toEqual({
      group: 'example.com',
      version: 'v2',
      kind: 'Widget',
      plural: 'widgets',
      namespaced: false,
    });
    expect(widgets.resolve('example.com/v1', 'Widget')?.namespaced).toBe(true);
  });
});

describe('buildTypeResolver', () => {
  it('should build from live discovery', async () => {
    const resolver = await buildTypeResolver({ discover: async () => TEST_GROUPS });

    expect(resolver.resolve('v1', 'Service')?.plural).toBe('services');
  });

  it('should fail with SchemaDiscoveryError when discovery fails', async () => {
    const failing = {
      discover: async () => {
        throw new Error('connection refused');
      },
    };

    await expect(buildTypeResolver(failing)).rejects.toBeInstanceOf(SchemaDiscoveryError);
    await expect(buildTypeResolver(failing)).rejects.toThrow(
      'Failed to discover API resources: connection refused'
    );
  });
});
