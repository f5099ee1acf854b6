/**
 * Manifest module exports
 */

export {
  decomposeManifest,
  splitManifest,
  splitApiVersion,
  toDescriptor,
  withDefaultNamespace,
  type DecomposeOptions,
} from './decompose.js';

export type { ReleaseManifest, ResourceDescriptor, GroupVersion } from './types.js';
