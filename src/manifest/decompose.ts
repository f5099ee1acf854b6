/**
 * Manifest decomposition
 *
 * Splits a rendered multi-document manifest into resource descriptors, in
 * manifest order. List documents (anything with an `items` array) are
 * replaced by their members at the same position.
 */

import { isScalar, parseAllDocuments, type Document } from 'yaml';
import { toError } from '../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { GroupVersion, ResourceDescriptor } from './types.js';

export interface DecomposeOptions {
  /** Receives skipped-document and dropped-list messages */
  logger?: ApiLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Split manifest text into its YAML documents
 *
 * Empty documents (blank, or only comments) are dropped. Documents with
 * syntax errors are kept, with their `errors` set.
 */
export function splitManifest(manifest: string): Document.Parsed[] {
  const documents: Document.Parsed[] = [];
  for (const doc of parseAllDocuments(manifest)) {
    if (!isEmptyDocument(doc)) {
      documents.push(doc);
    }
  }
  return documents;
}

function isEmptyDocument(doc: Document.Parsed): boolean {
  return doc.contents === null || (isScalar(doc.contents) && doc.contents.value === null);
}

/**
 * Split an `apiVersion` into group and version
 *
 * @example
 * splitApiVersion('apps/v1') // { group: 'apps', version: 'v1' }
 * splitApiVersion('v1')      // { group: '', version: 'v1' }
 */
export function splitApiVersion(apiVersion: string): GroupVersion {
  const slash = apiVersion.indexOf('/');
  if (slash === -1) {
    return { group: '', version: apiVersion };
  }
  return {
    group: apiVersion.slice(0, slash),
    version: apiVersion.slice(slash + 1),
  };
}

/**
 * Build a descriptor from a parsed object
 *
 * @returns undefined when the object carries no kind
 */
export function toDescriptor(object: Record<string, unknown>): ResourceDescriptor | undefined {
  const kind = stringField(object, 'kind');
  if (!kind) {
    return undefined;
  }

  const metadata = isRecord(object.metadata) ? object.metadata : {};
  const annotations: Record<string, string> = {};
  if (isRecord(metadata.annotations)) {
    for (const [key, value] of Object.entries(metadata.annotations)) {
      if (typeof value === 'string') {
        annotations[key] = value;
      }
    }
  }

  return {
    apiVersion: stringField(object, 'apiVersion'),
    kind,
    name: stringField(metadata, 'name'),
    namespace: stringField(metadata, 'namespace'),
    annotations,
    object,
  };
}

/**
 * Convert one document to a plain object
 *
 * @returns the mapping, or undefined when the document has syntax errors,
 * cannot be resolved (an unknown or excessive alias) or is not a mapping
 */
function toObject(doc: Document.Parsed, index: number, log: ApiLogger): Record<string, unknown> | undefined {
  if (doc.errors.length > 0) {
    log.debug('Skipping manifest document that failed to parse', {
      document: index,
      error: doc.errors[0].message,
    });
    return undefined;
  }

  let value: unknown;
  try {
    value = doc.toJS();
  } catch (err) {
    log.debug('Skipping manifest document that failed to resolve', {
      document: index,
      error: toError(err).message,
    });
    return undefined;
  }
  return isRecord(value) ? value : undefined;
}

/**
 * Expand a list document into descriptors for its members
 *
 * A list with a member that is not a mapping is dropped whole.
 */
function expandList(
  list: Record<string, unknown>,
  items: unknown[],
  log: ApiLogger
): ResourceDescriptor[] {
  const members: Record<string, unknown>[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      log.warn('Dropping list document with a member that is not an object', {
        kind: stringField(list, 'kind'),
      });
      return [];
    }
    members.push(item);
  }

  const descriptors: ResourceDescriptor[] = [];
  for (const member of members) {
    const descriptor = toDescriptor(member);
    if (descriptor) {
      descriptors.push(descriptor);
    }
  }
  return descriptors;
}

/**
 * Decompose a manifest into resource descriptors
 *
 * Documents that fail to parse, are not mappings, or have no kind are
 * skipped. Duplicates are kept.
 *
 * @param manifest - Multi-document YAML text
 * @returns Descriptors in manifest order
 */
export function decomposeManifest(
  manifest: string,
  options: DecomposeOptions = {}
): ResourceDescriptor[] {
  const log = options.logger ?? defaultLogger;
  const descriptors: ResourceDescriptor[] = [];

  const documents = splitManifest(manifest);
  for (const [index, doc] of documents.entries()) {
    const object = toObject(doc, index, log);
    if (!object) {
      continue;
    }

    if (Array.isArray(object.items)) {
      descriptors.push(...expandList(object, object.items, log));
      continue;
    }

    const descriptor = toDescriptor(object);
    if (descriptor) {
      descriptors.push(descriptor);
    }
  }

  return descriptors;
}

/**
 * Give a descriptor the release namespace when it names none
 *
 * Returns a copy; explicit namespaces are kept.
 */
export function withDefaultNamespace(
  descriptor: ResourceDescriptor,
  namespace: string
): ResourceDescriptor {
  if (descriptor.namespace !== '') {
    return descriptor;
  }
  return { ...descriptor, namespace };
}
