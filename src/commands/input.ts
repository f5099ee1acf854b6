/**
 * Manifest input for the release commands
 */

import { readFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';

/**
 * Read all of a stream as UTF-8 text
 */
export async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Read a manifest from a file, or from standard input when the path is `-`
 */
export async function readManifestInput(
  path: string,
  stdin: Readable = process.stdin
): Promise<string> {
  if (path === '-') {
    return readStream(stdin);
  }
  return readFile(path, 'utf-8');
}
