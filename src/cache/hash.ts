import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import { FileAccessError } from '../errors.js';

export const IDENTIFIER_LENGTH = 8;

/**
 * SHA-256 of the whole file, streamed so large binaries never sit in memory.
 */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new FileAccessError(path, err);
  }
  return hash.digest('hex');
}

export function toIdentifier(digest: string): string {
  return digest.slice(0, IDENTIFIER_LENGTH);
}

export function isIdentifier(name: string): boolean {
  return new RegExp(`^[0-9a-f]{${IDENTIFIER_LENGTH}}$`).test(name);
}
