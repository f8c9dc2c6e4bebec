// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { Readable } from 'stream';

export const algorithms = ['sha256', 'sha512', 'sha1', 'md5'] as const;
export type Algorithm = typeof algorithms[number];

export function isAlgorithm(value: unknown): value is Algorithm {
  return algorithms.some(each => each === value);
}

/** consumes the stream and returns the lowercase hex digest of its contents */
export async function hash(stream: Readable, algorithm: Algorithm = 'sha256'): Promise<string> {
  const hasher = createHash(algorithm);
  try {
    for await (const chunk of stream) {
      hasher.update(chunk);
    }
  } finally {
    stream.destroy();
  }
  return hasher.digest('hex');
}

export function hashFile(path: string, algorithm: Algorithm = 'sha256'): Promise<string> {
  return hash(createReadStream(path), algorithm);
}

export function sameDigest(a: string, b: string) {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
