// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';

export class Failed extends Error {
}

/** The install spec can't be used as written: a missing or malformed field, or a template the mode can't serve. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/** Something could not be fetched or read: a release, a manifest, an asset body. */
export class AcquisitionError extends Error {
  override readonly name = 'AcquisitionError';
  readonly location?: string;

  constructor(message: string, options?: { location?: string, cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.location = options?.location;
  }
}

export class NoChecksumFound extends Error {
  override readonly name = 'NoChecksumFound';
  constructor(public readonly version: string, public readonly filename: string) {
    super(i`No checksum found for ${filename} (version ${version})`);
  }
}

export class ChecksumMismatch extends Error {
  override readonly name = 'ChecksumMismatch';
  constructor(public readonly filename: string, public readonly expected: string, public readonly actual: string) {
    super(i`Checksum mismatch for ${filename}: expected ${expected}, got ${actual}`);
  }
}

/** renders an error and the chain of causes behind it as one line */
export function describeError(e: unknown): string {
  if (!(e instanceof Error)) {
    return String(e);
  }
  const cause = e.cause === undefined ? '' : `: ${describeError(e.cause)}`;
  return `${e.message}${cause}`;
}
