// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { normalize } from 'path';
import { pipeline as origPipeline } from 'stream';
import { promisify } from 'util';
import { Session } from '../session';

export const pipeline = promisify(origPipeline);

export interface UnpackOptions {
  /** leading path elements to drop from each entry */
  strip?: number;
}

export type Unpacker = (session: Session, archive: string, output: string, options: UnpackOptions) => Promise<void>;

/**
 * Returns a new path string such that the path has prefixCount path elements removed, and directory
 * separators normalized to a single forward slash.
 * If prefixCount is greater than or equal to the number of path elements in the path, undefined is returned.
 */
export function stripPath(path: string, prefixCount: number): string | undefined {
  const elements = path.split(/[\\/]+/);
  const hasLeadingSlash = elements.length !== 0 && elements[0].length === 0;
  const hasTrailingSlash = elements.length !== 0 && elements[elements.length - 1].length === 0;
  let countForUndefined = prefixCount;
  if (hasLeadingSlash) {
    ++countForUndefined;
  }

  if (hasTrailingSlash) {
    ++countForUndefined;
  }

  if (elements.length <= countForUndefined) {
    return undefined;
  }

  if (hasLeadingSlash) {
    return '/' + elements.splice(prefixCount + 1).join('/');
  }

  return elements.splice(prefixCount).join('/');
}

/**
 * Applies the unpack options to the path of an archive entry.
 *
 * @returns the relative path to extract the entry to, or undefined when it is not extracted
 * (stripped away entirely, or pointing outside the output folder).
 */
export function implementUnpackOptions(path: string, options: UnpackOptions): string | undefined {
  const stripped = options.strip ? stripPath(path, options.strip) : path;
  if (!stripped) {
    return undefined;
  }
  const relative = normalize(stripped.replace(/^[\\/]+/, ''));
  if (relative === '.' || relative === '..' || relative.startsWith('../') || relative.startsWith('..\\')) {
    return undefined;
  }
  return relative;
}
