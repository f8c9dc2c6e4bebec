// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { posix } from 'path';
import { i } from '../i18n';
import { Session } from '../session';
import { AcquisitionError } from '../util/exceptions';

/** filename to digest, in manifest order; the first line for a filename wins */
export type ChecksumEntries = Map<string, string>;

export interface ManifestOptions {
  /** where the content came from, for messages */
  source?: string;
  /**
   * the asset a per-asset manifest describes.
   *
   * A line that holds only a digest is taken as the digest of this file.
   */
  singleFile?: string;
}

/**
 * Parses `<hash> [*]<filename>` lines, as written by sha256sum and friends.
 *
 * Blank lines and `#` comments are skipped; an empty result is an error.
 */
export function parseManifest(session: Session, content: string, options: ManifestOptions = {}): ChecksumEntries {
  const entries: ChecksumEntries = new Map();

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const fields = line.split(/\s+/);
    if (fields.length < 2) {
      if (options.singleFile) {
        if (!entries.has(options.singleFile)) {
          entries.set(options.singleFile, fields[0]);
        }
      } else {
        session.channels.warning(i`Ignoring invalid checksum line: ${line}`);
      }
      continue;
    }

    const [hash, name] = fields;
    const filename = name.startsWith('*') ? name.substring(1) : name;
    if (!entries.has(filename)) {
      entries.set(filename, hash);
    }
  }

  if (entries.size === 0) {
    throw new AcquisitionError(i`no checksums found`, { location: options.source });
  }
  return entries;
}

/** keeps the entries whose filename the spec can produce; passes everything when nothing can be produced */
export function filterChecksums(session: Session, entries: ChecksumEntries, possible: Set<string>): ChecksumEntries {
  if (possible.size === 0) {
    session.channels.warning(i`No possible asset filenames could be generated, keeping all checksums`);
    return entries;
  }

  const filtered: ChecksumEntries = new Map();
  for (const [filename, hash] of entries) {
    if (possible.has(filename)) {
      filtered.set(filename, hash);
    } else {
      session.channels.debug(`Filtering out checksum for non-matching file: ${filename}`);
    }
  }
  session.channels.message(i`Filtered checksums: ${filtered.size} out of ${entries.size} entries match the asset template`);
  return filtered;
}

/** the digest on the first entry that names the file, by its full path or by its basename */
export function lookupChecksum(entries: ChecksumEntries, filename: string): string | undefined {
  for (const [name, hash] of entries) {
    if (name === filename || posix.basename(name) === filename) {
      return hash;
    }
  }
  return undefined;
}
