// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createReadStream, createWriteStream } from 'fs';
import { basename, join } from 'path';
import { createGunzip } from 'zlib';
import { Session } from '../session';
import { unpackPlainTar, unpackTarBz2, unpackTarGz, unpackTarXz } from './tar';
import { pipeline, UnpackOptions, Unpacker } from './unpacker';
import { unpackZip } from './zip';

/** a gzip-compressed single file (not a tarball): decompressed next to its name without `.gz` */
async function gunzipFile(session: Session, archive: string, output: string): Promise<void> {
  const destination = join(output, basename(archive).replace(/\.gz$/i, ''));
  session.channels.debug(`unpacking GZ ${archive} => ${destination}`);
  await pipeline(createReadStream(archive), createGunzip(), createWriteStream(destination, { mode: 0o755 }));
}

const unpackers: Array<[RegExp, Unpacker]> = [
  [/\.(tar\.gz|tgz)$/i, unpackTarGz],
  [/\.(tar\.bz2|tbz2?)$/i, unpackTarBz2],
  [/\.(tar\.xz|txz)$/i, unpackTarXz],
  [/\.tar$/i, unpackPlainTar],
  [/\.zip$/i, unpackZip],
  [/\.gz$/i, gunzipFile],
];

/**
 * Extracts an archive into the output folder, picking the format from the asset's filename.
 *
 * @returns false when the asset is not an archive (nothing is extracted)
 */
export async function unpack(session: Session, archive: string, filename: string, output: string, options: UnpackOptions = {}): Promise<boolean> {
  const unpacker = unpackers.find(([pattern]) => pattern.test(filename))?.[1];
  if (!unpacker) {
    return false;
  }
  await unpacker(session, archive, output, options);
  return true;
}
