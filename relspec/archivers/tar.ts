// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createReadStream, createWriteStream } from 'fs';
import { lstat, mkdir, symlink } from 'fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { Readable, Transform } from 'stream';
import { extract as tarExtract, Headers } from 'tar-stream';
import { default as bz2 } from 'unbzip2-stream';
import { createGunzip } from 'zlib';
import { i } from '../i18n';
import { Session } from '../session';
import { execute } from '../util/exec-cmd';
import { implementUnpackOptions, pipeline, UnpackOptions } from './unpacker';

function isInside(folder: string, path: string) {
  const rel = relative(resolve(folder), resolve(path));
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** the first link already on disk along the entry's path, if any; entries are never written through one */
async function linkOnPath(output: string, extractPath: string): Promise<string | undefined> {
  let current = output;
  for (const element of extractPath.split(/[\\/]+/)) {
    current = join(current, element);
    try {
      if ((await lstat(current)).isSymbolicLink()) {
        return current;
      }
    } catch (e) {
      if (e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) {
        return undefined;
      }
      throw e;
    }
  }
  return undefined;
}

async function maybeUnpackEntry(session: Session, archive: string, output: string, options: UnpackOptions, header: Headers, stream: Readable): Promise<void> {
  const streamPromise = new Promise((accept, reject) => {
    stream.on('end', accept);
    stream.on('error', reject);
  });

  try {
    const extractPath = implementUnpackOptions(header.name, options);
    if (!extractPath) {
      return;
    }
    const destination = join(output, extractPath);
    const link = await linkOnPath(output, extractPath);
    if (link) {
      session.channels.warning(i`in ${archive} skipping ${header.name} because ${link} is a link`);
      return;
    }

    if (header.type === 'symlink') {
      if (header.linkname) {
        if (isAbsolute(header.linkname) || !isInside(output, resolve(dirname(destination), header.linkname))) {
          session.channels.warning(i`in ${archive} skipping ${header.name} because its target ${header.linkname} is outside the output folder`);
          return;
        }
        await mkdir(dirname(destination), { recursive: true });
        await symlink(header.linkname, destination);
      }
      return;
    }
    if (header.type === 'directory') {
      session.channels.debug(`in ${archive} skipping directory ${header.name}`);
      return;
    }
    if (header.type && header.type !== 'file') {
      session.channels.warning(i`in ${archive} skipping ${header.name} because it is a ${header.type}`);
      return;
    }

    session.channels.debug(`unpacking TAR ${archive}/${header.name} => ${destination}`);
    await mkdir(dirname(destination), { recursive: true });
    await pipeline(stream, createWriteStream(destination, { mode: header.mode }));
  } finally {
    stream.resume();
    await streamPromise;
  }
}

async function unpackTar(session: Session, archive: string, output: string, options: UnpackOptions, decompressor?: Transform): Promise<void> {
  const tarExtractor = tarExtract();

  // a failed entry tears the extractor down, which rejects the pipeline below
  tarExtractor.on('entry', (header, stream, next) => {
    maybeUnpackEntry(session, archive, output, options, header, stream).then(() => next(), (err: unknown) => {
      tarExtractor.destroy(err instanceof Error ? err : new Error(String(err)));
    });
  });

  if (decompressor) {
    await pipeline(createReadStream(archive), decompressor, tarExtractor);
  } else {
    await pipeline(createReadStream(archive), tarExtractor);
  }
}

export function unpackPlainTar(session: Session, archive: string, output: string, options: UnpackOptions): Promise<void> {
  session.channels.debug(`unpacking TAR ${archive} => ${output}`);
  return unpackTar(session, archive, output, options);
}

export function unpackTarGz(session: Session, archive: string, output: string, options: UnpackOptions): Promise<void> {
  session.channels.debug(`unpacking TAR.GZ ${archive} => ${output}`);
  return unpackTar(session, archive, output, options, createGunzip());
}

export function unpackTarBz2(session: Session, archive: string, output: string, options: UnpackOptions): Promise<void> {
  session.channels.debug(`unpacking TAR.BZ2 ${archive} => ${output}`);
  return unpackTar(session, archive, output, options, bz2());
}

/** xz has no stream decoder here; the system tar does the work */
export async function unpackTarXz(session: Session, archive: string, output: string, options: UnpackOptions): Promise<void> {
  session.channels.debug(`unpacking TAR.XZ ${archive} => ${output}`);
  const args = ['-xJf', archive, '-C', output];
  if (options.strip) {
    args.push(`--strip-components=${options.strip}`);
  }
  const result = await execute('tar', args);
  if (result.error) {
    throw new Error(i`Unable to extract ${archive}: ${result.stderr.trim() || result.error.message}`, { cause: result.error });
  }
}
