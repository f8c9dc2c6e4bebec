// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createWriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { default as StreamZip } from 'node-stream-zip';
import { dirname, join } from 'path';
import { Session } from '../session';
import { implementUnpackOptions, pipeline, UnpackOptions } from './unpacker';

export async function unpackZip(session: Session, archive: string, output: string, options: UnpackOptions): Promise<void> {
  session.channels.debug(`unpacking ZIP ${archive} => ${output}`);
  const zipFile = new StreamZip.async({ file: archive });
  try {
    for (const file of Object.values(await zipFile.entries())) {
      const extractPath = implementUnpackOptions(file.name, options);
      if (!extractPath || file.isDirectory) {
        continue;
      }
      const destination = join(output, extractPath);
      session.channels.debug(`unpacking ZIP file ${archive}/${file.name} => ${destination}`);
      await mkdir(dirname(destination), { recursive: true });
      const mode = (file.attr >> 16) & 0xfff;
      await pipeline(await zipFile.stream(file), createWriteStream(destination, { mode: mode ? mode : undefined }));
    }
  } finally {
    await zipFile.close();
  }
}
