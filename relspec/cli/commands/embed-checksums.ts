// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ChecksumEmbedder, embedModes, isEmbedMode } from '../../checksums/embedder';
import { i } from '../../i18n';
import { session } from '../../main';
import { Command } from '../command';
import { cmdSwitch, count, specFile } from '../format';
import { error, log } from '../styling';
import { Switch } from '../switch';
import { File } from '../switches/file';
import { Output } from '../switches/output';
import { Version } from '../switches/version';

class Mode extends Switch {
  switch = 'mode';
  get help() {
    return [
      i`how checksums are acquired: ${embedModes.join(', ')} (defaults to download)`
    ];
  }
}

class Concurrency extends Switch {
  switch = 'concurrency';
  get help() {
    return [
      i`how many assets to download at once in calculate mode`
    ];
  }
}

export class EmbedChecksumsCommand extends Command {
  readonly command = 'embed-checksums';
  mode = new Mode(this);
  version = new Version(this);
  file = new File(this);
  output = new Output(this);
  concurrency = new Concurrency(this);

  get summary() {
    return i`embeds the checksums of a release into the install spec`;
  }

  override async run() {
    const mode = this.mode.value ?? 'download';
    if (!isEmbedMode(mode)) {
      error(i`Unknown mode '${mode}'; expected one of ${embedModes.join(', ')}`);
      return false;
    }

    let concurrency: number | undefined;
    if (this.concurrency.value !== undefined) {
      concurrency = Number(this.concurrency.value);
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        error(i`${cmdSwitch('concurrency')} must be a positive integer`);
        return false;
      }
    }

    const file = await this.config.load();
    if (!file) {
      return false;
    }

    const embedder = new ChecksumEmbedder(session, file.spec);
    const result = await embedder.embed(mode, this.version.value, { checksumFile: this.file.resolvedValue, concurrency });
    file.setChecksums(embedder.spec.checksums ?? {});

    const destination = this.output.resolvedValue ?? file.filename;
    await file.save(destination);
    log(i`Embedded ${count(result.checksums.length)} checksums for ${result.version} into ${specFile(destination)}`);
    return true;
  }
}
