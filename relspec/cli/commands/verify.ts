// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { basename } from 'path';
import { ChecksumVerifier } from '../../checksums/verifier';
import { resolveVersion } from '../../checksums/embedder';
import { i } from '../../i18n';
import { session } from '../../main';
import { Command } from '../command';
import { cmdSwitch } from '../format';
import { error } from '../styling';
import { Switch } from '../switch';
import { File } from '../switches/file';
import { Version } from '../switches/version';

class Asset extends Switch {
  switch = 'asset';
  get help() {
    return [
      i`the release asset the file was downloaded as (defaults to the file's name)`
    ];
  }
}

export class VerifyCommand extends Command {
  readonly command = 'verify';
  file = new File(this, { required: true });
  version = new Version(this);
  asset = new Asset(this);

  get summary() {
    return i`verifies a downloaded release asset against the install spec's checksums`;
  }

  override async run() {
    const path = this.file.resolvedValue;
    if (!path) {
      error(i`${cmdSwitch('file')} is required`);
      return false;
    }
    const spec = (await this.config.load())?.spec;
    if (!spec) {
      return false;
    }

    const version = await resolveVersion(session, spec, this.version.value);
    await new ChecksumVerifier(session, spec).verify(version, path, this.asset.value ?? basename(path), { missing: 'error' });
    return true;
  }
}
