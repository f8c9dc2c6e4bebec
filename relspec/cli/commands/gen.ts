// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { chmod, writeFile } from 'fs/promises';
import { i } from '../../i18n';
import { session } from '../../main';
import { generateScript } from '../../shell/script';
import { Command } from '../command';
import { specFile } from '../format';
import { log } from '../styling';
import { Output } from '../switches/output';
import { Version } from '../switches/version';

export class GenCommand extends Command {
  readonly command = 'gen';
  output = new Output(this);
  version = new Version(this);

  get summary() {
    return i`generates a POSIX shell installer from the install spec`;
  }

  override async run() {
    const file = await this.config.load();
    if (!file) {
      return false;
    }

    const script = generateScript(file.spec, { targetVersion: this.version.value });
    const destination = this.output.value === '-' ? undefined : this.output.resolvedValue;
    if (!destination) {
      process.stdout.write(script);
      return true;
    }

    await writeFile(destination, script, 'utf8');
    await chmod(destination, 0o755);
    session.channels.debug(`wrote ${script.length} characters`);
    log(i`Wrote installer to ${specFile(destination)}`);
    return true;
  }
}
