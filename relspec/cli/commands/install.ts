// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Installer } from '../../installers/installer';
import { session } from '../../main';
import { Command } from '../command';
import { Table } from '../console-table';
import { platform } from '../format';
import { log } from '../styling';
import { Switch } from '../switch';
import { Version } from '../switches/version';

class BinDir extends Switch {
  switch = 'bin-dir';
  get help() {
    return [
      i`the folder to install binaries into`
    ];
  }
}

class DryRun extends Switch {
  switch = 'dry-run';
  get help() {
    return [
      i`shows what would be installed, without downloading anything`
    ];
  }
}

export class InstallCommand extends Command {
  readonly command = 'install';
  version = new Version(this);
  binDir = new BinDir(this);
  dryRun = new DryRun(this);

  get summary() {
    return i`installs the release binaries for this platform`;
  }

  override async run() {
    const spec = (await this.config.load())?.spec;
    if (!spec) {
      return false;
    }

    const installer = new Installer(session, spec);
    const options = { version: this.version.value, binDir: this.binDir.value };

    if (this.dryRun.active) {
      const plan = await installer.plan(options);
      log(i`Dry run: ${spec.name ?? ''} ${plan.version} for ${platform(`${plan.platform.os}/${plan.platform.arch}`)}`);
      log(i`  asset: ${plan.url}`);
      const table = new Table(i`Binary`, i`Path in asset`, i`Destination`);
      for (const binary of plan.binaries) {
        table.push(binary.name, binary.path, `${plan.binDir}/${binary.name}`);
      }
      log(table.toString());
      return true;
    }

    const result = await installer.install(options);
    if (result.verification === 'skipped') {
      log(i`Installed without checksum verification`);
    }
    return true;
  }
}
