// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';
import { AssetStatus, assetReport, platformTable } from '../../checks/asset-report';
import { resolveVersion } from '../../checksums/embedder';
import { i } from '../../i18n';
import { session } from '../../main';
import { Command } from '../command';
import { Table } from '../console-table';
import { count, heading, platform, specFile } from '../format';
import { log } from '../styling';
import { Switch } from '../switch';
import { Version } from '../switches/version';

class CheckAssets extends Switch {
  switch = 'check-assets';
  get help() {
    return [
      i`compares the generated filenames with the assets of the release (on by default; --check-assets=false to skip)`
    ];
  }
}

function formatStatus(status: AssetStatus) {
  switch (status) {
    case 'matched':
      return chalk.green(i`✓ MATCHED`);
    case 'no-match':
      return chalk.red(i`✗ NO MATCH`);
    case 'non-binary':
      return chalk.gray(i`- NON-BINARY`);
    case 'missing':
      return chalk.red(i`✗ MISSING`);
    case 'unsupported':
      return chalk.yellow(i`⚠ NOT SUPPORTED`);
  }
}

export class CheckCommand extends Command {
  readonly command = 'check';
  version = new Version(this);
  checkAssets = new CheckAssets(this);

  get summary() {
    return i`validates the install spec and shows the filename generated for each platform`;
  }

  override async run() {
    const file = await this.config.load();
    if (!file) {
      return false;
    }
    const spec = file.spec;
    log(i`${specFile(file.filename)} is valid`);

    const version = await resolveVersion(session, spec, this.version.value);
    log(heading(i`Release ${version}`, 2));

    const platforms = new Table(i`Platform`, i`Filename`);
    for (const row of platformTable(spec, version)) {
      platforms.push(platform(row.platform), row.filename);
    }
    log(platforms.toString());

    if (this.checkAssets.values.length > 0 && !this.checkAssets.active) {
      return true;
    }

    const repo = spec.repo;
    if (!repo) {
      log(i`No repository set; skipping the release asset check`);
      return true;
    }

    const assets = await session.releaseHost.releaseAssets(repo, version);
    const rows = assetReport(spec, version, assets.map(each => each.name));
    const report = new Table(i`Asset`, i`Platform`, i`Status`);
    for (const row of rows) {
      report.push(row.name, row.platform ?? '', formatStatus(row.status));
    }
    log('');
    log(heading(i`Release assets of ${repo} ${version}`, 2));
    log(report.toString());

    const problems = rows.filter(each => each.status === 'no-match' || each.status === 'missing');
    if (problems.length > 0) {
      log(i`${count(problems.length)} assets need attention`);
    }
    return true;
  }
}
