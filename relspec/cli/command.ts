// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';
import { CommandLine } from './command-line';
import { blank, cli } from './constants';
import { cmdSwitch, command, heading, optional } from './format';
import { Switch } from './switch';
import { Config } from './switches/config';
import { Debug } from './switches/debug';

/** @internal */

export abstract class Command {
  readonly abstract command: string;
  abstract get summary(): string;

  readonly switches = new Array<Switch>();

  readonly debug = new Debug(this);
  readonly config = new Config(this);

  constructor(public commandLine: CommandLine) {}

  get inputs() {
    return this.commandLine.inputs.slice(1);
  }

  get title() {
    return `${cli} ${this.command}`;
  }

  get synopsis(): Array<string> {
    return [
      heading(i`Synopsis`, 2),
      ` ${command(this.title)} ${this.switches.map(each => optional(`[--${each.switch}]`)).join(' ')}`,
    ];
  }

  get help() {
    return [
      heading(this.title),
      blank,
      this.summary,
      blank,
      ...this.synopsis,
      blank,
      heading(i`Switches`, 2),
      blank,
      ...this.switches.map(each => ` ${cmdSwitch(each.switch)}: ${each.help.join(' ')}`)
    ];
  }

  async run(): Promise<boolean> {
    return true;
  }
}
