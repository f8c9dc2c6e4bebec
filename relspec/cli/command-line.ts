// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { tmpdir } from 'os';
import { resolve } from 'path';
import { binDirVariable } from '../constants';
import { SessionSettings } from '../session';
import { Command } from './command';

export type switches = {
  [key: string]: Array<string>;
}

function env(name: string) {
  return process.env[name] || undefined;
}

/** the settings a session is created with: global switches first, then the environment */
class Ctx implements SessionSettings {
  constructor(cmdline: CommandLine) {
    this.os = cmdline.switches['os']?.[0];
    this.arch = cmdline.switches['arch']?.[0];
    this.binDir = env(binDirVariable);
  }

  readonly os?: string;
  readonly arch?: string;
  readonly binDir?: string;

  get homeFolder() {
    return process.env['HOME'] || process.env['USERPROFILE'] || tmpdir();
  }

  get githubToken() {
    return env('GITHUB_TOKEN');
  }

  get githubApi() {
    return env('GITHUB_API_URL');
  }

  get githubServer() {
    return env('GITHUB_SERVER_URL');
  }
}

export class CommandLine {
  readonly commands = new Array<Command>();
  readonly inputs = new Array<string>();
  readonly switches: switches = {};
  readonly context: SessionSettings;

  get debug() {
    return this.isSet('debug');
  }

  get language() {
    const l = this.switches['language'] || [];
    return l[0] ? resolve(l[0]) : undefined;
  }

  isSet(sw: string) {
    const s = this.switches[sw];
    if (s && s[s.length - 1] !== 'false') {
      return true;
    }
    return false;
  }

  claim(sw: string) {
    const v = this.switches[sw];
    delete this.switches[sw];
    return v;
  }

  addCommand(command: Command) {
    this.commands.push(command);
  }

  /** parses the command line and returns the command that has been requested */
  get command() {
    return this.commands.find(cmd => cmd.command === this.inputs[0]);
  }

  constructor(args: Array<string>) {
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      // eslint-disable-next-line prefer-const
      let [, name, , value] = /^--([^=:]+)([=:])?(.+)?$/g.exec(arg) || [];
      if (name) {
        if (!value) {
          if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
            // if you say --foo bar then bar is the value
            value = args[++i];
          }
        }
        this.switches[name] = this.switches[name] === undefined ? [] : this.switches[name];
        this.switches[name].push(value ?? '');
        continue;
      }
      this.inputs.push(arg);
    }

    this.context = new Ctx(this);
  }
}
