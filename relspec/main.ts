#!/usr/bin/env node

// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { argv } from 'process';
import { CommandLine } from './cli/command-line';
import { CheckCommand } from './cli/commands/check';
import { EmbedChecksumsCommand } from './cli/commands/embed-checksums';
import { GenCommand } from './cli/commands/gen';
import { HelpCommand } from './cli/commands/help';
import { InstallCommand } from './cli/commands/install';
import { VerifyCommand } from './cli/commands/verify';
import { cmdSwitch } from './cli/format';
import { error, initStyling, log } from './cli/styling';
import { i, setLocale } from './i18n';
import { Session } from './session';
import { describeError } from './util/exceptions';

// parse the command line
const commandline = new CommandLine(argv.slice(2));

setLocale(commandline.language);

export let session: Session;

async function main() {
  // create our session for this process.
  session = new Session(process.cwd(), commandline.context);

  initStyling(session);

  commandline.addCommand(new HelpCommand(commandline));
  commandline.addCommand(new CheckCommand(commandline));
  commandline.addCommand(new EmbedChecksumsCommand(commandline));
  commandline.addCommand(new VerifyCommand(commandline));
  commandline.addCommand(new GenCommand(commandline));
  commandline.addCommand(new InstallCommand(commandline));

  const command = commandline.command;
  if (!command) {
    // no command recognized.

    // did they specify inputs?
    if (commandline.inputs.length > 0) {
      // unrecognized command
      error(i`Unrecognized command '${commandline.inputs[0]}'`);
      return process.exitCode = 1;
    }

    return process.exitCode = await new HelpCommand(commandline).run() ? 0 : 1;
  }

  const missing = command.switches.filter(each => !each.valid);
  if (missing.length > 0) {
    for (const each of missing) {
      error(i`Missing required switch ${cmdSwitch(each.switch)}`);
    }
    return process.exit(1);
  }

  let result = true;
  try {
    result = await command.run();
  } catch (e) {
    // in --debug mode we want to see the stack trace(s).
    if (commandline.debug && e instanceof Error) {
      log(e.stack);
    }

    error(describeError(e));
    return process.exit(1);
  }

  session.channels.debug(`finished '${command.command}'`);
  return process.exit(result ? 0 : 1);
}

void main();
