// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Command } from '../command';
import { blank, cli } from '../constants';
import { command as formatCommand, heading, hint } from '../format';
import { error, indent, log } from '../styling';

/**@internal */
export class HelpCommand extends Command {
  readonly command = 'help';

  get summary() {
    return i`get help on ${cli} or one of the commands`;
  }

  override async run() {
    const cmd = this.inputs[0];
    // did they ask for help on a command?
    if (cmd) {
      const target = this.commandLine.commands.find(each => each.command === cmd);
      if (target) {
        log(target.help.join('\n'));
        log(blank);
        return true;
      }

      error(i`Unrecognized command '${cmd}'`);
      log(hint(i`Use ${formatCommand(`${cli} ${this.command}`)} to get the list of available commands`));
      return false;
    }

    log(heading(i`Usage`, 2));
    log(blank);
    log(indent(i`${cli} COMMAND [--switches]`));
    log(blank);

    log(heading(i`Available ${cli} commands:`, 2));
    log(blank);
    const max = Math.max(...this.commandLine.commands.map(each => each.command.length));
    for (const command of this.commandLine.commands) {
      log(indent(i`${formatCommand(command.command.padEnd(max))} : ${command.summary}`));
    }
    log(blank);
    return true;
  }
}
