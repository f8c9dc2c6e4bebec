// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';

export function heading(text: string, level = 1) {
  switch (level) {
    case 1:
      return `${chalk.underline.bold(text)}`;
    case 2:
      return `${chalk.greenBright(text)}`;
    case 3:
      return `${chalk.green(text)}`;
  }
  return `${chalk.bold(text)}`;
}

export function optional(text: string) {
  return chalk.gray(text);
}
export function cmdSwitch(text: string) {
  return optional(`--${text}`);
}

export function command(text: string) {
  return chalk.whiteBright.bold(text);
}

export function hint(text: string) {
  return chalk.green.dim(text);
}

export function count(num: number) {
  return chalk.grey(`${num}`);
}

export function specFile(path: string): string {
  return chalk.cyan(path);
}

export function platform(text: string) {
  return chalk.whiteBright(text);
}
