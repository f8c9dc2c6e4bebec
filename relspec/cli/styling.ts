// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';
import { argv } from 'process';
import { i } from '../i18n';
import { Session } from '../session';

function formatTime(t: number) {
  return (
    t < 3600000 ? [Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000] :
      t < 86400000 ? [Math.floor(t / 3600000) % 24, Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000] :
        [Math.floor(t / 86400000), Math.floor(t / 3600000) % 24, Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000]).map(each => each.toString().padStart(2, '0')).join(':').replace(/(.*):(\d)/, '$1.$2');
}

export function indent(text: string): string
export function indent(text: Array<string>): Array<string>
export function indent(text: string | Array<string>): string | Array<string> {
  if (Array.isArray(text)) {
    return text.map(each => indent(each));
  }
  return `  ${text}`;
}

export const log: (message?: string) => void = (text) => console.log(text ?? '');
export const error: (message?: string) => void = (text) => {
  const errorLocalized = i`error:`;
  return console.error(`${chalk.red.bold(errorLocalized)} ${text ?? ''}`);
};
export const warning: (message?: string) => void = (text) => {
  const warningLocalized = i`warning:`;
  return console.error(`${chalk.yellow.bold(warningLocalized)} ${text ?? ''}`);
};
export const debug: (message?: string) => void = (text) => {
  if (argv.includes('--debug')) {
    console.error(`${chalk.cyan.bold('debug: ')}${text ?? ''}`);
  }
};

export function initStyling(session: Session) {

  session.channels.on('message', (text: string, _msec: number) => {
    log(text);
  });

  session.channels.on('error', (text: string, _msec: number) => {
    error(text);
  });

  session.channels.on('debug', (text: string, msec: number) => {
    debug(`${chalk.cyan.bold(`[${formatTime(msec)}]`)} ${text}`);
  });

  session.channels.on('warning', (text: string, _msec: number) => {
    warning(text);
  });
}
