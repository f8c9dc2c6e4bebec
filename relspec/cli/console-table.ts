// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';
import chalk from 'chalk';
import stripAnsi from 'strip-ansi';

function leftPad(text: string, length: number) {
  const remain = length - stripAnsi(text).length;
  if (remain <= 0) { return text; }
  return text + ' '.repeat(remain);
}

export class Table {
  private readonly columnNames: Array<string>;
  private readonly rows = new Array<Array<string>>();
  constructor(...columnNames: Array<string>) {
    this.columnNames = columnNames;
  }
  get length() {
    return this.rows.length;
  }
  push(...values: Array<string>) {
    strict.equal(values.length, this.columnNames.length, 'unexpected number of arguments in table row');
    this.rows.push(Array.from(values));
  }
  toString() {
    const lengths = this.columnNames.map(each => each.length);

    for (const row of this.rows) {
      for (let colNum = 0; colNum < this.columnNames.length; ++colNum) {
        const colLen = stripAnsi(row[colNum]).length;
        if (colLen > lengths[colNum]) {
          lengths[colNum] = colLen;
        }
      }
    }

    const formattedRows = new Array<string>();
    formattedRows.push(this.columnNames.map((name, colNum) => chalk.red(leftPad(name, lengths[colNum]))).join('  ').trimEnd());
    formattedRows.push(lengths.map(length => '-'.repeat(length)).join('  '));
    for (const row of this.rows) {
      formattedRows.push(row.map((value, colNum) => leftPad(value, lengths[colNum])).join('  ').trimEnd());
    }

    return formattedRows.join('\n');
  }
}
