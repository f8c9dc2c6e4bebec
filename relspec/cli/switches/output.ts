// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { i } from '../../i18n';
import { session } from '../../main';
import { Switch } from '../switch';

export class Output extends Switch {
  switch = 'output';
  get help() {
    return [
      i`the file to write to`
    ];
  }

  get resolvedValue(): string | undefined {
    const v = this.value;
    return v ? resolve(session.currentDirectory, v) : undefined;
  }
}
