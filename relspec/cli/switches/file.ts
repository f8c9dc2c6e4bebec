// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { i } from '../../i18n';
import { session } from '../../main';
import { Switch } from '../switch';

export class File extends Switch {
  switch = 'file';
  get help() {
    return [
      i`a local file to read`
    ];
  }

  get resolvedValue(): string | undefined {
    const v = this.value;
    return v ? resolve(session.currentDirectory, v) : undefined;
  }
}
