// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { configurationName } from '../../constants';
import { i } from '../../i18n';
import { session } from '../../main';
import { setDefaults } from '../../spec/defaults';
import { InstallSpecFile } from '../../spec/spec-file';
import { specFile } from '../format';
import { debug, error } from '../styling';
import { Switch } from '../switch';

export class Config extends Switch {
  switch = 'config';
  get help() {
    return [
      i`the install spec to use (defaults to ${configurationName})`
    ];
  }

  get path(): string {
    return resolve(session.currentDirectory, this.value || configurationName);
  }

  /**
   * Loads and validates the spec; problems are reported as errors.
   *
   * @returns the spec file (with defaults applied to its spec), or undefined when it is not usable
   */
  async load(): Promise<InstallSpecFile | undefined> {
    debug(`Loading install spec ${this.path}`);
    const file = await InstallSpecFile.load(this.path);
    if (!file.isFormatValid) {
      for (const each of file.formatErrors) {
        error(each);
      }
      error(i`Unable to parse ${specFile(this.path)}`);
      return undefined;
    }

    let valid = true;
    for (const each of file.validate()) {
      error(file.formatVMessage(each));
      valid = false;
    }
    if (!valid) {
      return undefined;
    }

    setDefaults(file.spec);
    return file;
  }
}
