// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { spawn, SpawnOptions } from 'child_process';

export interface ExecResult {
  stdout: string;
  stderr: string;

  /**
   * Union of stdout and stderr.
   */
  log: string;
  error: Error | null;
  code: number | null;
  command: string,
  args: Array<string>,
}

/** runs a command (resolved on the PATH) and collects its output; a non-zero exit is reported in the result, not thrown */
export function execute(command: string, cmdlineargs: Array<string>, options: SpawnOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const cp = spawn(command, cmdlineargs.filter(each => each), { ...options, stdio: 'pipe' });

    let err = '';
    let out = '';
    let all = '';
    cp.stderr?.on('data', (chunk: Buffer) => {
      err += chunk.toString();
      all += chunk.toString();
    });
    cp.stdout?.on('data', (chunk: Buffer) => {
      out += chunk.toString();
      all += chunk.toString();
    });

    cp.on('error', (err) => {
      reject(err);
    });

    cp.on('close', (code) => {
      return resolve({
        stdout: out,
        stderr: err,
        log: all,
        error: code ? new Error(`${command} exited with code ${code}`) : null,
        code,
        command: command,
        args: cmdlineargs,
      });
    });
  });
}
