// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { endianness } from 'os';
import { platformKey } from '../asset/platforms';
import { i } from '../i18n';
import { Session } from '../session';
import { InstallSpec, Platform } from '../spec/install-spec';
import { Failed } from '../util/exceptions';
import { execute } from '../util/exec-cmd';

const osNames = new Map<string, string>([
  ['win32', 'windows'],
  ['sunos', 'solaris'],
]);

const archNames = new Map<string, string>([
  ['x64', 'amd64'],
  ['ia32', '386'],
  ['mipsel', 'mipsle'],
]);

/** the OS name (as used in release filenames) for a node platform */
export function osName(platform: string = process.platform) {
  return osNames.get(platform) ?? platform;
}

/** the architecture name (as used in release filenames) for a node architecture */
export function archName(arch: string = process.arch, endianness: 'BE' | 'LE' = 'LE') {
  if (arch === 'ppc64' && endianness === 'LE') {
    return 'ppc64le';
  }
  return archNames.get(arch) ?? arch;
}

/** true if x86_64 binaries can run here through Rosetta 2 */
export async function isRosetta2Available(): Promise<boolean> {
  try {
    const result = await execute('arch', ['-arch', 'x86_64', 'true']);
    return result.code === 0;
  } catch {
    // no `arch` command at all
    return false;
  }
}

/**
 * The platform to install for.
 *
 * `--os`/`--arch` override detection. On Apple Silicon, specs that opt into Rosetta 2
 * get amd64 binaries when it is installed.
 */
export async function detectPlatform(session: Session, spec: InstallSpec): Promise<Platform> {
  const os = (session.settings.os || osName()).toLowerCase();
  let arch = (session.settings.arch || archName(process.arch, endianness())).toLowerCase();

  if (!session.settings.arch && spec.asset?.archEmulation?.rosetta2 && os === 'darwin' && arch === 'arm64' && await isRosetta2Available()) {
    session.channels.message(i`Apple Silicon with Rosetta 2 found: using amd64 as ARCH`);
    arch = 'amd64';
  }
  return { os, arch };
}

/** throws when the spec lists its supported platforms and this is not one of them */
export function checkSupported(spec: InstallSpec, platform: Platform) {
  const supported = spec.supportedPlatforms;
  if (supported?.length && !supported.some(each => each.os.toLowerCase() === platform.os && each.arch.toLowerCase() === platform.arch)) {
    throw new Failed(i`Platform ${platformKey(platform)} is not supported; supported platforms: ${supported.map(platformKey).join(', ')}`);
  }
}
