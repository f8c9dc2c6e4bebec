// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Platform } from '../spec/install-spec';

/** operating systems enumerated when a spec doesn't list its supported platforms */
export const matrixOS = ['android', 'darwin', 'dragonfly', 'freebsd', 'linux', 'netbsd', 'openbsd', 'solaris', 'windows'] as const;

/** architectures enumerated when a spec doesn't list its supported platforms */
export const matrixArch = ['amd64', 'arm', 'arm64', 'mips', 'mips64', 'mips64le', 'mipsle', 'ppc64', 'ppc64le', 'riscv64', 's390x', '386'] as const;

/** values accepted in supported_platforms */
export const knownOS: ReadonlyArray<string> = [...matrixOS, 'aix', 'illumos', 'ios', 'js', 'plan9', 'wasip1'];
export const knownArch: ReadonlyArray<string> = [...matrixArch, 'amd64p32', 'armv5', 'armv6', 'armv7', 'loong64', 'wasm'];

export function platformMatrix(): Array<Platform> {
  return matrixOS.flatMap(os => matrixArch.map(arch => ({ os, arch })));
}

export function platformKey(platform: Platform) {
  return `${platform.os}/${platform.arch}`;
}
