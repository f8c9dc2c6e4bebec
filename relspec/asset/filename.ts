// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';
import { InstallSpec, Platform } from '../spec/install-spec';
import { ConfigurationError } from '../util/exceptions';
import { interpolate, versionVariables } from './interpolate';
import { platformKey, platformMatrix } from './platforms';
import { resolveAsset, Resolution } from './rules';

/** Generates release asset filenames for one version of a spec */
export class FilenameGenerator {
  constructor(public readonly spec: InstallSpec, public readonly version: string) {
  }

  /** NAME, TAG and VERSION: the variables every template of this spec can use */
  get variables() {
    return { NAME: this.spec.name ?? '', ...versionVariables(this.version) };
  }

  /** resolves naming conventions and rules for a platform; os and arch are matched in lowercase */
  resolve(os: string, arch: string): Resolution {
    return resolveAsset(this.spec.asset, os.toLowerCase(), arch.toLowerCase());
  }

  generate(os: string, arch: string): string {
    if (!this.spec.asset?.template) {
      throw new ConfigurationError(i`Asset template not defined in spec`);
    }
    const resolved = this.resolve(os, arch);
    return interpolate(resolved.template, { ...this.variables, OS: resolved.os, ARCH: resolved.arch, EXT: resolved.ext });
  }

  /** the supported platforms when listed, otherwise every OS/arch combination */
  platforms(): Array<Platform> {
    const supported = this.spec.supportedPlatforms;
    return supported?.length ? supported : platformMatrix();
  }

  /** filename to the first platform that produces it */
  filenames(): Map<string, string> {
    const result = new Map<string, string>();
    if (!this.spec.asset?.template) {
      return result;
    }
    for (const platform of this.platforms()) {
      const filename = this.generate(platform.os, platform.arch);
      if (filename && !result.has(filename)) {
        result.set(filename, platformKey(platform));
      }
    }
    return result;
  }

  /** every distinct filename this spec can produce for its platforms */
  possibleFilenames(): Set<string> {
    return new Set(this.filenames().keys());
  }
}
