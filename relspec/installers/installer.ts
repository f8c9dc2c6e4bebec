// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { randomBytes } from 'crypto';
import { createWriteStream } from 'fs';
import { chmod, copyFile, mkdir, mkdtemp, readdir, rename, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join, relative } from 'path';
import { unpack } from '../archivers/archive';
import { pipeline } from '../archivers/unpacker';
import { FilenameGenerator } from '../asset/filename';
import { interpolate } from '../asset/interpolate';
import { ChecksumVerifier, VerifyOutcome } from '../checksums/verifier';
import { resolveVersion } from '../checksums/embedder';
import { defaultBinDirectory } from '../constants';
import { i } from '../i18n';
import { Session } from '../session';
import { Binary, InstallSpec, Platform } from '../spec/install-spec';
import { AcquisitionError, ConfigurationError, Failed } from '../util/exceptions';
import { checkSupported, detectPlatform } from './platform';

export interface InstallOptions {
  /** a tag, or `latest` */
  version?: string;
  binDir?: string;
  signal?: AbortSignal;
}

export interface InstallPlan {
  version: string;
  platform: Platform;
  filename: string;
  url: string;
  binDir: string;
  /** names and in-archive paths, with every variable filled in */
  binaries: Array<Binary>;
}

export interface InstallResult extends InstallPlan {
  verification: VerifyOutcome;
  /** full paths of the installed executables */
  installed: Array<string>;
}

async function listFiles(folder: string): Promise<Array<string>> {
  const result = new Array<string>();
  for (const entry of await readdir(folder, { withFileTypes: true })) {
    const full = join(folder, entry.name);
    if (entry.isDirectory()) {
      result.push(...await listFiles(full));
    } else {
      result.push(full);
    }
  }
  return result;
}

function executableName(name: string) {
  return process.platform === 'win32' && !name.toLowerCase().endsWith('.exe') ? `${name}.exe` : name;
}

/** copies the binary beside its destination, then renames it over whatever is there */
export async function placeBinary(source: string, destination: string): Promise<void> {
  const temp = join(dirname(destination), `.${basename(destination)}-${randomBytes(4).toString('hex')}`);
  try {
    await copyFile(source, temp);
    await chmod(temp, 0o755);
    try {
      await rename(temp, destination);
    } catch (e) {
      // windows will not rename over an existing file
      if (process.platform !== 'win32') {
        throw e;
      }
      await rm(destination, { force: true });
      await rename(temp, destination);
    }
  } catch (e) {
    await rm(temp, { force: true });
    throw e;
  }
}

/** Downloads, verifies, extracts and installs a release's binaries for the current platform */
export class Installer {
  constructor(private readonly session: Session, public readonly spec: InstallSpec) {
  }

  /** the install directory: the option, $RELSPEC_BIN_DIR, the spec's default, then ~/.local/bin */
  binDir(requested?: string): string {
    const variables = { ...process.env, HOME: this.session.settings.homeFolder };
    return requested || this.session.settings.binDir || interpolate(this.spec.defaultBinDir || defaultBinDirectory, variables);
  }

  async plan(options: InstallOptions = {}): Promise<InstallPlan> {
    const repo = this.spec.repo;
    if (!repo) {
      throw new ConfigurationError(i`Repository not specified in spec`);
    }
    const version = await resolveVersion(this.session, this.spec, options.version, options.signal);
    const platform = await detectPlatform(this.session, this.spec);
    checkSupported(this.spec, platform);

    const generator = new FilenameGenerator(this.spec, version);
    const filename = generator.generate(platform.os, platform.arch);
    const resolution = generator.resolve(platform.os, platform.arch);
    const variables = { ...generator.variables, OS: resolution.os, ARCH: resolution.arch, EXT: resolution.ext, ASSET_FILENAME: filename };
    const binaries = resolution.binaries.map(each => ({ name: executableName(each.name), path: interpolate(each.path, variables) }));
    if (binaries.length === 0) {
      throw new ConfigurationError(i`No binaries configured for ${platform.os}/${platform.arch}`);
    }

    return {
      version,
      platform,
      filename,
      url: this.session.releaseHost.downloadUrl(repo, version, filename),
      binDir: this.binDir(options.binDir),
      binaries,
    };
  }

  async install(options: InstallOptions = {}): Promise<InstallResult> {
    const plan = await this.plan(options);
    this.session.channels.message(i`Installing ${this.spec.name ?? ''} ${plan.version} for ${plan.platform.os}/${plan.platform.arch}`);

    const temp = await mkdtemp(join(tmpdir(), 'relspec-'));
    try {
      const asset = join(temp, plan.filename);
      this.session.channels.message(i`Downloading ${plan.url}`);
      try {
        await pipeline(this.session.releaseHost.openStream(plan.url, options.signal), createWriteStream(asset));
      } catch (e) {
        throw new AcquisitionError(i`Failed to download ${plan.url}`, { location: plan.url, cause: e });
      }

      const verification = await new ChecksumVerifier(this.session, this.spec).verify(plan.version, asset, plan.filename, { missing: 'warn', signal: options.signal });

      const extracted = join(temp, 'extracted');
      await mkdir(extracted, { recursive: true });
      if (!await unpack(this.session, asset, plan.filename, extracted, { strip: this.spec.unpack?.stripComponents })) {
        await copyFile(asset, join(extracted, plan.filename));
      }

      await mkdir(plan.binDir, { recursive: true });
      const installed = new Array<string>();
      for (const binary of plan.binaries) {
        const source = await this.locate(extracted, binary.path, plan.filename);
        const destination = join(plan.binDir, binary.name);
        this.session.channels.message(i`Installing ${binary.name} to ${destination}`);
        await placeBinary(source, destination);
        installed.push(destination);
      }

      this.session.channels.message(i`Installed ${this.spec.name ?? ''} ${plan.version} to ${plan.binDir}`);
      return { ...plan, verification, installed };
    } finally {
      await rm(temp, { recursive: true, force: true });
    }
  }

  /** finds a binary in the extracted asset; a binary named after the asset itself is the sole extracted file when there is just one */
  private async locate(extracted: string, path: string, filename: string): Promise<string> {
    const candidate = join(extracted, path);
    if (relative(extracted, candidate).startsWith('..')) {
      throw new ConfigurationError(i`Binary path ${path} points outside the asset`);
    }
    if (await stat(candidate).then(s => s.isFile(), () => false)) {
      return candidate;
    }
    if (path === filename) {
      const files = await listFiles(extracted);
      if (files.length === 1) {
        return files[0];
      }
    }
    throw new Failed(i`Binary not found at ${path} in ${filename}`);
  }
}
