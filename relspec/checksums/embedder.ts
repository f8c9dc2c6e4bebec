// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFile } from 'fs/promises';
import { FilenameGenerator } from '../asset/filename';
import { interpolate, versionVariables } from '../asset/interpolate';
import { assetFilenamePlaceholder, defaultConcurrency, latestVersion, repositoryPattern } from '../constants';
import { i } from '../i18n';
import { Session } from '../session';
import { ChecksumConfig, compareFilenames, EmbeddedChecksum, InstallSpec } from '../spec/install-spec';
import { AcquisitionError, ConfigurationError, describeError } from '../util/exceptions';
import { Algorithm, hash } from '../util/hash';
import { Queue } from '../util/promise';
import { ChecksumEntries, filterChecksums, parseManifest } from './manifest';

export const embedModes = ['download', 'checksum-file', 'calculate'] as const;
export type EmbedMode = typeof embedModes[number];

export function isEmbedMode(value: unknown): value is EmbedMode {
  return embedModes.some(each => each === value);
}

export interface EmbedOptions {
  /** the local manifest for `checksum-file` mode */
  checksumFile?: string;
  /** how many assets `calculate` mode downloads at once */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface EmbedResult {
  /** the version as resolved (never `latest`) */
  version: string;
  checksums: Array<EmbeddedChecksum>;
}

/** resolves the version to use: the argument, the spec's default, then the latest release */
export async function resolveVersion(session: Session, spec: InstallSpec, version?: string, signal?: AbortSignal): Promise<string> {
  const requested = version || spec.defaultVersion || latestVersion;
  if (requested !== latestVersion) {
    return requested;
  }
  if (!spec.repo) {
    throw new ConfigurationError(i`Repository not specified in spec`);
  }
  const tag = await session.releaseHost.latestTag(spec.repo, signal);
  session.channels.message(i`Resolved latest version: ${tag}`);
  return tag;
}

/** Acquires the checksums of a release and records them in the spec */
export class ChecksumEmbedder {
  constructor(private readonly session: Session, public readonly spec: InstallSpec) {
  }

  /**
   * Replaces the embedded checksums of one version.
   *
   * The spec's `checksums` is updated in place; writing it to disk is up to the caller.
   */
  async embed(mode: EmbedMode, version?: string, options: EmbedOptions = {}): Promise<EmbedResult> {
    const repo = this.spec.repo;
    if (!repo || !repositoryPattern.test(repo)) {
      throw new ConfigurationError(i`Invalid repository '${repo ?? ''}': expected owner/name`);
    }

    const checksums: ChecksumConfig = this.spec.checksums ?? (this.spec.checksums = {});
    const algorithm = checksums.algorithm ??= 'sha256';

    if (mode === 'download') {
      if (!checksums.template) {
        throw new ConfigurationError(i`No checksum template defined in spec; 'download' mode needs checksums.template`);
      }
      if (checksums.template.includes(assetFilenamePlaceholder)) {
        throw new ConfigurationError(i`${assetFilenamePlaceholder} is not supported in checksum templates for 'download' mode. Use --mode=calculate to generate checksums for all platforms`);
      }
    }

    const resolved = await resolveVersion(this.session, this.spec, version, options.signal);
    const embedded = checksums.embeddedChecksums ?? (checksums.embeddedChecksums = new Map());
    embedded.delete(resolved);

    let entries: ChecksumEntries;
    try {
      switch (mode) {
        case 'download':
          entries = await this.download(repo, resolved, options.signal);
          break;
        case 'checksum-file':
          entries = await this.checksumFile(resolved, options.checksumFile);
          break;
        case 'calculate':
          entries = await this.calculate(repo, resolved, algorithm, options);
          break;
        default:
          throw new ConfigurationError(i`Invalid mode: ${mode}`);
      }
    } catch (e) {
      if (e instanceof ConfigurationError) {
        throw e;
      }
      throw new AcquisitionError(i`Failed to embed checksums for ${resolved} (mode ${mode}): ${describeError(e)}`, { cause: e });
    }

    const list = [...entries].map(([filename, hash]) => ({ filename, hash })).sort(compareFilenames);
    embedded.set(resolved, list);
    return { version: resolved, checksums: list };
  }

  /** the manifest filename for a version: NAME, TAG and VERSION only */
  manifestFilename(version: string): string {
    return interpolate(this.spec.checksums?.template ?? '', { NAME: this.spec.name ?? '', ...versionVariables(version) });
  }

  private async download(repo: string, version: string, signal?: AbortSignal): Promise<ChecksumEntries> {
    const filename = this.manifestFilename(version);
    if (!filename) {
      throw new ConfigurationError(i`Unable to generate the checksum filename`);
    }
    const url = this.session.releaseHost.downloadUrl(repo, version, filename);
    this.session.channels.message(i`Downloading checksums from ${url}`);
    const content = await this.session.releaseHost.fetchText(url, signal);
    return filterChecksums(this.session, parseManifest(this.session, content, { source: url }), this.possible(version));
  }

  private async checksumFile(version: string, file?: string): Promise<ChecksumEntries> {
    if (!file) {
      throw new ConfigurationError(i`'checksum-file' mode needs a checksum file (--file)`);
    }
    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (e) {
      throw new AcquisitionError(i`Unable to read checksum file ${file}`, { location: file, cause: e });
    }
    return filterChecksums(this.session, parseManifest(this.session, content, { source: file }), this.possible(version));
  }

  private async calculate(repo: string, version: string, algorithm: Algorithm, options: EmbedOptions): Promise<ChecksumEntries> {
    const possible = this.possible(version);
    const assets = (await this.session.releaseHost.releaseAssets(repo, version, options.signal)).filter(asset => possible.has(asset.name));
    if (assets.length === 0) {
      throw new AcquisitionError(i`No release assets of ${version} match the asset template`);
    }
    this.session.channels.message(i`Calculating checksums for ${assets.length} assets`);

    const queue = new Queue(options.concurrency ?? defaultConcurrency);
    const results = await queue.enqueueMany(assets, async (asset): Promise<[string, string] | undefined> => {
      if (algorithm === 'sha256' && asset.digest?.startsWith('sha256:')) {
        this.session.channels.debug(`Using published digest for ${asset.name}`);
        return [asset.name, asset.digest.substring('sha256:'.length)];
      }
      try {
        const digest = await hash(this.session.releaseHost.openStream(asset.downloadUrl, options.signal), algorithm);
        this.session.channels.debug(`Calculated ${algorithm} for ${asset.name}`);
        return [asset.name, digest];
      } catch (e) {
        if (options.signal?.aborted) {
          throw e;
        }
        this.session.channels.warning(i`Failed to calculate checksum for ${asset.name}: ${describeError(e)}`);
        return undefined;
      }
    });

    const entries: ChecksumEntries = new Map();
    for (const each of results) {
      if (each) {
        entries.set(...each);
      }
    }
    if (entries.size === 0) {
      throw new AcquisitionError(i`failed to calculate any checksums`);
    }
    return entries;
  }

  private possible(version: string) {
    return new FilenameGenerator(this.spec, version).possibleFilenames();
  }
}
