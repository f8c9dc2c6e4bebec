// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { interpolate, versionVariables } from '../asset/interpolate';
import { assetFilenamePlaceholder } from '../constants';
import { i } from '../i18n';
import { Session } from '../session';
import { InstallSpec } from '../spec/install-spec';
import { AcquisitionError, ChecksumMismatch, describeError, NoChecksumFound } from '../util/exceptions';
import { hashFile, sameDigest } from '../util/hash';
import { lookupChecksum, parseManifest } from './manifest';

/**
 * What to do when a file has no checksum to check against.
 *
 * `warn` reports it and skips verification; `error` fails.
 */
export type MissingChecksumPolicy = 'warn' | 'error';

export type VerifyOutcome = 'verified' | 'skipped';

export interface VerifyOptions {
  missing?: MissingChecksumPolicy;
  signal?: AbortSignal;
}

/** Checks downloaded assets against the embedded checksums, or the release's checksum manifest */
export class ChecksumVerifier {
  constructor(private readonly session: Session, public readonly spec: InstallSpec) {
  }

  /** the expected digest of `filename` in release `version` */
  async getChecksum(version: string, filename: string, signal?: AbortSignal): Promise<string> {
    const embedded = this.spec.checksums?.embeddedChecksums?.get(version)?.find(each => each.filename === filename);
    if (embedded) {
      this.session.channels.debug(`Using embedded checksum for ${filename}`);
      return embedded.hash;
    }

    const template = this.spec.checksums?.template;
    if (template && this.spec.repo) {
      const perAsset = template.includes(assetFilenamePlaceholder);
      const manifest = interpolate(template, { NAME: this.spec.name ?? '', ...versionVariables(version), ASSET_FILENAME: filename });
      const url = this.session.releaseHost.downloadUrl(this.spec.repo, version, manifest);
      this.session.channels.message(i`Downloading checksums from ${url}`);
      const content = await this.session.releaseHost.fetchText(url, signal);
      const found = lookupChecksum(parseManifest(this.session, content, { source: url, singleFile: perAsset ? filename : undefined }), filename);
      if (found) {
        return found;
      }
    }

    throw new NoChecksumFound(version, filename);
  }

  /**
   * Hashes `file` with the spec's algorithm and compares it with the expected digest of `filename`.
   *
   * Digests are compared without regard to case.
   */
  async verify(version: string, file: string, filename: string, options: VerifyOptions = {}): Promise<VerifyOutcome> {
    let expected: string;
    try {
      expected = await this.getChecksum(version, filename, options.signal);
    } catch (e) {
      if (options.missing === 'warn' && (e instanceof NoChecksumFound || (e instanceof AcquisitionError && !options.signal?.aborted))) {
        this.session.channels.warning(i`No checksum found for ${filename}, skipping verification: ${describeError(e)}`);
        return 'skipped';
      }
      throw e;
    }

    const algorithm = this.spec.checksums?.algorithm ?? 'sha256';
    const actual = await hashFile(file, algorithm);
    if (!sameDigest(expected, actual)) {
      throw new ChecksumMismatch(filename, expected.trim().toLowerCase(), actual);
    }
    this.session.channels.message(i`Checksum verified for ${filename}`);
    return 'verified';
  }
}
