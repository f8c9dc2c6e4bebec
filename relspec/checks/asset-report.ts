// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { FilenameGenerator } from '../asset/filename';
import { interpolate } from '../asset/interpolate';
import { platformKey } from '../asset/platforms';
import { assetFilenamePlaceholder } from '../constants';
import { InstallSpec, Platform } from '../spec/install-spec';

export type AssetStatus = 'matched' | 'no-match' | 'non-binary' | 'missing' | 'unsupported';

export interface AssetRow {
  name: string;
  /** os/arch, `checksums` for the manifest, or undefined */
  platform?: string;
  status: AssetStatus;
}

export interface PlatformRow {
  platform: string;
  filename: string;
}

/** shown when a spec lists no supported platforms */
const commonPlatforms: ReadonlyArray<Platform> = [
  { os: 'linux', arch: 'amd64' },
  { os: 'linux', arch: 'arm64' },
  { os: 'darwin', arch: 'amd64' },
  { os: 'darwin', arch: 'arm64' },
  { os: 'windows', arch: 'amd64' },
  { os: 'windows', arch: 'arm64' },
];

const nonBinaryPatterns = [
  '.txt', '.sha256', '.sha512', '.md5', '.sig', '.asc', '.pem',
  '.sbom', '.json', '.yml', '.yaml', '.sh', '.ps1', '.md',
  'checksums', 'SHASUMS', 'SHA256SUMS', 'README', 'LICENSE',
];

/** signatures, manifests, docs and source archives (name-1.2.3.tar.gz) */
export function isNonBinaryAsset(filename: string): boolean {
  if (nonBinaryPatterns.some(pattern => filename.includes(pattern))) {
    return true;
  }
  const source = /^.+-([^-]+)\.(tar\.gz|zip)$/.exec(filename);
  return !!source && (source[1].includes('.') || source[1].startsWith('v'));
}

/** the filename for each listed platform (or the common ones), sorted by platform */
export function platformTable(spec: InstallSpec, version: string): Array<PlatformRow> {
  const generator = new FilenameGenerator(spec, version);
  const platforms = spec.supportedPlatforms?.length ? spec.supportedPlatforms : commonPlatforms;
  return platforms
    .map(platform => ({ platform: platformKey(platform), filename: generator.generate(platform.os, platform.arch) }))
    .sort((a, b) => a.platform < b.platform ? -1 : a.platform > b.platform ? 1 : 0);
}

const statusOrder: Record<AssetStatus, number> = { 'matched': 0, 'no-match': 1, 'non-binary': 2, 'missing': 3, 'unsupported': 3 };

/**
 * Compares the assets of a release with the filenames the spec generates.
 *
 * Rows are ordered matched, unmatched, then non-binary, each by name; the checksum manifest comes last.
 */
export function assetReport(spec: InstallSpec, version: string, releaseAssets: ReadonlyArray<string>): Array<AssetRow> {
  const generator = new FilenameGenerator(spec, version);
  const filenames = generator.filenames();

  const template = spec.checksums?.template;
  const manifest = template && !template.includes(assetFilenamePlaceholder) ? interpolate(template, generator.variables) : undefined;

  const rows = new Array<AssetRow>();
  for (const name of releaseAssets) {
    if (name === manifest) {
      continue;
    }
    const platform = filenames.get(name);
    if (platform) {
      rows.push({ name, platform, status: 'matched' });
    } else {
      rows.push({ name, status: isNonBinaryAsset(name) ? 'non-binary' : 'no-match' });
    }
  }
  rows.sort((a, b) => statusOrder[a.status] - statusOrder[b.status] || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  if (template) {
    if (manifest === undefined) {
      rows.push({ name: '(per-asset pattern)', platform: 'checksums', status: 'unsupported' });
    } else {
      rows.push({ name: manifest, platform: 'checksums', status: releaseAssets.includes(manifest) ? 'matched' : 'missing' });
    }
  }
  return rows;
}
