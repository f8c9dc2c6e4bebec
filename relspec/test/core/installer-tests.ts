// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';
import { createHash } from 'crypto';
import { existsSync, statSync } from 'fs';
import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { Installer, placeBinary } from '../../installers/installer';
import { archName, checkSupported, osName } from '../../installers/platform';
import { setDefaults } from '../../spec/defaults';
import { InstallSpec } from '../../spec/install-spec';
import { ChecksumMismatch, Failed } from '../../util/exceptions';
import { SuiteLocal } from './SuiteLocal';
import { tarGz } from './tarball';

const isWindows = process.platform === 'win32';
const repo = 'example/tool';
const script = '#!/bin/sh\necho tool\n';

function sha256(content: Buffer | string) {
  return createHash('sha256').update(content).digest('hex');
}

describe('platform detection', () => {
  it('names platforms the way release assets do', () => {
    strict.equal(osName('win32'), 'windows');
    strict.equal(osName('linux'), 'linux');
    strict.equal(archName('x64'), 'amd64');
    strict.equal(archName('ia32'), '386');
    strict.equal(archName('ppc64', 'LE'), 'ppc64le');
    strict.equal(archName('ppc64', 'BE'), 'ppc64');
    strict.equal(archName('arm64'), 'arm64');
  });

  it('rejects platforms the spec does not list', () => {
    const spec: InstallSpec = { supportedPlatforms: [{ os: 'linux', arch: 'amd64' }, { os: 'darwin', arch: 'arm64' }] };
    checkSupported(spec, { os: 'linux', arch: 'amd64' });
    checkSupported({}, { os: 'plan9', arch: '386' });
    strict.throws(() => checkSupported(spec, { os: 'windows', arch: 'amd64' }), (e: unknown) =>
      e instanceof Failed && e.message === 'Platform windows/amd64 is not supported; supported platforms: linux/amd64, darwin/arm64');
  });
});

describe('Installer', () => {
  const local = new SuiteLocal({ os: 'linux', arch: 'amd64' });
  after(local.after.bind(local));

  let archive: Buffer;
  before(async () => {
    archive = await tarGz([
      { name: 'tool-1.0.0/tool', content: script, mode: 0o755 },
      { name: 'tool-1.0.0/LICENSE', content: 'MIT' },
    ]);
    local.host.publish(repo, 'v1.0.0', 'tool_1.0.0_linux_amd64.tar.gz', archive);
    local.host.publish(repo, 'v1.0.0', 'tool_linux_amd64', 'raw binary');
  });

  function archiveSpec(hash: string): InstallSpec {
    return setDefaults({
      name: 'tool',
      repo,
      asset: {
        template: '${NAME}_${VERSION}_${OS}_${ARCH}.${EXT}',
        defaultExtension: 'tar.gz',
        binaries: [{ name: 'tool', path: 'tool-${VERSION}/tool' }],
      },
      checksums: { embeddedChecksums: new Map([['v1.0.0', [{ filename: 'tool_1.0.0_linux_amd64.tar.gz', hash }]]]) },
    });
  }

  it('plans an installation', async () => {
    const installer = new Installer(local.session, archiveSpec('unused'));
    const plan = await installer.plan({ version: 'v1.0.0' });
    strict.deepEqual(plan, {
      version: 'v1.0.0',
      platform: { os: 'linux', arch: 'amd64' },
      filename: 'tool_1.0.0_linux_amd64.tar.gz',
      url: 'https://releases.example.test/example/tool/v1.0.0/tool_1.0.0_linux_amd64.tar.gz',
      binDir: `${local.session.settings.homeFolder}/.local/bin`,
      binaries: [{ name: 'tool', path: 'tool-1.0.0/tool' }],
    });
  });

  it('picks the bin directory from the option, the environment, then the spec', () => {
    const spec = { ...archiveSpec('unused'), defaultBinDir: '${HOME}/tools' };
    strict.equal(new Installer(local.session, spec).binDir('/opt/bin'), '/opt/bin');
    strict.equal(new Installer(local.session, spec).binDir(), `${local.session.settings.homeFolder}/tools`);
    const configured = new SuiteLocal({ binDir: '/srv/bin' });
    strict.equal(new Installer(configured.session, spec).binDir(), '/srv/bin');
    return configured.after();
  });

  it('downloads, verifies and installs the binaries of an archive', async () => {
    const binDir = join(local.tempFolder, 'bin');
    const result = await new Installer(local.session, archiveSpec(sha256(archive))).install({ version: 'v1.0.0', binDir });
    strict.equal(result.verification, 'verified');
    strict.deepEqual(result.installed, [join(binDir, 'tool')]);
    strict.equal(await readFile(join(binDir, 'tool'), 'utf8'), script);
    if (!isWindows) {
      strict.equal(statSync(join(binDir, 'tool')).mode & 0o777, 0o755);
    }
  });

  it('replaces a binary that is already installed', async () => {
    const binDir = join(local.tempFolder, 'bin-replace');
    await mkdir(binDir);
    await writeFile(join(binDir, 'tool'), 'old version');
    await new Installer(local.session, archiveSpec(sha256(archive))).install({ version: 'v1.0.0', binDir });
    strict.equal(await readFile(join(binDir, 'tool'), 'utf8'), script);
    strict.deepEqual(await readdir(binDir), ['tool']);
  });

  it('leaves the installed binary alone when the copy fails', async () => {
    const binDir = join(local.tempFolder, 'bin-failed');
    await mkdir(binDir);
    await writeFile(join(binDir, 'tool'), 'old version');
    await strict.rejects(placeBinary(join(local.tempFolder, 'no-such-file'), join(binDir, 'tool')));
    strict.equal(await readFile(join(binDir, 'tool'), 'utf8'), 'old version');
    strict.deepEqual(await readdir(binDir), ['tool']);
  });

  it('installs nothing when the checksum does not match', async () => {
    const binDir = join(local.tempFolder, 'bin-mismatch');
    await strict.rejects(new Installer(local.session, archiveSpec(sha256('something else'))).install({ version: 'v1.0.0', binDir }), ChecksumMismatch);
    strict.ok(!existsSync(join(binDir, 'tool')));
  });

  it('installs a raw binary without a checksum', async () => {
    local.warnings.length = 0;
    const binDir = join(local.tempFolder, 'bin-raw');
    const spec = setDefaults({ name: 'tool', repo, asset: { template: '${NAME}_${OS}_${ARCH}' } });
    const result = await new Installer(local.session, spec).install({ version: 'v1.0.0', binDir });
    strict.equal(result.verification, 'skipped');
    strict.equal(await readFile(join(binDir, 'tool'), 'utf8'), 'raw binary');
    strict.deepEqual(local.warnings, ['No checksum found for tool_linux_amd64, skipping verification: No checksum found for tool_linux_amd64 (version v1.0.0)']);
  });

  it('refuses an unsupported platform before downloading', async () => {
    local.host.requests.length = 0;
    const spec = { ...archiveSpec('unused'), supportedPlatforms: [{ os: 'darwin', arch: 'arm64' }] };
    await strict.rejects(new Installer(local.session, spec).install({ version: 'v1.0.0' }), Failed);
    strict.deepEqual(local.host.requests, []);
  });
});
