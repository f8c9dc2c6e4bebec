// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { platformKey } from '../asset/platforms';
import { assetFilenamePlaceholder, binDirVariable, defaultBinDirectory, latestVersion, userAgent } from '../constants';
import { i } from '../i18n';
import { AssetConfig, Binary, InstallSpec } from '../spec/install-spec';
import { binDirSafetyProblem, shellSafetyProblem } from '../spec/shell-safe';
import { ConfigurationError } from '../util/exceptions';
import { download, hashFunction, logging, manifestLookup, platformDetection, untar } from './library';
import { compileTemplate, quote } from './quote';

export interface ScriptOptions {
  /** generate for this one version: it is always installed and only its embedded checksums are kept */
  targetVersion?: string;
}

const assetVariables = ['NAME', 'TAG', 'VERSION', 'OS', 'ARCH', 'EXT'];
const binaryVariables = [...assetVariables, 'ASSET_FILENAME'];
const manifestVariables = ['NAME', 'TAG', 'VERSION', 'ASSET_FILENAME'];

function indent(text: string, spaces: number) {
  const prefix = ' '.repeat(spaces);
  return text.split('\n').map(line => line ? prefix + line : line).join('\n');
}

/** every spec value that ends up in the script, with the field it came from */
function* embeddedValues(spec: InstallSpec): Iterable<[string | undefined, string]> {
  yield [spec.name, 'name'];
  yield [spec.repo, 'repo'];
  yield [spec.defaultVersion, 'default_version'];
  yield [spec.asset?.template, 'asset.template'];
  yield [spec.asset?.defaultExtension, 'asset.default_extension'];
  yield [spec.checksums?.template, 'checksums.template'];
  for (const [index, binary] of (spec.asset?.binaries ?? []).entries()) {
    yield [binary.name, `asset.binaries[${index}].name`];
    yield [binary.path, `asset.binaries[${index}].path`];
  }
  for (const [index, rule] of (spec.asset?.rules ?? []).entries()) {
    const path = `asset.rules[${index}]`;
    yield [rule.when?.os, `${path}.when.os`];
    yield [rule.when?.arch, `${path}.when.arch`];
    yield [rule.os, `${path}.os`];
    yield [rule.arch, `${path}.arch`];
    yield [rule.ext, `${path}.ext`];
    yield [rule.template, `${path}.template`];
    for (const [n, binary] of (rule.binaries ?? []).entries()) {
      yield [binary.name, `${path}.binaries[${n}].name`];
      yield [binary.path, `${path}.binaries[${n}].path`];
    }
  }
  for (const [version, checksums] of spec.checksums?.embeddedChecksums ?? []) {
    yield [version, 'checksums.embedded_checksums'];
    for (const each of checksums) {
      yield [each.filename, `checksums.embedded_checksums.${version}`];
      yield [each.hash, `checksums.embedded_checksums.${version}`];
    }
  }
}

/** throws a ConfigurationError listing every value that is unsafe to put in a script */
export function checkShellSafety(spec: InstallSpec) {
  const problems = new Array<string>();
  for (const [value, field] of embeddedValues(spec)) {
    const problem = shellSafetyProblem(value, field);
    if (problem) {
      problems.push(problem);
    }
  }
  const binDir = binDirSafetyProblem(spec.defaultBinDir, 'default_bin_dir');
  if (binDir) {
    problems.push(binDir);
  }
  if (problems.length) {
    throw new ConfigurationError(i`The spec cannot be embedded in a shell script: ${problems.join('; ')}`);
  }
}

class IdTable<T> {
  readonly entries = new Array<T>();
  constructor(private readonly same: (a: T, b: T) => boolean) {
  }
  id(value: T): number {
    const index = this.entries.findIndex(each => this.same(each, value));
    return index === -1 ? this.entries.push(value) - 1 : index;
  }
}

function sameBinaries(a: Array<Binary>, b: Array<Binary>) {
  return a.length === b.length && a.every((each, index) => each.name === b[index].name && each.path === b[index].path);
}

function conditionOf(when: { os?: string, arch?: string }) {
  const tests = new Array<string>();
  if (when.os) {
    tests.push(`[ "\${UNAME_OS}" = ${quote(when.os)} ]`);
  }
  if (when.arch) {
    tests.push(`[ "\${UNAME_ARCH}" = ${quote(when.arch)} ]`);
  }
  return tests.join(' && ');
}

interface CompiledResolution {
  text: string;
  binaries: Array<Array<Binary>>;
}

function compileResolution(asset: AssetConfig): CompiledResolution {
  const templates = new IdTable<string>((a, b) => a === b);
  const binaries = new IdTable<Array<Binary>>(sameBinaries);
  templates.id(asset.template ?? '');
  binaries.id(asset.binaries ?? []);

  const lines = [
    `UNAME_OS=$(echo "\${UNAME_OS}" | tr '[:upper:]' '[:lower:]')`,
    `UNAME_ARCH=$(echo "\${UNAME_ARCH}" | tr '[:upper:]' '[:lower:]')`,
    asset.namingConvention?.os === 'titlecase'
      ? `OS=$(echo "\${UNAME_OS}" | awk '{ print toupper(substr($0, 1, 1)) tolower(substr($0, 2)) }')`
      : `OS="\${UNAME_OS}"`,
    `ARCH="\${UNAME_ARCH}"`,
    `EXT=${quote(asset.defaultExtension ?? '')}`,
    'TEMPLATE_ID=0',
    'BINARIES_ID=0',
  ];

  for (const rule of asset.rules ?? []) {
    if (!rule.when) {
      continue;
    }
    const assignments = new Array<string>();
    if (rule.os) {
      assignments.push(`OS=${quote(rule.os)}`);
    }
    if (rule.arch) {
      assignments.push(`ARCH=${quote(rule.arch)}`);
    }
    if (rule.ext) {
      assignments.push(`EXT=${quote(rule.ext)}`);
    }
    if (rule.template) {
      assignments.push(`TEMPLATE_ID=${templates.id(rule.template)}`);
    }
    if (rule.binaries?.length) {
      assignments.push(`BINARIES_ID=${binaries.id(rule.binaries)}`);
    }
    if (!assignments.length) {
      continue;
    }
    const condition = conditionOf(rule.when);
    if (condition) {
      lines.push(`if ${condition}; then`, ...assignments.map(each => `  ${each}`), 'fi');
    } else {
      lines.push(...assignments);
    }
  }

  lines.push('case "${TEMPLATE_ID}" in');
  for (const [id, template] of templates.entries.entries()) {
    lines.push(`  ${id}) ASSET_FILENAME=${compileTemplate(template, assetVariables)} ;;`);
  }
  lines.push('esac');

  return {
    text: `resolve_asset() {\n${indent(lines.join('\n'), 2)}\n}`,
    binaries: binaries.entries,
  };
}

/**
 * The `resolve_asset` shell function on its own.
 *
 * It reads UNAME_OS, UNAME_ARCH, NAME, TAG and VERSION, and sets OS, ARCH, EXT, ASSET_FILENAME and BINARIES_ID
 * exactly as the native filename generator resolves them.
 */
export function resolutionFunction(spec: InstallSpec): string {
  return compileResolution(spec.asset ?? {}).text;
}

function installBinaries(sets: Array<Array<Binary>>) {
  const lines = ['install_binaries() {', '  case "${BINARIES_ID}" in'];
  for (const [id, set] of sets.entries()) {
    lines.push(`    ${id})`);
    for (const binary of set) {
      lines.push(`      install_binary ${quote(binary.name)} ${compileTemplate(binary.path, binaryVariables)} || return 1`);
    }
    lines.push('      ;;');
  }
  lines.push('  esac', '}');
  return lines.join('\n');
}

function embeddedChecksums(spec: InstallSpec, targetVersion?: string) {
  const lines = ['embedded_checksum() {', '  case "$1:$2" in'];
  for (const [version, checksums] of spec.checksums?.embeddedChecksums ?? []) {
    if (targetVersion && version !== targetVersion) {
      continue;
    }
    for (const each of checksums) {
      lines.push(`    ${quote(`${version}:${each.filename}`)}) echo ${quote(each.hash)} ;;`);
    }
  }
  lines.push('    *) : ;;', '  esac', '}');
  return lines.join('\n');
}

function checkPlatform(spec: InstallSpec) {
  const supported = spec.supportedPlatforms ?? [];
  if (!supported.length) {
    return 'check_platform() {\n  return 0\n}';
  }
  const patterns = supported.map(each => quote(platformKey({ os: each.os.toLowerCase(), arch: each.arch.toLowerCase() }))).join(' | ');
  return `check_platform() {
  case "\${UNAME_OS}/\${UNAME_ARCH}" in
    ${patterns}) return 0 ;;
  esac
  log_crit "platform \${UNAME_OS}/\${UNAME_ARCH} is not supported by \${NAME}"
  return 1
}`;
}

function detectPlatform(spec: InstallSpec) {
  const rosetta = spec.asset?.archEmulation?.rosetta2 ? `
  if [ "\${UNAME_OS}" = 'darwin' ] && [ "\${UNAME_ARCH}" = 'arm64' ] && arch -arch x86_64 true 2>/dev/null; then
    log_info "Apple Silicon with Rosetta 2 found: using amd64 as ARCH"
    UNAME_ARCH='amd64'
  fi` : '';
  return `detect_platform() {
  UNAME_OS=$(uname_os)
  UNAME_ARCH=$(uname_arch)${rosetta}
}`;
}

function verifyAsset(spec: InstallSpec) {
  const template = spec.checksums?.template;
  const manifest = template ? `
  if [ -z "\${expected}" ]; then
    checksum_filename=${compileTemplate(template, manifestVariables)}
    sumfile="\${WORK_DIR}/checksums"
    if http_download "\${sumfile}" "https://github.com/\${REPO}/releases/download/\${TAG}/\${checksum_filename}"; then
      expected=$(manifest_lookup "\${sumfile}" "\${ASSET_FILENAME}" ${template.includes(assetFilenamePlaceholder) ? 1 : 0})
    else
      log_warn "unable to download \${checksum_filename}"
    fi
  fi` : '';
  return `verify_asset() {
  asset_path=$1
  expected=$(embedded_checksum "\${TAG}" "\${ASSET_FILENAME}")${manifest}
  if [ -z "\${expected}" ]; then
    log_warn "No checksum found for \${ASSET_FILENAME}, skipping verification"
    return 0
  fi
  got=$(hash_compute "\${asset_path}") || return 1
  if [ "$(lowercase "\${expected}")" != "$(lowercase "\${got}")" ]; then
    log_crit "Checksum mismatch for \${ASSET_FILENAME}: expected \${expected}, got \${got}"
    return 1
  fi
  log_info "Checksum verified for \${ASSET_FILENAME}"
}`;
}

export const installBinary = `install_binary() {
  binary_name=$1
  binary_path=$2
  src="\${EXTRACT_DIR}/\${binary_path}"
  if [ ! -f "\${src}" ] && [ "\${binary_path}" = "\${ASSET_FILENAME}" ]; then
    if [ "$(find "\${EXTRACT_DIR}" -type f | wc -l | tr -d ' ')" = 1 ]; then
      src=$(find "\${EXTRACT_DIR}" -type f)
    fi
  fi
  if [ ! -f "\${src}" ]; then
    log_crit "binary not found at \${binary_path} in \${ASSET_FILENAME}"
    return 1
  fi
  mkdir -p "\${BINDIR}"
  tmp="\${BINDIR}/.\${binary_name}-$$"
  if ! cp "\${src}" "\${tmp}" || ! chmod 755 "\${tmp}" || ! mv -f "\${tmp}" "\${BINDIR}/\${binary_name}"; then
    rm -f "\${tmp}"
    log_crit "failed to install \${BINDIR}/\${binary_name}"
    return 1
  fi
  log_info "installed \${BINDIR}/\${binary_name}"
}`;

/**
 * Generates a POSIX sh installer for the spec.
 *
 * The spec should have its defaults applied; values are checked for shell safety first.
 */
export function generateScript(spec: InstallSpec, options: ScriptOptions = {}): string {
  if (!spec.asset?.template) {
    throw new ConfigurationError(i`Asset template not defined in spec`);
  }
  if (!spec.repo) {
    throw new ConfigurationError(i`Repository not specified in spec`);
  }
  checkShellSafety(spec);

  const resolution = compileResolution(spec.asset);
  const defaultBinDir = spec.defaultBinDir || defaultBinDirectory;
  const tag = options.targetVersion
    ? `TAG=${quote(options.targetVersion)}`
    : `TAG=\${TAG:-${quote(spec.defaultVersion || latestVersion)}}`;

  return `#!/bin/sh
# Installs ${spec.name ?? ''} from https://github.com/${spec.repo}/releases
# Generated by ${userAgent}; regenerate it rather than editing it.
set -e

PROGRAM=${quote(spec.name ?? userAgent)}
NAME=${quote(spec.name ?? '')}
REPO=${quote(spec.repo)}
STRIP_COMPONENTS=${spec.unpack?.stripComponents ?? 0}

usage() {
  echo "Usage: $1 [-b bindir] [-d] [-q] [-n] [tag]"
  echo "  installs \${NAME} from https://github.com/\${REPO}/releases"
  echo "  -b sets the installation directory, default is \${BINDIR}"
  echo "  -d turns on debug logging"
  echo "  -q only logs errors"
  echo "  -n dry run: shows what would be installed"
  echo "  [tag] is a release tag, or latest"
  exit 2
}

parse_args() {
  BINDIR="\${${binDirVariable}:-${defaultBinDir}}"
  DRY_RUN=0
  while getopts "b:dqnh?x" arg; do
    case "$arg" in
      b) BINDIR="$OPTARG" ;;
      d) log_set_priority 10 ;;
      q) log_set_priority 3 ;;
      n) DRY_RUN=1 ;;
      h | \\?) usage "$0" ;;
      x) set -x ;;
    esac
  done
  shift $((OPTIND - 1))
  TAG=\${1:-}
}

resolve_version() {
  ${tag}
  if [ "\${TAG}" = 'latest' ]; then
    log_info "checking GitHub for the latest tag"
    TAG=$(github_release "\${REPO}" latest) || {
      log_crit "unable to find the latest release of \${REPO}"
      return 1
    }
  fi
  VERSION=\${TAG#v}
}

${logging}

${platformDetection}

${detectPlatform(spec)}

${checkPlatform(spec)}

${resolution.text}

${embeddedChecksums(spec, options.targetVersion)}

${manifestLookup}

${hashFunction(spec.checksums?.algorithm ?? 'sha256')}

${verifyAsset(spec)}

${download}

${untar}

${installBinary}

${installBinaries(resolution.binaries)}

main() {
  parse_args "$@"
  resolve_version
  detect_platform
  check_platform
  resolve_asset
  ASSET_URL="https://github.com/\${REPO}/releases/download/\${TAG}/\${ASSET_FILENAME}"
  log_info "found version \${VERSION} for \${TAG}/\${UNAME_OS}/\${UNAME_ARCH}"
  if [ "\${DRY_RUN}" = 1 ]; then
    log_info "dry run: would install \${ASSET_URL} into \${BINDIR}"
    return 0
  fi

  WORK_DIR=$(mktemp -d)
  trap 'rm -rf "\${WORK_DIR}"' EXIT
  EXTRACT_DIR="\${WORK_DIR}/extracted"
  mkdir -p "\${EXTRACT_DIR}"

  log_info "downloading \${ASSET_URL}"
  http_download "\${WORK_DIR}/\${ASSET_FILENAME}" "\${ASSET_URL}"
  verify_asset "\${WORK_DIR}/\${ASSET_FILENAME}"

  cp "\${WORK_DIR}/\${ASSET_FILENAME}" "\${EXTRACT_DIR}/\${ASSET_FILENAME}"
  (cd "\${EXTRACT_DIR}" && untar "\${ASSET_FILENAME}" "\${STRIP_COMPONENTS}")
  install_binaries
}

main "$@"
`;
}
