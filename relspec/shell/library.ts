// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Algorithm } from '../util/hash';

/** logging with priorities: 3 err, 4 warn, 6 info, 7 debug */
export const logging = `is_command() {
  command -v "$1" >/dev/null
}
echoerr() {
  echo "$@" 1>&2
}
_logp=6
log_set_priority() {
  _logp="$1"
}
log_priority() {
  [ "$1" -le "$_logp" ]
}
log_debug() {
  log_priority 7 || return 0
  echoerr "\${PROGRAM}" debug "$@"
}
log_info() {
  log_priority 6 || return 0
  echoerr "\${PROGRAM}" info "$@"
}
log_warn() {
  log_priority 4 || return 0
  echoerr "\${PROGRAM}" warning "$@"
}
log_err() {
  log_priority 3 || return 0
  echoerr "\${PROGRAM}" err "$@"
}
log_crit() {
  echoerr "\${PROGRAM}" crit "$@"
}`;

/** OS and architecture names as used in release filenames */
export const platformDetection = `uname_os() {
  os=$(uname -s | tr '[:upper:]' '[:lower:]')
  case "$os" in
    msys*) os="windows" ;;
    mingw*) os="windows" ;;
    cygwin*) os="windows" ;;
  esac
  if [ "$os" = "sunos" ]; then
    if [ "$(uname -o)" = "illumos" ]; then
      os="illumos"
    else
      os="solaris"
    fi
  fi
  echo "$os"
}
uname_arch() {
  arch=$(uname -m)
  case $arch in
    x86_64) arch="amd64" ;;
    i86pc) arch="amd64" ;;
    x86) arch="386" ;;
    i686) arch="386" ;;
    i386) arch="386" ;;
    aarch64) arch="arm64" ;;
    armv5*) arch="armv5" ;;
    armv6*) arch="armv6" ;;
    armv7*) arch="armv7" ;;
  esac
  echo "\${arch}"
}`;

const hashCommands: Record<Algorithm, Array<[string, string]>> = {
  sha256: [
    ['sha256sum', `sha256sum "$target" | cut -d ' ' -f 1`],
    ['shasum', `shasum -a 256 "$target" | cut -d ' ' -f 1`],
    ['openssl', `openssl dgst -sha256 "$target" | sed 's/^.* //'`],
  ],
  sha512: [
    ['sha512sum', `sha512sum "$target" | cut -d ' ' -f 1`],
    ['shasum', `shasum -a 512 "$target" | cut -d ' ' -f 1`],
    ['openssl', `openssl dgst -sha512 "$target" | sed 's/^.* //'`],
  ],
  sha1: [
    ['sha1sum', `sha1sum "$target" | cut -d ' ' -f 1`],
    ['shasum', `shasum -a 1 "$target" | cut -d ' ' -f 1`],
    ['openssl', `openssl dgst -sha1 "$target" | sed 's/^.* //'`],
  ],
  md5: [
    ['md5sum', `md5sum "$target" | cut -d ' ' -f 1`],
    ['md5', `md5 -q "$target"`],
    ['openssl', `openssl dgst -md5 "$target" | sed 's/^.* //'`],
  ],
};

/** `hash_compute FILE` prints the lowercase hex digest of FILE */
export function hashFunction(algorithm: Algorithm): string {
  const branches = hashCommands[algorithm].map(([command, invocation], index) =>
    `  ${index ? 'elif' : 'if'} is_command ${command}; then\n    ${invocation}`);
  return `hash_compute() {
  target=$1
${branches.join('\n')}
  else
    log_crit "unable to find a command to compute ${algorithm} hashes"
    return 1
  fi
}`;
}

/** checksum manifests: \`manifest_lookup SUMFILE FILENAME [SINGLE]\` prints the digest listed for FILENAME */
export const manifestLookup = `manifest_lookup() {
  awk -v name="$2" -v single="\${3:-0}" '
    { sub(/\\r$/, "") }
    /^[ \\t]*(#|$)/ { next }
    NF == 1 { if (single == "1") { print $1; exit } next }
    {
      file = $2
      sub(/^\\*/, "", file)
      base = file
      sub(/.*\\//, "", base)
      if (file == name || base == name) { print $1; exit }
    }
  ' "$1"
}
lowercase() {
  echo "$1" | tr '[:upper:]' '[:lower:]'
}`;

/** http downloads; GITHUB_TOKEN is only sent to GitHub */
export const download = `is_github_url() {
  case "$1" in
    https://github.com/* | https://*.github.com/* | https://githubusercontent.com/* | https://*.githubusercontent.com/*) return 0 ;;
  esac
  return 1
}
http_download() {
  local_file=$1
  source_url=$2
  header=$3
  log_debug "http_download \${source_url}"
  auth=""
  if [ -n "\${GITHUB_TOKEN}" ] && is_github_url "\${source_url}"; then
    log_debug "Using GITHUB_TOKEN for authentication"
    auth="Authorization: Bearer \${GITHUB_TOKEN}"
  fi
  if is_command curl; then
    set -- -fsSL -o "\${local_file}"
    [ -n "\${auth}" ] && set -- "$@" -H "\${auth}"
    [ -n "\${header}" ] && set -- "$@" -H "\${header}"
    curl "$@" "\${source_url}"
  elif is_command wget; then
    set -- -q -O "\${local_file}"
    [ -n "\${auth}" ] && set -- "$@" --header "\${auth}"
    [ -n "\${header}" ] && set -- "$@" --header "\${header}"
    wget "$@" "\${source_url}"
  else
    log_crit "http_download unable to find wget or curl"
    return 1
  fi
}
github_release() {
  owner_repo=$1
  version=$2
  test -z "$version" && version="latest"
  json_file=$(mktemp)
  http_download "\${json_file}" "https://github.com/\${owner_repo}/releases/\${version}" "Accept:application/json" || {
    rm -f "\${json_file}"
    return 1
  }
  version=$(tr -s '\\n' ' ' <"\${json_file}" | sed 's/.*"tag_name":"//' | sed 's/".*//')
  rm -f "\${json_file}"
  test -z "$version" && return 1
  echo "$version"
}`;

/** \`untar ARCHIVE STRIP\` extracts into the current directory and removes the archive; anything else is left as is */
export const untar = `untar() {
  tarball=$1
  strip_components=\${2:-0}
  case "\${tarball}" in
    *.tar.gz | *.tgz) tar --no-same-owner -xzf "\${tarball}" --strip-components "\${strip_components}" && rm -f "\${tarball}" ;;
    *.tar.xz | *.txz) tar --no-same-owner -xJf "\${tarball}" --strip-components "\${strip_components}" && rm -f "\${tarball}" ;;
    *.tar.bz2 | *.tbz | *.tbz2) tar --no-same-owner -xjf "\${tarball}" --strip-components "\${strip_components}" && rm -f "\${tarball}" ;;
    *.tar) tar --no-same-owner -xf "\${tarball}" --strip-components "\${strip_components}" && rm -f "\${tarball}" ;;
    *.gz) gunzip "\${tarball}" ;;
    *.zip)
      if [ "\${strip_components}" -gt 0 ]; then
        extract_dir=$(mktemp -d)
        unzip -q "\${tarball}" -d "\${extract_dir}" || return 1
        first_subdir=$(find "\${extract_dir}" -mindepth 1 -maxdepth 1 -type d | head -n 1)
        if [ -n "\${first_subdir}" ]; then
          mv "\${first_subdir}"/* .
        else
          log_warn "no folder to strip in \${tarball}"
          mv "\${extract_dir}"/* .
        fi
        rm -rf "\${extract_dir}"
      else
        unzip -q "\${tarball}" || return 1
      fi
      rm -f "\${tarball}"
      ;;
    *) log_debug "\${tarball} is not an archive" ;;
  esac
}`;
