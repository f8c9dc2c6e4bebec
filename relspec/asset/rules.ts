// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { AssetConfig, AssetRule, Binary } from '../spec/install-spec';

/** the values a platform's asset name is built from, after naming conventions and rules */
export interface Resolution {
  os: string;
  arch: string;
  ext: string;
  template: string;
  binaries: Array<Binary>;
}

export function titleCase(text: string) {
  return text ? text.substring(0, 1).toUpperCase() + text.substring(1).toLowerCase() : text;
}

/**
 * A rule matches when it has a `when` block and each non-empty field of it equals the original platform value.
 *
 * `when: {}` matches every platform; a rule without `when` matches none.
 */
export function ruleMatches(rule: AssetRule, os: string, arch: string) {
  return !!rule.when &&
    (!rule.when.os || rule.when.os === os) &&
    (!rule.when.arch || rule.when.arch === arch);
}

/**
 * Applies naming conventions, then every matching rule in order.
 *
 * Rules are matched against `os` and `arch` as given (lowercase), never against values an earlier rule produced.
 */
export function resolveAsset(asset: AssetConfig | undefined, os: string, arch: string): Resolution {
  const state: Resolution = {
    os: asset?.namingConvention?.os === 'titlecase' ? titleCase(os) : os,
    arch,
    ext: asset?.defaultExtension ?? '',
    template: asset?.template ?? '',
    binaries: asset?.binaries ?? [],
  };

  for (const rule of asset?.rules ?? []) {
    if (!ruleMatches(rule, os, arch)) {
      continue;
    }
    if (rule.os) {
      state.os = rule.os;
    }
    if (rule.arch) {
      state.arch = rule.arch;
    }
    if (rule.ext) {
      state.ext = rule.ext;
    }
    if (rule.template) {
      state.template = rule.template;
    }
    if (rule.binaries?.length) {
      state.binaries = rule.binaries;
    }
  }
  return state;
}
