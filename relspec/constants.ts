// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export const configurationName = '.config/relspec.yml';
export const latestVersion = 'latest';
export const schemaVersion = 'v1';
export const defaultBinDirectory = '${HOME}/.local/bin';
export const binDirVariable = 'RELSPEC_BIN_DIR';
export const userAgent = 'relspec';
export const defaultConcurrency = 4;
export const requestTimeout = 30000;

export const repositoryPattern = /^[a-zA-Z0-9._-]+\/[a-zA-Z0-9._-]+$/;

/** placeholder that names a single asset; only meaningful to per-asset checksum manifests and binary paths */
export const assetFilenamePlaceholder = '${ASSET_FILENAME}';
