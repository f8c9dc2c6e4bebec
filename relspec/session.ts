// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { GitHubReleases } from './hosting/github';
import { ReleaseHost } from './hosting/release-host';
import { Channels, Stopwatch } from './util/channels';

export type SessionSettings = {
  readonly homeFolder: string;
  readonly githubToken?: string;
  readonly githubApi?: string;
  readonly githubServer?: string;
  readonly binDir?: string;
  readonly os?: string;
  readonly arch?: string;
}

/**
 * The Session class is used to hold a reference to the
 * message channels,
 * the release host,
 * and any other 'global' data that should be kept.
 *
 */
export class Session {
  /** @internal */
  readonly stopwatch = new Stopwatch();
  readonly channels: Channels;
  readonly releaseHost: ReleaseHost;
  currentDirectory: string;

  constructor(currentDirectory: string, public readonly settings: SessionSettings, releaseHost?: ReleaseHost) {
    this.channels = new Channels(this);
    this.releaseHost = releaseHost ?? new GitHubReleases(this);
    this.currentDirectory = currentDirectory;
  }
}
