// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Readable } from 'stream';

export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
  /** `algorithm:hex` as published by the host, e.g. `sha256:9f86...` */
  readonly digest?: string;
}

/** The service a spec's releases are published on */
export interface ReleaseHost {
  /** the tag of the most recent release */
  latestTag(repo: string, signal?: AbortSignal): Promise<string>;

  /** the assets attached to the release tagged `tag` */
  releaseAssets(repo: string, tag: string, signal?: AbortSignal): Promise<Array<ReleaseAsset>>;

  /** where a release asset is downloaded from */
  downloadUrl(repo: string, tag: string, filename: string): string;

  fetchText(url: string, signal?: AbortSignal): Promise<string>;

  /** the body of a download; failures surface as stream errors */
  openStream(url: string, signal?: AbortSignal): Readable;
}
