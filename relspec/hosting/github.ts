// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { default as got, HTTPError } from 'got';
import { addAbortSignal, Readable } from 'stream';
import { requestTimeout, userAgent } from '../constants';
import { i } from '../i18n';
import { Session } from '../session';
import { AcquisitionError } from '../util/exceptions';
import { ReleaseAsset, ReleaseHost } from './release-host';

type Headers = Record<string, string>;

const defaultApi = 'https://api.github.com';
const defaultServer = 'https://github.com';

/** true for github.com, githubusercontent.com and their subdomains */
export function isGitHubUrl(url: string): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return ['github.com', 'githubusercontent.com'].some(domain => hostname === domain || hostname.endsWith(`.${domain}`));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function trimSlash(url: string) {
  return url.replace(/\/+$/, '');
}

/** cancels a got request when the signal fires */
export async function cancelOn<T>(request: Promise<T> & { cancel(reason?: string): void }, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return request;
  }
  if (signal.aborted) {
    request.cancel('aborted');
    return request;
  }
  const abort = () => request.cancel('aborted');
  signal.addEventListener('abort', abort, { once: true });
  try {
    return await request;
  } finally {
    signal.removeEventListener('abort', abort);
  }
}

/** download timeouts: none on the whole transfer, only on reaching the first byte and on a stalled socket */
export const streamTimeout = {
  lookup: requestTimeout,
  connect: requestTimeout,
  secureConnect: requestTimeout,
  socket: requestTimeout,
  response: requestTimeout,
};

function describe(e: unknown) {
  return e instanceof HTTPError ? `HTTP ${e.response.statusCode} ${e.response.statusMessage ?? ''}`.trim() : e instanceof Error ? e.message : String(e);
}

/** GitHub releases, over the REST API and the release download URLs */
export class GitHubReleases implements ReleaseHost {
  constructor(private readonly session: Session) {
  }

  get api() {
    return trimSlash(this.session.settings.githubApi || defaultApi);
  }

  get server() {
    return trimSlash(this.session.settings.githubServer || defaultServer);
  }

  /** the GITHUB_TOKEN is only ever sent to GitHub itself (or the configured GitHub endpoints) */
  headers(url: string, extra: Headers = {}): Headers {
    const headers: Headers = { 'user-agent': userAgent, ...extra };
    const token = this.session.settings.githubToken;
    if (token && (isGitHubUrl(url) || url.startsWith(`${this.api}/`) || url.startsWith(`${this.server}/`))) {
      headers['authorization'] = `Bearer ${token}`;
    }
    return headers;
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    this.session.channels.debug(`GET ${url}`);
    try {
      const response = await cancelOn(got(url, { headers: this.headers(url, { accept: 'application/vnd.github+json' }), timeout: requestTimeout }), signal);
      const body: unknown = JSON.parse(response.body);
      return body;
    } catch (e) {
      throw new AcquisitionError(i`Request to ${url} failed: ${describe(e)}`, { location: url, cause: e });
    }
  }

  async latestTag(repo: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.api}/repos/${repo}/releases/latest`;
    const release = await this.getJson(url, signal);
    if (isRecord(release) && typeof release.tag_name === 'string' && release.tag_name) {
      return release.tag_name;
    }
    throw new AcquisitionError(i`The latest release of ${repo} has no tag name`, { location: url });
  }

  async releaseAssets(repo: string, tag: string, signal?: AbortSignal): Promise<Array<ReleaseAsset>> {
    const url = `${this.api}/repos/${repo}/releases/tags/${encodeURIComponent(tag)}`;
    const release = await this.getJson(url, signal);
    if (!isRecord(release) || !Array.isArray(release.assets)) {
      throw new AcquisitionError(i`Unexpected response for release ${tag} of ${repo}`, { location: url });
    }
    const assets = new Array<ReleaseAsset>();
    for (const each of release.assets) {
      if (isRecord(each) && typeof each.name === 'string' && typeof each.browser_download_url === 'string') {
        assets.push({
          name: each.name,
          downloadUrl: each.browser_download_url,
          digest: typeof each.digest === 'string' && each.digest ? each.digest : undefined,
        });
      }
    }
    return assets;
  }

  downloadUrl(repo: string, tag: string, filename: string): string {
    return `${this.server}/${repo}/releases/download/${tag}/${filename}`;
  }

  async fetchText(url: string, signal?: AbortSignal): Promise<string> {
    this.session.channels.debug(`GET ${url}`);
    try {
      const response = await cancelOn(got(url, { headers: this.headers(url), timeout: requestTimeout }), signal);
      return response.body;
    } catch (e) {
      throw new AcquisitionError(i`Download of ${url} failed: ${describe(e)}`, { location: url, cause: e });
    }
  }

  openStream(url: string, signal?: AbortSignal): Readable {
    this.session.channels.debug(`GET ${url} (stream)`);
    const stream = got.stream(url, { headers: this.headers(url), timeout: streamTimeout });
    return signal ? addAbortSignal(signal, stream) : stream;
  }
}
