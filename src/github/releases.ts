import type { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

export interface ReleaseRecord {
  id: number;
  tagName: string;
  uploadUrl: string;
  htmlUrl: string;
}

export interface UploadedAsset {
  id: number;
  name: string;
  url: string;
}

export type ReleaseHostFailure = 'already_exists' | 'unauthorized' | 'not_found' | 'rejected' | 'network';

export class ReleaseHostError extends Error {
  constructor(
    public readonly reason: ReleaseHostFailure,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ReleaseHostError';
  }
}

/** The hosting platform's release primitives, as the release-asset publisher needs them. */
export interface ReleaseHost {
  findReleaseByTag(tag: string): Promise<ReleaseRecord | null>;
  createRelease(tag: string): Promise<ReleaseRecord>;
  uploadAsset(release: ReleaseRecord, name: string, content: Buffer): Promise<UploadedAsset>;
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

function toHostError(error: unknown, action: string): ReleaseHostError {
  if (error instanceof RequestError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new ReleaseHostError('unauthorized', `${action}: credentials rejected (HTTP ${status})`, status);
    }
    if (status === 404) {
      return new ReleaseHostError('not_found', `${action}: not found`, status);
    }
    if (status === 422 && JSON.stringify(error.response?.data ?? {}).includes('already_exists')) {
      return new ReleaseHostError('already_exists', `${action}: already exists`, status);
    }
    if (status >= 500) {
      return new ReleaseHostError('network', `${action}: host answered HTTP ${status}`, status);
    }
    return new ReleaseHostError('rejected', `${action}: ${error.message}`, status);
  }
  return new ReleaseHostError('network', `${action}: ${error instanceof Error ? error.message : 'Unknown error'}`);
}

export class GitHubReleaseHost implements ReleaseHost {
  constructor(
    private readonly octokit: Octokit,
    private readonly repository: RepositoryRef
  ) {}

  async findReleaseByTag(tag: string): Promise<ReleaseRecord | null> {
    try {
      const { data } = await this.octokit.rest.repos.getReleaseByTag({
        owner: this.repository.owner,
        repo: this.repository.repo,
        tag,
      });
      return { id: data.id, tagName: data.tag_name, uploadUrl: data.upload_url, htmlUrl: data.html_url };
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) {
        return null;
      }
      throw toHostError(error, `Looking up release ${tag}`);
    }
  }

  async createRelease(tag: string): Promise<ReleaseRecord> {
    try {
      const { data } = await this.octokit.rest.repos.createRelease({
        owner: this.repository.owner,
        repo: this.repository.repo,
        tag_name: tag,
        name: tag,
      });
      return { id: data.id, tagName: data.tag_name, uploadUrl: data.upload_url, htmlUrl: data.html_url };
    } catch (error) {
      throw toHostError(error, `Creating release ${tag}`);
    }
  }

  async uploadAsset(release: ReleaseRecord, name: string, content: Buffer): Promise<UploadedAsset> {
    try {
      // upload_url is an RFC 6570 template ending in {?name,label}; octokit expands it from `name`.
      const response = await this.octokit.request({
        method: 'POST',
        url: release.uploadUrl,
        name,
        data: content,
        headers: {
          'content-type': 'application/octet-stream',
          'content-length': content.length,
        },
      });
      const data: unknown = response.data;
      const id = typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'number' ? data.id : 0;
      const url =
        typeof data === 'object' && data !== null && 'browser_download_url' in data && typeof data.browser_download_url === 'string'
          ? data.browser_download_url
          : release.htmlUrl;
      return { id, name, url };
    } catch (error) {
      throw toHostError(error, `Uploading ${name} to release ${release.tagName}`);
    }
  }
}
