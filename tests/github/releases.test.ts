import { Octokit } from '@octokit/rest';
import { GitHubReleaseHost, ReleaseHostError } from '../../src/github/releases.js';
import { releaseHostCredentialsFromEnv } from '../../src/github/client.js';
import { ConfigError } from '../../src/errors/errors.js';

interface Call {
  method: string;
  url: string;
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function hostWith(handler: (call: Call) => Response) {
  const calls: Call[] = [];
  const stub: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const call = { method: init?.method ?? 'GET', url };
    calls.push(call);
    return handler(call);
  };
  const octokit = new Octokit({ auth: 'test-token', request: { fetch: stub } });
  return { host: new GitHubReleaseHost(octokit, { owner: 'acme', repo: 'usage-monitor' }), calls };
}

const releaseBody = {
  id: 11,
  tag_name: 'v2.3.0',
  upload_url: 'https://uploads.example.test/repos/acme/usage-monitor/releases/11/assets{?name,label}',
  html_url: 'https://example.test/acme/usage-monitor/releases/tag/v2.3.0',
};

describe('GitHubReleaseHost', () => {
  test('finds a release by tag', async () => {
    const { host, calls } = hostWith(() => jsonResponse(200, releaseBody));

    const release = await host.findReleaseByTag('v2.3.0');

    expect(release).toEqual({
      id: 11,
      tagName: 'v2.3.0',
      uploadUrl: releaseBody.upload_url,
      htmlUrl: releaseBody.html_url,
    });
    expect(calls[0]).toEqual({
      method: 'GET',
      url: 'https://api.github.com/repos/acme/usage-monitor/releases/tags/v2.3.0',
    });
  });

  test('returns null when no release exists for the tag', async () => {
    const { host } = hostWith(() => jsonResponse(404, { message: 'Not Found' }));
    await expect(host.findReleaseByTag('v2.3.0')).resolves.toBeNull();
  });

  test('maps an existing release to already_exists on create', async () => {
    const { host } = hostWith(() =>
      jsonResponse(422, {
        message: 'Validation Failed',
        errors: [{ resource: 'Release', code: 'already_exists', field: 'tag_name' }],
      })
    );

    const error = await host.createRelease('v2.3.0').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ReleaseHostError);
    if (error instanceof ReleaseHostError) {
      expect(error.reason).toBe('already_exists');
      expect(error.status).toBe(422);
      expect(error.message).toBe('Creating release v2.3.0: already exists');
    }
  });

  test('maps rejected credentials to unauthorized', async () => {
    const { host } = hostWith(() => jsonResponse(401, { message: 'Bad credentials' }));
    const error = await host.createRelease('v2.3.0').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ReleaseHostError);
    if (error instanceof ReleaseHostError) {
      expect(error.reason).toBe('unauthorized');
      expect(error.message).toBe('Creating release v2.3.0: credentials rejected (HTTP 401)');
    }
  });

  test('uploads an asset to the expanded upload URL', async () => {
    const { host, calls } = hostWith(() =>
      jsonResponse(201, {
        id: 99,
        name: 'usage-monitor-linux',
        browser_download_url: 'https://example.test/download/v2.3.0/usage-monitor-linux',
      })
    );
    const release = {
      id: 11,
      tagName: 'v2.3.0',
      uploadUrl: releaseBody.upload_url,
      htmlUrl: releaseBody.html_url,
    };

    const asset = await host.uploadAsset(release, 'usage-monitor-linux', Buffer.from('binary'));

    expect(asset).toEqual({
      id: 99,
      name: 'usage-monitor-linux',
      url: 'https://example.test/download/v2.3.0/usage-monitor-linux',
    });
    expect(calls[0]).toEqual({
      method: 'POST',
      url: 'https://uploads.example.test/repos/acme/usage-monitor/releases/11/assets?name=usage-monitor-linux',
    });
  });
});

describe('releaseHostCredentialsFromEnv', () => {
  test('prefers app credentials when all three are set', () => {
    const credentials = releaseHostCredentialsFromEnv({
      GITHUB_TOKEN: 'test-token',
      GITHUB_APP_ID: '123',
      GITHUB_PRIVATE_KEY: 'test-private-key',
      GITHUB_INSTALLATION_ID: 456,
    });
    expect(credentials.type).toBe('app');
    if (credentials.type === 'app') {
      expect(credentials.app.appId).toBe('123');
      expect(credentials.app.installationId).toBe(456);
      expect(String(credentials.app.privateKey)).toBe('[credential github-app-key]');
    }
  });

  test('falls back to a token', () => {
    const credentials = releaseHostCredentialsFromEnv({ GITHUB_TOKEN: 'test-token' });
    expect(credentials.type).toBe('token');
    if (credentials.type === 'token') {
      expect(credentials.token.reveal()).toBe('test-token');
      expect(JSON.stringify(credentials)).toBe('{"type":"token","token":"[credential github-token]"}');
    }
  });

  test('throws a ConfigError without any credentials', () => {
    expect(() => releaseHostCredentialsFromEnv({})).toThrow(ConfigError);
  });
});
