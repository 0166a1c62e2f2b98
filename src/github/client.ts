import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';
import { ConfigError } from '../errors/errors.js';
import { Credential } from '../errors/secrets.js';

export interface AppCredentials {
  appId: string;
  privateKey: Credential;
  installationId: number;
}

export type ReleaseHostCredentials =
  | { type: 'token'; token: Credential }
  | { type: 'app'; app: AppCredentials };

export interface ClientOptions {
  baseUrl?: string;
  /** Replaces the HTTP transport, e.g. with an in-process stand-in. */
  fetch?: typeof fetch;
}

export async function createInstallationToken(app: AppCredentials): Promise<Credential> {
  const auth = createAppAuth({
    appId: app.appId,
    privateKey: app.privateKey.reveal().replace(/\\n/g, '\n'),
  });

  const installationAuth = await auth({
    type: 'installation',
    installationId: app.installationId,
  });

  return new Credential(installationAuth.token, 'github-installation');
}

export async function createReleaseClient(
  credentials: ReleaseHostCredentials,
  options: ClientOptions = {}
): Promise<Octokit> {
  const token = credentials.type === 'token' ? credentials.token : await createInstallationToken(credentials.app);

  return new Octokit({
    auth: token.reveal(),
    baseUrl: options.baseUrl,
    request: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

export function releaseHostCredentialsFromEnv(env: {
  GITHUB_TOKEN?: string;
  GITHUB_APP_ID?: string;
  GITHUB_PRIVATE_KEY?: string;
  GITHUB_INSTALLATION_ID?: number;
}): ReleaseHostCredentials {
  if (env.GITHUB_APP_ID && env.GITHUB_PRIVATE_KEY && env.GITHUB_INSTALLATION_ID) {
    return {
      type: 'app',
      app: {
        appId: env.GITHUB_APP_ID,
        privateKey: new Credential(env.GITHUB_PRIVATE_KEY, 'github-app-key'),
        installationId: env.GITHUB_INSTALLATION_ID,
      },
    };
  }

  if (env.GITHUB_TOKEN) {
    return { type: 'token', token: new Credential(env.GITHUB_TOKEN, 'github-token') };
  }

  throw new ConfigError('GitHub credentials not configured', [
    'set GITHUB_TOKEN, or GITHUB_APP_ID, GITHUB_PRIVATE_KEY and GITHUB_INSTALLATION_ID',
  ]);
}
