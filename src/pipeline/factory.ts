import path from 'path';
import type { AxiosInstance } from 'axios';
import { ExecutableBuilder } from '../builders/executable-builder.js';
import { PackageBuilder } from '../builders/package-builder.js';
import type { ToolRunner } from '../builders/tool-runner.js';
import {
  configuredTargets,
  DEFAULT_BUILD_TIMEOUT_MS,
  DEFAULT_VERIFY_TIMEOUT_MS,
  type ReleaseConfig,
} from '../config/release-config.js';
import { parseRepository, type Env } from '../config/env.js';
import { ConfigError } from '../errors/errors.js';
import { Credential } from '../errors/secrets.js';
import { createReleaseClient, releaseHostCredentialsFromEnv } from '../github/client.js';
import { GitHubReleaseHost, type ReleaseHost, type RepositoryRef } from '../github/releases.js';
import { logger as rootLogger, type Logger } from '../observability/logger.js';
import { IndexPublisher } from '../publishers/index-publisher.js';
import { ReleaseAssetPublisher } from '../publishers/release-asset-publisher.js';
import { ExecutableGate, PackageGate } from '../verification/gate.js';
import { ReleaseOrchestrator, type ReleasePipeline } from './orchestrator.js';

export interface PipelineOptions {
  config: ReleaseConfig;
  env: Env;
  /** Source tree root; defaults to SOURCE_ROOT, then the working directory. */
  sourceRoot?: string;
  /** Stand-ins for the outside world, used by tests and dry runs. */
  releaseHost?: ReleaseHost;
  http?: AxiosInstance;
  runTool?: ToolRunner;
}

function resolveRepository(config: ReleaseConfig, env: Env): RepositoryRef {
  if (env.GITHUB_REPOSITORY) {
    return parseRepository(env.GITHUB_REPOSITORY);
  }
  if (config.repository) {
    return config.repository;
  }
  throw new ConfigError('Release repository not configured', [
    'set GITHUB_REPOSITORY=owner/repo or "repository" in the release config',
  ]);
}

async function resolveReleaseHost(options: PipelineOptions): Promise<ReleaseHost> {
  if (options.releaseHost) {
    return options.releaseHost;
  }
  const repository = resolveRepository(options.config, options.env);
  const octokit = await createReleaseClient(releaseHostCredentialsFromEnv(options.env), {
    baseUrl: options.env.GITHUB_API_URL,
  });
  return new GitHubReleaseHost(octokit, repository);
}

/** Validates credentials and wires builders, gates and publishers for every configured target. */
export async function createReleasePipeline(options: PipelineOptions): Promise<ReleasePipeline> {
  const { config, env } = options;

  if (!env.INDEX_TOKEN) {
    throw new ConfigError('Package index credential not configured', ['set INDEX_TOKEN']);
  }
  const indexToken = new Credential(env.INDEX_TOKEN, 'index-token');

  const commandPrefixes = Object.fromEntries(
    config.platforms.map(platform => [platform.name, platform.commandPrefix])
  );

  const releaseHost = await resolveReleaseHost(options);

  return {
    source: { root: path.resolve(options.sourceRoot ?? env.SOURCE_ROOT ?? process.cwd()) },
    targets: configuredTargets(config),
    builders: {
      package: new PackageBuilder({
        distributionName: config.package.name,
        buildCommand: config.package.buildCommand,
        outDir: config.package.outDir,
        runTool: options.runTool,
      }),
      executable: new ExecutableBuilder({
        name: config.executable.name,
        entry: config.executable.entry,
        dataPaths: config.executable.dataPaths,
        hiddenImports: config.executable.hiddenImports,
        freezeCommand: config.executable.freezeCommand,
        distDir: config.executable.distDir,
        commandPrefixes,
        runTool: options.runTool,
      }),
    },
    gates: {
      package: new PackageGate(),
      executable: new ExecutableGate({
        probeArgs: config.executable.probeArgs,
        successExitCode: config.executable.successExitCode,
        commandPrefixes,
        runTool: options.runTool,
      }),
    },
    publishers: {
      package: new IndexPublisher({
        uploadUrl: env.INDEX_UPLOAD_URL ?? config.index.uploadUrl,
        token: indexToken,
        http: options.http,
      }),
      executable: new ReleaseAssetPublisher({
        host: releaseHost,
        assetBaseName: config.executable.name,
      }),
    },
    timeouts: {
      buildMs: env.BUILD_TIMEOUT_MS ?? config.timeouts.buildMs ?? DEFAULT_BUILD_TIMEOUT_MS,
      verifyMs: env.VERIFY_TIMEOUT_MS ?? config.timeouts.verifyMs ?? DEFAULT_VERIFY_TIMEOUT_MS,
    },
  };
}

export async function createReleaseOrchestrator(
  options: PipelineOptions,
  logger: Logger = rootLogger
): Promise<ReleaseOrchestrator> {
  return new ReleaseOrchestrator(await createReleasePipeline(options), logger);
}
