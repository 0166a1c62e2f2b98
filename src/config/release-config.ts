import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors/errors.js';
import type { BuildTarget } from '../types.js';

export const DEFAULT_BUILD_TIMEOUT_MS = 900_000;
export const DEFAULT_VERIFY_TIMEOUT_MS = 30_000;
export const DEFAULT_INDEX_UPLOAD_URL = 'https://upload.pypi.org/legacy/';

const commandSchema = z.array(z.string().min(1)).min(1);

const dataPathSchema = z.object({
  source: z.string().min(1),
  dest: z.string().min(1),
});

const platformSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'target names are lowercase slugs'),
  platform: z.string().min(1),
  commandPrefix: z.array(z.string().min(1)).default([]),
});

const releaseConfigSchema = z.object({
  package: z.object({
    target: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/).default('package'),
    name: z.string().min(1),
    buildCommand: commandSchema.default(['python', '-m', 'build', '--sdist', '--wheel', '--outdir', '{outDir}']),
    outDir: z.string().min(1).default('dist'),
  }),
  executable: z.object({
    name: z.string().min(1),
    entry: z.string().min(1),
    dataPaths: z.array(dataPathSchema).default([]),
    hiddenImports: z.array(z.string().min(1)).default([]),
    freezeCommand: commandSchema.default(['pyinstaller']),
    distDir: z.string().min(1).default('build/executables'),
    probeArgs: z.array(z.string()).default(['--version']),
    successExitCode: z.number().int().default(0),
  }),
  platforms: z.array(platformSchema).default([]),
  index: z
    .object({
      uploadUrl: z.string().url().default(DEFAULT_INDEX_UPLOAD_URL),
    })
    .default({}),
  repository: z
    .object({
      owner: z.string().min(1),
      repo: z.string().min(1),
    })
    .optional(),
  timeouts: z
    .object({
      buildMs: z.number().int().positive().optional(),
      verifyMs: z.number().int().positive().optional(),
    })
    .default({}),
});

export type ReleaseConfig = z.infer<typeof releaseConfigSchema>;
export type PlatformConfig = ReleaseConfig['platforms'][number];
export type DataPath = z.infer<typeof dataPathSchema>;

export function parseReleaseConfig(raw: unknown): ReleaseConfig {
  const result = releaseConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Invalid release config',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const config = result.data;
  const names = [config.package.target, ...config.platforms.map(p => p.name)];
  const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw new ConfigError('Invalid release config', [`duplicate target names: ${[...new Set(duplicates)].join(', ')}`]);
  }

  return config;
}

export function loadReleaseConfig(configPath: string): ReleaseConfig {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read release config at ${resolved}`, [
      error instanceof Error ? error.message : 'Unknown error',
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Release config at ${resolved} is not valid JSON`, [
      error instanceof Error ? error.message : 'Unknown error',
    ]);
  }

  return parseReleaseConfig(raw);
}

/** The statically configured target set: one package target, one executable per platform. */
export function configuredTargets(config: ReleaseConfig): BuildTarget[] {
  const packageTarget = Object.freeze<BuildTarget>({ name: config.package.target, kind: 'package' });
  const executables = config.platforms.map(platform =>
    Object.freeze<BuildTarget>({ name: platform.name, kind: 'executable', platform: platform.platform })
  );
  return [packageTarget, ...executables];
}

export function isWindowsPlatform(platform: string | undefined): boolean {
  return platform !== undefined && /^win/i.test(platform);
}
