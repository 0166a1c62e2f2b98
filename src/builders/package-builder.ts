import fs from 'fs/promises';
import path from 'path';
import { buildFailure, describeError } from '../errors/error-info.js';
import { versionString } from '../version/descriptor.js';
import type { BuildArtifact, BuildTarget, SourceTree } from '../types.js';
import { failedArtifact, producedArtifact, type ArtifactBuilder, type BuildContext } from './types.js';
import { spawnTool, toolFailure, type ToolRunner } from './tool-runner.js';

export interface PackageBuilderOptions {
  distributionName: string;
  buildCommand: string[];
  outDir: string;
  runTool?: ToolRunner;
}

export interface DistributionFile {
  file: string;
  type: 'sdist' | 'wheel';
  name: string;
  version: string;
}

const SDIST_SUFFIX = '.tar.gz';
const WHEEL_SUFFIX = '.whl';

export function normalizeDistributionName(name: string): string {
  return name.replace(/[-_.]+/g, '_').toLowerCase();
}

/** Parse `<name>-<version>.tar.gz` or `<name>-<version>-<tags>.whl`; null for anything else. */
export function parseDistributionFilename(file: string): DistributionFile | null {
  const base = path.basename(file);

  if (base.endsWith(SDIST_SUFFIX)) {
    const stem = base.slice(0, -SDIST_SUFFIX.length);
    const split = stem.lastIndexOf('-');
    if (split <= 0 || split === stem.length - 1) return null;
    return { file, type: 'sdist', name: stem.slice(0, split), version: stem.slice(split + 1) };
  }

  if (base.endsWith(WHEEL_SUFFIX)) {
    const parts = base.slice(0, -WHEEL_SUFFIX.length).split('-');
    if (parts.length < 5 || !parts[0] || !parts[1]) return null;
    return { file, type: 'wheel', name: parts[0], version: parts[1] };
  }

  return null;
}

const PYPROJECT_VERSION = /^\s*version\s*=\s*["']([^"']+)["']/m;
const SETUP_PY_VERSION = /\bversion\s*=\s*["']([^"']+)["']/;

/**
 * Version literal declared by the source tree, if any. A dynamic version
 * (computed at build time) yields null and is checked after the build.
 */
export async function readDeclaredVersion(root: string): Promise<string | null> {
  const candidates: Array<[string, RegExp]> = [
    ['pyproject.toml', PYPROJECT_VERSION],
    ['setup.py', SETUP_PY_VERSION],
  ];

  for (const [file, pattern] of candidates) {
    let text: string;
    try {
      text = await fs.readFile(path.join(root, file), 'utf8');
    } catch {
      continue;
    }
    const match = pattern.exec(text);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export class PackageBuilder implements ArtifactBuilder {
  readonly kind = 'package' as const;
  private readonly runTool: ToolRunner;

  constructor(private readonly options: PackageBuilderOptions) {
    this.runTool = options.runTool ?? spawnTool;
  }

  async build(target: BuildTarget, source: SourceTree, context: BuildContext): Promise<BuildArtifact> {
    try {
      return await this.buildDistributions(target, source, context);
    } catch (error) {
      context.logger.error('package_build', 'Package build raised unexpectedly', {
        target: target.name,
        error: describeError(error),
      });
      return failedArtifact(target, buildFailure('unexpected_error', describeError(error)));
    }
  }

  private async buildDistributions(
    target: BuildTarget,
    source: SourceTree,
    context: BuildContext
  ): Promise<BuildArtifact> {
    const expected = versionString(context.version);

    const declared = await readDeclaredVersion(source.root);
    if (declared !== null && declared !== expected) {
      return failedArtifact(
        target,
        buildFailure(
          'version_mismatch',
          `Source tree declares version ${declared} but tag ${context.version.raw} requires ${expected}`,
          { declared, expected }
        )
      );
    }

    // One directory per tag so a stale distribution from another run is never picked up.
    const outDir = path.resolve(source.root, this.options.outDir, context.version.raw);
    await fs.rm(outDir, { recursive: true, force: true });
    await fs.mkdir(outDir, { recursive: true });

    const [command, ...rest] = this.options.buildCommand;
    const invocation = {
      command,
      args: rest.map(arg => arg.split('{outDir}').join(outDir)),
      cwd: source.root,
      signal: context.signal,
    };

    context.logger.info('package_build', 'Building source and wheel distributions', {
      target: target.name,
      outDir,
    });

    const result = await this.runTool(invocation);
    const failure = toolFailure(result, invocation);
    if (failure) {
      const code = failure.code === 'nonzero_exit' ? 'tool_error' : failure.code;
      return failedArtifact(target, buildFailure(code, failure.message, failure.detail));
    }

    return this.collectDistributions(target, outDir, expected);
  }

  private async collectDistributions(target: BuildTarget, outDir: string, expected: string): Promise<BuildArtifact> {
    const wanted = normalizeDistributionName(this.options.distributionName);
    const entries = await fs.readdir(outDir);
    const distributions = entries
      .map(entry => parseDistributionFilename(path.join(outDir, entry)))
      .filter((dist): dist is DistributionFile => dist !== null)
      .filter(dist => normalizeDistributionName(dist.name) === wanted);

    const sdists = distributions.filter(dist => dist.type === 'sdist');
    const wheels = distributions.filter(dist => dist.type === 'wheel');

    if (sdists.length !== 1 || wheels.length === 0) {
      return failedArtifact(
        target,
        buildFailure(
          'missing_distribution',
          `Expected one sdist and at least one wheel for ${this.options.distributionName}, found ${sdists.length} sdist(s) and ${wheels.length} wheel(s)`,
          { outDir }
        ),
        distributions.map(dist => dist.file)
      );
    }

    const mismatched = distributions.find(dist => dist.version !== expected);
    if (mismatched) {
      return failedArtifact(
        target,
        buildFailure(
          'version_mismatch',
          `${path.basename(mismatched.file)} carries version ${mismatched.version}, expected ${expected}`,
          { file: path.basename(mismatched.file), declared: mismatched.version, expected }
        ),
        distributions.map(dist => dist.file)
      );
    }

    return producedArtifact(target, [...sdists, ...wheels].map(dist => dist.file));
  }
}
