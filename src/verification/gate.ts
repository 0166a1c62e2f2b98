import path from 'path';
import { describeError, verificationFailure } from '../errors/error-info.js';
import { normalizeDistributionName, parseDistributionFilename } from '../builders/package-builder.js';
import { spawnTool, toolFailure, type ToolInvocation, type ToolRunner } from '../builders/tool-runner.js';
import type { Logger } from '../observability/logger.js';
import type { BuildArtifact, ErrorInfo, TargetKind, VersionTag } from '../types.js';
import { versionString } from '../version/descriptor.js';
import { DistributionInspectionError, readSdistMetadata, readWheelMetadata, type CoreMetadata } from './distribution.js';

export interface VerificationContext {
  version: VersionTag;
  signal: AbortSignal;
  logger: Logger;
}

/** Returns a copy of the artifact with `verified` set; never rejects. */
export interface VerificationGate {
  readonly kind: TargetKind;
  verify(artifact: BuildArtifact, context: VerificationContext): Promise<BuildArtifact>;
}

function passed(artifact: BuildArtifact): BuildArtifact {
  return { ...artifact, verified: true, error: undefined };
}

function rejected(artifact: BuildArtifact, error: ErrorInfo): BuildArtifact {
  return { ...artifact, verified: false, error };
}

/** Structural check: archives open and carry metadata for the tagged version. No network, no install. */
export class PackageGate implements VerificationGate {
  readonly kind = 'package' as const;

  async verify(artifact: BuildArtifact, context: VerificationContext): Promise<BuildArtifact> {
    const expected = versionString(context.version);

    if (artifact.handle.files.length === 0) {
      return rejected(artifact, verificationFailure('malformed_archive', 'No distribution files to verify'));
    }

    for (const file of artifact.handle.files) {
      const parsed = parseDistributionFilename(file);
      if (!parsed) {
        return rejected(
          artifact,
          verificationFailure('malformed_archive', `${path.basename(file)} is not a recognised distribution file`)
        );
      }

      let metadata: CoreMetadata;
      try {
        metadata = parsed.type === 'wheel' ? readWheelMetadata(file) : await readSdistMetadata(file);
      } catch (error) {
        if (error instanceof DistributionInspectionError) {
          return rejected(artifact, verificationFailure(error.code, error.message, { file: path.basename(file) }));
        }
        return rejected(artifact, verificationFailure('unexpected_error', describeError(error)));
      }

      if (metadata.version !== expected) {
        return rejected(
          artifact,
          verificationFailure(
            'version_mismatch',
            `${path.basename(file)} metadata declares ${metadata.version}, expected ${expected}`,
            { file: path.basename(file), declared: metadata.version, expected }
          )
        );
      }

      if (normalizeDistributionName(metadata.name) !== normalizeDistributionName(parsed.name)) {
        return rejected(
          artifact,
          verificationFailure(
            'metadata_unparseable',
            `${path.basename(file)} metadata names ${metadata.name}, which does not match the file name`,
            { file: path.basename(file) }
          )
        );
      }

      context.logger.info('package_verification', 'Distribution metadata verified', {
        target: artifact.target.name,
        file: path.basename(file),
        metadataVersion: metadata.metadataVersion,
      });
    }

    return passed(artifact);
  }
}

export interface ExecutableGateOptions {
  probeArgs: string[];
  successExitCode: number;
  commandPrefixes?: Record<string, string[]>;
  runTool?: ToolRunner;
}

/** Smoke check: the executable answers a trivial probe with the success exit code. */
export class ExecutableGate implements VerificationGate {
  readonly kind = 'executable' as const;
  private readonly runTool: ToolRunner;

  constructor(private readonly options: ExecutableGateOptions) {
    this.runTool = options.runTool ?? spawnTool;
  }

  async verify(artifact: BuildArtifact, context: VerificationContext): Promise<BuildArtifact> {
    const executable = artifact.handle.files[0];
    if (!executable) {
      return rejected(artifact, verificationFailure('malformed_archive', 'No executable to verify'));
    }

    const prefix = this.options.commandPrefixes?.[artifact.target.name] ?? [];
    const invocation: ToolInvocation =
      prefix.length > 0
        ? {
            command: prefix[0],
            args: [...prefix.slice(1), executable, ...this.options.probeArgs],
            cwd: path.dirname(executable),
            signal: context.signal,
          }
        : { command: executable, args: this.options.probeArgs, cwd: path.dirname(executable), signal: context.signal };

    const result = await this.runTool(invocation);
    const failure = toolFailure(result, invocation, this.options.successExitCode);

    if (failure) {
      context.logger.warn('executable_verification', 'Smoke check failed', {
        target: artifact.target.name,
        code: failure.code,
        exitCode: result.exitCode,
        signal: result.signal,
        durationMs: result.durationMs,
      });
      return rejected(artifact, verificationFailure(failure.code, failure.message, failure.detail));
    }

    context.logger.info('executable_verification', 'Smoke check passed', {
      target: artifact.target.name,
      durationMs: result.durationMs,
    });
    return passed(artifact);
  }
}
