import type { Logger } from '../observability/logger.js';
import type { BuildArtifact, BuildTarget, ErrorInfo, SourceTree, TargetKind, VersionTag } from '../types.js';

export interface BuildContext {
  version: VersionTag;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Shared builder contract. Implementations keep no mutable state between
 * calls and never reject: failures come back as `produced: false`.
 */
export interface ArtifactBuilder {
  readonly kind: TargetKind;
  build(target: BuildTarget, source: SourceTree, context: BuildContext): Promise<BuildArtifact>;
}

export function producedArtifact(target: BuildTarget, files: string[]): BuildArtifact {
  return { target, handle: { files }, produced: true, verified: false };
}

export function failedArtifact(target: BuildTarget, error: ErrorInfo, files: string[] = []): BuildArtifact {
  return { target, handle: { files }, produced: false, verified: false, error };
}
