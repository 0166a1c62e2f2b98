import type { BuildArtifact } from '../types.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class PublishPreconditionError extends Error {
  constructor(public readonly targetName: string) {
    super(`Refusing to publish unverified artifact for target ${targetName}`);
    this.name = 'PublishPreconditionError';
  }
}

export class UnknownTargetError extends Error {
  constructor(
    public readonly unknown: string[],
    public readonly known: string[]
  ) {
    super(`Unknown target(s): ${unknown.join(', ')}. Configured: ${known.join(', ')}`);
    this.name = 'UnknownTargetError';
  }
}

export function assertPublishable(artifact: BuildArtifact): void {
  if (!artifact.produced || !artifact.verified) {
    throw new PublishPreconditionError(artifact.target.name);
  }
}
