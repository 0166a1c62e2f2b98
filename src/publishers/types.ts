import type { Logger } from '../observability/logger.js';
import type { BuildArtifact, ErrorInfo, PublishAck, TargetKind, VersionTag } from '../types.js';

export type PublishResult =
  | { ok: true; ack: PublishAck }
  | { ok: false; error: ErrorInfo };

export interface PublishContext {
  version: VersionTag;
  logger: Logger;
}

/**
 * Channel publisher contract. Credentials are handed to the constructor,
 * never read from the environment here. Callers must only pass verified
 * artifacts; an unverified one is a contract violation and throws.
 */
export interface ChannelPublisher {
  readonly kind: TargetKind;
  publish(artifact: BuildArtifact, context: PublishContext): Promise<PublishResult>;
}
