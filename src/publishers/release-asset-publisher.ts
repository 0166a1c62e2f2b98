import fs from 'fs/promises';
import path from 'path';
import { assertPublishable } from '../errors/errors.js';
import { describeError, duplicateRelease, publishFailure } from '../errors/error-info.js';
import { isWindowsPlatform } from '../config/release-config.js';
import { ReleaseHostError, type ReleaseHost, type ReleaseRecord } from '../github/releases.js';
import type { BuildArtifact, BuildTarget, ErrorInfo } from '../types.js';
import type { ChannelPublisher, PublishContext, PublishResult } from './types.js';

export interface ReleaseAssetPublisherOptions {
  host: ReleaseHost;
  assetBaseName: string;
}

export function assetName(baseName: string, target: BuildTarget): string {
  const platform = target.platform ?? target.name;
  return isWindowsPlatform(target.platform) ? `${baseName}-${platform}.exe` : `${baseName}-${platform}`;
}

function hostFailure(error: unknown, fallback: string): ErrorInfo {
  if (error instanceof ReleaseHostError) {
    switch (error.reason) {
      case 'already_exists':
        return duplicateRelease(error.message, { status: error.status ?? null });
      case 'unauthorized':
        return publishFailure('credential_rejected', error.message, { status: error.status ?? null });
      case 'network':
        return publishFailure('network_error', error.message, { status: error.status ?? null });
      default:
        return publishFailure('release_conflict', error.message, { status: error.status ?? null });
    }
  }
  return publishFailure('unexpected_error', `${fallback}: ${describeError(error)}`);
}

/** Attaches an executable to the release for the tag, creating the release first when needed. */
export class ReleaseAssetPublisher implements ChannelPublisher {
  readonly kind = 'executable' as const;

  constructor(private readonly options: ReleaseAssetPublisherOptions) {}

  async publish(artifact: BuildArtifact, context: PublishContext): Promise<PublishResult> {
    assertPublishable(artifact);

    const executable = artifact.handle.files[0];
    const name = assetName(this.options.assetBaseName, artifact.target);

    let release: ReleaseRecord;
    try {
      release = await this.ensureRelease(context.version.raw, context);
    } catch (error) {
      return { ok: false, error: hostFailure(error, `Preparing release ${context.version.raw}`) };
    }

    let content: Buffer;
    try {
      content = await fs.readFile(executable);
    } catch (error) {
      return {
        ok: false,
        error: publishFailure('unexpected_error', `Cannot read ${path.basename(executable)}: ${describeError(error)}`),
      };
    }

    try {
      const asset = await this.options.host.uploadAsset(release, name, content);
      context.logger.info('release_asset_publish', 'Executable attached to release', {
        target: artifact.target.name,
        asset: name,
        releaseId: release.id,
        bytes: content.length,
      });
      return {
        ok: true,
        ack: { channel: 'release-assets', location: asset.url, items: [name] },
      };
    } catch (error) {
      return { ok: false, error: hostFailure(error, `Uploading ${name}`) };
    }
  }

  /**
   * Get or create the release for `tag`. Executable targets publish in
   * parallel, so a create can lose the race to a sibling; the winner's
   * release is then fetched instead.
   */
  private async ensureRelease(tag: string, context: PublishContext): Promise<ReleaseRecord> {
    const existing = await this.options.host.findReleaseByTag(tag);
    if (existing) {
      return existing;
    }

    try {
      const created = await this.options.host.createRelease(tag);
      context.logger.info('release_asset_publish', 'Release record created', { tag, releaseId: created.id });
      return created;
    } catch (error) {
      if (error instanceof ReleaseHostError && error.reason === 'already_exists') {
        const raced = await this.options.host.findReleaseByTag(tag);
        if (raced) {
          return raced;
        }
      }
      throw error;
    }
  }
}
