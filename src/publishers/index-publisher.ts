import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import axios, { type AxiosInstance } from 'axios';
import { assertPublishable } from '../errors/errors.js';
import { describeError, duplicateRelease, publishFailure } from '../errors/error-info.js';
import type { Credential } from '../errors/secrets.js';
import { parseDistributionFilename, type DistributionFile } from '../builders/package-builder.js';
import { readSdistMetadata, readWheelMetadata } from '../verification/distribution.js';
import type { BuildArtifact, ErrorInfo } from '../types.js';
import type { ChannelPublisher, PublishContext, PublishResult } from './types.js';

const UPLOAD_TIMEOUT_MS = 120_000;
const DUPLICATE_RESPONSE = /already exists/i;

export interface IndexPublisherOptions {
  uploadUrl: string;
  token: Credential;
  http?: AxiosInstance;
}

type UploadOutcome =
  | { status: 'uploaded'; file: string }
  | { status: 'duplicate'; file: string }
  | { status: 'failed'; file: string; error: ErrorInfo };

function responseText(data: unknown, statusText: string): string {
  const body = typeof data === 'string' ? data : data === undefined || data === null ? '' : JSON.stringify(data);
  return `${statusText} ${body}`.trim();
}

/** Uploads sdist and wheels to a package index through the legacy upload API. */
export class IndexPublisher implements ChannelPublisher {
  readonly kind = 'package' as const;
  private readonly http: AxiosInstance;

  constructor(private readonly options: IndexPublisherOptions) {
    this.http = options.http ?? axios.create({ timeout: UPLOAD_TIMEOUT_MS });
  }

  async publish(artifact: BuildArtifact, context: PublishContext): Promise<PublishResult> {
    assertPublishable(artifact);

    const outcomes: UploadOutcome[] = [];
    for (const file of artifact.handle.files) {
      const outcome = await this.uploadFile(file);
      outcomes.push(outcome);

      context.logger.info('index_publish', 'Distribution upload finished', {
        target: artifact.target.name,
        file: path.basename(file),
        status: outcome.status,
      });

      // Later files would hit the same rejection; stop at the first hard failure.
      if (outcome.status === 'failed') {
        return { ok: false, error: outcome.error };
      }
    }

    const uploaded = outcomes.filter(outcome => outcome.status === 'uploaded').map(outcome => path.basename(outcome.file));
    const duplicates = outcomes.filter(outcome => outcome.status === 'duplicate').map(outcome => path.basename(outcome.file));

    if (uploaded.length === 0) {
      return {
        ok: false,
        error: duplicateRelease(`Version ${context.version.raw} is already on the index`, {
          files: duplicates.join(', '),
        }),
      };
    }

    return {
      ok: true,
      ack: {
        channel: 'index',
        location: this.options.uploadUrl,
        items: uploaded,
      },
    };
  }

  private async uploadFile(file: string): Promise<UploadOutcome> {
    const distribution = parseDistributionFilename(file);
    if (!distribution) {
      return {
        status: 'failed',
        file,
        error: publishFailure('index_conflict', `${path.basename(file)} is not a distribution file`),
      };
    }

    let form: FormData;
    try {
      form = await this.buildForm(distribution);
    } catch (error) {
      return {
        status: 'failed',
        file,
        error: publishFailure('unexpected_error', `Could not prepare ${path.basename(file)}: ${describeError(error)}`),
      };
    }

    try {
      const response = await this.http.post(this.options.uploadUrl, form, {
        auth: { username: '__token__', password: this.options.token.reveal() },
        validateStatus: () => true,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      });

      const status = response.status;
      const text = responseText(response.data, response.statusText);

      if (status >= 200 && status < 300) {
        return { status: 'uploaded', file };
      }
      if ((status === 400 || status === 409) && DUPLICATE_RESPONSE.test(text)) {
        return { status: 'duplicate', file };
      }
      if (status === 401 || status === 403) {
        return {
          status: 'failed',
          file,
          error: publishFailure('credential_rejected', `Index rejected the upload token (HTTP ${status})`, { status }),
        };
      }
      if (status >= 500) {
        return {
          status: 'failed',
          file,
          error: publishFailure('network_error', `Index answered HTTP ${status}: ${text}`, { status }),
        };
      }
      return {
        status: 'failed',
        file,
        error: publishFailure('index_conflict', `Index refused ${path.basename(file)} (HTTP ${status}): ${text}`, { status }),
      };
    } catch (error) {
      return {
        status: 'failed',
        file,
        error: publishFailure('network_error', `Upload of ${path.basename(file)} failed: ${describeError(error)}`),
      };
    }
  }

  private async buildForm(distribution: DistributionFile): Promise<FormData> {
    const content = await fs.readFile(distribution.file);
    const metadata =
      distribution.type === 'wheel' ? readWheelMetadata(distribution.file) : await readSdistMetadata(distribution.file);
    const wheelTags = path.basename(distribution.file).split('-');
    // <name>-<version>[-<build>]-<python>-<abi>-<platform>.whl
    const pythonTag = distribution.type === 'wheel' ? wheelTags[wheelTags.length - 3] : 'source';

    const form = new FormData();
    form.append(':action', 'file_upload');
    form.append('protocol_version', '1');
    form.append('metadata_version', metadata.metadataVersion);
    form.append('name', metadata.name);
    form.append('version', metadata.version);
    form.append('filetype', distribution.type === 'wheel' ? 'bdist_wheel' : 'sdist');
    form.append('pyversion', pythonTag);
    form.append('sha256_digest', crypto.createHash('sha256').update(content).digest('hex'));
    form.append('content', new Blob([content]), path.basename(distribution.file));
    return form;
  }
}
