import path from 'path';
import AdmZip from 'adm-zip';
import * as tar from 'tar';
import type { ReadEntry } from 'tar';

export interface CoreMetadata {
  metadataVersion: string;
  name: string;
  version: string;
  headers: Record<string, string[]>;
}

export class DistributionInspectionError extends Error {
  constructor(
    public readonly code: 'malformed_archive' | 'metadata_unparseable',
    message: string,
    public readonly file: string
  ) {
    super(message);
    this.name = 'DistributionInspectionError';
  }
}

const WHEEL_METADATA = /^[^/]+\.dist-info\/METADATA$/;
const SDIST_METADATA = /^[^/]+\/PKG-INFO$/;
const MAX_METADATA_BYTES = 1024 * 1024;

/**
 * Parse core metadata (RFC 822 style headers). The body after the first
 * blank line is the long description and is ignored.
 */
export function parseCoreMetadata(text: string): CoreMetadata | null {
  const headers: Record<string, string[]> = {};
  let lastKey: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') break;

    if (/^[ \t]/.test(line)) {
      if (!lastKey) return null;
      const values = headers[lastKey];
      values[values.length - 1] += `\n${line.trim()}`;
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) return null;

    const key = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    if (!headers[key]) headers[key] = [];
    headers[key].push(value);
    lastKey = key;
  }

  const metadataVersion = headers['metadata-version']?.[0];
  const name = headers['name']?.[0];
  const version = headers['version']?.[0];
  if (!metadataVersion || !name || !version) {
    return null;
  }

  return { metadataVersion, name, version, headers };
}

function requireMetadata(text: string, file: string): CoreMetadata {
  const metadata = parseCoreMetadata(text);
  if (!metadata) {
    throw new DistributionInspectionError(
      'metadata_unparseable',
      `${path.basename(file)} has no parseable Metadata-Version, Name and Version headers`,
      file
    );
  }
  return metadata;
}

export function readWheelMetadata(file: string): CoreMetadata {
  let zip: AdmZip;
  try {
    zip = new AdmZip(file);
  } catch (error) {
    throw new DistributionInspectionError(
      'malformed_archive',
      `${path.basename(file)} is not a readable zip archive: ${error instanceof Error ? error.message : 'Unknown error'}`,
      file
    );
  }

  const entry = zip.getEntries().find(candidate => WHEEL_METADATA.test(candidate.entryName));
  if (!entry) {
    throw new DistributionInspectionError(
      'metadata_unparseable',
      `${path.basename(file)} has no .dist-info/METADATA entry`,
      file
    );
  }

  return requireMetadata(entry.getData().toString('utf8'), file);
}

export async function readSdistMetadata(file: string): Promise<CoreMetadata> {
  const found: { pkgInfo?: string } = {};
  const reads: Array<Promise<void>> = [];

  const onentry = (entry: ReadEntry) => {
    if (found.pkgInfo !== undefined || !SDIST_METADATA.test(entry.path)) return;
    const chunks: Buffer[] = [];
    let size = 0;
    reads.push(
      new Promise<void>((resolve) => {
        entry.on('data', (chunk: Buffer) => {
          size += chunk.length;
          if (size <= MAX_METADATA_BYTES) chunks.push(chunk);
        });
        entry.on('end', () => {
          found.pkgInfo = Buffer.concat(chunks).toString('utf8');
          resolve();
        });
      })
    );
  };

  try {
    await tar.t({ file, strict: true, onentry });
    await Promise.all(reads);
  } catch (error) {
    throw new DistributionInspectionError(
      'malformed_archive',
      `${path.basename(file)} is not a readable gzip tar archive: ${error instanceof Error ? error.message : 'Unknown error'}`,
      file
    );
  }

  if (found.pkgInfo === undefined) {
    throw new DistributionInspectionError('metadata_unparseable', `${path.basename(file)} has no PKG-INFO`, file);
  }

  return requireMetadata(found.pkgInfo, file);
}
