import fs from 'fs';
import path from 'path';
import AdmZip from 'adm-zip';
import * as tar from 'tar';
import { tempDir } from './fakes.js';

export function coreMetadata(name: string, version: string): string {
  return `Metadata-Version: 2.1\nName: ${name}\nVersion: ${version}\nSummary: Usage monitor\n\nLong description.\n`;
}

export function writeWheel(dir: string, fileName: string, metadata: string | null): string {
  const zip = new AdmZip();
  const stem = fileName.split('-').slice(0, 2).join('-');
  zip.addFile('usage_monitor/__init__.py', Buffer.from(''));
  if (metadata !== null) {
    zip.addFile(`${stem}.dist-info/METADATA`, Buffer.from(metadata));
  }
  const file = path.join(dir, fileName);
  zip.writeZip(file);
  return file;
}

export async function writeSdist(dir: string, fileName: string, pkgInfo: string | null): Promise<string> {
  const staging = tempDir('sdist');
  const folder = fileName.replace(/\.tar\.gz$/, '');
  fs.mkdirSync(path.join(staging, folder), { recursive: true });
  fs.writeFileSync(path.join(staging, folder, 'setup.py'), 'from setuptools import setup\nsetup()\n');
  if (pkgInfo !== null) {
    fs.writeFileSync(path.join(staging, folder, 'PKG-INFO'), pkgInfo);
  }
  const file = path.join(dir, fileName);
  await tar.c({ gzip: true, file, cwd: staging }, [folder]);
  return file;
}
