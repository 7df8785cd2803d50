import { Injectable, Logger } from '@nestjs/common';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, relative, resolve } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createExtractorFromFile } from 'node-unrar-js';
import * as yauzl from 'yauzl';
import { errToMessage } from '../lib/errors';

export const ARCHIVE_EXTENSIONS = ['.zip', '.rar'] as const;

export class ArchiveExtractionError extends Error {
  constructor(
    message: string,
    readonly source: string,
  ) {
    super(message);
    this.name = 'ArchiveExtractionError';
  }
}

export function isArchiveExtension(ext: string): boolean {
  const lower = ext.toLowerCase();
  return ARCHIVE_EXTENSIONS.some((known) => known === lower);
}

/** Absolute path of `entryName` under `outDir`; throws when it would land outside. */
export function resolveInside(outDir: string, entryName: string): string {
  const root = resolve(outDir);
  const target = resolve(root, entryName);
  const rel = relative(root, target);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`entry escapes the output directory: ${entryName}`);
  }
  return target;
}

function openZip(path: string): Promise<yauzl.ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(path, { lazyEntries: true, autoClose: true }, (err, zip) => {
      if (err) return reject(err);
      if (!zip) return reject(new Error('zip could not be opened'));
      resolvePromise(zip);
    });
  });
}

function openEntryStream(zip: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolvePromise, reject) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err) return reject(err);
      if (!stream) return reject(new Error(`no data for ${entry.fileName}`));
      resolvePromise(stream);
    });
  });
}

@Injectable()
export class ArchiveExtractorService {
  private readonly logger = new Logger(ArchiveExtractorService.name);

  /**
   * Unpack `source` into `outDir` (which must exist) and return the relative
   * paths of the files written. Every failure surfaces as ArchiveExtractionError.
   */
  async extract(source: string, outDir: string): Promise<string[]> {
    const ext = extname(source).toLowerCase();
    try {
      if (ext === '.zip') return await this.extractZip(source, outDir);
      if (ext === '.rar') return await this.extractRar(source, outDir);
    } catch (err) {
      throw new ArchiveExtractionError(`${basename(source)}: ${errToMessage(err)}`, source);
    }
    throw new ArchiveExtractionError(`${basename(source)}: unsupported archive type`, source);
  }

  private async extractZip(source: string, outDir: string): Promise<string[]> {
    const zip = await openZip(source);
    const written: string[] = [];

    await new Promise<void>((resolvePromise, reject) => {
      zip.on('error', reject);
      zip.on('end', () => resolvePromise());
      zip.on('entry', (entry: yauzl.Entry) => {
        this.writeZipEntry(zip, entry, outDir).then(
          (rel) => {
            if (rel) written.push(rel);
            zip.readEntry();
          },
          (err: unknown) => {
            zip.close();
            reject(err);
          },
        );
      });
      zip.readEntry();
    });

    this.logger.debug(`Extracted ${written.length} file(s) from ${basename(source)}`);
    return written;
  }

  private async writeZipEntry(
    zip: yauzl.ZipFile,
    entry: yauzl.Entry,
    outDir: string,
  ): Promise<string | null> {
    const target = resolveInside(outDir, entry.fileName);
    if (entry.fileName.endsWith('/')) {
      await mkdir(target, { recursive: true });
      return null;
    }

    await mkdir(dirname(target), { recursive: true });
    const stream = await openEntryStream(zip, entry);
    await pipeline(stream, createWriteStream(target));
    return relative(resolve(outDir), target);
  }

  private async extractRar(source: string, outDir: string): Promise<string[]> {
    // Later volumes of a multi-volume set are read from the same directory.
    const extractor = await createExtractorFromFile({ filepath: source, targetPath: outDir });
    const { files } = extractor.extract();
    const written: string[] = [];
    for (const file of files) {
      if (!file.fileHeader.flags.directory) written.push(file.fileHeader.name);
    }

    this.logger.debug(`Extracted ${written.length} file(s) from ${basename(source)}`);
    return written;
  }
}
