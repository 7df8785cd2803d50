import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readdir, rm } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import {
  ArchiveExtractionError,
  ArchiveExtractorService,
  isArchiveExtension,
} from '../archive/archive-extractor.service';
import { Aria2Client } from '../aria2/aria2.client';
import type { Aria2Download, RemoveOptions } from '../aria2/aria2.types';
import { errToMessage } from '../lib/errors';
import { pathExists } from '../lib/fs';
import { KeyedLockService } from '../locks/keyed-lock.service';
import { MediaMoverService } from '../media/media-mover.service';
import { LibraryScanService } from '../notifications/library-scan.service';
import { SettingsService } from '../settings/settings.service';
import {
  belongsToLockKey,
  lockKeyFor,
  parseMultiPart,
  type MultiPartName,
} from './lock-key';

const OUTPUT_DIR_SUFFIX = '-OUT';

/**
 * Turns aria2 completion events into filesystem work: archives are
 * extracted, everything else is categorized into the ended directory.
 * One worker runs per gid; a gid delivered again while its worker is
 * still running is skipped. Workers are tracked so shutdown can wait
 * for them.
 */
@Injectable()
export class CompletionDispatcherService {
  private readonly logger = new Logger(CompletionDispatcherService.name);
  private readonly workers = new Map<string, Promise<void>>();

  constructor(
    private readonly settingsService: SettingsService,
    private readonly aria2: Aria2Client,
    private readonly locks: KeyedLockService,
    private readonly extractor: ArchiveExtractorService,
    private readonly mover: MediaMoverService,
    private readonly scans: LibraryScanService,
  ) {}

  get activeWorkers(): number {
    return this.workers.size;
  }

  /** Fire-and-forget entry point for a completion notification. */
  onComplete(gid: string): void {
    if (this.workers.has(gid)) {
      this.logger.debug(`${gid} Already being processed`);
      return;
    }

    const worker = this.handleCompletion(gid)
      .catch((err: unknown) => {
        this.logger.error(
          `${gid} Failed: ${errToMessage(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
      })
      .finally(() => {
        this.workers.delete(gid);
      });
    this.workers.set(gid, worker);
  }

  /** Wait for running workers. Resolves false when `timeoutMs` passes first. */
  async drain(timeoutMs: number): Promise<boolean> {
    if (!this.workers.size) return true;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([
        Promise.all(this.workers.values()).then(() => true),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  async handleCompletion(gid: string): Promise<void> {
    this.logger.log(`${gid} OnComplete`);
    const download = await this.aria2.getDownload(gid);

    const nfoOnly =
      download.files.length > 0 &&
      download.files.every((file) => extname(file).toLowerCase() === '.nfo');

    if (nfoOnly) {
      await this.removeRecord(download, { deleteFiles: true, clean: true });
    } else {
      for (const file of download.files) {
        await this.handleFile(gid, file);
      }
      await this.removeRecord(download, { clean: true });
    }

    this.logger.log(`${gid} Complete`);
  }

  private async removeRecord(download: Aria2Download, options: RemoveOptions): Promise<void> {
    try {
      await this.aria2.remove(download, options);
    } catch (err) {
      this.logger.warn(`${download.gid} Remove failed: ${errToMessage(err)}`);
    }
  }

  private async handleFile(gid: string, file: string): Promise<void> {
    const ext = extname(file).toLowerCase();

    if (ext === '.nfo') {
      await rm(file, { force: true });
      this.logger.log(`${gid} Deleted ${basename(file)}`);
      return;
    }

    if (isArchiveExtension(ext)) {
      await this.handleArchive(gid, basename(file));
      return;
    }

    const moved = await this.mover.move(file, this.settingsService.get().paths.endedDir);
    await this.scans.notify(moved.category, moved.mediaFiles);
  }

  private async handleArchive(gid: string, fileName: string): Promise<void> {
    const multi = parseMultiPart(fileName);
    if (multi && !(await this.isGroupComplete(multi))) {
      this.logger.log(`${gid} Waiting for remaining parts of ${multi.base}`);
      return;
    }

    const key = lockKeyFor(fileName);
    this.logger.debug(`${gid} Acquire Lock ${key}`);
    const handle = await this.locks.acquire(key);
    if (!handle) {
      this.logger.log(`${gid} Already Locked ${key}`);
      return;
    }

    try {
      await this.extractGroup(gid, key, fileName, multi);
    } finally {
      handle.release();
      this.logger.debug(`${gid} Lock Release ${key}`);
    }
  }

  /** Every download aria2 knows under the set's base name has finished. */
  private async isGroupComplete(multi: MultiPartName): Promise<boolean> {
    const downloads = await this.aria2.getDownloads();
    return downloads
      .filter((download) => download.name.startsWith(multi.base))
      .every((download) => download.isComplete);
  }

  private async extractGroup(
    gid: string,
    key: string,
    fileName: string,
    multi: MultiPartName | null,
  ): Promise<void> {
    const { downloadDir, extractDir, endedDir } = this.settingsService.get().paths;

    const source = multi
      ? await this.findFirstVolume(downloadDir, multi)
      : join(downloadDir, fileName);
    if (!source || !(await pathExists(source))) {
      this.logger.warn(`${gid} Source missing for ${key}, already handled`);
      return;
    }

    const outDir = join(extractDir, `${key}${OUTPUT_DIR_SUFFIX}`);
    await mkdir(outDir, { recursive: true });

    this.logger.log(`${gid} Extract ${basename(source)}`);
    try {
      await this.extractor.extract(source, outDir);
    } catch (err) {
      if (!(err instanceof ArchiveExtractionError)) throw err;
      this.logger.error(`${gid} Error ${err.message}`);
      return;
    }

    const moved = await this.mover.move(outDir, endedDir);
    await this.sweep(gid, downloadDir, key);
    await this.scans.notify(moved.category, moved.mediaFiles);
  }

  /** Lowest-numbered volume of the set still on disk. */
  private async findFirstVolume(downloadDir: string, multi: MultiPartName): Promise<string | null> {
    const entries = await readdir(downloadDir, { withFileTypes: true });
    let first: { name: string; part: number } | null = null;

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const parsed = parseMultiPart(entry.name);
      if (!parsed || parsed.base !== multi.base || parsed.ext !== multi.ext) continue;
      if (!first || parsed.part < first.part) first = { name: entry.name, part: parsed.part };
    }

    return first ? join(downloadDir, first.name) : null;
  }

  private async sweep(gid: string, downloadDir: string, key: string): Promise<void> {
    const entries = await readdir(downloadDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile() || !belongsToLockKey(entry.name, key)) continue;
      await rm(join(downloadDir, entry.name), { force: true });
      this.logger.log(`${gid} Clean ${entry.name}`);
    }
  }
}
