import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { movePath, pathExists } from '../lib/fs';
import { categorize, isMediaFile, type MediaCategory } from './media-classification';

export type MoveResult = {
  category: MediaCategory;
  /** Where the moved file or directory now lives. */
  target: string;
  /** Video files at the new location (the file itself, or direct children). */
  mediaFiles: string[];
};

export class DestinationCollisionError extends Error {
  constructor(readonly target: string) {
    super(`Destination already exists: ${target}`);
    this.name = 'DestinationCollisionError';
  }
}

@Injectable()
export class MediaMoverService {
  private readonly logger = new Logger(MediaMoverService.name);

  /** Names inspected for classification: the file itself, or a directory's direct children. */
  private async inspectedNames(path: string): Promise<{ names: string[]; isDirectory: boolean }> {
    const info = await stat(path);
    if (!info.isDirectory()) return { names: [basename(path)], isDirectory: false };

    const entries = await readdir(path, { withFileTypes: true });
    return {
      names: entries.filter((e) => e.isFile()).map((e) => e.name),
      isDirectory: true,
    };
  }

  async listMediaFiles(path: string): Promise<string[]> {
    const { names, isDirectory } = await this.inspectedNames(path);
    const media = names.filter(isMediaFile);
    if (!isDirectory) return media.length ? [path] : [];
    return media.sort().map((name) => join(path, name));
  }

  async classify(path: string): Promise<MediaCategory> {
    const { names } = await this.inspectedNames(path);
    return categorize(names);
  }

  /**
   * Move `path` into `<destinationRoot>/<category>/`. Directory creation and
   * collisions fail loudly; the caller decides what a failed move means.
   */
  async move(path: string, destinationRoot: string): Promise<MoveResult> {
    const category = await this.classify(path);
    const categoryDir = join(destinationRoot, category);
    await mkdir(categoryDir, { recursive: true });

    const target = join(categoryDir, basename(path));
    if (await pathExists(target)) throw new DestinationCollisionError(target);

    await movePath(path, target);
    const mediaFiles = await this.listMediaFiles(target);

    this.logger.log(`Moved ${basename(path)} -> ${category} (${mediaFiles.length} media file(s))`);
    return { category, target, mediaFiles };
  }
}
