import { Logger } from '@nestjs/common';
import { createWriteStream } from 'node:fs';
import { copyFile, mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import * as yazl from 'yazl';
import {
  ArchiveExtractionError,
  ArchiveExtractorService,
} from '../archive/archive-extractor.service';
import type { Aria2Download, RemoveOptions } from '../aria2/aria2.types';
import { pathExists } from '../lib/fs';
import { KeyedLockService } from '../locks/keyed-lock.service';
import { MediaMoverService } from '../media/media-mover.service';
import { SettingsService } from '../settings/settings.service';
import { CompletionDispatcherService } from './completion-dispatcher.service';

async function writeZip(path: string, entries: Record<string, string>) {
  const zip = new yazl.ZipFile();
  for (const [name, content] of Object.entries(entries)) {
    zip.addBuffer(Buffer.from(content, 'utf8'), name);
  }
  zip.end();
  await pipeline(zip.outputStream, createWriteStream(path));
}

const RAR_FIXTURES = join(__dirname, '..', 'archive', '__fixtures__');

async function copyFixtures(dir: string, names: string[]): Promise<string[]> {
  const copied: string[] = [];
  for (const name of names) {
    const target = join(dir, name);
    await copyFile(join(RAR_FIXTURES, name), target);
    copied.push(target);
  }
  return copied;
}

async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const startedAt = Date.now();
  while (!predicate()) {
    if (Date.now() - startedAt > timeoutMs) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

function download(gid: string, name: string, files: string[], isComplete = true): Aria2Download {
  return { gid, name, status: isComplete ? 'complete' : 'active', isComplete, files };
}

describe('CompletionDispatcherService', () => {
  let root: string;
  let downloadDir: string;
  let extractDir: string;
  let endedDir: string;
  let known: Aria2Download[];

  let aria2: {
    getDownload: jest.Mock<Promise<Aria2Download>, [string]>;
    getDownloads: jest.Mock<Promise<Aria2Download[]>, []>;
    remove: jest.Mock<Promise<void>, [Aria2Download, RemoveOptions?]>;
  };
  let scans: { notify: jest.Mock<Promise<void>, [string, string[]]> };
  let extractor: ArchiveExtractorService;
  let locks: KeyedLockService;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;

  function createService(env: Record<string, string> = {}) {
    const settings = new SettingsService({
      DOWNLOAD_DIR: downloadDir,
      EXTRACT_DIR: extractDir,
      ENDED_DIR: endedDir,
      ...env,
    });
    locks = new KeyedLockService(settings);
    return new CompletionDispatcherService(
      settings,
      aria2 as unknown as ConstructorParameters<typeof CompletionDispatcherService>[1],
      locks,
      extractor,
      new MediaMoverService(),
      scans as unknown as ConstructorParameters<typeof CompletionDispatcherService>[5],
    );
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'dispatcher-'));
    downloadDir = join(root, 'downloads');
    extractDir = join(root, 'Extract');
    endedDir = join(root, 'Ended');
    await mkdir(downloadDir);
    await mkdir(extractDir);

    known = [];
    aria2 = {
      getDownload: jest.fn<Promise<Aria2Download>, [string]>(async (gid: string) => {
        const found = known.find((d) => d.gid === gid);
        if (!found) throw new Error(`unknown gid ${gid}`);
        return found;
      }),
      getDownloads: jest.fn<Promise<Aria2Download[]>, []>(async () => known),
      remove: jest.fn<Promise<void>, [Aria2Download, RemoveOptions?]>(async (d, options) => {
        if (options?.deleteFiles) {
          for (const file of d.files) await rm(file, { force: true });
        }
      }),
    };
    scans = { notify: jest.fn<Promise<void>, [string, string[]]>(async () => undefined) };
    extractor = new ArchiveExtractorService();
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('extracts simple.zip into others and empties the download and extract dirs', async () => {
    const source = join(downloadDir, 'simple.zip');
    await writeZip(source, { 'simple.txt': 'hello from the archive\n' });
    known = [download('0000000000000001', 'simple.zip', [source])];
    const service = createService();

    await service.handleCompletion('0000000000000001');

    expect(
      await readFile(join(endedDir, 'others', 'simple.zip-OUT', 'simple.txt'), 'utf8'),
    ).toBe('hello from the archive\n');
    expect(await readdir(downloadDir)).toEqual([]);
    expect(await readdir(extractDir)).toEqual([]);
    expect(scans.notify).toHaveBeenCalledWith('others', []);
    expect(aria2.remove).toHaveBeenCalledWith(known[0], { clean: true });
    expect(locks.size).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('0000000000000001 OnComplete');
    expect(logSpy).toHaveBeenCalledWith('0000000000000001 Complete');
  });

  it('deletes an nfo-only download and moves nothing', async () => {
    const source = join(downloadDir, '100.nfo');
    await writeFile(source, 'info');
    known = [download('0000000000000001', '100.nfo', [source])];
    const service = createService();

    await service.handleCompletion('0000000000000001');

    expect(await pathExists(source)).toBe(false);
    expect(await pathExists(endedDir)).toBe(false);
    expect(aria2.remove).toHaveBeenCalledTimes(1);
    expect(aria2.remove).toHaveBeenCalledWith(known[0], { deleteFiles: true, clean: true });
  });

  it('unlinks an nfo beside a video and files the video under movies', async () => {
    const nfo = join(downloadDir, 'Movie.Title.2021.nfo');
    const video = join(downloadDir, 'Movie.Title.2021.mkv');
    await writeFile(nfo, 'info');
    await writeFile(video, 'video');
    known = [download('0000000000000002', 'Movie.Title.2021', [video, nfo])];
    const service = createService();

    await service.handleCompletion('0000000000000002');

    const target = join(endedDir, 'movies', 'Movie.Title.2021.mkv');
    expect(await readdir(downloadDir)).toEqual([]);
    expect(await readFile(target, 'utf8')).toBe('video');
    expect(scans.notify).toHaveBeenCalledWith('movies', [target]);
    expect(aria2.remove).toHaveBeenCalledWith(known[0], { clean: true });
  });

  it('files an episode under series and a document under others', async () => {
    const episode = join(downloadDir, 'Show.Name.S01E02.mkv');
    const report = join(downloadDir, 'report.pdf');
    await writeFile(episode, 'video');
    await writeFile(report, 'pdf');
    known = [
      download('0000000000000003', 'Show.Name.S01E02.mkv', [episode]),
      download('0000000000000004', 'report.pdf', [report]),
    ];
    const service = createService();

    await service.handleCompletion('0000000000000003');
    await service.handleCompletion('0000000000000004');

    expect(await readdir(join(endedDir, 'series'))).toEqual(['Show.Name.S01E02.mkv']);
    expect(await readdir(join(endedDir, 'others'))).toEqual(['report.pdf']);
    expect(scans.notify).toHaveBeenCalledWith('series', [
      join(endedDir, 'series', 'Show.Name.S01E02.mkv'),
    ]);
  });

  it('waits for every known part before extracting a multi-part set', async () => {
    const part1 = join(downloadDir, 'multi.part1.rar');
    await writeFile(part1, 'volume 1');
    known = [
      download('0000000000000001', 'multi.part1.rar', [part1]),
      download('0000000000000002', 'multi.part2.rar', [join(downloadDir, 'multi.part2.rar')], false),
    ];
    const extract = jest.spyOn(extractor, 'extract');
    const service = createService();

    await service.handleCompletion('0000000000000001');

    expect(extract).not.toHaveBeenCalled();
    expect(await readdir(downloadDir)).toEqual(['multi.part1.rar']);
    expect(await readdir(extractDir)).toEqual([]);
    expect(logSpy).toHaveBeenCalledWith('0000000000000001 Waiting for remaining parts of multi');
  });

  it('keeps the parts and the output dir when extraction fails', async () => {
    const part1 = join(downloadDir, 'multi.part1.rar');
    const part3 = join(downloadDir, 'multi.part3.rar');
    await writeFile(part1, 'volume 1');
    await writeFile(part3, 'volume 3');
    known = [
      download('0000000000000001', 'multi.part1.rar', [part1]),
      download('0000000000000003', 'multi.part3.rar', [part3]),
    ];
    const extract = jest
      .spyOn(extractor, 'extract')
      .mockRejectedValue(new ArchiveExtractionError('multi.part1.rar: missing volume', part1));
    const service = createService();

    await service.handleCompletion('0000000000000003');

    expect(extract).toHaveBeenCalledWith(part1, join(extractDir, 'multi-OUT'));
    expect((await readdir(downloadDir)).sort()).toEqual(['multi.part1.rar', 'multi.part3.rar']);
    expect(await readdir(extractDir)).toEqual(['multi-OUT']);
    expect(await pathExists(endedDir)).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('0000000000000003 Error multi.part1.rar: missing volume');
    expect(locks.size).toBe(0);
  });

  it('extracts a complete four-volume rar set and sweeps every volume', async () => {
    const names = [1, 2, 3, 4].map((part) => `multi.part${part}.rar`);
    const parts = await copyFixtures(downloadDir, names);
    known = parts.map((path, i) => download(`000000000000000${i + 1}`, names[i], [path]));
    const service = createService();

    await service.handleCompletion('0000000000000004');

    const content = await readFile(join(endedDir, 'others', 'multi-OUT', 'multi.txt'), 'utf8');
    expect(content).toHaveLength(960);
    expect(content.startsWith('multi-volume fixture line 00')).toBe(true);
    expect(await readdir(downloadDir)).toEqual([]);
    expect(await readdir(extractDir)).toEqual([]);
    expect(scans.notify).toHaveBeenCalledWith('others', []);
    expect(locks.size).toBe(0);
  });

  it('keeps parts 1 and 3 when the rar extraction hits the missing volume', async () => {
    const [part1, part3] = await copyFixtures(downloadDir, ['multi.part1.rar', 'multi.part3.rar']);
    known = [
      download('0000000000000001', 'multi.part1.rar', [part1]),
      download('0000000000000003', 'multi.part3.rar', [part3]),
    ];
    const service = createService();

    await service.handleCompletion('0000000000000003');

    expect((await readdir(downloadDir)).sort()).toEqual(['multi.part1.rar', 'multi.part3.rar']);
    expect(await readdir(extractDir)).toEqual(['multi-OUT']);
    expect(await pathExists(endedDir)).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^0000000000000003 Error multi\.part1\.rar: /),
    );
    expect(scans.notify).not.toHaveBeenCalled();
    expect(locks.size).toBe(0);
  });

  it('lets exactly one of two concurrent events for the same key extract', async () => {
    const source = join(downloadDir, 'simple.zip');
    await writeFile(source, 'zip');
    known = [
      download('0000000000000001', 'simple.zip', [source]),
      download('0000000000000002', 'simple.zip', [source]),
    ];
    let finish = () => {};
    const extract = jest.spyOn(extractor, 'extract').mockImplementation(
      () =>
        new Promise<string[]>((resolve) => {
          finish = () => resolve([]);
        }),
    );
    const service = createService();

    service.onComplete('0000000000000001');
    await waitFor(() => extract.mock.calls.length === 1);
    service.onComplete('0000000000000002');
    await waitFor(() =>
      logSpy.mock.calls.some(([line]) => line === '0000000000000002 Already Locked simple.zip'),
    );
    finish();

    await expect(service.drain(2_000)).resolves.toBe(true);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(service.activeWorkers).toBe(0);
    expect(locks.size).toBe(0);
  });

  it('drops a duplicate event for a corrupt archive instead of extracting it twice', async () => {
    const source = join(downloadDir, 'bad.zip');
    await writeFile(source, 'this is not a zip archive');
    known = [
      download('0000000000000001', 'bad.zip', [source]),
      download('0000000000000002', 'bad.zip', [source]),
    ];
    const extract = jest.spyOn(extractor, 'extract');
    const service = createService();

    service.onComplete('0000000000000001');
    service.onComplete('0000000000000002');

    await expect(service.drain(5_000)).resolves.toBe(true);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('0000000000000002 Already Locked bad.zip');
    expect(await readdir(downloadDir)).toEqual(['bad.zip']);
    expect(await pathExists(endedDir)).toBe(false);
    expect(locks.size).toBe(0);
  });

  it('skips a gid that is delivered again while its worker is running', async () => {
    const file = join(downloadDir, 'notes.txt');
    await writeFile(file, 'text');
    known = [download('0000000000000001', 'notes.txt', [file])];
    const service = createService();

    service.onComplete('0000000000000001');
    service.onComplete('0000000000000001');

    expect(service.activeWorkers).toBe(1);
    await expect(service.drain(2_000)).resolves.toBe(true);
    expect(aria2.getDownload).toHaveBeenCalledTimes(1);
    expect(await readdir(join(endedDir, 'others'))).toEqual(['notes.txt']);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(debugSpy).toHaveBeenCalledWith('0000000000000001 Already being processed');
  });

  it('skips when the archive was already consumed', async () => {
    known = [download('0000000000000001', 'gone.zip', [join(downloadDir, 'gone.zip')])];
    const extract = jest.spyOn(extractor, 'extract');
    const service = createService();

    await service.handleCompletion('0000000000000001');

    expect(extract).not.toHaveBeenCalled();
    expect(await readdir(extractDir)).toEqual([]);
    expect(locks.size).toBe(0);
  });

  it('logs worker failures instead of rejecting', async () => {
    const service = createService();

    service.onComplete('00000000000000ff');

    await expect(service.drain(1_000)).resolves.toBe(true);
    expect(errorSpy).toHaveBeenCalledWith(
      '00000000000000ff Failed: unknown gid 00000000000000ff',
      expect.any(String),
    );
  });

  it('keeps going when the record cannot be removed', async () => {
    const file = join(downloadDir, 'notes.txt');
    await writeFile(file, 'text');
    known = [download('0000000000000001', 'notes.txt', [file])];
    aria2.remove.mockRejectedValue(new Error('aria2 aria2.removeDownloadResult failed: not found'));
    const service = createService();

    await service.handleCompletion('0000000000000001');

    expect(await readdir(join(endedDir, 'others'))).toEqual(['notes.txt']);
    expect(logSpy).toHaveBeenCalledWith('0000000000000001 Complete');
  });

  it('reports a drain timeout while a worker is still busy', async () => {
    let unblock = () => {};
    aria2.getDownload.mockImplementation(
      () =>
        new Promise<Aria2Download>((_resolve, reject) => {
          unblock = () => reject(new Error('stopped'));
        }),
    );
    const service = createService();

    service.onComplete('0000000000000001');

    await expect(service.drain(10)).resolves.toBe(false);
    expect(service.activeWorkers).toBe(1);
    unblock();
    await expect(service.drain(1_000)).resolves.toBe(true);
  });
});
