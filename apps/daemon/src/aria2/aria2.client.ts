import { Injectable, Logger } from '@nestjs/common';
import { rm } from 'node:fs/promises';
import { basename } from 'node:path';
import { errToMessage } from '../lib/errors';
import { SettingsService } from '../settings/settings.service';
import { Aria2NotificationListener } from './aria2-notifications';
import type {
  Aria2Download,
  Aria2RawStatus,
  Aria2Status,
  CompletionHandler,
  CompletionListener,
  RemoveOptions,
} from './aria2.types';

const STATUSES: readonly Aria2Status[] = [
  'active',
  'waiting',
  'paused',
  'error',
  'complete',
  'removed',
];

// aria2 keeps at most --max-download-result stopped entries (1000 by default).
const LIST_PAGE_SIZE = 1000;

export class Aria2RpcError extends Error {
  constructor(
    message: string,
    readonly code: number | null = null,
  ) {
    super(message);
    this.name = 'Aria2RpcError';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function parseStatus(value: unknown): Aria2Status {
  return STATUSES.find((s) => s === value) ?? 'error';
}

function readFiles(raw: unknown): Array<{ path: string; uri: string }> {
  if (!Array.isArray(raw)) return [];
  return raw.filter(isPlainObject).map((file) => {
    const uris = Array.isArray(file.uris) ? file.uris.filter(isPlainObject) : [];
    return { path: asString(file.path), uri: asString(uris[0]?.uri) };
  });
}

function readTorrentName(raw: unknown): string {
  if (!isPlainObject(raw) || !isPlainObject(raw.info)) return '';
  return asString(raw.info.name);
}

export function toAria2Download(raw: Aria2RawStatus): Aria2Download {
  const gid = asString(raw.gid);
  const status = parseStatus(raw.status);
  const files = readFiles(raw.files);
  const first = files[0];
  const name =
    readTorrentName(raw.bittorrent) ||
    (first?.path ? basename(first.path) : '') ||
    first?.uri ||
    gid;

  return {
    gid,
    name,
    status,
    isComplete: status === 'complete',
    files: files.map((f) => f.path).filter(Boolean),
  };
}

/** aria2 JSON-RPC over HTTP for calls, WebSocket for notifications. */
@Injectable()
export class Aria2Client {
  private readonly logger = new Logger(Aria2Client.name);
  private nextId = 1;

  constructor(private readonly settingsService: SettingsService) {}

  get rpcUrl(): string {
    const { url, port } = this.settingsService.get().aria2;
    const parsed = new URL(/^[a-z]+:\/\//i.test(url) ? url : `http://${url}`);
    parsed.port = String(port);
    parsed.pathname = '/jsonrpc';
    return parsed.toString();
  }

  get notificationUrl(): string {
    const parsed = new URL(this.rpcUrl);
    parsed.protocol = parsed.protocol === 'https:' ? 'wss:' : 'ws:';
    return parsed.toString();
  }

  async call(method: string, params: unknown[] = [], timeoutMs = 10_000): Promise<unknown> {
    const secret = this.settingsService.get().aria2.secret;
    const id = String(this.nextId++);
    const body = JSON.stringify({
      jsonrpc: '2.0',
      id,
      method,
      params: secret ? [`token:${secret}`, ...params] : params,
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(this.rpcUrl, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body,
        signal: controller.signal,
      });

      // aria2 answers RPC errors with HTTP 400 and a JSON-RPC error body.
      const text = await res.text().catch(() => '');
      let payload: unknown = null;
      try {
        payload = text ? JSON.parse(text) : null;
      } catch {
        payload = null;
      }

      if (isPlainObject(payload) && isPlainObject(payload.error)) {
        const code = typeof payload.error.code === 'number' ? payload.error.code : null;
        throw new Aria2RpcError(
          `aria2 ${method} failed: ${asString(payload.error.message) || 'unknown error'}`,
          code,
        );
      }
      if (!res.ok) {
        throw new Aria2RpcError(`aria2 ${method} failed: HTTP ${res.status} ${text}`.trim());
      }
      if (!isPlainObject(payload) || !('result' in payload)) {
        throw new Aria2RpcError(`aria2 ${method} failed: malformed response`);
      }
      return payload.result;
    } catch (err) {
      if (err instanceof Aria2RpcError) throw err;
      throw new Aria2RpcError(`aria2 ${method} failed: ${errToMessage(err)}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  async getDownload(gid: string): Promise<Aria2Download> {
    const raw = await this.call('aria2.tellStatus', [gid]);
    if (!isPlainObject(raw)) {
      throw new Aria2RpcError(`aria2 aria2.tellStatus failed: unexpected result for ${gid}`);
    }
    return toAria2Download(raw);
  }

  async getDownloads(): Promise<Aria2Download[]> {
    const [active, waiting, stopped] = await Promise.all([
      this.call('aria2.tellActive'),
      this.call('aria2.tellWaiting', [0, LIST_PAGE_SIZE]),
      this.call('aria2.tellStopped', [0, LIST_PAGE_SIZE]),
    ]);

    return [active, waiting, stopped]
      .flatMap((list) => (Array.isArray(list) ? list : []))
      .filter(isPlainObject)
      .map((raw) => toAria2Download(raw));
  }

  async remove(download: Aria2Download, options: RemoveOptions = {}): Promise<void> {
    const clean = options.clean ?? true;

    if (download.status === 'active' || download.status === 'waiting' || download.status === 'paused') {
      await this.call('aria2.forceRemove', [download.gid]);
    }

    if (options.deleteFiles) {
      for (const file of download.files) {
        await rm(file, { force: true, recursive: true });
        // Control file aria2 keeps beside unfinished downloads.
        await rm(`${file}.aria2`, { force: true });
        this.logger.debug(`${download.gid} Deleted ${file}`);
      }
    }

    if (clean) {
      await this.call('aria2.removeDownloadResult', [download.gid]);
    }
  }

  async subscribe(onComplete: CompletionHandler, signal?: AbortSignal): Promise<CompletionListener> {
    const listener = new Aria2NotificationListener(this.notificationUrl, onComplete, this.logger);
    await listener.open(undefined, signal);
    return listener;
  }
}
