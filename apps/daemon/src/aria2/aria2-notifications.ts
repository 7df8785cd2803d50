import type { Logger } from '@nestjs/common';
import WebSocket from 'ws';
import { errToMessage } from '../lib/errors';
import type { CompletionHandler, CompletionListener } from './aria2.types';

const COMPLETION_METHODS = new Set([
  'aria2.onDownloadComplete',
  'aria2.onBtDownloadComplete',
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * gids carried by a completion notification frame; any other frame (RPC
 * replies, start/pause/error notifications) yields an empty list.
 */
export function parseCompletionNotification(text: string): string[] {
  let frame: unknown;
  try {
    frame = JSON.parse(text);
  } catch {
    return [];
  }
  if (!isPlainObject(frame)) return [];
  if (typeof frame.method !== 'string' || !COMPLETION_METHODS.has(frame.method)) {
    return [];
  }
  if (!Array.isArray(frame.params)) return [];

  const gids: string[] = [];
  for (const param of frame.params) {
    if (isPlainObject(param) && typeof param.gid === 'string' && param.gid) {
      gids.push(param.gid);
    }
  }
  return gids;
}

export class Aria2NotificationListener implements CompletionListener {
  private socket: WebSocket | null = null;
  private closedByUs = false;

  constructor(
    private readonly url: string,
    private readonly onComplete: CompletionHandler,
    private readonly logger: Logger,
  ) {}

  /**
   * Resolves once the socket is open; rejects if it fails before that or if
   * `signal` aborts the handshake, which terminates the socket.
   */
  open(timeoutMs = 10_000, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('aria2 notification handshake aborted'));
        return;
      }

      let opened = false;
      const socket = new WebSocket(this.url, { handshakeTimeout: timeoutMs });
      this.socket = socket;

      const onAbort = () => {
        reject(new Error('aria2 notification handshake aborted'));
        this.close();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      const settle = () => signal?.removeEventListener('abort', onAbort);

      socket.on('open', () => {
        opened = true;
        settle();
        this.logger.log(`Listening for aria2 notifications on ${this.url}`);
        resolve();
      });

      socket.on('error', (err) => {
        if (!opened) {
          settle();
          reject(err);
          return;
        }
        this.logger.warn(`aria2 notification socket error: ${errToMessage(err)}`);
      });

      socket.on('close', (code) => {
        if (!opened) {
          settle();
          reject(new Error(`aria2 notification socket closed before opening (code ${code})`));
          return;
        }
        if (!this.closedByUs) {
          this.logger.warn(`aria2 notification socket closed (code ${code})`);
        }
      });

      socket.on('message', (data) => {
        for (const gid of parseCompletionNotification(rawDataToText(data))) {
          this.onComplete(gid);
        }
      });
    });
  }

  isAlive(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  close(): void {
    this.closedByUs = true;
    const socket = this.socket;
    if (!socket) return;
    if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    } else if (socket.readyState === WebSocket.OPEN) {
      socket.close();
    }
  }
}
