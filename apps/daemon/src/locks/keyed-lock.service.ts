import { Injectable, Logger } from '@nestjs/common';
import AsyncLock from 'async-lock';
import { errToMessage } from '../lib/errors';
import { SettingsService } from '../settings/settings.service';

export type LockHandle = {
  key: string;
  release: () => void;
};

export type ExclusiveResult<T> =
  | { acquired: true; value: T }
  | { acquired: false };

/**
 * Per-key mutual exclusion. A key that is already held yields `null` at once
 * and the caller is expected to drop its work rather than queue behind the
 * holder. `lockWaitMs` only bounds the wait on the registry itself.
 */
@Injectable()
export class KeyedLockService {
  private readonly logger = new Logger(KeyedLockService.name);
  private readonly lock = new AsyncLock();
  // key -> release of the current holder; entries only live while held.
  private readonly held = new Map<string, () => void>();
  // keys claimed by a caller that is still entering the registry
  private readonly entering = new Set<string>();
  private readonly waitMs: number;

  constructor(settings: SettingsService) {
    this.waitMs = settings.get().lockWaitMs;
  }

  get size(): number {
    return this.held.size;
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  acquire(key: string, waitMs: number = this.waitMs): Promise<LockHandle | null> {
    if (this.held.has(key) || this.entering.has(key)) return Promise.resolve(null);
    this.entering.add(key);

    return new Promise((resolve) => {
      let entered = false;

      this.lock
        .acquire(
          key,
          () =>
            new Promise<void>((unlock) => {
              entered = true;
              this.entering.delete(key);
              let released = false;
              const releaseOnce = () => {
                if (released) return;
                released = true;
                if (this.held.get(key) === releaseOnce) this.held.delete(key);
                unlock();
              };
              this.held.set(key, releaseOnce);
              resolve({ key, release: releaseOnce });
            }),
          { timeout: waitMs },
        )
        .catch((err: unknown) => {
          if (!entered) {
            this.entering.delete(key);
            resolve(null);
            return;
          }
          this.logger.warn(`Lock ${key} ended abnormally: ${errToMessage(err)}`);
        });
    });
  }

  /** Release whoever currently holds `key`. No-op when the key is free. */
  release(key: string): void {
    const releaseHolder = this.held.get(key);
    if (!releaseHolder) return;
    releaseHolder();
  }

  async runExclusive<T>(
    key: string,
    fn: () => Promise<T>,
    waitMs?: number,
  ): Promise<ExclusiveResult<T>> {
    const handle = await this.acquire(key, waitMs);
    if (!handle) return { acquired: false };

    try {
      return { acquired: true, value: await fn() };
    } finally {
      handle.release();
    }
  }
}
