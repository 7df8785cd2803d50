import {
  BeforeApplicationShutdown,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { Aria2Client } from '../aria2/aria2.client';
import type { CompletionListener } from '../aria2/aria2.types';
import { CompletionDispatcherService } from '../dispatch/completion-dispatcher.service';
import { backoffDelayMs, sleepUnlessAborted } from '../lib/backoff';
import { errToMessage } from '../lib/errors';
import { SettingsService } from '../settings/settings.service';

export type SupervisorState = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'stopped';

export type SupervisorStatus = {
  state: SupervisorState;
  /** Consecutive failed attempts since the last successful connect. */
  failures: number;
  /** True once the retry budget ran out; the loop does not restart by itself. */
  exhausted: boolean;
  lastError: string | null;
  connectedAt: string | null;
};

/**
 * Keeps the aria2 notification stream open, reconnecting with exponential
 * backoff. Runs in the background; start() never blocks bootstrap.
 */
@Injectable()
export class NotificationSupervisorService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(NotificationSupervisorService.name);
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private caughtUp = false;
  private status: SupervisorStatus = {
    state: 'idle',
    failures: 0,
    exhausted: false,
    lastError: null,
    connectedAt: null,
  };

  constructor(
    private readonly settingsService: SettingsService,
    private readonly aria2: Aria2Client,
    private readonly dispatcher: CompletionDispatcherService,
  ) {}

  onApplicationBootstrap() {
    this.start();
  }

  async beforeApplicationShutdown() {
    await this.stop();
  }

  getStatus(): SupervisorStatus {
    return { ...this.status };
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      // run() handles its own failures; this only guards against bugs.
      this.logger.error(`Notification supervisor crashed: ${errToMessage(err)}`);
      this.setState('stopped');
    });
  }

  /** Resolves once the loop has exited (stop signal or exhausted retries). */
  async whenStopped(): Promise<void> {
    await this.loop;
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.setState('stopped');

    const timeoutMs = this.settingsService.get().shutdownDrainTimeoutMs;
    const drained = await this.dispatcher.drain(timeoutMs);
    if (!drained) {
      this.logger.warn(
        `Stopped with ${this.dispatcher.activeWorkers} worker(s) still running after ${timeoutMs}ms`,
      );
    }
    this.logger.log('Stopped listening');
  }

  private setState(state: SupervisorState) {
    if (this.status.state === state) return;
    this.logger.debug(`aria2 notifications: ${this.status.state} -> ${state}`);
    this.status = { ...this.status, state };
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { maxRetries, retryDelayMs } = this.settingsService.get().aria2;

    while (!signal.aborted) {
      this.setState('connecting');
      let listener: CompletionListener;
      try {
        listener = await this.aria2.subscribe((gid) => this.dispatcher.onComplete(gid), signal);
      } catch (err) {
        if (signal.aborted) break;
        this.status = {
          ...this.status,
          failures: this.status.failures + 1,
          lastError: errToMessage(err),
        };
        this.setState('disconnected');

        const { failures } = this.status;
        if (failures >= maxRetries) {
          this.status = { ...this.status, exhausted: true };
          this.logger.error(
            `Giving up on aria2 notifications after ${failures} attempt(s): ${errToMessage(err)}`,
          );
          break;
        }

        const delayMs = backoffDelayMs(failures, { initialDelayMs: retryDelayMs });
        this.logger.warn(
          `aria2 connection failed (${failures}/${maxRetries}): ${errToMessage(err)}; retrying in ${delayMs}ms`,
        );
        await sleepUnlessAborted(delayMs, signal);
        continue;
      }

      this.status = {
        ...this.status,
        failures: 0,
        lastError: null,
        connectedAt: new Date().toISOString(),
      };
      this.setState('connected');
      this.logger.log('Starting listening');

      if (!this.caughtUp) {
        this.caughtUp = true;
        await this.catchUp();
      }

      await this.watch(listener, signal);
      listener.close();
      if (signal.aborted) break;

      this.setState('disconnected');
      this.logger.warn('aria2 notification stream lost, reconnecting');
      await sleepUnlessAborted(backoffDelayMs(1, { initialDelayMs: retryDelayMs }), signal);
    }

    this.setState('stopped');
  }

  private async watch(listener: CompletionListener, signal: AbortSignal): Promise<void> {
    const intervalMs = this.settingsService.get().aria2.livenessIntervalMs;
    while (!signal.aborted && listener.isAlive()) {
      await sleepUnlessAborted(intervalMs, signal);
    }
  }

  /** Handle downloads that completed while nothing was listening. */
  private async catchUp(): Promise<void> {
    try {
      const downloads = await this.aria2.getDownloads();
      const complete = downloads.filter((download) => download.isComplete);
      for (const download of complete) {
        this.logger.log(`${download.gid} Catch-up`);
        this.dispatcher.onComplete(download.gid);
      }
    } catch (err) {
      this.logger.warn(`Catch-up pass failed: ${errToMessage(err)}`);
    }
  }
}
