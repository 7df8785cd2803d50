import { Injectable, Logger } from '@nestjs/common';
import { join, sep } from 'node:path';
import { sleepUnlessAborted } from '../lib/backoff';
import { errToMessage } from '../lib/errors';
import type { MediaCategory } from '../media/media-classification';
import { RadarrService } from '../radarr/radarr.service';
import { SettingsService, type ArrServiceKey } from '../settings/settings.service';
import { SonarrService } from '../sonarr/sonarr.service';

const COMMAND_POLL_ATTEMPTS = 3;
const TERMINAL_STATUSES = new Set(['completed', 'failed', 'aborted', 'cancelled']);

type ScanClient = Pick<SonarrService, 'triggerDownloadedScan' | 'getCommand'>;

type ScanTarget = {
  key: ArrServiceKey;
  label: string;
  client: ScanClient;
};

/**
 * Tells Sonarr or Radarr to import what was just moved into the ended
 * directory. Failures are logged and never reach the caller.
 */
@Injectable()
export class LibraryScanService {
  private readonly logger = new Logger(LibraryScanService.name);

  constructor(
    private readonly settingsService: SettingsService,
    private readonly sonarr: SonarrService,
    private readonly radarr: RadarrService,
  ) {}

  private targetFor(category: MediaCategory): ScanTarget | null {
    if (category === 'series') return { key: 'sonarr', label: 'Sonarr', client: this.sonarr };
    if (category === 'movies') return { key: 'radarr', label: 'Radarr', client: this.radarr };
    return null;
  }

  async notify(category: MediaCategory, mediaFiles: string[]): Promise<void> {
    const target = this.targetFor(category);
    if (!target) return;

    const service = this.settingsService.getArrService(target.key);
    if (!service) {
      this.logger.debug(`${target.label} not configured, skipping scan`);
      return;
    }

    // Nothing to point at: scan the whole category directory.
    const paths = mediaFiles.length
      ? mediaFiles
      : [`${join(this.settingsService.get().paths.endedDir, category)}${sep}`];

    for (const path of paths) {
      try {
        const command = await target.client.triggerDownloadedScan({ ...service, path });
        this.logger.log(`${target.label} scan triggered for ${path}`);
        await this.followCommand(target, service, command.id);
      } catch (err) {
        this.logger.error(`Error triggering ${target.label} scan for ${path}: ${errToMessage(err)}`);
      }
    }
  }

  private async followCommand(
    target: ScanTarget,
    service: { baseUrl: string; apiKey: string },
    id: number,
  ): Promise<void> {
    const delayMs = this.settingsService.get().arrCommandPollDelayMs;
    let status = 'queued';

    for (let attempt = 1; attempt <= COMMAND_POLL_ATTEMPTS; attempt += 1) {
      await sleepUnlessAborted(delayMs);
      try {
        const command = await target.client.getCommand({ ...service, id });
        status = command.status ?? status;
      } catch (err) {
        this.logger.debug(`${target.label} command ${id} status unavailable: ${errToMessage(err)}`);
        return;
      }
      if (TERMINAL_STATUSES.has(status)) break;
    }

    this.logger.debug(`${target.label} command ${id} status: ${status}`);
  }
}
