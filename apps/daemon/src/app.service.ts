import { Injectable } from '@nestjs/common';
import { constants as fsConstants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import type { HealthResponseDto } from './app.dto';
import { ArrConnectivityMonitorService } from './integrations/arr-connectivity-monitor.service';
import type { ArrConnectivityStatus } from './integrations/arr-connectivity-monitor.service';
import { errToMessage } from './lib/errors';
import type { ArrServiceKey } from './settings/settings.service';
import { SettingsService } from './settings/settings.service';
import { NotificationSupervisorService } from './supervisor/notification-supervisor.service';

export type ReadinessCheck =
  | { ok: true }
  | {
      ok: false;
      error: string;
    };

export type ReadinessResponse = {
  status: 'ready' | 'not_ready';
  time: string;
  checks: {
    aria2: ReadinessCheck;
    downloadDir: ReadinessCheck;
    extractDir: ReadinessCheck;
    endedDir: ReadinessCheck;
  };
  integrations: Record<ArrServiceKey, ArrConnectivityStatus>;
};

async function checkWritableDir(path: string): Promise<ReadinessCheck> {
  try {
    const s = await stat(path);
    if (!s.isDirectory()) return { ok: false, error: `${path} is not a directory` };
    // Creating entries needs write + search on the directory.
    await access(path, fsConstants.W_OK | fsConstants.X_OK);
    return { ok: true };
  } catch (err) {
    return { ok: false, error: errToMessage(err) };
  }
}

@Injectable()
export class AppService {
  constructor(
    private readonly settingsService: SettingsService,
    private readonly supervisor: NotificationSupervisorService,
    private readonly connectivity: ArrConnectivityMonitorService,
  ) {}

  getHealth(): HealthResponseDto {
    return {
      status: 'ok' as const,
      time: new Date().toISOString(),
    };
  }

  async getReadiness(): Promise<ReadinessResponse> {
    const time = new Date().toISOString();
    const { downloadDir, extractDir, endedDir } = this.settingsService.get().paths;

    const supervisor = this.supervisor.getStatus();
    const aria2: ReadinessCheck =
      supervisor.state === 'connected'
        ? { ok: true }
        : {
            ok: false,
            error: supervisor.lastError
              ? `${supervisor.state}: ${supervisor.lastError}`
              : supervisor.state,
          };

    const [download, extract, ended] = await Promise.all([
      checkWritableDir(downloadDir),
      checkWritableDir(extractDir),
      checkWritableDir(endedDir),
    ]);
    const checks = { aria2, downloadDir: download, extractDir: extract, endedDir: ended };

    const status = Object.values(checks).every((c) => c.ok)
      ? ('ready' as const)
      : ('not_ready' as const);

    return { status, time, checks, integrations: this.connectivity.getStatuses() };
  }
}
