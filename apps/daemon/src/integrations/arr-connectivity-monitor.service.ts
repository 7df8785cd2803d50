import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { errToMessage } from '../lib/errors';
import { RadarrService } from '../radarr/radarr.service';
import { SettingsService, type ArrServiceKey } from '../settings/settings.service';
import { SonarrService } from '../sonarr/sonarr.service';

export type ArrConnectivityStatus = 'unknown' | 'not_configured' | 'online' | 'offline';

export type ArrConnectivityState = {
  status: ArrConnectivityStatus;
  consecutiveFails: number;
  lastError: string | null;
  lastNoisyOfflineLogAtMs: number | null;
};

const INTERVAL_MS = 5 * 60_000;
const FIRST_CHECK_DELAY_MS = 12_000;
const OFFLINE_REMINDER_MS = 15 * 60_000;
const FAILS_TO_MARK_OFFLINE = 2;

const SERVICE_KEYS: readonly ArrServiceKey[] = ['sonarr', 'radarr'];

/**
 * Probes Sonarr/Radarr in the background so a broken URL or key shows up in
 * the logs before the first import is attempted. Logs on change only.
 */
@Injectable()
export class ArrConnectivityMonitorService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ArrConnectivityMonitorService.name);
  private readonly state = new Map<ArrServiceKey, ArrConnectivityState>();

  constructor(
    private readonly settingsService: SettingsService,
    private readonly sonarr: SonarrService,
    private readonly radarr: RadarrService,
  ) {}

  onApplicationBootstrap() {
    setTimeout(() => {
      this.checkOnce().catch((err: unknown) => {
        this.logger.warn(`Connectivity check failed: ${errToMessage(err)}`);
      });
    }, FIRST_CHECK_DELAY_MS).unref();
  }

  @Interval(INTERVAL_MS)
  async poll() {
    await this.checkOnce();
  }

  getStatuses(): Record<ArrServiceKey, ArrConnectivityStatus> {
    return {
      sonarr: this.getState('sonarr').status,
      radarr: this.getState('radarr').status,
    };
  }

  async checkOnce(now: () => number = Date.now) {
    await Promise.all(SERVICE_KEYS.map((key) => this.check(key, now)));
  }

  private getState(key: ArrServiceKey): ArrConnectivityState {
    const existing = this.state.get(key);
    if (existing) return existing;
    const init: ArrConnectivityState = {
      status: 'unknown',
      consecutiveFails: 0,
      lastError: null,
      lastNoisyOfflineLogAtMs: null,
    };
    this.state.set(key, init);
    return init;
  }

  private async check(key: ArrServiceKey, now: () => number) {
    const service = this.settingsService.getArrService(key);
    if (!service) {
      this.setStatus(key, 'not_configured', null, now());
      return;
    }

    const st = this.getState(key);
    const client = key === 'sonarr' ? this.sonarr : this.radarr;
    try {
      await client.testConnection(service);
      st.consecutiveFails = 0;
      this.setStatus(key, 'online', null, now());
    } catch (err) {
      const msg = errToMessage(err);
      st.consecutiveFails += 1;
      st.lastError = msg;
      if (st.consecutiveFails >= FAILS_TO_MARK_OFFLINE) {
        this.setStatus(key, 'offline', msg, now());
      }
    }
  }

  private setStatus(
    key: ArrServiceKey,
    next: ArrConnectivityStatus,
    error: string | null,
    nowMs: number,
  ) {
    const st = this.getState(key);
    const label = key.toUpperCase();

    if (next !== st.status) {
      st.status = next;
      st.lastError = error;
      st.lastNoisyOfflineLogAtMs = null;

      if (next === 'online') {
        this.logger.log(`Integration connectivity: ${label} ONLINE`);
      } else if (next === 'offline') {
        this.logger.warn(
          `Integration connectivity: ${label} OFFLINE error=${JSON.stringify(error ?? 'unknown')}`,
        );
        st.lastNoisyOfflineLogAtMs = nowMs;
      } else if (next === 'not_configured') {
        this.logger.debug(`Integration connectivity: ${label} not configured`);
      }
      return;
    }

    if (next === 'offline') {
      const last = st.lastNoisyOfflineLogAtMs ?? 0;
      if (nowMs - last >= OFFLINE_REMINDER_MS) {
        this.logger.warn(
          `Integration connectivity: ${label} still OFFLINE error=${JSON.stringify(error ?? st.lastError ?? 'unknown')}`,
        );
        st.lastNoisyOfflineLogAtMs = nowMs;
      }
    }
    st.lastError = error ?? st.lastError;
  }
}
