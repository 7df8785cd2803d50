import { Inject, Injectable } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';
import { readEnvSecret, type EnvLike } from './secret-source';

export const DAEMON_ENV = Symbol('DAEMON_ENV');

export type ArrServiceKey = 'sonarr' | 'radarr';

export type ArrServiceSettings = {
  baseUrl: string;
  apiKey: string;
};

export type DaemonSettings = {
  aria2: {
    url: string;
    port: number;
    secret: string;
    maxRetries: number;
    /** First reconnect delay; doubles per failed attempt up to a minute. */
    retryDelayMs: number;
    livenessIntervalMs: number;
  };
  paths: {
    downloadDir: string;
    extractDir: string;
    endedDir: string;
  };
  sonarr: ArrServiceSettings;
  radarr: ArrServiceSettings;
  lockWaitMs: number;
  arrCommandPollDelayMs: number;
  shutdownDrainTimeoutMs: number;
  logLevel: LogLevel;
  http: { host: string; port: number };
};

const LOG_LEVELS: readonly LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error'];

function parseNumberEnv(raw: string | undefined, defaultValue: number): number {
  const n = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(n) && n > 0 ? n : defaultValue;
}

function parseStringEnv(raw: string | undefined, defaultValue: string): string {
  const v = raw?.trim();
  return v ? v : defaultValue;
}

function parseLogLevelEnv(raw: string | undefined): LogLevel {
  const v = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v) ?? 'log';
}

/** Levels at or above `level`, in the shape `ConsoleLogger#setLogLevels` expects. */
export function logLevelsFrom(level: LogLevel): LogLevel[] {
  const index = LOG_LEVELS.indexOf(level);
  return index < 0 ? LOG_LEVELS.slice(2) : LOG_LEVELS.slice(index);
}

export function loadDaemonSettings(env: EnvLike): DaemonSettings {
  const downloadDir = parseStringEnv(env.DOWNLOAD_DIR, '/downloads');
  return {
    aria2: {
      url: parseStringEnv(env.ARIA2_URL, 'http://127.0.0.1'),
      port: parseNumberEnv(env.ARIA2_PORT, 6800),
      secret: readEnvSecret(env, 'ARIA2_SECRET'),
      maxRetries: parseNumberEnv(env.ARIA2_MAX_RETRIES, 10),
      retryDelayMs: parseNumberEnv(env.ARIA2_RETRY_DELAY_MS, 1_000),
      livenessIntervalMs: parseNumberEnv(env.ARIA2_LIVENESS_INTERVAL_MS, 1_000),
    },
    paths: {
      downloadDir,
      extractDir: parseStringEnv(env.EXTRACT_DIR, `${downloadDir}/Extract`),
      endedDir: parseStringEnv(env.ENDED_DIR, `${downloadDir}/Ended`),
    },
    sonarr: {
      baseUrl: env.SONARR_URL?.trim() ?? '',
      apiKey: readEnvSecret(env, 'SONARR_API_KEY'),
    },
    radarr: {
      baseUrl: env.RADARR_URL?.trim() ?? '',
      apiKey: readEnvSecret(env, 'RADARR_API_KEY'),
    },
    lockWaitMs: parseNumberEnv(env.LOCK_WAIT_MS, 3_000),
    arrCommandPollDelayMs: parseNumberEnv(env.ARR_COMMAND_POLL_DELAY_MS, 2_000),
    shutdownDrainTimeoutMs: parseNumberEnv(env.SHUTDOWN_DRAIN_TIMEOUT_MS, 30_000),
    logLevel: parseLogLevelEnv(env.LOG_LEVEL),
    http: {
      host: parseStringEnv(env.HOST, '0.0.0.0'),
      port: parseNumberEnv(env.PORT, 5480),
    },
  };
}

@Injectable()
export class SettingsService {
  private readonly settings: DaemonSettings;

  constructor(@Inject(DAEMON_ENV) env: EnvLike) {
    this.settings = loadDaemonSettings(env);
  }

  get(): DaemonSettings {
    return this.settings;
  }

  /** Connection details for an *arr service, or null when URL or key is missing. */
  getArrService(key: ArrServiceKey): ArrServiceSettings | null {
    const service = this.settings[key];
    if (!service.baseUrl || !service.apiKey) return null;
    return service;
  }
}
