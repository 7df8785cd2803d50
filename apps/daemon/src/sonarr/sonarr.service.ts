import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import { errToMessage } from '../lib/errors';

type SonarrSystemStatus = Record<string, unknown>;

export type SonarrCommand = Record<string, unknown> & {
  id: number;
  name?: string;
  status?: string;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isCommand(value: unknown): value is SonarrCommand {
  return isPlainObject(value) && typeof value.id === 'number';
}

@Injectable()
export class SonarrService {
  private readonly logger = new Logger(SonarrService.name);

  async testConnection(params: { baseUrl: string; apiKey: string }) {
    const { baseUrl, apiKey } = params;
    const url = this.buildApiUrl(baseUrl, 'api/v3/system/status');

    this.logger.debug(`Testing Sonarr connection: ${url}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 10_000);

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'X-Api-Key': apiKey,
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(`Sonarr test failed: HTTP ${res.status} ${body}`.trim());
      }

      const data: unknown = await res.json();
      const status: SonarrSystemStatus = isPlainObject(data) ? data : {};
      return { ok: true, status };
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Sonarr test failed: ${errToMessage(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Ask Sonarr to import whatever it finds at `path` (a file, or a directory ending in a separator). */
  async triggerDownloadedScan(params: {
    baseUrl: string;
    apiKey: string;
    path: string;
  }): Promise<SonarrCommand> {
    const { baseUrl, apiKey, path } = params;
    const url = this.buildApiUrl(baseUrl, 'api/v3/command');

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 10_000);

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'X-Api-Key': apiKey,
        },
        body: JSON.stringify({ name: 'DownloadedEpisodesScan', path }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(`Sonarr scan failed: HTTP ${res.status} ${body}`.trim());
      }

      const data: unknown = await res.json().catch(() => null);
      if (!isCommand(data)) {
        throw new BadGatewayException('Sonarr scan failed: response has no command id');
      }
      return data;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Sonarr scan failed: ${errToMessage(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  async getCommand(params: { baseUrl: string; apiKey: string; id: number }): Promise<SonarrCommand> {
    const { baseUrl, apiKey, id } = params;
    const url = this.buildApiUrl(baseUrl, `api/v3/command/${id}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 10_000);

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'X-Api-Key': apiKey,
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(`Sonarr command status failed: HTTP ${res.status} ${body}`.trim());
      }

      const data: unknown = await res.json();
      if (!isCommand(data)) {
        throw new BadGatewayException(`Sonarr command status failed: unexpected body for ${id}`);
      }
      return data;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Sonarr command status failed: ${errToMessage(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildApiUrl(baseUrl: string, path: string) {
    const normalized = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    return new URL(path, normalized).toString();
  }
}
