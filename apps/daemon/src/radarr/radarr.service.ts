import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import { errToMessage } from '../lib/errors';

type RadarrSystemStatus = Record<string, unknown>;

export type RadarrCommand = Record<string, unknown> & {
  id: number;
  name?: string;
  status?: string;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isCommand(value: unknown): value is RadarrCommand {
  return isPlainObject(value) && typeof value.id === 'number';
}

@Injectable()
export class RadarrService {
  private readonly logger = new Logger(RadarrService.name);

  async testConnection(params: { baseUrl: string; apiKey: string }) {
    const { baseUrl, apiKey } = params;
    const url = this.buildApiUrl(baseUrl, 'api/v3/system/status');

    this.logger.debug(`Testing Radarr connection: ${url}`);

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
        throw new BadGatewayException(`Radarr test failed: HTTP ${res.status} ${body}`.trim());
      }

      const data: unknown = await res.json();
      const status: RadarrSystemStatus = isPlainObject(data) ? data : {};
      return { ok: true, status };
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Radarr test failed: ${errToMessage(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Ask Radarr to import whatever it finds at `path` (a file, or a directory ending in a separator). */
  async triggerDownloadedScan(params: {
    baseUrl: string;
    apiKey: string;
    path: string;
  }): Promise<RadarrCommand> {
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
        body: JSON.stringify({ name: 'DownloadedMoviesScan', path }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(`Radarr scan failed: HTTP ${res.status} ${body}`.trim());
      }

      const data: unknown = await res.json().catch(() => null);
      if (!isCommand(data)) {
        throw new BadGatewayException('Radarr scan failed: response has no command id');
      }
      return data;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Radarr scan failed: ${errToMessage(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  async getCommand(params: { baseUrl: string; apiKey: string; id: number }): Promise<RadarrCommand> {
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
        throw new BadGatewayException(`Radarr command status failed: HTTP ${res.status} ${body}`.trim());
      }

      const data: unknown = await res.json();
      if (!isCommand(data)) {
        throw new BadGatewayException(`Radarr command status failed: unexpected body for ${id}`);
      }
      return data;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Radarr command status failed: ${errToMessage(err)}`,
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
