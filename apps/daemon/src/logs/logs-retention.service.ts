import { Inject, Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { ServerLogStore } from './server-logs.store';

const RETENTION_DAYS = 7;
const DAY_MS = 24 * 60 * 60_000;

@Injectable()
export class LogsRetentionService {
  private readonly logger = new Logger(LogsRetentionService.name);

  constructor(@Inject(ServerLogStore) private readonly store: ServerLogStore) {}

  @Interval(DAY_MS)
  poll() {
    this.cleanupOnce();
  }

  cleanupOnce(now = new Date()) {
    const cutoff = new Date(now.getTime() - RETENTION_DAYS * DAY_MS);
    const res = this.store.pruneOlderThan(cutoff);
    if (res.removed > 0) {
      this.logger.log(
        `Server logs retention: removed=${res.removed} kept=${res.kept} cutoff=${cutoff.toISOString()}`,
      );
    }
    return res;
  }
}
