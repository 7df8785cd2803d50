import { Controller, Get, Inject, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ServerLogStore } from './server-logs.store';

function parseIntParam(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : undefined;
}

@Controller('logs')
@ApiTags('logs')
export class LogsController {
  constructor(@Inject(ServerLogStore) private readonly store: ServerLogStore) {}

  @Get()
  getLogs(@Query('afterId') afterIdRaw?: string, @Query('limit') limitRaw?: string) {
    const data = this.store.list({
      afterId: parseIntParam(afterIdRaw),
      limit: parseIntParam(limitRaw),
    });
    return { ok: true, ...data };
  }
}
