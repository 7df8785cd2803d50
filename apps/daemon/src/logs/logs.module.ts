import { Module } from '@nestjs/common';
import { LogsController } from './logs.controller';
import { LogsRetentionService } from './logs-retention.service';
import { ServerLogStore, serverLogStore } from './server-logs.store';

@Module({
  controllers: [LogsController],
  providers: [{ provide: ServerLogStore, useValue: serverLogStore }, LogsRetentionService],
})
export class LogsModule {}
