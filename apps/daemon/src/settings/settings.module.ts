import { Global, Module } from '@nestjs/common';
import { DAEMON_ENV, SettingsService } from './settings.service';

@Global()
@Module({
  providers: [{ provide: DAEMON_ENV, useValue: process.env }, SettingsService],
  exports: [SettingsService],
})
export class SettingsModule {}
