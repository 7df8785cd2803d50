import { Module } from '@nestjs/common';
import { RadarrModule } from '../radarr/radarr.module';
import { SonarrModule } from '../sonarr/sonarr.module';
import { LibraryScanService } from './library-scan.service';

@Module({
  imports: [SonarrModule, RadarrModule],
  providers: [LibraryScanService],
  exports: [LibraryScanService],
})
export class NotificationsModule {}
