import { Module } from '@nestjs/common';
import { RadarrModule } from '../radarr/radarr.module';
import { SonarrModule } from '../sonarr/sonarr.module';
import { ArrConnectivityMonitorService } from './arr-connectivity-monitor.service';

@Module({
  imports: [SonarrModule, RadarrModule],
  providers: [ArrConnectivityMonitorService],
  exports: [ArrConnectivityMonitorService],
})
export class IntegrationsModule {}
