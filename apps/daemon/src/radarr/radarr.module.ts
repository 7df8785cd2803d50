import { Module } from '@nestjs/common';
import { RadarrService } from './radarr.service';

@Module({
  providers: [RadarrService],
  exports: [RadarrService],
})
export class RadarrModule {}
