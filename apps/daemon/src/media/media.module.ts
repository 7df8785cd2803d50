import { Module } from '@nestjs/common';
import { MediaMoverService } from './media-mover.service';

@Module({
  providers: [MediaMoverService],
  exports: [MediaMoverService],
})
export class MediaModule {}
