import { Module } from '@nestjs/common';
import { ArchiveExtractorService } from './archive-extractor.service';

@Module({
  providers: [ArchiveExtractorService],
  exports: [ArchiveExtractorService],
})
export class ArchiveModule {}
