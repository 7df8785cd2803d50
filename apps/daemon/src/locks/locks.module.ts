import { Module } from '@nestjs/common';
import { KeyedLockService } from './keyed-lock.service';

@Module({
  providers: [KeyedLockService],
  exports: [KeyedLockService],
})
export class LocksModule {}
