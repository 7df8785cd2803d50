import { Module } from '@nestjs/common';
import { ArchiveModule } from '../archive/archive.module';
import { Aria2Module } from '../aria2/aria2.module';
import { LocksModule } from '../locks/locks.module';
import { MediaModule } from '../media/media.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { CompletionDispatcherService } from './completion-dispatcher.service';

@Module({
  imports: [Aria2Module, LocksModule, ArchiveModule, MediaModule, NotificationsModule],
  providers: [CompletionDispatcherService],
  exports: [CompletionDispatcherService],
})
export class DispatchModule {}
