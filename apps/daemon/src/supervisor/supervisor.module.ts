import { Module } from '@nestjs/common';
import { Aria2Module } from '../aria2/aria2.module';
import { DispatchModule } from '../dispatch/dispatch.module';
import { NotificationSupervisorService } from './notification-supervisor.service';

@Module({
  imports: [Aria2Module, DispatchModule],
  providers: [NotificationSupervisorService],
  exports: [NotificationSupervisorService],
})
export class SupervisorModule {}
