import { Module } from '@nestjs/common';
import { RemoteCommandQueueService } from './remote-command-queue.service';

@Module({
  providers: [RemoteCommandQueueService],
  exports: [RemoteCommandQueueService],
})
export class QueueModule {}
