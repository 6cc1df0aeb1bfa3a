import { Module } from '@nestjs/common';
import { RunEventsService } from './run-events.service';
import { SSEController } from './sse.controller';

@Module({
  controllers: [SSEController],
  providers: [RunEventsService],
  exports: [RunEventsService],
})
export class StreamingModule {}
