import { Module } from '@nestjs/common';
import { QueueModule } from '../queue/queue.module';
import { TargetsModule } from '../targets/targets.module';
import { AgentService } from './agent.service';
import { CommandExecutorService } from './command-executor.service';

@Module({
  imports: [QueueModule, TargetsModule],
  providers: [AgentService, CommandExecutorService],
  exports: [AgentService, CommandExecutorService],
})
export class AgentModule {}
