import { Module } from '@nestjs/common';
import { QueueModule } from '../queue/queue.module';
import { TargetsModule } from '../targets/targets.module';
import { CommandSweeperService } from './command-sweeper.service';
import { ConfiguredIdentityProvider, ExecutionIdentityProvider } from './execution-identity';
import { PgRemoteExecutionClient } from './pg-remote-execution.client';
import { RemoteExecutionClient } from './remote-execution.client';

@Module({
  imports: [QueueModule, TargetsModule],
  providers: [
    { provide: RemoteExecutionClient, useClass: PgRemoteExecutionClient },
    { provide: ExecutionIdentityProvider, useClass: ConfiguredIdentityProvider },
    CommandSweeperService,
  ],
  exports: [RemoteExecutionClient, ExecutionIdentityProvider, CommandSweeperService],
})
export class ExecutionModule {}
