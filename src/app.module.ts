import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AgentModule } from './agent/agent.module';
import { rolloutConfig } from './config/rollout.config';
import { DatabaseModule } from './database/database.module';
import { DeploymentsModule } from './deployments/deployments.module';
import { ExecutionModule } from './execution/execution.module';
import { StreamingModule } from './streaming/streaming.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [rolloutConfig] }),
    DatabaseModule,
    ExecutionModule,
    DeploymentsModule,
    StreamingModule,
    AgentModule,
  ],
})
export class AppModule {}
