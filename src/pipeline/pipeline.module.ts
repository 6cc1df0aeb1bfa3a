import { Module } from '@nestjs/common';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { ExecutionModule } from '../execution/execution.module';
import { LocksModule } from '../locks/locks.module';
import { StreamingModule } from '../streaming/streaming.module';
import { TargetsModule } from '../targets/targets.module';
import { TemplatesModule } from '../templates/templates.module';
import { PipelineOrchestratorService } from './pipeline-orchestrator.service';
import { StageRunnerService } from './stage-runner.service';
import { buildStages, PIPELINE_STAGES } from './stages';

@Module({
  imports: [TargetsModule, TemplatesModule, ExecutionModule, LocksModule, StreamingModule],
  providers: [
    StageRunnerService,
    PipelineOrchestratorService,
    {
      provide: PIPELINE_STAGES,
      useFactory: (config: RolloutConfig) => buildStages(config),
      inject: [rolloutConfig.KEY],
    },
  ],
  exports: [PipelineOrchestratorService, StageRunnerService],
})
export class PipelineModule {}
