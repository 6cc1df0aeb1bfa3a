import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { DeploymentRunRepository } from './deployment-run.repository';
import { DeploymentsController } from './deployments.controller';
import { DeploymentsService } from './deployments.service';

@Module({
  imports: [PipelineModule],
  controllers: [DeploymentsController],
  providers: [DeploymentsService, DeploymentRunRepository],
})
export class DeploymentsModule {}
