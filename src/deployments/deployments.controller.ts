import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { parseDeploymentRequest } from './deployment-request';
import { DeploymentsService } from './deployments.service';
import { CreateDeploymentDto } from './dto/create-deployment.dto';

@ApiTags('deployments')
@Controller('deployments')
export class DeploymentsController {
  constructor(private readonly deployments: DeploymentsService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Deploy an image to the target chosen by a selector' })
  start(@Body() body: CreateDeploymentDto) {
    return this.deployments.start(parseDeploymentRequest(body));
  }

  @Get()
  @ApiOperation({ summary: 'List recent run reports' })
  async findAll() {
    return this.deployments.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a run report, or its running status' })
  async findOne(@Param('id') id: string) {
    const status = await this.deployments.findOne(id);
    if (!status) throw new NotFoundException('Deployment run not found');
    return status;
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Stop a running deployment before its next stage' })
  cancel(@Param('id') id: string) {
    if (!this.deployments.cancel(id)) {
      throw new NotFoundException('Deployment run is not in flight');
    }
    return { runId: id, cancelled: true };
  }
}
