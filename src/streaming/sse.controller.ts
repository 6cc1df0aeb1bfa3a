import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { RunEvent, RunEventsService } from './run-events.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly runEvents: RunEventsService) {}

  /**
   * GET /stream/deployments/:runId - stage progress of one run as it happens.
   */
  @Sse('deployments/:runId')
  @ApiOperation({ summary: 'SSE: progress events for one deployment run' })
  streamRun(@Param('runId') runId: string): Observable<{ data: RunEvent }> {
    return this.runEvents.streamForRun(runId).pipe(map((ev) => ({ data: ev })));
  }

  @Sse('deployments')
  @ApiOperation({ summary: 'SSE: progress events for all deployment runs' })
  streamAll(): Observable<{ data: RunEvent }> {
    return this.runEvents.stream().pipe(map((ev) => ({ data: ev })));
  }
}
