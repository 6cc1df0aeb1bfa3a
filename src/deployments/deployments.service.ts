import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { sleep } from '../common/sleep';
import { RunReport } from '../pipeline/pipeline-run';
import { PipelineOrchestratorService } from '../pipeline/pipeline-orchestrator.service';
import { DeploymentRequest } from './deployment-request';
import { DeploymentRunRepository } from './deployment-run.repository';

export type DeploymentStatus =
  | { id: string; status: 'running' }
  | { id: string; status: 'finished'; report: RunReport };

interface InFlightRun {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Starts deployments in the background, tracks the ones in flight so they can be cancelled,
 * and persists each report when its run ends.
 */
@Injectable()
export class DeploymentsService implements OnModuleDestroy {
  private readonly logger = new Logger(DeploymentsService.name);
  private readonly inFlight = new Map<string, InFlightRun>();

  constructor(
    private readonly orchestrator: PipelineOrchestratorService,
    private readonly runs: DeploymentRunRepository,
  ) {}

  start(request: DeploymentRequest): { runId: string } {
    const runId = randomUUID();
    const controller = new AbortController();

    const done = this.orchestrator
      .deploy(request.selector, request.imageRef, { runId, signal: controller.signal })
      .then(async (run) => {
        await this.runs.save(run);
      })
      .catch((err: unknown) => {
        this.logger.error(
          `run=${runId} ended without a report: ${err instanceof Error ? err.message : String(err)}`,
        );
      })
      .finally(() => {
        this.inFlight.delete(runId);
      });

    this.inFlight.set(runId, { controller, done });
    return { runId };
  }

  /** Resolves once the run has ended and its report was written (or failed to be). */
  async whenSettled(runId: string): Promise<void> {
    await this.inFlight.get(runId)?.done;
  }

  cancel(runId: string): boolean {
    const run = this.inFlight.get(runId);
    if (!run) return false;
    run.controller.abort();
    this.logger.warn(`run=${runId} cancellation requested`);
    return true;
  }

  async findAll(): Promise<RunReport[]> {
    return this.runs.findRecent();
  }

  async findOne(runId: string): Promise<DeploymentStatus | null> {
    const report = await this.runs.findOne(runId);
    if (report) return { id: runId, status: 'finished', report };
    return this.inFlight.has(runId) ? { id: runId, status: 'running' } : null;
  }

  async onModuleDestroy(): Promise<void> {
    const pending = [...this.inFlight.keys()];
    for (const runId of pending) this.cancel(runId);
    if (pending.length > 0) {
      await Promise.race([Promise.all(pending.map((runId) => this.whenSettled(runId))), sleep(2000)]);
    }
  }
}
