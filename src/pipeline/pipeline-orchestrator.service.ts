import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { sleep } from '../common/sleep';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { makeOutcome } from '../execution/command-outcome';
import { ExecutionIdentityProvider } from '../execution/execution-identity';
import { TargetLock, TargetLockResult } from '../locks/target-lock';
import { RunEventsService } from '../streaming/run-events.service';
import { ResolutionError } from '../targets/resolution.error';
import { TargetResolverService } from '../targets/target-resolver.service';
import { describeSelector, Target, TargetSelector } from '../targets/target.types';
import { CommandTemplateService } from '../templates/command-template.service';
import { RenderError } from '../templates/render.error';
import { AbortCause, freezeRun, PipelineRun, StageRecord, Verdict, verdictLabel } from './pipeline-run';
import { RunContext, StageDefinition } from './stage';
import { StageResult, StageRunnerService } from './stage-runner.service';
import { PIPELINE_STAGES } from './stages';

export interface DeployOptions {
  runId?: string;
  /** Checked between stages; an in-flight stage always finishes and is recorded. */
  signal?: AbortSignal;
}

export interface FleetDeployOptions {
  maxTargets: number;
  signal?: AbortSignal;
}

interface RunDraft {
  id: string;
  selector: TargetSelector;
  imageRef: string;
  startedAt: Date;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Promotes an image onto resolved targets:
 * resolve -> identity -> preflight render -> lock -> stages in order, fail-fast.
 *
 * Every outcome, including errors of this process's own database or lock connection,
 * ends up in the returned PipelineRun's verdict.
 */
@Injectable()
export class PipelineOrchestratorService {
  private readonly logger = new Logger(PipelineOrchestratorService.name);

  constructor(
    private readonly resolver: TargetResolverService,
    private readonly runner: StageRunnerService,
    private readonly templates: CommandTemplateService,
    private readonly identities: ExecutionIdentityProvider,
    private readonly locks: TargetLock,
    private readonly events: RunEventsService,
    @Inject(PIPELINE_STAGES) private readonly stages: readonly StageDefinition[],
    @Inject(rolloutConfig.KEY) private readonly config: RolloutConfig,
  ) {}

  async deploy(
    selector: TargetSelector,
    imageRef: string,
    options: DeployOptions = {},
  ): Promise<PipelineRun> {
    const draft = this.startRun(options.runId ?? randomUUID(), selector, imageRef);

    let target: Target;
    try {
      target = await this.withResolveRetry(draft.id, () => this.resolver.resolve(selector), options.signal);
    } catch (err) {
      return this.finish(draft, null, [], this.unresolved(err, options.signal));
    }

    return this.runOnTarget(draft, target, options.signal);
  }

  /**
   * One independent pipeline per resolved target, run concurrently. Targets share nothing;
   * each gets its own run id, identity and lock, and one target's failure never affects
   * another's run.
   */
  async deployFleet(
    selector: TargetSelector,
    imageRef: string,
    options: FleetDeployOptions,
  ): Promise<PipelineRun[]> {
    let targets: Target[];
    const resolutionRunId = randomUUID();
    try {
      targets = await this.withResolveRetry(
        resolutionRunId,
        () => this.resolver.resolveMany(selector, options.maxTargets),
        options.signal,
      );
    } catch (err) {
      const verdict = this.unresolved(err, options.signal);
      return [this.finish(this.startRun(resolutionRunId, selector, imageRef), null, [], verdict)];
    }

    this.logger.log(
      `Deploying ${imageRef} to ${targets.length} targets: ${targets.map((t) => t.id).join(', ')}`,
    );
    return Promise.all(
      targets.map((target) =>
        this.runOnTarget(this.startRun(randomUUID(), selector, imageRef), target, options.signal),
      ),
    );
  }

  private startRun(id: string, selector: TargetSelector, imageRef: string): RunDraft {
    this.events.emit(id, 'run.started', `${imageRef} -> ${describeSelector(selector)}`);
    return { id, selector, imageRef, startedAt: new Date() };
  }

  /** Verdict for a resolution that did not produce a target. An invalid maxTargets is rethrown. */
  private unresolved(err: unknown, signal?: AbortSignal): Verdict {
    if (err instanceof RangeError) throw err;
    if (signal?.aborted) return this.aborted(1, this.stages[0], 'cancelled');
    if (err instanceof ResolutionError) return { kind: 'TargetNotFound', reason: err.message };
    return { kind: 'InfrastructureError', reason: `Target lookup failed: ${describeError(err)}` };
  }

  /** Always settles with a run; stage records gathered before an error are kept. */
  private async runOnTarget(
    draft: RunDraft,
    target: Target,
    signal?: AbortSignal,
  ): Promise<PipelineRun> {
    const records: StageRecord[] = [];
    let verdict: Verdict;
    try {
      verdict = await this.attempt(draft, target, records, signal);
    } catch (err) {
      if (err instanceof RenderError) {
        verdict = { kind: 'ConfigurationError', reason: err.message };
      } else {
        this.logger.error(
          `run=${draft.id} stopped on ${target.id}: ${describeError(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
        verdict = { kind: 'InfrastructureError', reason: describeError(err) };
      }
    }
    return this.finish(draft, target.id, records, verdict);
  }

  private async attempt(
    draft: RunDraft,
    target: Target,
    records: StageRecord[],
    signal?: AbortSignal,
  ): Promise<Verdict> {
    const identity = await this.identities.acquire();
    const context: RunContext = Object.freeze({ runId: draft.id, imageRef: draft.imageRef, identity });

    // Local configuration defects stop the run before anything reaches the target.
    for (const stage of this.stages) {
      this.templates.validate(stage.template, stage.bindings(target, context));
    }

    const lock = await this.locks.tryAcquire(target.id, draft.id);
    if (!lock.acquired) return { kind: 'TargetBusy', holder: lock.holder };

    try {
      for (const [position, stage] of this.stages.entries()) {
        const index = position + 1;
        if (signal?.aborted) return this.aborted(index, stage, 'cancelled');

        const { result, attempts } = await this.runStage(target, stage, context, signal);
        records.push({ index, stage: stage.name, outcome: result.outcome, passed: result.passed, attempts });
        if (!result.passed) return this.aborted(index, stage, 'failed');
      }
      return { kind: 'Completed' };
    } finally {
      await this.releaseLock(lock, draft.id, target.id);
    }
  }

  private async releaseLock(lock: TargetLockResult, runId: string, targetId: string): Promise<void> {
    try {
      await lock.release();
    } catch (err) {
      this.logger.error(`run=${runId} could not release the lock on ${targetId}: ${describeError(err)}`);
    }
  }

  /**
   * Runs a stage, re-running it after Failure/TimedOut while stageRetries allows.
   * TargetUnreachable and errors raised by this process are never retried; such an error
   * is recorded as the stage's Failure outcome.
   */
  private async runStage(
    target: Target,
    stage: StageDefinition,
    context: RunContext,
    signal?: AbortSignal,
  ): Promise<{ result: StageResult; attempts: number }> {
    let attempts = 0;
    while (true) {
      attempts++;
      this.events.emit(context.runId, 'stage.started', `attempt ${attempts} on ${target.id}`, stage.name);

      let result: StageResult;
      let interrupted = false;
      try {
        result = await this.runner.run(target, stage, context);
      } catch (err) {
        if (err instanceof RenderError) throw err;
        interrupted = true;
        this.logger.error(`run=${context.runId} ${stage.name} on ${target.id} interrupted: ${describeError(err)}`);
        result = {
          outcome: makeOutcome('Failure', { output: `Stage interrupted: ${describeError(err)}` }),
          passed: false,
        };
      }
      this.events.emit(
        context.runId,
        'stage.finished',
        `${result.passed ? 'PASS' : 'FAIL'} (${result.outcome.status})`,
        stage.name,
      );

      const retryable = !result.passed && !interrupted && result.outcome.status !== 'TargetUnreachable';
      if (!retryable || attempts > this.config.stageRetries || signal?.aborted) {
        return { result, attempts };
      }

      const backoff = this.config.stageRetryBackoffMs * 2 ** (attempts - 1);
      this.logger.warn(
        `run=${context.runId} ${stage.name} ${result.outcome.status} on ${target.id}; retrying in ${backoff}ms`,
      );
      await sleep(backoff, signal);
      if (signal?.aborted) return { result, attempts };
    }
  }

  private async withResolveRetry<T>(
    runId: string,
    resolve: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await resolve();
      } catch (err) {
        if (!(err instanceof ResolutionError) || attempt >= this.config.resolveAttempts || signal?.aborted) {
          throw err;
        }
        const backoff = this.config.resolveBackoffMs * 2 ** (attempt - 1);
        this.logger.warn(`run=${runId} ${describeError(err)}; resolving again in ${backoff}ms`);
        await sleep(backoff, signal);
        if (signal?.aborted) throw err;
      }
    }
  }

  private aborted(index: number, stage: StageDefinition, cause: AbortCause): Verdict {
    return { kind: 'AbortedAtStage', stage: index, stageName: stage.name, cause };
  }

  private finish(
    draft: RunDraft,
    targetId: string | null,
    records: StageRecord[],
    verdict: Verdict,
  ): PipelineRun {
    const run = freezeRun({ ...draft, targetId, stages: records, verdict, finishedAt: new Date() });
    const label = verdictLabel(verdict);
    const summary = `run=${run.id} image=${run.imageRef} target=${targetId ?? '-'} verdict=${label}`;

    if (verdict.kind === 'Completed') {
      this.logger.log(summary);
    } else if (verdict.kind === 'AbortedAtStage' && verdict.cause === 'cancelled') {
      this.logger.warn(`${summary} (cancelled before ${verdict.stageName})`);
    } else {
      this.logger.error(summary);
    }
    this.events.emit(run.id, 'run.finished', label);
    return run;
  }
}
