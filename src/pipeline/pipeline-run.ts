import { CommandOutcome, OutcomeStatus } from '../execution/command-outcome';
import { TargetSelector } from '../targets/target.types';
import { StageName } from './stage';

export type AbortCause = 'failed' | 'cancelled';

export type Verdict =
  | { readonly kind: 'Completed' }
  | {
      readonly kind: 'AbortedAtStage';
      /** 1-based position of the stage that failed or would have run next. */
      readonly stage: number;
      readonly stageName: StageName;
      readonly cause: AbortCause;
    }
  | { readonly kind: 'TargetNotFound'; readonly reason: string }
  | { readonly kind: 'ConfigurationError'; readonly reason: string }
  | { readonly kind: 'TargetBusy'; readonly holder: string | null }
  /** This process failed (database, lock connection, identity) outside any stage. */
  | { readonly kind: 'InfrastructureError'; readonly reason: string };

export interface StageRecord {
  readonly index: number;
  readonly stage: StageName;
  readonly outcome: CommandOutcome;
  readonly passed: boolean;
  readonly attempts: number;
}

/** Immutable record of one orchestration attempt against one target. */
export interface PipelineRun {
  readonly id: string;
  readonly selector: TargetSelector;
  readonly imageRef: string;
  readonly targetId: string | null;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly stages: readonly StageRecord[];
  readonly verdict: Verdict;
}

export interface RunReportRecord {
  stage_name: StageName;
  outcome: OutcomeStatus;
  passed: boolean;
  attempts: number;
  exit_code: number | null;
  captured_output: string;
  truncated: boolean;
}

/** Serialized PipelineRun; the only artifact a run leaves behind. */
export interface RunReport {
  id: string;
  target_id: string | null;
  image_ref: string;
  verdict: string;
  cause: AbortCause | null;
  reason: string | null;
  /** false when the run never reached a stage (resolution, configuration, lock or infrastructure problems). */
  attempted: boolean;
  started_at: string;
  finished_at: string;
  records: RunReportRecord[];
}

export function verdictLabel(verdict: Verdict): string {
  return verdict.kind === 'AbortedAtStage' ? `AbortedAtStage(${verdict.stage})` : verdict.kind;
}

export function wasAttempted(verdict: Verdict): boolean {
  return verdict.kind === 'Completed' || verdict.kind === 'AbortedAtStage';
}

export function freezeRun(run: PipelineRun): PipelineRun {
  return Object.freeze({
    ...run,
    selector: Object.freeze({ ...run.selector, labels: Object.freeze({ ...run.selector.labels }) }),
    stages: Object.freeze(run.stages.map((record) => Object.freeze({ ...record }))),
    verdict: Object.freeze({ ...run.verdict }),
  });
}

function verdictReason(verdict: Verdict): string | null {
  switch (verdict.kind) {
    case 'TargetNotFound':
    case 'ConfigurationError':
    case 'InfrastructureError':
      return verdict.reason;
    case 'TargetBusy':
      return verdict.holder ? `target locked by run ${verdict.holder}` : 'target locked';
    default:
      return null;
  }
}

export function toRunReport(run: PipelineRun): RunReport {
  return {
    id: run.id,
    target_id: run.targetId,
    image_ref: run.imageRef,
    verdict: verdictLabel(run.verdict),
    cause: run.verdict.kind === 'AbortedAtStage' ? run.verdict.cause : null,
    reason: verdictReason(run.verdict),
    attempted: wasAttempted(run.verdict) || run.stages.length > 0,
    started_at: run.startedAt.toISOString(),
    finished_at: run.finishedAt.toISOString(),
    records: run.stages.map((record) => ({
      stage_name: record.stage,
      outcome: record.outcome.status,
      passed: record.passed,
      attempts: record.attempts,
      exit_code: record.outcome.exitCode,
      captured_output: record.outcome.output,
      truncated: record.outcome.truncated,
    })),
  };
}
