import { CommandOutcome } from '../execution/command-outcome';
import { ExecutionIdentity } from '../execution/execution-identity';
import { Target } from '../targets/target.types';
import { Bindings } from '../templates/command-template';

export type StageName = 'DependencyCheck' | 'ArtifactPull' | 'DeploySwap' | 'HealthCheck';

/** Per-run values every stage may bind. Built once per run, never shared between runs. */
export interface RunContext {
  readonly runId: string;
  readonly imageRef: string;
  readonly identity: ExecutionIdentity;
}

export interface StageDefinition {
  readonly name: StageName;
  readonly template: string;
  /** Bounded wait for the stage's command, also passed to the target as its deadline. */
  readonly timeoutMs: number;
  /** Called for every render so target- and run-specific values are never reused. */
  bindings(target: Target, context: RunContext): Bindings;
  /** Line the command prints on success; its absence fails the stage. */
  readonly expectMarker?: string;
  /** Replaces the default success predicate. */
  succeeded?(outcome: CommandOutcome): boolean;
}

export function stagePassed(stage: StageDefinition, outcome: CommandOutcome): boolean {
  if (stage.succeeded) return stage.succeeded(outcome);
  if (outcome.status !== 'Success') return false;
  return stage.expectMarker == null || outcome.output.includes(stage.expectMarker);
}
