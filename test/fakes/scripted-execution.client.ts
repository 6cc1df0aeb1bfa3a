import { CommandHandle, CommandOutcome, makeOutcome } from '../../src/execution/command-outcome';
import { DispatchError } from '../../src/execution/dispatch.error';
import { DispatchOptions, RemoteExecutionClient } from '../../src/execution/remote-execution.client';
import { Target } from '../../src/targets/target.types';
import { RenderedCommand } from '../../src/templates/command-template';

export type ScriptedBehavior =
  | { kind: 'outcome'; outcome: CommandOutcome }
  | { kind: 'unreachable' }
  /** Never reaches a terminal state; every poll times out. */
  | { kind: 'hang' }
  /** Dispatch succeeds, then every poll rejects with error. */
  | { kind: 'pollError'; error: Error };

export interface DispatchedCommand {
  id: string;
  targetId: string;
  template: string;
  body: string;
  principal: string | null;
  deadlineMs: number | null;
}

export const SUCCESS_MARKERS: Readonly<Record<string, string>> = {
  'dependency-check': 'ROLLOUT_DEPENDENCIES_OK',
  'artifact-pull': 'ROLLOUT_ARTIFACT_OK',
  'deploy-swap': 'ROLLOUT_SWAP_OK',
  'health-check': 'ROLLOUT_HEALTHY',
};

export function succeeds(template: string): ScriptedBehavior {
  return {
    kind: 'outcome',
    outcome: makeOutcome('Success', { output: `${SUCCESS_MARKERS[template] ?? 'ok'}\n`, exitCode: 0 }),
  };
}

export function fails(output = 'boom\n', exitCode = 1): ScriptedBehavior {
  return { kind: 'outcome', outcome: makeOutcome('Failure', { output, exitCode }) };
}

/**
 * In-process command channel. Templates without a script succeed with their marker.
 * Scripted behaviors are consumed per dispatch; the last one repeats.
 */
export class ScriptedExecutionClient extends RemoteExecutionClient {
  readonly dispatched: DispatchedCommand[] = [];
  readonly polls: { id: string; timeoutMs: number }[] = [];
  dispatchAttempts = 0;
  /** Called while a poll is in flight, before it returns. */
  onPoll: ((command: DispatchedCommand) => void) | null = null;

  private readonly scripts = new Map<string, ScriptedBehavior[]>();
  private readonly behaviors = new Map<string, ScriptedBehavior>();

  script(template: string, ...behaviors: ScriptedBehavior[]): this {
    this.scripts.set(template, behaviors);
    return this;
  }

  templates(): string[] {
    return this.dispatched.map((c) => c.template);
  }

  async dispatch(
    target: Target,
    command: RenderedCommand,
    options: DispatchOptions = {},
  ): Promise<CommandHandle> {
    this.dispatchAttempts++;
    const behavior = this.nextBehavior(command.template);
    if (behavior.kind === 'unreachable') throw new DispatchError(target.id);

    const id = `cmd-${this.dispatched.length + 1}`;
    this.dispatched.push({
      id,
      targetId: target.id,
      template: command.template,
      body: command.body,
      principal: options.identity?.principal ?? null,
      deadlineMs: options.deadlineMs ?? null,
    });
    this.behaviors.set(id, behavior);
    return { id, targetId: target.id };
  }

  async poll(handle: CommandHandle, timeoutMs: number): Promise<CommandOutcome> {
    const command = this.dispatched.find((c) => c.id === handle.id);
    if (!command) throw new Error(`Unknown command handle ${handle.id}`);
    this.polls.push({ id: handle.id, timeoutMs });
    this.onPoll?.(command);
    const behavior = this.behaviors.get(handle.id);
    if (behavior?.kind === 'pollError') throw behavior.error;
    return behavior?.kind === 'outcome' ? behavior.outcome : makeOutcome('TimedOut');
  }

  private nextBehavior(template: string): ScriptedBehavior {
    const queue = this.scripts.get(template);
    if (!queue || queue.length === 0) return succeeds(template);
    return queue.length > 1 ? (queue.shift() ?? succeeds(template)) : queue[0];
  }
}
