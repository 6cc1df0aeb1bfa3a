import { Injectable } from '@nestjs/common';
import { CommandHandle, CommandOutcome, makeOutcome } from '../execution/command-outcome';
import { DispatchError } from '../execution/dispatch.error';
import { RemoteExecutionClient } from '../execution/remote-execution.client';
import { Target } from '../targets/target.types';
import { RenderedCommand } from '../templates/command-template';
import { CommandTemplateService } from '../templates/command-template.service';
import { RunContext, StageDefinition, stagePassed } from './stage';

export interface StageResult {
  readonly outcome: CommandOutcome;
  readonly passed: boolean;
}

/**
 * Runs one stage on one target: render, dispatch, poll, classify.
 * No retries here; the orchestrator owns retry policy.
 */
@Injectable()
export class StageRunnerService {
  constructor(
    private readonly templates: CommandTemplateService,
    private readonly client: RemoteExecutionClient,
  ) {}

  /** Throws RenderError when the stage's bindings do not cover its template. */
  render(target: Target, stage: StageDefinition, context: RunContext): RenderedCommand {
    return this.templates.render(stage.template, stage.bindings(target, context));
  }

  async run(target: Target, stage: StageDefinition, context: RunContext): Promise<StageResult> {
    const command = this.render(target, stage, context);

    let handle: CommandHandle;
    try {
      handle = await this.client.dispatch(target, command, {
        identity: context.identity,
        deadlineMs: stage.timeoutMs,
      });
    } catch (err) {
      if (err instanceof DispatchError) {
        return { outcome: makeOutcome('TargetUnreachable', { output: err.message }), passed: false };
      }
      throw err;
    }

    const outcome = await this.client.poll(handle, stage.timeoutMs);
    return { outcome, passed: stagePassed(stage, outcome) };
  }
}
