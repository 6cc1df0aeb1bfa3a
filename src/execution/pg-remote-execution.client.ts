import { Inject, Injectable, Logger } from '@nestjs/common';
import { sleep } from '../common/sleep';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import {
  CommandRowStatus,
  RemoteCommandQueueService,
  RemoteCommandRecord,
} from '../queue/remote-command-queue.service';
import { TargetRegistryService } from '../targets/target-registry.service';
import { Target } from '../targets/target.types';
import { RenderedCommand } from '../templates/command-template';
import {
  CommandHandle,
  CommandOutcome,
  makeOutcome,
  OutcomeStatus,
  truncateOutput,
} from './command-outcome';
import { DispatchError } from './dispatch.error';
import { DispatchOptions, RemoteExecutionClient } from './remote-execution.client';

const TERMINAL: Readonly<Partial<Record<CommandRowStatus, OutcomeStatus>>> = {
  success: 'Success',
  failed: 'Failure',
  timed_out: 'TimedOut',
  target_unreachable: 'TargetUnreachable',
};

/**
 * Command channel backed by the remote_commands table. The agent on each target claims
 * its rows and writes back the result; this side only inserts and reads.
 */
@Injectable()
export class PgRemoteExecutionClient extends RemoteExecutionClient {
  private readonly logger = new Logger(PgRemoteExecutionClient.name);

  constructor(
    private readonly queue: RemoteCommandQueueService,
    private readonly registry: TargetRegistryService,
    @Inject(rolloutConfig.KEY) private readonly config: RolloutConfig,
  ) {
    super();
  }

  async dispatch(
    target: Target,
    command: RenderedCommand,
    options: DispatchOptions = {},
  ): Promise<CommandHandle> {
    // Liveness from resolution may be stale by now; ask again.
    const current = await this.registry.findOne(target.id);
    if (!current || current.liveness !== 'alive') throw new DispatchError(target.id);

    const id = await this.queue.enqueue({
      targetId: target.id,
      template: command.template,
      body: command.body,
      requestedBy: options.identity?.principal ?? null,
      timeoutMs: options.deadlineMs ?? null,
    });
    return Object.freeze({ id, targetId: target.id });
  }

  /**
   * Reads the command row until it is terminal or timeoutMs runs out. A failed read is
   * retried on the next interval; if reads keep failing the poll ends as TimedOut carrying
   * the last error.
   */
  async poll(handle: CommandHandle, timeoutMs: number): Promise<CommandOutcome> {
    const deadline = Date.now() + Math.max(0, timeoutMs);
    let lastSeen: RemoteCommandRecord | null = null;
    let readError: string | null = null;

    while (true) {
      let record: RemoteCommandRecord | null;
      try {
        record = await this.queue.findOne(handle.id);
        readError = null;
      } catch (err) {
        readError = err instanceof Error ? err.message : String(err);
        this.logger.warn(`command=${handle.id} read failed: ${readError}`);
        record = lastSeen;
      }
      if (!record && readError === null) throw new Error(`Unknown command handle ${handle.id}`);

      if (record) {
        lastSeen = record;
        const status = TERMINAL[record.status];
        if (status) return this.toOutcome(status, record);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        if (record) return this.toOutcome('TimedOut', { ...record, exit_code: null });
        return makeOutcome('TimedOut', { output: `Command ${handle.id} unreadable: ${readError}` });
      }
      await sleep(Math.min(this.config.pollIntervalMs, remaining));
    }
  }

  private toOutcome(status: OutcomeStatus, record: RemoteCommandRecord): CommandOutcome {
    const capped = truncateOutput(record.output ?? '', this.config.maxOutputBytes);
    return makeOutcome(status, {
      output: capped.output,
      truncated: capped.truncated || Boolean(record.output_truncated),
      exitCode: record.exit_code,
    });
  }
}
