import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { sleep } from '../common/sleep';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { RemoteCommandQueueService } from '../queue/remote-command-queue.service';
import { TargetRegistryService } from '../targets/target-registry.service';
import { parseLabels } from './agent-labels';
import { CommandExecutorService } from './command-executor.service';

/**
 * Agent main loop, for processes running on a target (RUN_AGENT_LOOP=true):
 * - register this target with its labels, then heartbeat so it stays 'alive'
 * - claim the next pending command addressed to it, run it, write back the result
 * - when nothing is pending, sleep for the poll interval
 */
@Injectable()
export class AgentService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(AgentService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  readonly targetId: string;

  constructor(
    private readonly queue: RemoteCommandQueueService,
    private readonly registry: TargetRegistryService,
    private readonly executor: CommandExecutorService,
    private readonly configService: ConfigService,
    @Inject(rolloutConfig.KEY) private readonly config: RolloutConfig,
  ) {
    this.targetId =
      configService.get<string>('AGENT_TARGET_ID') ||
      configService.get<string>('HOSTNAME') ||
      `target-${randomUUID().slice(0, 8)}`;
  }

  async onModuleInit(): Promise<void> {
    if (this.configService.get<string>('RUN_AGENT_LOOP') !== 'true') return;
    await this.start(parseLabels(this.configService.get<string>('AGENT_LABELS')));
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
    if (this.loopPromise) {
      await Promise.race([this.loopPromise, sleep(2000)]);
    }
  }

  async start(labels: Record<string, string>): Promise<void> {
    await this.registry.register(this.targetId, labels);
    this.logger.log(`Agent ${this.targetId} registered with labels ${JSON.stringify(labels)}`);

    // Three beats per liveness window, so one missed beat does not mark the target unreachable.
    const intervalMs = Math.max(1000, Math.floor((this.config.heartbeatTimeoutSeconds * 1000) / 3));
    this.heartbeatTimer = setInterval(() => {
      this.registry.heartbeat(this.targetId).catch((err: unknown) => {
        this.logger.warn(`Heartbeat failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);

    this.loopPromise = this.runLoop();
  }

  /** Claims and runs at most one command. Returns false when nothing was pending. */
  async processNext(): Promise<boolean> {
    const command = await this.queue.claimNext(this.targetId);
    if (!command) return false;

    this.logger.log(`command=${command.id} template=${command.template} started`);
    const result = await this.executor.execute(command);
    await this.queue.markFinished(command.id, result);
    this.logger.log(`command=${command.id} ${result.status} exit=${result.exitCode ?? '-'}`);
    return true;
  }

  private async runLoop(): Promise<void> {
    while (!this.abort.signal.aborted) {
      try {
        const worked = await this.processNext();
        if (!worked) await sleep(this.config.pollIntervalMs);
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.error(`Agent loop error: ${err instanceof Error ? err.message : String(err)}`);
        await sleep(this.config.pollIntervalMs);
      }
    }
  }
}
