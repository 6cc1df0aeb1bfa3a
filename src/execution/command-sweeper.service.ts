import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { RemoteCommandQueueService } from '../queue/remote-command-queue.service';

const DEFAULT_SWEEP_INTERVAL_MS = 15_000;

/**
 * Closes commands addressed to targets whose agent stopped heartbeating, so pollers see
 * TargetUnreachable instead of waiting out their timeout. Enabled with RUN_COMMAND_SWEEPER=true.
 */
@Injectable()
export class CommandSweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CommandSweeperService.name);
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly queue: RemoteCommandQueueService,
    private readonly configService: ConfigService,
    @Inject(rolloutConfig.KEY) private readonly config: RolloutConfig,
  ) {}

  onModuleInit(): void {
    if (this.configService.get<string>('RUN_COMMAND_SWEEPER') !== 'true') return;
    this.startSweepLoop();
  }

  onModuleDestroy(): void {
    this.stopSweepLoop();
  }

  async sweepOnce(): Promise<string[]> {
    const expired = await this.queue.expireForSilentTargets(this.config.heartbeatTimeoutSeconds);
    if (expired.length > 0) {
      this.logger.warn(`Closed ${expired.length} commands on silent targets`);
    }
    return expired;
  }

  startSweepLoop(intervalMs = DEFAULT_SWEEP_INTERVAL_MS): void {
    this.stopSweepLoop();
    this.sweepTimer = setInterval(() => {
      this.sweepOnce().catch((err: unknown) => {
        // next interval retries
        this.logger.error(`Sweep failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);
  }

  stopSweepLoop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
