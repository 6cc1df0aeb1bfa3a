import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { LIVENESS_SQL, toTarget, TargetQueryRow } from './pg-fleet-query.service';
import { Target } from './target.types';

/**
 * Writes and reads individual target rows. Agents register and heartbeat through here;
 * the execution client re-checks liveness at dispatch time.
 */
@Injectable()
export class TargetRegistryService {
  constructor(
    private readonly dataSource: DataSource,
    @Inject(rolloutConfig.KEY) private readonly config: RolloutConfig,
  ) {}

  async register(targetId: string, labels: Record<string, string>): Promise<void> {
    await this.dataSource.query(
      `INSERT INTO targets (id, labels, last_seen_at)
       VALUES ($1, $2::jsonb, NOW())
       ON CONFLICT (id) DO UPDATE SET
         labels = EXCLUDED.labels,
         last_seen_at = EXCLUDED.last_seen_at`,
      [targetId, JSON.stringify(labels)],
    );
  }

  async heartbeat(targetId: string): Promise<void> {
    await this.dataSource.query(`UPDATE targets SET last_seen_at = NOW() WHERE id = $1`, [
      targetId,
    ]);
  }

  async findOne(targetId: string): Promise<Target | null> {
    const rows: TargetQueryRow[] = await this.dataSource.query(
      `SELECT id, labels, ${LIVENESS_SQL} AS liveness FROM targets WHERE id = $1`,
      [targetId, this.config.heartbeatTimeoutSeconds],
    );
    return rows.length > 0 ? toTarget(rows[0]) : null;
  }
}
