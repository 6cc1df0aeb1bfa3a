import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { FleetQuery } from './fleet-query';
import { LIVENESS_STATES, Liveness, Target, TargetSelector } from './target.types';

/**
 * SQL expression deriving liveness from the agent heartbeat. $2 is the heartbeat window in seconds.
 */
export const LIVENESS_SQL = `
  CASE
    WHEN last_seen_at IS NULL THEN 'unknown'
    WHEN last_seen_at >= NOW() - ($2::text || ' seconds')::interval THEN 'alive'
    ELSE 'unreachable'
  END`;

export interface TargetQueryRow {
  id: string;
  labels: Record<string, string> | null;
  liveness: string;
}

export function toTarget(row: TargetQueryRow): Target {
  const liveness = LIVENESS_STATES.find((state): state is Liveness => state === row.liveness);
  return {
    id: String(row.id),
    liveness: liveness ?? 'unknown',
    labels: { ...(row.labels ?? {}) },
  };
}

@Injectable()
export class PgFleetQueryService extends FleetQuery {
  constructor(
    private readonly dataSource: DataSource,
    @Inject(rolloutConfig.KEY) private readonly config: RolloutConfig,
  ) {
    super();
  }

  async list(selector: TargetSelector): Promise<Target[]> {
    const rows: TargetQueryRow[] = await this.dataSource.query(
      `SELECT id, labels, ${LIVENESS_SQL} AS liveness
       FROM targets
       WHERE labels @> $1::jsonb
       ORDER BY id`,
      [JSON.stringify(selector.labels), this.config.heartbeatTimeoutSeconds],
    );
    return rows.map(toTarget);
  }
}
