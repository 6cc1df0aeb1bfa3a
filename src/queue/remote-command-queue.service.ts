import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

export type CommandRowStatus =
  | 'pending'
  | 'running'
  | 'success'
  | 'failed'
  | 'timed_out'
  | 'target_unreachable';

/** The columns both sides of the channel read. */
export interface RemoteCommandRecord {
  id: string;
  target_id: string;
  template: string;
  body: string;
  status: CommandRowStatus;
  timeout_ms: number | null;
  exit_code: number | null;
  output: string;
  output_truncated: boolean;
}

export interface EnqueueCommand {
  targetId: string;
  template: string;
  body: string;
  requestedBy: string | null;
  timeoutMs: number | null;
}

export interface FinishedCommand {
  status: Extract<CommandRowStatus, 'success' | 'failed' | 'timed_out'>;
  exitCode: number | null;
  output: string;
  truncated: boolean;
}

const RECORD_COLUMNS = `id, target_id, template, body, status, timeout_ms, exit_code, output, output_truncated`;

/**
 * remote_commands table access. Writes that must return rows go through a CTE so the
 * driver hands back plain rows for UPDATE ... RETURNING.
 */
@Injectable()
export class RemoteCommandQueueService {
  constructor(private readonly dataSource: DataSource) {}

  async enqueue(command: EnqueueCommand): Promise<string> {
    const rows: { id: string }[] = await this.dataSource.query(
      `INSERT INTO remote_commands (target_id, template, body, status, requested_by, timeout_ms)
       VALUES ($1, $2, $3, 'pending', $4, $5)
       RETURNING id`,
      [command.targetId, command.template, command.body, command.requestedBy, command.timeoutMs],
    );
    if (rows.length === 0) throw new Error(`Command for ${command.targetId} was not recorded`);
    return String(rows[0].id);
  }

  async findOne(commandId: string): Promise<RemoteCommandRecord | null> {
    const rows: RemoteCommandRecord[] = await this.dataSource.query(
      `SELECT ${RECORD_COLUMNS} FROM remote_commands WHERE id = $1`,
      [commandId],
    );
    return rows[0] ?? null;
  }

  /**
   * Claims the oldest pending command addressed to this target.
   * One agent per target is expected, SKIP LOCKED keeps a second one harmless.
   */
  async claimNext(targetId: string): Promise<RemoteCommandRecord | null> {
    const rows: RemoteCommandRecord[] = await this.dataSource.query(
      `
      WITH claimed AS (
        UPDATE remote_commands
        SET status = 'running',
            claimed_at = NOW()
        WHERE id = (
          SELECT c.id
          FROM remote_commands c
          WHERE c.target_id = $1
            AND c.status = 'pending'
          ORDER BY c.created_at ASC
          FOR UPDATE SKIP LOCKED
          LIMIT 1
        )
        RETURNING ${RECORD_COLUMNS}
      )
      SELECT * FROM claimed
      `,
      [targetId],
    );
    return rows[0] ?? null;
  }

  async markFinished(commandId: string, result: FinishedCommand): Promise<void> {
    await this.dataSource.query(
      `
      UPDATE remote_commands
      SET status = $2,
          exit_code = $3,
          output = $4,
          output_truncated = $5,
          completed_at = NOW()
      WHERE id = $1
        AND status = 'running'
      `,
      [commandId, result.status, result.exitCode, result.output, result.truncated],
    );
  }

  /**
   * Commands still pending or running on a target whose agent has gone quiet for longer than
   * timeoutSeconds are closed as target_unreachable. Returns the ids that were closed.
   */
  async expireForSilentTargets(timeoutSeconds: number): Promise<string[]> {
    const rows: { id: string }[] = await this.dataSource.query(
      `
      WITH expired AS (
        UPDATE remote_commands c
        SET status = 'target_unreachable',
            completed_at = NOW()
        FROM targets t
        WHERE c.target_id = t.id
          AND c.status IN ('pending', 'running')
          AND (t.last_seen_at IS NULL
               OR t.last_seen_at < NOW() - ($1::text || ' seconds')::interval)
        RETURNING c.id
      )
      SELECT id FROM expired
      `,
      [timeoutSeconds],
    );
    return rows.map((r) => String(r.id));
  }
}
