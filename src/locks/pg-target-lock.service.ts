import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, PoolClient } from 'pg';
import { TargetLock, TargetLockResult } from './target-lock';

export const TARGET_LOCK_POOL = Symbol('TARGET_LOCK_POOL');

const TRY_LOCK_SQL = `SELECT pg_try_advisory_lock(hashtext($1)) AS acquired`;
const UNLOCK_SQL = `SELECT pg_advisory_unlock(hashtext($1))`;
const HOLDER_SQL = `SELECT locked_by FROM target_locks WHERE target_id = $1`;
const RECORD_HOLDER_SQL = `
  INSERT INTO target_locks (target_id, locked_by, locked_at)
  VALUES ($1, $2, NOW())
  ON CONFLICT (target_id) DO UPDATE SET locked_by = EXCLUDED.locked_by, locked_at = EXCLUDED.locked_at`;
const CLEAR_HOLDER_SQL = `DELETE FROM target_locks WHERE target_id = $1 AND locked_by = $2`;

function lockKey(targetId: string): string {
  return `target:${targetId}`;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * One run per target, enforced with a session-level advisory lock. The lock lives as long
 * as the connection that took it, so each held target keeps its own client checked out of
 * the pool until release. target_locks only records the holder for TargetBusy reports.
 */
@Injectable()
export class PgTargetLockService extends TargetLock implements OnModuleDestroy {
  private readonly logger = new Logger(PgTargetLockService.name);

  constructor(@Inject(TARGET_LOCK_POOL) private readonly pool: Pool) {
    super();
  }

  async tryAcquire(targetId: string, runId: string): Promise<TargetLockResult> {
    const client = await this.pool.connect();

    let acquired = false;
    try {
      const result = await client.query<{ acquired: boolean }>(TRY_LOCK_SQL, [lockKey(targetId)]);
      acquired = result.rows[0]?.acquired === true;
      if (!acquired) {
        const holder = await client.query<{ locked_by: string }>(HOLDER_SQL, [targetId]);
        client.release();
        return { acquired: false, holder: holder.rows[0]?.locked_by ?? null, release: async () => {} };
      }
      await client.query(RECORD_HOLDER_SQL, [targetId, runId]);
    } catch (err) {
      // Destroy rather than return the connection: it may still hold the session lock.
      client.release(acquired ? asError(err) : undefined);
      throw err;
    }

    return { acquired: true, holder: null, release: () => this.release(client, targetId, runId) };
  }

  /** Unlocks first; a failed unlock destroys the connection, which ends the lock with it. */
  private async release(client: PoolClient, targetId: string, runId: string): Promise<void> {
    try {
      await client.query(UNLOCK_SQL, [lockKey(targetId)]);
    } catch (err) {
      client.release(asError(err));
      this.logger.warn(`Unlock of ${targetId} failed, connection dropped: ${asError(err).message}`);
      await this.clearHolder((sql, params) => this.pool.query(sql, params), targetId, runId);
      return;
    }
    await this.clearHolder((sql, params) => client.query(sql, params), targetId, runId);
    client.release();
  }

  private async clearHolder(
    query: (sql: string, params: string[]) => Promise<unknown>,
    targetId: string,
    runId: string,
  ): Promise<void> {
    try {
      await query(CLEAR_HOLDER_SQL, [targetId, runId]);
    } catch (err) {
      this.logger.warn(`Could not clear the holder row of ${targetId}: ${asError(err).message}`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
