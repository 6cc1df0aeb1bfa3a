import { Entity, PrimaryColumn, Column } from 'typeorm';

/** Mirror of the advisory lock held for a target while a run is in flight. */
@Entity('target_locks')
export class TargetLockRow {
  @PrimaryColumn({ length: 128 })
  target_id!: string;

  @Column({ type: 'uuid' })
  locked_by!: string;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  locked_at!: Date;
}
