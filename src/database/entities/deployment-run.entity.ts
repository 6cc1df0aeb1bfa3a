import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';
import type { RunReport } from '../../pipeline/pipeline-run';

/**
 * Persisted run report. Written once when a run ends; never updated.
 */
@Entity('deployment_runs')
@Index(['created_at'])
export class DeploymentRunRow {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ length: 128, nullable: true })
  target_id!: string | null;

  @Column({ length: 500 })
  image_ref!: string;

  @Column('jsonb')
  selector!: Record<string, unknown>;

  @Column({ length: 100 })
  verdict!: string;

  @Column('jsonb')
  report!: RunReport;

  @Column({ type: 'timestamptz' })
  started_at!: Date;

  @Column({ type: 'timestamptz' })
  finished_at!: Date;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
