import { Entity, PrimaryColumn, Column, CreateDateColumn, OneToMany, Index } from 'typeorm';
import { RemoteCommand } from './remote-command.entity';

/**
 * One compute instance that can receive deployments.
 * Rows are written by the agent running on the instance; liveness is derived from last_seen_at
 * at query time and never stored.
 */
@Entity('targets')
@Index(['last_seen_at'])
export class TargetRow {
  @PrimaryColumn({ length: 128 })
  id!: string;

  @Column('jsonb', { default: () => `'{}'::jsonb` })
  labels!: Record<string, string>;

  @Column({ type: 'timestamptz', nullable: true })
  last_seen_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  registered_at!: Date;

  @OneToMany(() => RemoteCommand, (command) => command.target)
  commands!: RemoteCommand[];
}
