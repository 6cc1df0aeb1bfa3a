import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { TargetRow } from './target.entity';

/**
 * Command channel: one dispatched script per row.
 * The orchestrator inserts pending rows and polls them; the agent on the target claims
 * via FOR UPDATE SKIP LOCKED and writes the terminal status.
 * Statuses: pending, running, success, failed, timed_out, target_unreachable.
 */
@Entity('remote_commands')
@Index(['target_id', 'status', 'created_at'])
export class RemoteCommand {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 128 })
  target_id!: string;

  @ManyToOne(() => TargetRow, (target) => target.commands, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'target_id' })
  target!: TargetRow;

  @Column({ length: 100 })
  template!: string;

  @Column('text')
  body!: string;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ length: 128, nullable: true })
  requested_by!: string | null;

  /** Upper bound the agent enforces on the process; null means no agent-side limit. */
  @Column({ type: 'int', nullable: true })
  timeout_ms!: number | null;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column('text', { default: '' })
  output!: string;

  @Column({ default: false })
  output_truncated!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  claimed_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
