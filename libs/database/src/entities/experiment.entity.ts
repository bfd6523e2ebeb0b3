import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import type { HeatScore } from '@biocurate/graph';
import { User } from './user.entity';
import { Query } from './query.entity';
import { Omic } from './omic.entity';
import { ExperimentStatus } from '../enums/experiment-status.enum';

/**
 * Experiment entity — a heat diffusion run of an omic over a query result.
 *
 * Invariants:
 * - status leaves PENDING at most once
 * - started_at is set by the single worker that claimed the experiment
 * - result is set only when COMPLETED, message only when FAILED
 */
@Entity('experiments')
export class Experiment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'query_id' })
  queryId!: string;

  @Column({ type: 'uuid', name: 'omic_id' })
  omicId!: string;

  @Index('IDX_experiments_owner_id')
  @Column({ type: 'uuid', name: 'owner_id' })
  ownerId!: string;

  @Column({
    type: 'enum',
    enum: ExperimentStatus,
    enumName: 'experiment_status_enum',
    default: ExperimentStatus.PENDING,
  })
  status!: ExperimentStatus;

  @Column({ type: 'int', default: 10 })
  steps!: number;

  @Column({ type: 'jsonb', nullable: true })
  result!: HeatScore[] | null;

  @Column({ type: 'text', nullable: true })
  message!: string | null;

  @Column({ type: 'int', name: 'duration_ms', nullable: true })
  durationMs!: number | null;

  @Column({ type: 'varchar', length: 64, name: 'task_id', nullable: true })
  taskId!: string | null;

  @Column({ type: 'timestamptz', name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'completed_at', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Query, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'query_id' })
  query!: Query;

  @ManyToOne(() => Omic, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'omic_id' })
  omic!: Omic;

  @ManyToOne(() => User, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'owner_id' })
  owner!: User;
}
