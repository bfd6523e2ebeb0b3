import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  OneToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { Network } from './network.entity';
import { ReportStatus } from '../enums/report-status.enum';

/**
 * Report entity — one compilation attempt of an uploaded document.
 *
 * The row is the hand-off between the api-gateway and the worker: the
 * gateway inserts it PENDING with the document bytes and compile flags,
 * the worker claims it by setting started_at and finishes it exactly once.
 *
 * Invariants:
 * - status leaves PENDING at most once and never changes afterwards
 * - started_at is set by the single worker that claimed the report
 * - network_id is set only when COMPLETED, and is unique
 * - message is set only when FAILED
 * - source is excluded from default selects; load it explicitly
 */
@Entity('reports')
@Index('IDX_reports_owner_status', ['ownerId', 'status'])
export class Report {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255, name: 'source_name' })
  sourceName!: string;

  @Column({ type: 'bytea', select: false })
  source!: Buffer;

  /** sha512 hex digest of source */
  @Column({ type: 'varchar', length: 128, name: 'source_hash' })
  sourceHash!: string;

  @Column({ type: 'varchar', length: 32, default: 'utf-8' })
  encoding!: string;

  // ── Compile flags ────────────────────────────────────────

  @Column({ type: 'boolean', default: true })
  public!: boolean;

  @Column({ type: 'boolean', name: 'citation_clearing', default: true })
  citationClearing!: boolean;

  @Column({ type: 'boolean', name: 'infer_origin', default: true })
  inferOrigin!: boolean;

  @Column({ type: 'boolean', name: 'identifier_validation', default: true })
  identifierValidation!: boolean;

  // ── Outcome ──────────────────────────────────────────────

  @Column({
    type: 'enum',
    enum: ReportStatus,
    enumName: 'report_status_enum',
    default: ReportStatus.PENDING,
  })
  status!: ReportStatus;

  @Column({ type: 'text', nullable: true })
  message!: string | null;

  @Column({ type: 'int', name: 'number_nodes', nullable: true })
  numberNodes!: number | null;

  @Column({ type: 'int', name: 'number_edges', nullable: true })
  numberEdges!: number | null;

  @Column({ type: 'int', name: 'number_warnings', nullable: true })
  numberWarnings!: number | null;

  @Column({ type: 'int', name: 'number_citations', nullable: true })
  numberCitations!: number | null;

  @Column({ type: 'int', name: 'duration_ms', nullable: true })
  durationMs!: number | null;

  @Column({ type: 'varchar', length: 64, name: 'task_id', nullable: true })
  taskId!: string | null;

  @Column({ type: 'timestamptz', name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'completed_at', nullable: true })
  completedAt!: Date | null;

  @Column({ type: 'uuid', name: 'network_id', nullable: true, unique: true })
  networkId!: string | null;

  @Index('IDX_reports_owner_id')
  @Column({ type: 'uuid', name: 'owner_id' })
  ownerId!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.reports, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'owner_id' })
  owner!: User;

  @OneToOne(() => Network, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'network_id' })
  network!: Network | null;
}
