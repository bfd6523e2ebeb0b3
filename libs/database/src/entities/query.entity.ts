import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import type { PipelineEntry, SeedingEntry } from '@biocurate/graph';
import { User } from './user.entity';

/**
 * Query entity — a saved graph query over an assembly of networks.
 *
 * Invariants:
 * - Append-only: rows are never updated; deriving a query inserts a child
 *   row whose parent_id points at the source query
 * - assembly_hash is the md5 of the sorted network ids
 * - network_ids is a plain array with no foreign key, so deleting a
 *   network leaves the query naming it; running such a query fails
 */
@Entity('queries')
export class Query {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_queries_owner_id')
  @Column({ type: 'uuid', name: 'owner_id' })
  ownerId!: string;

  @Column({ type: 'varchar', length: 32, name: 'assembly_hash' })
  assemblyHash!: string;

  @Column({ type: 'uuid', array: true, name: 'network_ids' })
  networkIds!: string[];

  @Column({ type: 'jsonb', default: [] })
  seeding!: SeedingEntry[];

  @Column({ type: 'jsonb', default: [] })
  pipeline!: PipelineEntry[];

  @Column({ type: 'uuid', name: 'parent_id', nullable: true })
  parentId!: string | null;

  @Column({ type: 'boolean', default: false })
  public!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.queries, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'owner_id' })
  owner!: User;

  @ManyToOne(() => Query, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'parent_id' })
  parent!: Query | null;

}
