import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  ManyToMany,
  OneToMany,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import type { CompiledGraph } from '@biocurate/graph';
import { User } from './user.entity';
import { Edge } from './edge.entity';
import { Project } from './project.entity';

/**
 * Network entity — the graph produced by a completed report.
 *
 * Invariants:
 * - (name, version) is unique across all networks
 * - report_id is unique: one report yields at most one network
 * - graph holds the compiled graph and is excluded from default selects
 * - Deleting a network cascades to its edges; the report keeps its row
 */
@Entity('networks')
@Unique('UQ_networks_name_version', ['name', 'version'])
export class Network {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 64 })
  version!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'text', nullable: true })
  authors!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  contact!: string | null;

  @Column({ type: 'text', nullable: true })
  license!: string | null;

  @Column({ type: 'boolean', default: false })
  public!: boolean;

  @Column({ type: 'jsonb', select: false })
  graph!: CompiledGraph;

  @Column({ type: 'int', name: 'number_nodes' })
  numberNodes!: number;

  @Column({ type: 'int', name: 'number_edges' })
  numberEdges!: number;

  @Index('IDX_networks_owner_id')
  @Column({ type: 'uuid', name: 'owner_id' })
  ownerId!: string;

  @Column({ type: 'uuid', name: 'report_id', unique: true })
  reportId!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.networks, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'owner_id' })
  owner!: User;

  @OneToMany(() => Edge, (edge) => edge.network)
  edges!: Edge[];

  @ManyToMany(() => Project, (project) => project.networks)
  projects!: Project[];
}
