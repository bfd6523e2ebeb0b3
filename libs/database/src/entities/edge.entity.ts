import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import { Network } from './network.entity';
import { Citation } from './citation.entity';
import { EdgeVote } from './edge-vote.entity';
import { EdgeComment } from './edge-comment.entity';

/**
 * Edge entity — one statement of a stored network, indexed for search,
 * voting and comments.
 *
 * Invariants:
 * - (network_id, hash) is unique
 * - Deleted together with its network
 */
@Entity('edges')
@Unique('UQ_edges_network_hash', ['networkId', 'hash'])
export class Edge {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_edges_network_id')
  @Column({ type: 'uuid', name: 'network_id' })
  networkId!: string;

  @Column({ type: 'varchar', length: 512, name: 'source_label' })
  sourceLabel!: string;

  @Column({ type: 'varchar', length: 512, name: 'target_label' })
  targetLabel!: string;

  @Index('IDX_edges_relation')
  @Column({ type: 'varchar', length: 64 })
  relation!: string;

  @Column({ type: 'text', nullable: true })
  evidence!: string | null;

  @Column({ type: 'jsonb', default: {} })
  annotations!: Record<string, string>;

  /** md5 of the edge's canonical form */
  @Column({ type: 'varchar', length: 32 })
  hash!: string;

  @Column({ type: 'uuid', name: 'citation_id', nullable: true })
  citationId!: string | null;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Network, (network) => network.edges, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'network_id' })
  network!: Network;

  @ManyToOne(() => Citation, (citation) => citation.edges, {
    onDelete: 'SET NULL',
    nullable: true,
  })
  @JoinColumn({ name: 'citation_id' })
  citation!: Citation | null;

  @OneToMany(() => EdgeVote, (vote) => vote.edge)
  votes!: EdgeVote[];

  @OneToMany(() => EdgeComment, (comment) => comment.edge)
  comments!: EdgeComment[];
}
