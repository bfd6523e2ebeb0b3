import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { Edge } from './edge.entity';
import { User } from './user.entity';

/** A user's agreement or disagreement with an edge; one per (edge, user). */
@Entity('edge_votes')
@Unique('UQ_edge_votes_edge_user', ['edgeId', 'userId'])
export class EdgeVote {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'edge_id' })
  edgeId!: string;

  @Column({ type: 'uuid', name: 'user_id' })
  userId!: string;

  @Column({ type: 'boolean' })
  agreed!: boolean;

  @UpdateDateColumn({ type: 'timestamptz', name: 'changed_at' })
  changedAt!: Date;

  @ManyToOne(() => Edge, (edge) => edge.votes, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'edge_id' })
  edge!: Edge;

  @ManyToOne(() => User, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'user_id' })
  user!: User;
}
