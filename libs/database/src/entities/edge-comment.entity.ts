import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Edge } from './edge.entity';
import { User } from './user.entity';

@Entity('edge_comments')
export class EdgeComment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_edge_comments_edge_id')
  @Column({ type: 'uuid', name: 'edge_id' })
  edgeId!: string;

  @Column({ type: 'uuid', name: 'user_id' })
  userId!: string;

  @Column({ type: 'text' })
  comment!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => Edge, (edge) => edge.comments, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'edge_id' })
  edge!: Edge;

  @ManyToOne(() => User, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'user_id' })
  user!: User;
}
