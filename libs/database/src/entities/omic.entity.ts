import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';

/**
 * Omic entity — a table of per-gene measurements (e.g. differential
 * expression) used to seed heat diffusion experiments.
 *
 * data is excluded from default selects.
 */
@Entity('omics')
export class Omic {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255, name: 'source_name' })
  sourceName!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 128, name: 'gene_column' })
  geneColumn!: string;

  @Column({ type: 'varchar', length: 128, name: 'data_column' })
  dataColumn!: string;

  @Column({ type: 'jsonb', select: false })
  data!: Record<string, number>;

  @Column({ type: 'int', name: 'number_genes' })
  numberGenes!: number;

  @Column({ type: 'boolean', default: false })
  public!: boolean;

  @Index('IDX_omics_owner_id')
  @Column({ type: 'uuid', name: 'owner_id' })
  ownerId!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => User, (user) => user.omics, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'owner_id' })
  owner!: User;
}
