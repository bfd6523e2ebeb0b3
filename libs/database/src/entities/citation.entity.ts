import { Entity, PrimaryGeneratedColumn, Column, OneToMany, Unique } from 'typeorm';
import { Edge } from './edge.entity';

/**
 * Citation entity — a literature reference shared by every network that
 * cites it. Upserted by (db, reference) when a network is stored.
 */
@Entity('citations')
@Unique('UQ_citations_db_reference', ['db', 'reference'])
export class Citation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64 })
  db!: string;

  @Column({ type: 'varchar', length: 255 })
  reference!: string;

  @Column({ type: 'text', nullable: true })
  title!: string | null;

  @OneToMany(() => Edge, (edge) => edge.citation)
  edges!: Edge[];
}
