import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  ManyToMany,
  Index,
} from 'typeorm';
import { Report } from './report.entity';
import { Network } from './network.entity';
import { Project } from './project.entity';
import { Query } from './query.entity';
import { Omic } from './omic.entity';

/**
 * User entity — an account that uploads, curates and queries networks.
 *
 * Invariants:
 * - Email is unique and stored lower-cased
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Admins can read and drop every report and network
 * - Deleting a user cascades to their reports, networks, queries and omics
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 255, name: 'full_name' })
  fullName!: string;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @Column({ type: 'boolean', name: 'is_admin', default: false })
  isAdmin!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Report, (report) => report.owner)
  reports!: Report[];

  @OneToMany(() => Network, (network) => network.owner)
  networks!: Network[];

  @ManyToMany(() => Project, (project) => project.members)
  projects!: Project[];

  @OneToMany(() => Query, (query) => query.owner)
  queries!: Query[];

  @OneToMany(() => Omic, (omic) => omic.owner)
  omics!: Omic[];
}
