import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — creates all core tables for biocurate.
 *
 * Tables: users, reports, networks, citations, edges, edge_votes,
 *         edge_comments, projects, project_members, project_networks,
 *         queries, omics, experiments
 * Enums: report_status_enum, experiment_status_enum
 *
 * Hand-written to match the TypeORM entity definitions, since
 * migration:generate needs a running database. PostgreSQL-specific
 * (uuid_generate_v4, timestamptz, jsonb, bytea, CREATE TYPE).
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Enable UUID extension ──────────────────────────────
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Create enum types ──────────────────────────────────
    await queryRunner.query(
      `CREATE TYPE "report_status_enum" AS ENUM ('pending', 'completed', 'failed')`,
    );
    await queryRunner.query(
      `CREATE TYPE "experiment_status_enum" AS ENUM ('pending', 'completed', 'failed')`,
    );

    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "email"         varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "full_name"     varchar(255) NOT NULL,
        "is_active"     boolean NOT NULL DEFAULT true,
        "is_admin"      boolean NOT NULL DEFAULT false,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );

    // ── Reports table ──────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "reports" (
        "id"                    uuid NOT NULL DEFAULT uuid_generate_v4(),
        "source_name"           varchar(255) NOT NULL,
        "source"                bytea NOT NULL,
        "source_hash"           varchar(128) NOT NULL,
        "encoding"              varchar(32) NOT NULL DEFAULT 'utf-8',
        "public"                boolean NOT NULL DEFAULT true,
        "citation_clearing"     boolean NOT NULL DEFAULT true,
        "infer_origin"          boolean NOT NULL DEFAULT true,
        "identifier_validation" boolean NOT NULL DEFAULT true,
        "status"                "report_status_enum" NOT NULL DEFAULT 'pending',
        "message"               text,
        "number_nodes"          integer,
        "number_edges"          integer,
        "number_warnings"       integer,
        "number_citations"      integer,
        "duration_ms"           integer,
        "task_id"               varchar(64),
        "started_at"            TIMESTAMPTZ,
        "completed_at"          TIMESTAMPTZ,
        "network_id"            uuid,
        "owner_id"              uuid NOT NULL,
        "created_at"            TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_reports" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_reports_network_id" UNIQUE ("network_id"),
        CONSTRAINT "FK_reports_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_reports_owner_id" ON "reports" ("owner_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_reports_owner_status" ON "reports" ("owner_id", "status")`,
    );

    // ── Networks table ─────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "networks" (
        "id"           uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name"         varchar(255) NOT NULL,
        "version"      varchar(64) NOT NULL,
        "description"  text,
        "authors"      text,
        "contact"      varchar(255),
        "license"      text,
        "public"       boolean NOT NULL DEFAULT false,
        "graph"        jsonb NOT NULL,
        "number_nodes" integer NOT NULL,
        "number_edges" integer NOT NULL,
        "owner_id"     uuid NOT NULL,
        "report_id"    uuid NOT NULL,
        "created_at"   TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_networks" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_networks_name_version" UNIQUE ("name", "version"),
        CONSTRAINT "UQ_networks_report_id" UNIQUE ("report_id"),
        CONSTRAINT "FK_networks_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_networks_owner_id" ON "networks" ("owner_id")`,
    );
    await queryRunner.query(`
      ALTER TABLE "reports" ADD CONSTRAINT "FK_reports_network"
        FOREIGN KEY ("network_id") REFERENCES "networks"("id")
        ON DELETE SET NULL ON UPDATE NO ACTION
    `);

    // ── Citations table ────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "citations" (
        "id"        uuid NOT NULL DEFAULT uuid_generate_v4(),
        "db"        varchar(64) NOT NULL,
        "reference" varchar(255) NOT NULL,
        "title"     text,
        CONSTRAINT "PK_citations" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_citations_db_reference" UNIQUE ("db", "reference")
      )
    `);

    // ── Edges table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "edges" (
        "id"           uuid NOT NULL DEFAULT uuid_generate_v4(),
        "network_id"   uuid NOT NULL,
        "source_label" varchar(512) NOT NULL,
        "target_label" varchar(512) NOT NULL,
        "relation"     varchar(64) NOT NULL,
        "evidence"     text,
        "annotations"  jsonb NOT NULL DEFAULT '{}',
        "hash"         varchar(32) NOT NULL,
        "citation_id"  uuid,
        CONSTRAINT "PK_edges" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_edges_network_hash" UNIQUE ("network_id", "hash"),
        CONSTRAINT "FK_edges_network" FOREIGN KEY ("network_id")
          REFERENCES "networks"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_edges_citation" FOREIGN KEY ("citation_id")
          REFERENCES "citations"("id") ON DELETE SET NULL ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_edges_network_id" ON "edges" ("network_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_edges_relation" ON "edges" ("relation")`,
    );

    // ── Edge votes & comments ──────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "edge_votes" (
        "id"         uuid NOT NULL DEFAULT uuid_generate_v4(),
        "edge_id"    uuid NOT NULL,
        "user_id"    uuid NOT NULL,
        "agreed"     boolean NOT NULL,
        "changed_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_edge_votes" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_edge_votes_edge_user" UNIQUE ("edge_id", "user_id"),
        CONSTRAINT "FK_edge_votes_edge" FOREIGN KEY ("edge_id")
          REFERENCES "edges"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_edge_votes_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "edge_comments" (
        "id"         uuid NOT NULL DEFAULT uuid_generate_v4(),
        "edge_id"    uuid NOT NULL,
        "user_id"    uuid NOT NULL,
        "comment"    text NOT NULL,
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_edge_comments" PRIMARY KEY ("id"),
        CONSTRAINT "FK_edge_comments_edge" FOREIGN KEY ("edge_id")
          REFERENCES "edges"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_edge_comments_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_edge_comments_edge_id" ON "edge_comments" ("edge_id")`,
    );

    // ── Projects ───────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "projects" (
        "id"          uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name"        varchar(255) NOT NULL,
        "description" text,
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_projects" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_projects_name" UNIQUE ("name")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "project_members" (
        "project_id" uuid NOT NULL,
        "user_id"    uuid NOT NULL,
        CONSTRAINT "PK_project_members" PRIMARY KEY ("project_id", "user_id"),
        CONSTRAINT "FK_project_members_project" FOREIGN KEY ("project_id")
          REFERENCES "projects"("id") ON DELETE CASCADE ON UPDATE CASCADE,
        CONSTRAINT "FK_project_members_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "project_networks" (
        "project_id" uuid NOT NULL,
        "network_id" uuid NOT NULL,
        CONSTRAINT "PK_project_networks" PRIMARY KEY ("project_id", "network_id"),
        CONSTRAINT "FK_project_networks_project" FOREIGN KEY ("project_id")
          REFERENCES "projects"("id") ON DELETE CASCADE ON UPDATE CASCADE,
        CONSTRAINT "FK_project_networks_network" FOREIGN KEY ("network_id")
          REFERENCES "networks"("id") ON DELETE CASCADE ON UPDATE CASCADE
      )
    `);

    // ── Queries ────────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "queries" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "owner_id"      uuid NOT NULL,
        "assembly_hash" varchar(32) NOT NULL,
        "network_ids"   uuid[] NOT NULL,
        "seeding"       jsonb NOT NULL DEFAULT '[]',
        "pipeline"      jsonb NOT NULL DEFAULT '[]',
        "parent_id"     uuid,
        "public"        boolean NOT NULL DEFAULT false,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_queries" PRIMARY KEY ("id"),
        CONSTRAINT "FK_queries_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_queries_parent" FOREIGN KEY ("parent_id")
          REFERENCES "queries"("id") ON DELETE SET NULL ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_queries_owner_id" ON "queries" ("owner_id")`,
    );

    // ── Omics & experiments ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "omics" (
        "id"           uuid NOT NULL DEFAULT uuid_generate_v4(),
        "source_name"  varchar(255) NOT NULL,
        "description"  text,
        "gene_column"  varchar(128) NOT NULL,
        "data_column"  varchar(128) NOT NULL,
        "data"         jsonb NOT NULL,
        "number_genes" integer NOT NULL,
        "public"       boolean NOT NULL DEFAULT false,
        "owner_id"     uuid NOT NULL,
        "created_at"   TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_omics" PRIMARY KEY ("id"),
        CONSTRAINT "FK_omics_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_omics_owner_id" ON "omics" ("owner_id")`,
    );

    await queryRunner.query(`
      CREATE TABLE "experiments" (
        "id"           uuid NOT NULL DEFAULT uuid_generate_v4(),
        "query_id"     uuid NOT NULL,
        "omic_id"      uuid NOT NULL,
        "owner_id"     uuid NOT NULL,
        "status"       "experiment_status_enum" NOT NULL DEFAULT 'pending',
        "steps"        integer NOT NULL DEFAULT 10,
        "result"       jsonb,
        "message"      text,
        "duration_ms"  integer,
        "task_id"      varchar(64),
        "started_at"   TIMESTAMPTZ,
        "completed_at" TIMESTAMPTZ,
        "created_at"   TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_experiments" PRIMARY KEY ("id"),
        CONSTRAINT "FK_experiments_query" FOREIGN KEY ("query_id")
          REFERENCES "queries"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_experiments_omic" FOREIGN KEY ("omic_id")
          REFERENCES "omics"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_experiments_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_experiments_owner_id" ON "experiments" ("owner_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // ── Drop tables (reverse order of creation) ────────────
    await queryRunner.query(`DROP TABLE IF EXISTS "experiments"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "omics"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "queries"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "project_networks"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "project_members"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "projects"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "edge_comments"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "edge_votes"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "edges"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "citations"`);
    await queryRunner.query(`ALTER TABLE "reports" DROP CONSTRAINT IF EXISTS "FK_reports_network"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "networks"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "reports"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);

    // ── Drop enum types ────────────────────────────────────
    await queryRunner.query(`DROP TYPE IF EXISTS "experiment_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "report_status_enum"`);

    // ── Drop extension ─────────────────────────────────────
    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}
