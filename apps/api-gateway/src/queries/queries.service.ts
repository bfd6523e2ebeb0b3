import { Injectable, Logger, StreamableFile } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { createHash } from 'node:crypto';
import { Query } from '@biocurate/database';
import {
  GraphView,
  mergeViews,
  PipelineEntry,
  runQuery,
  SeedingEntry,
  toNodeLink,
} from '@biocurate/graph';
import type { RequestUser } from '../auth';
import { NetworkAccessService, toExportFile } from '../networks';
import { CreateQueryDto, QueryViewDto } from './dto';
import { QueryHasNoParentException, QueryNotFoundException } from './exceptions';

/** md5 over the sorted, de-duplicated network ids a query assembles */
export function assemblyHash(networkIds: readonly string[]): string {
  const sorted = [...new Set(networkIds)].sort();
  return createHash('md5').update(sorted.join(',')).digest('hex');
}

/**
 * QueriesService — the append-only query store.
 *
 * A query names the networks to assemble, the seeding that picks the
 * starting subgraph and the pipeline applied after it. Stored queries are
 * never updated: adding a seeding or pipeline entry creates a child query
 * pointing at its parent, so every earlier result stays reproducible.
 *
 * A query is visible to its owner, or to everyone when public. Its result
 * additionally requires every assembled network to still be readable. The
 * network ids are stored on the row itself, so deleting a network never
 * changes which networks a query names.
 */
@Injectable()
export class QueriesService {
  private readonly logger = new Logger(QueriesService.name);

  constructor(
    @InjectRepository(Query)
    private readonly queryRepository: Repository<Query>,

    private readonly access: NetworkAccessService,
  ) {}

  async createQuery(dto: CreateQueryDto, user: RequestUser): Promise<QueryViewDto> {
    const networks = await this.access.findAllReadable(dto.networkIds, user);
    const query = await this.store(
      {
        networkIds: networks.map((network) => network.id),
        seeding: dto.seeding ?? [],
        pipeline: dto.pipeline ?? [],
        parentId: null,
        public: dto.public ?? false,
      },
      user,
    );
    return toQueryView(query);
  }

  async getQuery(queryId: string, user: RequestUser): Promise<QueryViewDto> {
    return toQueryView(await this.findVisible(queryId, user));
  }

  /** The caller's own queries, newest first. */
  async listQueries(user: RequestUser): Promise<QueryViewDto[]> {
    const queries = await this.queryRepository.find({
      where: { ownerId: user.userId },
      order: { createdAt: 'DESC' },
    });
    return queries.map(toQueryView);
  }

  async appendSeeding(
    queryId: string,
    entry: SeedingEntry,
    user: RequestUser,
  ): Promise<QueryViewDto> {
    const parent = await this.findVisible(queryId, user);
    return this.derive(parent, { seeding: [...parent.seeding, entry] }, user);
  }

  async appendPipeline(
    queryId: string,
    entry: PipelineEntry,
    user: RequestUser,
  ): Promise<QueryViewDto> {
    const parent = await this.findVisible(queryId, user);
    return this.derive(parent, { pipeline: [...parent.pipeline, entry] }, user);
  }

  async getParent(queryId: string, user: RequestUser): Promise<QueryViewDto> {
    const query = await this.findVisible(queryId, user);
    if (query.parentId === null) {
      throw new QueryHasNoParentException(query.id);
    }
    return this.getQuery(query.parentId, user);
  }

  /** The root of the query's derivation chain; a root query is its own ancestor. */
  async getAncestor(queryId: string, user: RequestUser): Promise<QueryViewDto> {
    let current = await this.findVisible(queryId, user);
    const seen = new Set<string>([current.id]);

    while (current.parentId !== null && !seen.has(current.parentId)) {
      seen.add(current.parentId);
      current = await this.findVisible(current.parentId, user);
    }
    return toQueryView(current);
  }

  /** Node-link JSON of the assembled, seeded and piped graph. */
  async getResult(queryId: string, user: RequestUser): Promise<Record<string, unknown>> {
    return toNodeLink(await this.evaluate(queryId, user));
  }

  async exportResult(queryId: string, format: string, user: RequestUser): Promise<StreamableFile> {
    return toExportFile(await this.evaluate(queryId, user), format, `query-${queryId}`);
  }

  /** The stored query, or 404 when the caller cannot see it. */
  async requireVisible(queryId: string, user: RequestUser): Promise<Query> {
    return this.findVisible(queryId, user);
  }

  // ── Private helpers ──────────────────────────────────────

  private async evaluate(queryId: string, user: RequestUser): Promise<GraphView> {
    const query = await this.findVisible(queryId, user);
    const networks = await this.access.findAllReadable(query.networkIds, user);
    return runQuery(
      mergeViews(networks.map((network) => network.graph)),
      query.seeding,
      query.pipeline,
    );
  }

  /** Child of `parent` owned by the caller; the parent row is not touched. */
  private async derive(
    parent: Query,
    change: Partial<Pick<Query, 'seeding' | 'pipeline'>>,
    user: RequestUser,
  ): Promise<QueryViewDto> {
    await this.access.findAllReadable(parent.networkIds, user);
    const child = await this.store(
      {
        networkIds: parent.networkIds,
        seeding: change.seeding ?? parent.seeding,
        pipeline: change.pipeline ?? parent.pipeline,
        parentId: parent.id,
        public: false,
      },
      user,
    );
    this.logger.debug(`Query ${child.id} derived from ${parent.id}`);
    return toQueryView(child);
  }

  private async store(
    fields: {
      networkIds: readonly string[];
      seeding: SeedingEntry[];
      pipeline: PipelineEntry[];
      parentId: string | null;
      public: boolean;
    },
    user: RequestUser,
  ): Promise<Query> {
    const ids = [...new Set(fields.networkIds)].sort();
    const query = await this.queryRepository.save(
      this.queryRepository.create({
        ownerId: user.userId,
        networkIds: ids,
        assemblyHash: assemblyHash(ids),
        seeding: fields.seeding.map((entry) => ({ type: entry.type, data: [...entry.data] })),
        pipeline: fields.pipeline.map((entry) => ({ function: entry.function })),
        parentId: fields.parentId,
        public: fields.public,
      }),
    );
    this.logger.log(`Query ${query.id} stored for ${user.userId} over ${ids.length} network(s)`);
    return query;
  }

  private async findVisible(queryId: string, user: RequestUser): Promise<Query> {
    const query = await this.queryRepository.findOne({ where: { id: queryId } });
    if (!query || !(query.public || query.ownerId === user.userId || user.isAdmin)) {
      throw new QueryNotFoundException(queryId);
    }
    return query;
  }
}

function toQueryView(query: Query): QueryViewDto {
  return {
    id: query.id,
    ownerId: query.ownerId,
    networkIds: [...query.networkIds].sort(),
    assemblyHash: query.assemblyHash,
    seeding: query.seeding,
    pipeline: query.pipeline,
    parentId: query.parentId,
    public: query.public,
    createdAt: query.createdAt.toISOString(),
  };
}
