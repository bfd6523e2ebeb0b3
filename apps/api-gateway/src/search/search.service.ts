import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Citation, Edge } from '@biocurate/database';
import type { RequestUser } from '../auth';
import {
  CitationViewDto,
  EdgeViewDto,
  NetworkAccessService,
  NetworkViewDto,
  toCitationView,
  toEdgeView,
  toNetworkView,
} from '../networks';

export const SEARCH_RESULT_LIMIT = 50;

/** `%term%` with LIKE wildcards in the term taken literally */
export function containsPattern(term: string): string {
  return `%${term.trim().replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

/**
 * SearchService — substring search over readable networks only.
 *
 * Every query joins the owning network and applies the same read rule as
 * NetworkAccessService, so results never leak private networks.
 */
@Injectable()
export class SearchService {
  constructor(
    @InjectRepository(Edge)
    private readonly edgeRepository: Repository<Edge>,

    @InjectRepository(Citation)
    private readonly citationRepository: Repository<Citation>,

    private readonly access: NetworkAccessService,
  ) {}

  async searchNetworks(q: string, user: RequestUser): Promise<NetworkViewDto[]> {
    const networks = await this.access
      .readableNetworks(user)
      .andWhere('(network.name ILIKE :pattern OR network.description ILIKE :pattern)', {
        pattern: containsPattern(q),
      })
      .orderBy('network.createdAt', 'DESC')
      .take(SEARCH_RESULT_LIMIT)
      .getMany();
    return networks.map(toNetworkView);
  }

  async searchEdges(
    q: string,
    relation: string | undefined,
    user: RequestUser,
  ): Promise<EdgeViewDto[]> {
    const query = this.edgeRepository
      .createQueryBuilder('edge')
      .innerJoin('edge.network', 'network')
      .leftJoinAndSelect('edge.citation', 'citation')
      .where('(edge.sourceLabel ILIKE :pattern OR edge.targetLabel ILIKE :pattern)', {
        pattern: containsPattern(q),
      });
    if (relation) {
      query.andWhere('edge.relation = :relation', { relation });
    }

    const edges = await this.access
      .restrictToReadable(query, user)
      .orderBy('edge.sourceLabel', 'ASC')
      .addOrderBy('edge.targetLabel', 'ASC')
      .take(SEARCH_RESULT_LIMIT)
      .getMany();
    return edges.map(toEdgeView);
  }

  /** Citations used by at least one edge of a readable network. */
  async searchCitations(q: string, user: RequestUser): Promise<CitationViewDto[]> {
    const query = this.citationRepository
      .createQueryBuilder('citation')
      .innerJoin('citation.edges', 'edge')
      .innerJoin('edge.network', 'network')
      .where('(citation.reference ILIKE :pattern OR citation.title ILIKE :pattern)', {
        pattern: containsPattern(q),
      });

    const citations = await this.access
      .restrictToReadable(query, user)
      .orderBy('citation.db', 'ASC')
      .addOrderBy('citation.reference', 'ASC')
      .take(SEARCH_RESULT_LIMIT)
      .getMany();
    return citations.map(toCitationView);
  }
}
