import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import type { CitationViewDto, EdgeViewDto, NetworkViewDto } from '../networks';
import { SearchService } from './search.service';
import { EdgeSearchQueryDto, SearchQueryDto } from './dto';

/**
 * Routes (JWT required), at most 50 results each:
 *   GET /search/networks?q=
 *   GET /search/edges?q=&relation=
 *   GET /search/citations?q=
 */
@Controller('search')
@UseGuards(JwtAuthGuard)
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Get('networks')
  async networks(
    @Query() query: SearchQueryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<NetworkViewDto[]> {
    return this.searchService.searchNetworks(query.q, user);
  }

  @Get('edges')
  async edges(
    @Query() query: EdgeSearchQueryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<EdgeViewDto[]> {
    return this.searchService.searchEdges(query.q, query.relation, user);
  }

  @Get('citations')
  async citations(
    @Query() query: SearchQueryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<CitationViewDto[]> {
    return this.searchService.searchCitations(query.q, user);
  }
}
