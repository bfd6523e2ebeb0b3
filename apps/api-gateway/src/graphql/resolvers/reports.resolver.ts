import { Resolver, Query, ResolveField, Parent, Args, ID } from '@nestjs/graphql';
import { UseGuards, Logger } from '@nestjs/common';
import type { RequestUser } from '../../auth';
import { GqlJwtAuthGuard } from '../guards/gql-auth.guard';
import { GqlCurrentUser } from '../decorators/gql-current-user.decorator';
import { GraphqlApiService } from '../graphql-api.service';
import { NetworkLoader } from '../loaders';
import { NetworkType, ReportType } from '../types';

/**
 * GraphQL resolver for reports.
 *
 * ```graphql
 * query {
 *   reports {
 *     id
 *     sourceName
 *     status
 *     network { name version numberEdges }
 *   }
 * }
 * ```
 */
@Resolver(() => ReportType)
export class ReportsResolver {
  private readonly logger = new Logger(ReportsResolver.name);

  constructor(
    private readonly graphqlApiService: GraphqlApiService,
    private readonly networkLoader: NetworkLoader,
  ) {}

  @Query(() => [ReportType], {
    name: 'reports',
    description: 'Own reports, newest first; admins see all',
  })
  @UseGuards(GqlJwtAuthGuard)
  async reports(@GqlCurrentUser() user: RequestUser): Promise<ReportType[]> {
    this.logger.debug(`Query reports for user ${user.userId}`);
    return this.graphqlApiService.findReports(user);
  }

  @Query(() => ReportType, { name: 'report' })
  @UseGuards(GqlJwtAuthGuard)
  async report(
    @Args('id', { type: () => ID, description: 'Report UUID' }) id: string,
    @GqlCurrentUser() user: RequestUser,
  ): Promise<ReportType> {
    return this.graphqlApiService.findReportById(id, user);
  }

  @ResolveField('network', () => NetworkType, { nullable: true })
  async network(
    @Parent() report: ReportType,
    @GqlCurrentUser() user: RequestUser,
  ): Promise<NetworkType | null> {
    if (report.networkId === null) {
      return null;
    }
    const network = await this.networkLoader.loadById(report.networkId);
    return this.graphqlApiService.presentIfReadable(network, user);
  }
}
