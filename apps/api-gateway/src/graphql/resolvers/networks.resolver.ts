import { Resolver, Query, Args, ID } from '@nestjs/graphql';
import { UseGuards } from '@nestjs/common';
import type { RequestUser } from '../../auth';
import { GqlJwtAuthGuard } from '../guards/gql-auth.guard';
import { GqlCurrentUser } from '../decorators/gql-current-user.decorator';
import { GraphqlApiService } from '../graphql-api.service';
import { NetworkType } from '../types';

@Resolver(() => NetworkType)
export class NetworksResolver {
  constructor(private readonly graphqlApiService: GraphqlApiService) {}

  @Query(() => [NetworkType], {
    name: 'networks',
    description: 'Networks the caller may read, newest first',
  })
  @UseGuards(GqlJwtAuthGuard)
  async networks(@GqlCurrentUser() user: RequestUser): Promise<NetworkType[]> {
    return this.graphqlApiService.findNetworks(user);
  }

  @Query(() => NetworkType, { name: 'network' })
  @UseGuards(GqlJwtAuthGuard)
  async network(
    @Args('id', { type: () => ID, description: 'Network UUID' }) id: string,
    @GqlCurrentUser() user: RequestUser,
  ): Promise<NetworkType> {
    return this.graphqlApiService.findNetworkById(id, user);
  }
}
