import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Network, Report } from '@biocurate/database';
import { NetworksModule } from '../networks/networks.module';
import { ReportsModule } from '../reports/reports.module';
import { GraphqlApiService } from './graphql-api.service';
import { ReportsResolver } from './resolvers/reports.resolver';
import { NetworksResolver } from './resolvers/networks.resolver';
import { NetworkLoader } from './loaders';

// Side-effect: register GraphQL enums before Apollo builds the schema
import './enums';

/**
 * GraphqlApiModule — read-only GraphQL browse surface over reports and
 * networks.
 *
 * The Apollo driver is configured globally in AppModule; this module only
 * adds resolvers, types and the request-scoped NetworkLoader.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Report, Network]),
    ReportsModule,
    NetworksModule,
  ],
  providers: [
    GraphqlApiService,
    ReportsResolver,
    NetworksResolver,
    NetworkLoader,
  ],
})
export class GraphqlApiModule {}
