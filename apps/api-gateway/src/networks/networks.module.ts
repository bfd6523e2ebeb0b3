import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Edge, Network, Project } from '@biocurate/database';
import { NetworksController } from './networks.controller';
import { NetworksService } from './networks.service';
import { NetworkAccessService } from './network-access.service';

/**
 * NetworksModule — browsing, sharing and exporting networks.
 *
 * Exports NetworkAccessService: edges, search, queries and GraphQL apply
 * the same read rule.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Network, Edge, Project])],
  controllers: [NetworksController],
  providers: [NetworksService, NetworkAccessService],
  exports: [NetworksService, NetworkAccessService],
})
export class NetworksModule {}
