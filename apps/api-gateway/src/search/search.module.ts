import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Citation, Edge } from '@biocurate/database';
import { NetworksModule } from '../networks/networks.module';
import { SearchController } from './search.controller';
import { SearchService } from './search.service';

@Module({
  imports: [TypeOrmModule.forFeature([Edge, Citation]), NetworksModule],
  controllers: [SearchController],
  providers: [SearchService],
})
export class SearchModule {}
