import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Edge, EdgeComment, EdgeVote } from '@biocurate/database';
import { NetworksModule } from '../networks/networks.module';
import { EdgesController } from './edges.controller';
import { EdgesService } from './edges.service';

@Module({
  imports: [TypeOrmModule.forFeature([Edge, EdgeVote, EdgeComment]), NetworksModule],
  controllers: [EdgesController],
  providers: [EdgesService],
})
export class EdgesModule {}
