import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Experiment } from '@biocurate/database';
import { GrpcClientModule } from '../grpc/grpc-client.module';
import { OmicsModule } from '../omics/omics.module';
import { QueriesModule } from '../queries/queries.module';
import { ExperimentsController } from './experiments.controller';
import { ExperimentsService } from './experiments.service';

@Module({
  imports: [TypeOrmModule.forFeature([Experiment]), QueriesModule, OmicsModule, GrpcClientModule],
  controllers: [ExperimentsController],
  providers: [ExperimentsService],
})
export class ExperimentsModule {}
