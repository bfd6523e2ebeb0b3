import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Network, Report } from '@biocurate/database';
import { RedisModule } from '@biocurate/redis';
import { GrpcClientModule } from '../grpc/grpc-client.module';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';
import { ReportEventsService } from './report-events.service';
import { ReportViewService } from './report-view';

/**
 * ReportsModule — uploads, the report viewer and its SSE stream.
 *
 * Exports ReportViewService so the GraphQL surface shows the same
 * computed statuses as REST.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Report, Network]),
    RedisModule.forRoot({ subscriber: true }),
    GrpcClientModule,
  ],
  controllers: [ReportsController],
  providers: [ReportsService, ReportEventsService, ReportViewService],
  exports: [ReportViewService],
})
export class ReportsModule {}
