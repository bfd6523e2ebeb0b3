import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Omic } from '@biocurate/database';
import { OmicsController } from './omics.controller';
import { OmicsService } from './omics.service';

@Module({
  imports: [TypeOrmModule.forFeature([Omic])],
  controllers: [OmicsController],
  providers: [OmicsService],
  exports: [OmicsService],
})
export class OmicsModule {}
