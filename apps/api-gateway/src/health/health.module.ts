import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RedisModule } from '@biocurate/redis';
import { HealthController } from './health.controller';

@Module({
  imports: [TerminusModule, RedisModule.forRoot({ subscriber: true })],
  controllers: [HealthController],
})
export class HealthModule {}
