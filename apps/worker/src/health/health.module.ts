import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RedisModule } from '@biocurate/redis';
import { HealthController } from './health.controller';

@Module({
  imports: [TerminusModule, RedisModule.forRoot({ publisher: true })],
  controllers: [HealthController],
})
export class HealthModule {}
