import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@biocurate/database';
import { HealthModule } from './health/health.module';
import { TasksModule } from './tasks/tasks.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: Number(configService.get<string | number>('POSTGRES_PORT', 5432)),
        username: configService.get<string>('POSTGRES_USER', 'biocurate'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'biocurate_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'biocurate'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Shared Database Repositories ─────────────────────
    DatabaseModule.forFeature(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    TasksModule,
  ],
})
export class AppModule {}
