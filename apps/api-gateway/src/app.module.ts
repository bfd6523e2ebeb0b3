import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { GraphQLModule } from '@nestjs/graphql';
import { ApolloDriver, ApolloDriverConfig } from '@nestjs/apollo';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { Request, Response } from 'express';
import { DatabaseModule } from '@biocurate/database';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { ReportsModule } from './reports/reports.module';
import { NetworksModule } from './networks/networks.module';
import { EdgesModule } from './edges/edges.module';
import { SearchModule } from './search/search.module';
import { ProjectsModule } from './projects/projects.module';
import { QueriesModule } from './queries/queries.module';
import { OmicsModule } from './omics/omics.module';
import { ExperimentsModule } from './experiments/experiments.module';
import { GraphqlApiModule } from './graphql/graphql-api.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── GraphQL ───────────────────────────────────────────
    GraphQLModule.forRootAsync<ApolloDriverConfig>({
      driver: ApolloDriver,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        autoSchemaFile: true,
        sortSchema: true,
        path: configService.get<string>('API_GATEWAY_GRAPHQL_PATH', '/graphql'),
        playground: configService.get<string>('NODE_ENV') !== 'production',
        context: ({ req, res }: { req: Request; res: Response }) => ({ req, res }),
      }),
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
    AuthModule,
    ReportsModule,
    NetworksModule,
    EdgesModule,
    SearchModule,
    ProjectsModule,
    QueriesModule,
    OmicsModule,
    ExperimentsModule,
    GraphqlApiModule,
  ],
})
export class AppModule {}
