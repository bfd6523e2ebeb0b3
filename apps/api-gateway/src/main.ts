import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get<string>('API_GATEWAY_CORS_ORIGIN', 'http://localhost:3000'),
    credentials: true,
  });

  // ── Start ─────────────────────────────────────────────
  const port = Number(configService.get<string | number>('API_GATEWAY_PORT', 4000));
  await app.listen(port);

  const graphqlPath = configService.get<string>('API_GATEWAY_GRAPHQL_PATH', '/graphql');
  logger.log(`API gateway listening on http://localhost:${port}`);
  logger.log(`GraphQL endpoint: http://localhost:${port}${graphqlPath}`);
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  new Logger('Bootstrap').error(`API gateway failed to start: ${message}`);
  process.exit(1);
});
