import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { BIOCURATE_PACKAGE_NAME, TASKS_PROTO_PATH } from '@biocurate/proto';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Hybrid application: HTTP for health checks + gRPC for task dispatch
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  const grpcHost = configService.get<string>('WORKER_GRPC_HOST', '0.0.0.0');
  const grpcPort = Number(configService.get<string | number>('WORKER_GRPC_PORT', 50051));

  // ── gRPC Microservice ───────────────────────────────────
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      package: BIOCURATE_PACKAGE_NAME,
      protoPath: TASKS_PROTO_PATH,
      url: `${grpcHost}:${grpcPort}`,
    },
  });

  await app.startAllMicroservices();

  const httpPort = Number(configService.get<string | number>('WORKER_HTTP_PORT', 50052));
  await app.listen(httpPort);

  logger.log(`Worker gRPC server listening on ${grpcHost}:${grpcPort}`);
  logger.log(`Worker health check on http://localhost:${httpPort}/health`);
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  new Logger('Bootstrap').error(`Worker failed to start: ${message}`);
  process.exit(1);
});
