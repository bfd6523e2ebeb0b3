import { Module } from '@nestjs/common';
import { ClientsModule, Transport } from '@nestjs/microservices';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  BIOCURATE_PACKAGE_NAME,
  TASKS_PROTO_PATH,
  WORKER_GRPC_CLIENT,
} from '@biocurate/proto';
import { TaskDispatchClient } from './task-dispatch.client';

/**
 * Configures the gRPC connection to the worker and provides
 * TaskDispatchClient to feature modules (reports, experiments).
 *
 * The channel connects lazily on the first call.
 */
@Module({
  imports: [
    ClientsModule.registerAsync([
      {
        name: WORKER_GRPC_CLIENT,
        imports: [ConfigModule],
        inject: [ConfigService],
        useFactory: (configService: ConfigService) => ({
          transport: Transport.GRPC,
          options: {
            package: BIOCURATE_PACKAGE_NAME,
            protoPath: TASKS_PROTO_PATH,
            url: `${configService.get<string>('WORKER_GRPC_HOST', 'localhost')}:${configService.get<string | number>('WORKER_GRPC_PORT', 50051)}`,
          },
        }),
      },
    ]),
  ],
  providers: [TaskDispatchClient],
  exports: [TaskDispatchClient],
})
export class GrpcClientModule {}
