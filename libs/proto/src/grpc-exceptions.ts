/**
 * gRPC exception classes shared by the worker (thrown) and the gateway
 * (mapped back to HTTP).
 *
 * @see https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';

/** Unknown task name or a malformed target id */
export class GrpcInvalidArgumentException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.INVALID_ARGUMENT,
      message,
    });
  }
}

/** The worker is shutting down and accepts no new tasks */
export class GrpcUnavailableException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.UNAVAILABLE,
      message,
    });
  }
}
