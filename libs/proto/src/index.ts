/**
 * @biocurate/proto
 *
 * Task dispatch contract between api-gateway and worker.
 *
 * - tasks.proto is consumed at runtime by @grpc/proto-loader
 * - TypeScript interfaces provide compile-time type safety
 * - gRPC exceptions provide a shared error contract
 */
import { join } from 'path';

// ── Proto File Paths ────────────────────────────────────

/** Absolute path to the task dispatch proto file */
export const TASKS_PROTO_PATH: string = join(__dirname, 'tasks.proto');

// ── Package & Service Constants ─────────────────────────

/** gRPC package name matching the proto `package` directive */
export const BIOCURATE_PACKAGE_NAME = 'biocurate';

export const TASK_DISPATCH_SERVICE_NAME = 'TaskDispatchService';

/** NestJS injection token for the worker gRPC client */
export const WORKER_GRPC_CLIENT = 'WORKER_GRPC_CLIENT';

// ── TypeScript Interfaces ───────────────────────────────

export { TASK_NAMES, isTaskName } from './interfaces';
export type {
  TaskName,
  DispatchTaskRequest,
  DispatchTaskResponse,
  TaskDispatchServiceClient,
} from './interfaces';

// ── gRPC Exceptions ─────────────────────────────────────

export {
  GrpcInvalidArgumentException,
  GrpcUnavailableException,
} from './grpc-exceptions';
