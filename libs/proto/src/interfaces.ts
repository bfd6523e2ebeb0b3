/**
 * TypeScript interfaces mirroring the tasks.proto definitions.
 *
 * Hand-written to match the proto contract; @grpc/proto-loader parses the
 * proto at runtime (keepCase: false, so fields arrive camelCased).
 */
import { Observable } from 'rxjs';

// ── Task names ──────────────────────────────────────────

export const TASK_NAMES = ['compile-report', 'run-heat-diffusion'] as const;

export type TaskName = (typeof TASK_NAMES)[number];

export function isTaskName(value: string): value is TaskName {
  return TASK_NAMES.some((name) => name === value);
}

// ── Request / Response Interfaces ───────────────────────

export interface DispatchTaskRequest {
  taskName: string;
  targetId: string;
}

export interface DispatchTaskResponse {
  taskId: string;
  accepted: boolean;
  /** ISO-8601 */
  acceptedAt: string;
}

// ── Service Client Interface ────────────────────────────
// Matches the gRPC service definition for use with NestJS ClientGrpc

export interface TaskDispatchServiceClient {
  /** Unary RPC — schedule a background task on the worker */
  dispatchTask(request: DispatchTaskRequest): Observable<DispatchTaskResponse>;
}
