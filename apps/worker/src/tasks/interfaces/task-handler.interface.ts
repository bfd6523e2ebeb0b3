import type { TaskName } from '@biocurate/proto';

/**
 * A background task the worker can run for a target row.
 *
 * `run` must be safe to call more than once for the same target: a
 * redelivered or concurrent dispatch ends as a no-op.
 */
export interface TaskHandler {
  readonly taskName: TaskName;
  run(targetId: string, taskId: string): Promise<void>;
}
