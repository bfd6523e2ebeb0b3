/** Domains whose background tasks report status over pub/sub */
export type StatusDomain = 'report' | 'experiment';

export type TerminalStatus = 'completed' | 'failed';

/**
 * Published by the worker after a task's terminal write has committed.
 * Subscribers must treat the database row as the source of truth; the
 * event only says "look again".
 */
export interface TaskStatusEvent {
  domain: StatusDomain;
  id: string;
  status: TerminalStatus;
  message: string | null;
  /** ISO-8601 */
  emittedAt: string;
}

/** Channel convention: `{domain}:{id}:status` */
export function statusChannel(domain: StatusDomain, id: string): string {
  return `${domain}:${id}:status`;
}

export function isTaskStatusEvent(value: unknown): value is TaskStatusEvent {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    (candidate['domain'] === 'report' || candidate['domain'] === 'experiment') &&
    typeof candidate['id'] === 'string' &&
    (candidate['status'] === 'completed' || candidate['status'] === 'failed') &&
    (candidate['message'] === null || typeof candidate['message'] === 'string') &&
    typeof candidate['emittedAt'] === 'string'
  );
}
