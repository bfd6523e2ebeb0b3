/**
 * Stored lifecycle status of a report.
 *
 * Transitions (exactly once):
 *   PENDING → COMPLETED
 *           → FAILED
 *
 * "stalled" is not a member: it is how a viewer presents a PENDING report
 * older than the staleness threshold.
 */
export enum ReportStatus {
  /** Uploaded and queued; not yet finished by a worker */
  PENDING = 'pending',

  /** Compiled and stored; network_id points at the result */
  COMPLETED = 'completed',

  /** Compilation or upload failed (see message) */
  FAILED = 'failed',
}
