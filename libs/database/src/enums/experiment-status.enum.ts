/**
 * Lifecycle status of a heat diffusion experiment.
 *
 * Transitions: PENDING → COMPLETED | FAILED
 */
export enum ExperimentStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed',
}
