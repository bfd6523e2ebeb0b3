import type { ExperimentStatus } from '@biocurate/database';
import type { HeatScore } from '@biocurate/graph';

export class ExperimentViewDto {
  id!: string;
  queryId!: string;
  omicId!: string;
  ownerId!: string;
  status!: ExperimentStatus;
  steps!: number;

  /** Nodes ranked by score; set once completed */
  result!: HeatScore[] | null;
  message!: string | null;
  durationMs!: number | null;

  /** ISO timestamps */
  createdAt!: string;
  completedAt!: string | null;
}
