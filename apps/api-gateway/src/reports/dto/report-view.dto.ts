import type { ReportViewStatus } from '../report-view';

/** A report as the viewer shows it; `status` may be the computed "stalled" */
export class ReportViewDto {
  id!: string;
  sourceName!: string;
  sourceHash!: string;
  status!: ReportViewStatus;
  message!: string | null;

  public!: boolean;
  citationClearing!: boolean;
  inferOrigin!: boolean;
  identifierValidation!: boolean;

  numberNodes!: number | null;
  numberEdges!: number | null;
  numberWarnings!: number | null;
  numberCitations!: number | null;
  durationMs!: number | null;

  networkId!: string | null;
  ownerId!: string;

  /** ISO timestamps */
  createdAt!: string;
  startedAt!: string | null;
  completedAt!: string | null;
}
