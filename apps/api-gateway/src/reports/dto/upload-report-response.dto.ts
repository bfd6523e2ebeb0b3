import { ReportStatus } from '@biocurate/database';

/**
 * Response body for POST /reports (HTTP 201 Created).
 *
 * The report id is what the client follows on GET /reports/:id/events.
 */
export class UploadReportResponseDto {
  reportId!: string;

  /** Always "pending" immediately after upload */
  status!: ReportStatus;

  sourceName!: string;

  /** ISO timestamp */
  createdAt!: string;
}
