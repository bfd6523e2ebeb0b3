import { registerEnumType } from '@nestjs/graphql';
import { ReportStatus } from '@biocurate/database';

/** Stored report statuses plus the computed `stalled` */
export const ReportViewStatusEnum = {
  PENDING: ReportStatus.PENDING,
  COMPLETED: ReportStatus.COMPLETED,
  FAILED: ReportStatus.FAILED,
  STALLED: 'stalled',
} as const;

registerEnumType(ReportViewStatusEnum, {
  name: 'ReportViewStatus',
  description: 'Status of a report as the viewer presents it',
  valuesMap: {
    PENDING: { description: 'Queued or running, and younger than the stall threshold' },
    COMPLETED: { description: 'Compiled; the network field points at the result' },
    FAILED: { description: 'Compilation or upload failed (see message)' },
    STALLED: { description: 'Still pending past the stall threshold' },
  },
});
