import { ReportStatus } from '@biocurate/database';
import { reportViewStatus } from './report-view';

describe('reportViewStatus', () => {
  const now = new Date('2026-03-01T12:00:00.000Z');

  it('should keep a recent pending report pending', () => {
    const createdAt = new Date('2026-03-01T09:30:00.000Z');

    expect(reportViewStatus({ status: ReportStatus.PENDING, createdAt }, now, 3)).toBe('pending');
  });

  it('should show a pending report past the threshold as stalled', () => {
    const createdAt = new Date('2026-03-01T08:59:59.000Z');

    expect(reportViewStatus({ status: ReportStatus.PENDING, createdAt }, now, 3)).toBe('stalled');
  });

  it('should not stall a report exactly at the threshold', () => {
    const createdAt = new Date('2026-03-01T09:00:00.000Z');

    expect(reportViewStatus({ status: ReportStatus.PENDING, createdAt }, now, 3)).toBe('pending');
  });

  it('should never stall a finished report', () => {
    const createdAt = new Date('2026-01-01T00:00:00.000Z');

    expect(reportViewStatus({ status: ReportStatus.FAILED, createdAt }, now, 3)).toBe('failed');
    expect(reportViewStatus({ status: ReportStatus.COMPLETED, createdAt }, now, 3)).toBe(
      'completed',
    );
  });
});
