import { isTaskStatusEvent, statusChannel } from './task-status';

describe('statusChannel', () => {
  it('should follow the {domain}:{id}:status convention', () => {
    expect(statusChannel('report', 'r-1')).toBe('report:r-1:status');
    expect(statusChannel('experiment', 'e-9')).toBe('experiment:e-9:status');
  });
});

describe('isTaskStatusEvent', () => {
  const event = {
    domain: 'report',
    id: 'r-1',
    status: 'failed',
    message: 'Parsing failed for a.json: the document name was missing',
    emittedAt: '2026-01-01T00:00:00.000Z',
  };

  it('should accept a well-formed event', () => {
    expect(isTaskStatusEvent(event)).toBe(true);
    expect(isTaskStatusEvent({ ...event, status: 'completed', message: null })).toBe(true);
  });

  it('should reject non-terminal statuses', () => {
    expect(isTaskStatusEvent({ ...event, status: 'pending' })).toBe(false);
  });

  it('should reject unknown domains and non-objects', () => {
    expect(isTaskStatusEvent({ ...event, domain: 'document' })).toBe(false);
    expect(isTaskStatusEvent('report:r-1:status')).toBe(false);
    expect(isTaskStatusEvent(null)).toBe(false);
  });
});
