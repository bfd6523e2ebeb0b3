import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Subject } from 'rxjs';
import { Report, ReportStatus } from '@biocurate/database';
import { RedisSubscriberService, TaskStatusEvent } from '@biocurate/redis';
import { ReportEventsService } from './report-events.service';
import { ReportViewService } from './report-view';

describe('ReportEventsService', () => {
  let service: ReportEventsService;
  let events: Subject<TaskStatusEvent>;
  let reportRepository: { findOne: jest.Mock };
  let subscriber: { subscribeStatus: jest.Mock };
  let written: string[];
  let res: { write: jest.Mock; end: jest.Mock; on: jest.Mock };

  function report(status: ReportStatus): Report {
    return Object.assign(new Report(), {
      id: 'report-1',
      sourceName: 'tau.json',
      sourceHash: 'hash',
      status,
      message: null,
      public: true,
      citationClearing: true,
      inferOrigin: true,
      identifierValidation: true,
      numberNodes: null,
      numberEdges: null,
      numberWarnings: null,
      numberCitations: null,
      durationMs: null,
      networkId: null,
      ownerId: 'user-1',
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
    });
  }

  function frames(eventName: string): Array<Record<string, unknown>> {
    return written
      .filter((chunk) => chunk.includes(`event: ${eventName}\n`))
      .map((chunk) => JSON.parse(chunk.slice(chunk.indexOf('data: ') + 6)));
  }

  const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

  beforeEach(async () => {
    jest.useFakeTimers({ doNotFake: ['setImmediate'] });
    events = new Subject<TaskStatusEvent>();
    reportRepository = { findOne: jest.fn().mockResolvedValue(report(ReportStatus.PENDING)) };
    subscriber = { subscribeStatus: jest.fn().mockReturnValue(events.asObservable()) };
    written = [];
    res = {
      write: jest.fn((chunk: string) => written.push(chunk)),
      end: jest.fn(),
      on: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportEventsService,
        ReportViewService,
        { provide: getRepositoryToken(Report), useValue: reportRepository },
        { provide: RedisSubscriberService, useValue: subscriber },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((_key: string, fallback: unknown) => fallback) },
        },
      ],
    }).compile();

    service = module.get<ReportEventsService>(ReportEventsService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should send one snapshot and close for a finished report', () => {
    service.stream(report(ReportStatus.COMPLETED), res);

    expect(written[0]).toBe('retry: 3000\n\n');
    expect(frames('status')).toEqual([
      expect.objectContaining({ id: 'report-1', status: 'completed' }),
    ]);
    expect(subscriber.subscribeStatus).not.toHaveBeenCalled();
    expect(res.end).toHaveBeenCalledTimes(1);
  });

  it('should relay the stored row once the worker publishes', async () => {
    service.stream(report(ReportStatus.PENDING), res);
    await flush();
    reportRepository.findOne.mockResolvedValueOnce(report(ReportStatus.FAILED));
    events.next({
      domain: 'report',
      id: 'report-1',
      status: 'failed',
      message: 'Parsing failed for tau.json: the document name was missing',
      emittedAt: '2026-01-01T00:00:00.000Z',
    });
    await flush();

    expect(subscriber.subscribeStatus).toHaveBeenCalledWith('report', 'report-1');
    expect(frames('status').map((frame) => frame['status'])).toEqual(['pending', 'failed']);
    expect(res.end).toHaveBeenCalledTimes(1);
    expect(events.observed).toBe(false);
  });

  it('should stay open while the row is still pending after subscribing', async () => {
    service.stream(report(ReportStatus.PENDING), res);
    await flush();

    expect(reportRepository.findOne).toHaveBeenCalledWith({ where: { id: 'report-1' } });
    expect(frames('status')).toHaveLength(1);
    expect(res.end).not.toHaveBeenCalled();
    expect(events.observed).toBe(true);
  });

  it('should close when the report finished before the subscription started', async () => {
    reportRepository.findOne.mockResolvedValueOnce(report(ReportStatus.COMPLETED));

    service.stream(report(ReportStatus.PENDING), res);
    await flush();

    expect(frames('status').map((frame) => frame['status'])).toEqual(['pending', 'completed']);
    expect(res.end).toHaveBeenCalledTimes(1);
    expect(events.observed).toBe(false);
  });

  it('should release the subscription when the client disconnects', () => {
    service.stream(report(ReportStatus.PENDING), res);
    const [event, onClose] = res.on.mock.calls[0];

    expect(event).toBe('close');
    onClose();

    expect(events.observed).toBe(false);
    expect(res.end).toHaveBeenCalledTimes(1);
  });
});
