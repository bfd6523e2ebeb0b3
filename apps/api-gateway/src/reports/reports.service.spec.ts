import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import { createHash } from 'node:crypto';
import { Readable } from 'node:stream';
import { Network, Report, ReportStatus } from '@biocurate/database';
import { TaskDispatchClient } from '../grpc/task-dispatch.client';
import { TaskDispatchException } from '../grpc/task-dispatch.exception';
import { ReportViewService } from './report-view';
import { ReportsService } from './reports.service';
import {
  DocumentTooLargeException,
  EmptyDocumentException,
  MalformedDocumentException,
  ReportNotFoundException,
} from './exceptions';

const HOUR_MS = 60 * 60 * 1000;

function multerFile(originalname: string, buffer: Buffer): Express.Multer.File {
  return {
    fieldname: 'file',
    originalname,
    encoding: '7bit',
    mimetype: 'application/json',
    size: buffer.length,
    buffer,
    stream: Readable.from([]),
    destination: '',
    filename: '',
    path: '',
  };
}

describe('ReportsService', () => {
  let service: ReportsService;

  const owner = { userId: 'user-1', email: 'curator@example.com', isAdmin: false };
  const admin = { userId: 'user-9', email: 'admin@example.com', isAdmin: true };
  const document = Buffer.from(JSON.stringify({ graph: { name: 'Tau', version: '1.0.0' } }));
  const createdAt = new Date('2026-01-01T00:00:00.000Z');

  let config: Record<string, string>;
  let reportRepository: {
    create: jest.Mock;
    save: jest.Mock;
    find: jest.Mock;
    findOne: jest.Mock;
  };
  let manager: { delete: jest.Mock };
  let dataSource: { transaction: jest.Mock };
  let dispatchClient: { dispatch: jest.Mock };

  beforeEach(async () => {
    config = {};
    reportRepository = {
      create: jest.fn((data: object) => ({ ...data })),
      save: jest.fn((data: object) => Promise.resolve({ ...data, id: 'report-1', createdAt })),
      find: jest.fn().mockResolvedValue([]),
      findOne: jest.fn().mockResolvedValue(null),
    };
    manager = { delete: jest.fn().mockResolvedValue({ affected: 1 }) };
    dataSource = {
      transaction: jest.fn((work: (entityManager: typeof manager) => Promise<void>) =>
        work(manager),
      ),
    };
    dispatchClient = {
      dispatch: jest.fn().mockResolvedValue({
        taskId: 'task-1',
        accepted: true,
        acceptedAt: '2026-01-01T00:00:01.000Z',
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportsService,
        ReportViewService,
        { provide: getRepositoryToken(Report), useValue: reportRepository },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: TaskDispatchClient, useValue: dispatchClient },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, fallback: unknown) => config[key] ?? fallback),
          },
        },
      ],
    }).compile();

    service = module.get<ReportsService>(ReportsService);
  });

  describe('uploadFile', () => {
    it('should store a pending report and dispatch compilation', async () => {
      const result = await service.uploadFile(
        multerFile('tau.json', document),
        { public: false },
        'user-1',
      );

      expect(result).toEqual({
        reportId: 'report-1',
        status: ReportStatus.PENDING,
        sourceName: 'tau.json',
        createdAt: '2026-01-01T00:00:00.000Z',
      });
      expect(reportRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({
          sourceName: 'tau.json',
          source: document,
          sourceHash: createHash('sha512').update(document).digest('hex'),
          public: false,
          citationClearing: true,
          inferOrigin: true,
          identifierValidation: true,
          status: ReportStatus.PENDING,
          ownerId: 'user-1',
        }),
      );
      expect(dispatchClient.dispatch).toHaveBeenCalledWith('compile-report', 'report-1');
    });

    it('should cut a file name longer than the column to fit it', async () => {
      await service.uploadFile(multerFile(`${'t'.repeat(300)}.json`, document), {}, 'user-1');

      expect(reportRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({ sourceName: 't'.repeat(255) }),
      );
      expect(dispatchClient.dispatch).toHaveBeenCalledWith('compile-report', 'report-1');
    });

    it('should reject a missing file without creating a report', async () => {
      await expect(service.uploadFile(undefined, {}, 'user-1')).rejects.toBeInstanceOf(
        EmptyDocumentException,
      );
      expect(reportRepository.save).not.toHaveBeenCalled();
    });

    it('should reject an empty file without creating a report', async () => {
      await expect(
        service.uploadFile(multerFile('empty.json', Buffer.alloc(0)), {}, 'user-1'),
      ).rejects.toBeInstanceOf(EmptyDocumentException);
      expect(reportRepository.save).not.toHaveBeenCalled();
      expect(dispatchClient.dispatch).not.toHaveBeenCalled();
    });

    it('should reject bytes that are not UTF-8 text', async () => {
      const error = await service
        .uploadFile(multerFile('binary.json', Buffer.from([0xff, 0xfe, 0x00])), {}, 'user-1')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MalformedDocumentException);
      expect(error).toHaveProperty('response.message', 'Malformed document: the document is not valid UTF-8 text');
      expect(reportRepository.save).not.toHaveBeenCalled();
    });

    it('should reject JSON that is not an object', async () => {
      const error = await service
        .uploadFile(multerFile('list.json', Buffer.from('[1, 2]')), {}, 'user-1')
        .catch((err: unknown) => err);

      expect(error).toHaveProperty('response.message', 'Malformed document: the document must be a JSON object');
      expect(reportRepository.save).not.toHaveBeenCalled();
    });

    it('should reject documents over the configured size', async () => {
      config['UPLOAD_MAX_FILE_SIZE_MB'] = '0.000001';
      const module: TestingModule = await Test.createTestingModule({
        providers: [
          ReportsService,
          ReportViewService,
          { provide: getRepositoryToken(Report), useValue: reportRepository },
          { provide: getDataSourceToken(), useValue: dataSource },
          { provide: TaskDispatchClient, useValue: dispatchClient },
          {
            provide: ConfigService,
            useValue: {
              get: jest.fn((key: string, fallback: unknown) => config[key] ?? fallback),
            },
          },
        ],
      }).compile();
      const limited = module.get<ReportsService>(ReportsService);

      await expect(
        limited.uploadFile(multerFile('tau.json', document), {}, 'user-1'),
      ).rejects.toBeInstanceOf(DocumentTooLargeException);
      expect(reportRepository.save).not.toHaveBeenCalled();
    });

    it('should keep the report pending when dispatch fails', async () => {
      dispatchClient.dispatch.mockRejectedValueOnce(
        new TaskDispatchException('compile-report', 'report-1', new Error('UNAVAILABLE')),
      );

      const error = await service
        .uploadFile(multerFile('tau.json', document), {}, 'user-1')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TaskDispatchException);
      expect(error).toHaveProperty('status', 503);
      expect(reportRepository.save).toHaveBeenCalledTimes(1);
      expect(manager.delete).not.toHaveBeenCalled();
    });
  });

  describe('uploadJson', () => {
    it('should serialize the inline document and default its name', async () => {
      await service.uploadJson(
        { document: { graph: { name: 'Tau', version: '1.0.0' } } },
        'user-1',
      );

      expect(reportRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({ sourceName: 'document.json', source: document }),
      );
    });
  });

  describe('listReports', () => {
    it('should classify old pending reports as stalled without writing them', async () => {
      const now = Date.now();
      reportRepository.find.mockResolvedValueOnce([
        { id: 'r-1', status: ReportStatus.PENDING, createdAt: new Date(now - 4 * HOUR_MS) },
        { id: 'r-2', status: ReportStatus.PENDING, createdAt: new Date(now - HOUR_MS) },
        { id: 'r-3', status: ReportStatus.COMPLETED, createdAt: new Date(now - 9 * HOUR_MS) },
      ].map((row) => ({ ...row, startedAt: null, completedAt: null })));

      const views = await service.listReports(owner);

      expect(views.map((view) => view.status)).toEqual(['stalled', 'pending', 'completed']);
      expect(reportRepository.find).toHaveBeenCalledWith({
        where: { ownerId: 'user-1' },
        order: { createdAt: 'DESC' },
      });
      expect(reportRepository.save).not.toHaveBeenCalled();
    });

    it('should list every report for an admin', async () => {
      await service.listReports(admin);

      expect(reportRepository.find).toHaveBeenCalledWith({
        where: {},
        order: { createdAt: 'DESC' },
      });
    });
  });

  describe('getReport', () => {
    it('should hide reports owned by someone else', async () => {
      await expect(service.getReport('report-2', owner)).rejects.toBeInstanceOf(
        ReportNotFoundException,
      );
      expect(reportRepository.findOne).toHaveBeenCalledWith({
        where: { id: 'report-2', ownerId: 'user-1' },
      });
    });
  });

  describe('deleteReport', () => {
    it('should delete the report with the network it produced', async () => {
      reportRepository.findOne.mockResolvedValueOnce({ id: 'report-1', ownerId: 'user-1' });

      await service.deleteReport('report-1', owner);

      expect(manager.delete).toHaveBeenNthCalledWith(1, Network, { reportId: 'report-1' });
      expect(manager.delete).toHaveBeenNthCalledWith(2, Report, { id: 'report-1' });
    });
  });
});
