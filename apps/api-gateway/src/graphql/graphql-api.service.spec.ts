import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Network, Report, ReportStatus } from '@biocurate/database';
import { NetworkAccessService } from '../networks';
import { ReportViewService } from '../reports/report-view';
import { GraphqlApiService } from './graphql-api.service';
import { NetworkLoader } from './loaders';

describe('GraphqlApiService', () => {
  let service: GraphqlApiService;

  const owner = { userId: 'user-1', email: 'curator@example.com', isAdmin: false };
  const createdAt = new Date('2026-01-01T00:00:00.000Z');

  const network = Object.assign(new Network(), {
    id: 'network-1',
    name: 'Tau',
    version: '1.0.0',
    description: null,
    authors: null,
    contact: null,
    license: null,
    public: false,
    numberNodes: 2,
    numberEdges: 1,
    ownerId: 'user-2',
    reportId: 'report-1',
    createdAt,
  });

  let reportRepository: { find: jest.Mock; findOne: jest.Mock };
  let access: { canRead: jest.Mock; findReadable: jest.Mock; readableNetworks: jest.Mock };

  beforeEach(async () => {
    reportRepository = {
      find: jest.fn().mockResolvedValue([]),
      findOne: jest.fn().mockResolvedValue(null),
    };
    access = {
      canRead: jest.fn().mockResolvedValue(true),
      findReadable: jest.fn().mockResolvedValue(network),
      readableNetworks: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GraphqlApiService,
        ReportViewService,
        { provide: getRepositoryToken(Report), useValue: reportRepository },
        { provide: NetworkAccessService, useValue: access },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((_key: string, fallback: unknown) => fallback) },
        },
      ],
    }).compile();

    service = module.get<GraphqlApiService>(GraphqlApiService);
  });

  describe('findReports', () => {
    it('should present old pending reports as stalled', async () => {
      reportRepository.find.mockResolvedValueOnce([
        {
          id: 'report-1',
          status: ReportStatus.PENDING,
          createdAt: new Date(Date.now() - 4 * 60 * 60 * 1000),
          startedAt: null,
          completedAt: null,
        },
      ]);

      const [report] = await service.findReports(owner);

      expect(reportRepository.find).toHaveBeenCalledWith({
        where: { ownerId: 'user-1' },
        order: { createdAt: 'DESC' },
      });
      expect(report.status).toBe('stalled');
    });
  });

  describe('findReportById', () => {
    it('should hide reports of other users', async () => {
      const error = await service.findReportById('report-1', owner).catch((err: unknown) => err);

      expect(reportRepository.findOne).toHaveBeenCalledWith({
        where: { id: 'report-1', ownerId: 'user-1' },
      });
      expect(error).toHaveProperty('status', 404);
    });
  });

  describe('presentIfReadable', () => {
    it('should present a readable network', async () => {
      const view = await service.presentIfReadable(network, owner);

      expect(view).toEqual(
        expect.objectContaining({ id: 'network-1', createdAt: '2026-01-01T00:00:00.000Z' }),
      );
    });

    it('should return null for a network the reader may not see', async () => {
      access.canRead.mockResolvedValueOnce(false);

      await expect(service.presentIfReadable(network, owner)).resolves.toBeNull();
    });

    it('should return null for a missing network', async () => {
      await expect(service.presentIfReadable(null, owner)).resolves.toBeNull();
      expect(access.canRead).not.toHaveBeenCalled();
    });
  });
});

describe('NetworkLoader', () => {
  it('should batch lookups into one query and keep input order', async () => {
    const networkRepository = {
      find: jest.fn().mockResolvedValue([{ id: 'network-2' }, { id: 'network-1' }]),
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NetworkLoader,
        { provide: getRepositoryToken(Network), useValue: networkRepository },
      ],
    }).compile();
    const loader = await module.resolve(NetworkLoader);

    const loaded = await Promise.all([
      loader.loadById('network-1'),
      loader.loadById('network-3'),
      loader.loadById('network-2'),
    ]);

    expect(networkRepository.find).toHaveBeenCalledTimes(1);
    expect(loaded).toEqual([{ id: 'network-1' }, null, { id: 'network-2' }]);
  });
});
