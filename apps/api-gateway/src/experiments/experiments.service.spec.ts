import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Experiment, ExperimentStatus } from '@biocurate/database';
import { TaskDispatchClient } from '../grpc/task-dispatch.client';
import { TaskDispatchException } from '../grpc/task-dispatch.exception';
import { OmicsService } from '../omics/omics.service';
import { OmicNotFoundException } from '../omics/exceptions';
import { QueriesService } from '../queries/queries.service';
import { ExperimentsService } from './experiments.service';

describe('ExperimentsService', () => {
  let service: ExperimentsService;

  const owner = { userId: 'user-1', email: 'curator@example.com', isAdmin: false };
  const stranger = { userId: 'user-2', email: 'stranger@example.com', isAdmin: false };
  const createdAt = new Date('2026-03-01T00:00:00.000Z');

  let experimentRepository: {
    create: jest.Mock;
    save: jest.Mock;
    find: jest.Mock;
    findOne: jest.Mock;
  };
  let queriesService: { requireVisible: jest.Mock };
  let omicsService: { findReadable: jest.Mock };
  let dispatchClient: { dispatch: jest.Mock };

  beforeEach(async () => {
    experimentRepository = {
      create: jest.fn((data: object) => ({ ...data })),
      save: jest.fn((data: object) =>
        Promise.resolve({
          result: null,
          message: null,
          durationMs: null,
          completedAt: null,
          ...data,
          id: 'experiment-1',
          createdAt,
        }),
      ),
      find: jest.fn().mockResolvedValue([]),
      findOne: jest.fn().mockResolvedValue(null),
    };
    queriesService = { requireVisible: jest.fn().mockResolvedValue({ id: 'query-1' }) };
    omicsService = { findReadable: jest.fn().mockResolvedValue({ id: 'omic-1' }) };
    dispatchClient = {
      dispatch: jest.fn().mockResolvedValue({
        taskId: 'task-1',
        accepted: true,
        acceptedAt: '2026-03-01T00:00:01.000Z',
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ExperimentsService,
        { provide: getRepositoryToken(Experiment), useValue: experimentRepository },
        { provide: QueriesService, useValue: queriesService },
        { provide: OmicsService, useValue: omicsService },
        { provide: TaskDispatchClient, useValue: dispatchClient },
      ],
    }).compile();

    service = module.get<ExperimentsService>(ExperimentsService);
  });

  describe('createExperiment', () => {
    it('should store a pending experiment and dispatch the run', async () => {
      const result = await service.createExperiment(
        { queryId: 'query-1', omicId: 'omic-1' },
        owner,
      );

      expect(experimentRepository.create).toHaveBeenCalledWith({
        queryId: 'query-1',
        omicId: 'omic-1',
        ownerId: 'user-1',
        steps: 10,
        status: ExperimentStatus.PENDING,
      });
      expect(dispatchClient.dispatch).toHaveBeenCalledWith('run-heat-diffusion', 'experiment-1');
      expect(result).toEqual({
        id: 'experiment-1',
        queryId: 'query-1',
        omicId: 'omic-1',
        ownerId: 'user-1',
        status: ExperimentStatus.PENDING,
        steps: 10,
        result: null,
        message: null,
        durationMs: null,
        createdAt: '2026-03-01T00:00:00.000Z',
        completedAt: null,
      });
    });

    it('should not store anything when the omic is not readable', async () => {
      omicsService.findReadable.mockRejectedValueOnce(new OmicNotFoundException('omic-1'));

      const error = await service
        .createExperiment({ queryId: 'query-1', omicId: 'omic-1', steps: 5 }, owner)
        .catch((err: unknown) => err);

      expect(error).toHaveProperty('status', 404);
      expect(experimentRepository.save).not.toHaveBeenCalled();
      expect(dispatchClient.dispatch).not.toHaveBeenCalled();
    });

    it('should surface a dispatch failure and keep the experiment', async () => {
      dispatchClient.dispatch.mockRejectedValueOnce(
        new TaskDispatchException('run-heat-diffusion', 'experiment-1', new Error('UNAVAILABLE')),
      );

      const error = await service
        .createExperiment({ queryId: 'query-1', omicId: 'omic-1' }, owner)
        .catch((err: unknown) => err);

      expect(error).toHaveProperty('status', 503);
      expect(experimentRepository.save).toHaveBeenCalledTimes(1);
    });
  });

  describe('getExperiment', () => {
    const stored = {
      id: 'experiment-1',
      queryId: 'query-1',
      omicId: 'omic-1',
      ownerId: 'user-1',
      status: ExperimentStatus.COMPLETED,
      steps: 10,
      result: [{ node: 'p(HGNC:MAPT)', name: 'MAPT', initial: 1.5, score: 0.75 }],
      message: null,
      durationMs: 12,
      createdAt,
      completedAt: new Date('2026-03-01T00:00:02.000Z'),
    };

    it('should return the ranked scores to the owner', async () => {
      experimentRepository.findOne.mockResolvedValueOnce(stored);

      const result = await service.getExperiment('experiment-1', owner);

      expect(result.result).toEqual([
        { node: 'p(HGNC:MAPT)', name: 'MAPT', initial: 1.5, score: 0.75 },
      ]);
      expect(result.completedAt).toBe('2026-03-01T00:00:02.000Z');
    });

    it('should hide the experiment from another user', async () => {
      experimentRepository.findOne.mockResolvedValueOnce(stored);

      const error = await service
        .getExperiment('experiment-1', stranger)
        .catch((err: unknown) => err);

      expect(error).toHaveProperty('status', 404);
    });
  });
});
