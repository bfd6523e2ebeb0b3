import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Experiment, ExperimentStatus, Network, Omic, Query } from '@biocurate/database';
import { makeEdge, makeNode } from '@biocurate/graph';
import { HeatDiffusionTaskService } from './heat-diffusion-task.service';
import { TaskNotifier } from './task-notifier.service';

describe('HeatDiffusionTaskService', () => {
  let service: HeatDiffusionTaskService;

  const app = makeNode('Protein', 'HGNC', 'APP');
  const bace1 = makeNode('Protein', 'HGNC', 'BACE1');

  const pendingExperiment = {
    id: 'experiment-1',
    queryId: 'query-1',
    omicId: 'omic-1',
    ownerId: 'user-1',
    status: ExperimentStatus.PENDING,
    steps: 1,
    startedAt: null,
  };

  let experimentRepository: { findOne: jest.Mock; update: jest.Mock };
  let queryRepository: { findOne: jest.Mock };
  let networkRepository: { find: jest.Mock };
  let omicRepository: { findOne: jest.Mock };
  let notifier: { notify: jest.Mock };

  beforeEach(async () => {
    experimentRepository = {
      findOne: jest.fn().mockResolvedValue({ ...pendingExperiment }),
      update: jest.fn().mockResolvedValue({ affected: 1 }),
    };
    queryRepository = {
      findOne: jest.fn().mockResolvedValue({
        id: 'query-1',
        seeding: [],
        pipeline: [],
        networkIds: ['network-1'],
      }),
    };
    networkRepository = {
      find: jest.fn().mockResolvedValue([
        {
          id: 'network-1',
          graph: {
            nodes: [app, bace1],
            edges: [makeEdge(bace1.key, 'increases', app.key)],
          },
        },
      ]),
    };
    omicRepository = {
      findOne: jest.fn().mockResolvedValue({ id: 'omic-1', data: { bace1: 2 } }),
    };
    notifier = { notify: jest.fn().mockResolvedValue(undefined) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HeatDiffusionTaskService,
        { provide: getRepositoryToken(Experiment), useValue: experimentRepository },
        { provide: getRepositoryToken(Query), useValue: queryRepository },
        { provide: getRepositoryToken(Network), useValue: networkRepository },
        { provide: getRepositoryToken(Omic), useValue: omicRepository },
        { provide: TaskNotifier, useValue: notifier },
      ],
    }).compile();

    service = module.get<HeatDiffusionTaskService>(HeatDiffusionTaskService);
  });

  it('should store ranked heat scores for a pending experiment', async () => {
    await service.run('experiment-1', 'task-1');

    expect(experimentRepository.update).toHaveBeenLastCalledWith(
      { id: 'experiment-1', status: ExperimentStatus.PENDING },
      expect.objectContaining({
        status: ExperimentStatus.COMPLETED,
        message: null,
        result: [
          { node: 'p(HGNC:APP)', name: 'APP', initial: 0, score: 1 },
          { node: 'p(HGNC:BACE1)', name: 'BACE1', initial: 2, score: 1 },
        ],
      }),
    );
    expect(notifier.notify).toHaveBeenCalledWith(
      expect.objectContaining({ domain: 'experiment', status: 'completed' }),
    );
  });

  it('should fail the experiment when its omic is gone', async () => {
    omicRepository.findOne.mockResolvedValueOnce(null);

    await service.run('experiment-1', 'task-1');

    expect(experimentRepository.update).toHaveBeenLastCalledWith(
      { id: 'experiment-1', status: ExperimentStatus.PENDING },
      expect.objectContaining({
        status: ExperimentStatus.FAILED,
        message: 'omic omic-1 no longer exists',
        result: null,
      }),
    );
  });

  it('should fail rather than diffuse over a partial assembly', async () => {
    queryRepository.findOne.mockResolvedValueOnce({
      id: 'query-1',
      seeding: [],
      pipeline: [],
      networkIds: ['network-1', 'network-2'],
    });

    await service.run('experiment-1', 'task-1');

    expect(networkRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ select: { id: true, graph: true } }),
    );
    expect(experimentRepository.update).toHaveBeenLastCalledWith(
      { id: 'experiment-1', status: ExperimentStatus.PENDING },
      expect.objectContaining({
        status: ExperimentStatus.FAILED,
        message: 'network network-2 of the query no longer exists',
        result: null,
      }),
    );
    expect(notifier.notify).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'failed' }),
    );
  });

  it('should not announce an outcome the experiment row did not take', async () => {
    experimentRepository.update
      .mockResolvedValueOnce({ affected: 1 })
      .mockResolvedValueOnce({ affected: 0 });

    await service.run('experiment-1', 'task-1');

    expect(experimentRepository.update).toHaveBeenCalledTimes(2);
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should stop when the claim is lost', async () => {
    experimentRepository.update.mockResolvedValueOnce({ affected: 0 });

    await service.run('experiment-1', 'task-2');

    expect(queryRepository.findOne).not.toHaveBeenCalled();
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should skip experiments that already finished', async () => {
    experimentRepository.findOne.mockResolvedValueOnce({
      ...pendingExperiment,
      status: ExperimentStatus.FAILED,
    });

    await service.run('experiment-1', 'task-1');

    expect(experimentRepository.update).not.toHaveBeenCalled();
  });
});
