import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { createHash } from 'node:crypto';
import { Query } from '@biocurate/database';
import type { CompiledGraph } from '@biocurate/graph';
import { NetworkAccessService } from '../networks';
import { NetworkNotFoundException } from '../networks/exceptions';
import { assemblyHash, QueriesService } from './queries.service';
import { QueryHasNoParentException, QueryNotFoundException } from './exceptions';

describe('assemblyHash', () => {
  it('should not depend on order or duplicates', () => {
    const expected = createHash('md5').update('network-a,network-b').digest('hex');

    expect(assemblyHash(['network-b', 'network-a', 'network-b'])).toBe(expected);
  });
});

describe('QueriesService', () => {
  let service: QueriesService;

  const owner = { userId: 'user-1', email: 'owner@example.com', isAdmin: false };
  const stranger = { userId: 'user-2', email: 'stranger@example.com', isAdmin: false };
  const createdAt = new Date('2026-02-01T00:00:00.000Z');

  const graph: CompiledGraph = {
    metadata: {
      name: 'Tau',
      version: '1.0.0',
      description: null,
      authors: null,
      contact: null,
      license: null,
    },
    warnings: [],
    nodes: [
      { key: 'p(HGNC:MAPT)', function: 'Protein', namespace: 'HGNC', name: 'MAPT' },
      { key: 'bp(GO:apoptosis)', function: 'BiologicalProcess', namespace: 'GO', name: 'apoptosis' },
      { key: 'p(HGNC:CASP3)', function: 'Protein', namespace: 'HGNC', name: 'CASP3' },
    ],
    edges: [
      {
        source: 'p(HGNC:MAPT)',
        target: 'bp(GO:apoptosis)',
        relation: 'increases',
        citation: null,
        evidence: null,
        annotations: {},
        hash: 'hash-1',
      },
    ],
  };

  function storedQuery(overrides: Partial<Query> = {}): Query {
    return Object.assign(new Query(), {
      id: 'query-1',
      ownerId: 'user-1',
      assemblyHash: 'hash',
      seeding: [{ type: 'induction', data: ['MAPT'] }],
      pipeline: [],
      parentId: null,
      public: false,
      createdAt,
      networkIds: ['network-1'],
      ...overrides,
    });
  }

  let queryRepository: { findOne: jest.Mock; find: jest.Mock; create: jest.Mock; save: jest.Mock };
  let access: { findAllReadable: jest.Mock };

  beforeEach(async () => {
    queryRepository = {
      findOne: jest.fn().mockResolvedValue(null),
      find: jest.fn().mockResolvedValue([]),
      create: jest.fn((data: object) => ({ ...data })),
      save: jest.fn((data: object) => Promise.resolve({ ...data, id: 'query-2', createdAt })),
    };
    access = {
      findAllReadable: jest.fn().mockResolvedValue([{ id: 'network-1', graph }]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        QueriesService,
        { provide: getRepositoryToken(Query), useValue: queryRepository },
        { provide: NetworkAccessService, useValue: access },
      ],
    }).compile();

    service = module.get<QueriesService>(QueriesService);
  });

  describe('createQuery', () => {
    it('should store the query over readable networks', async () => {
      const view = await service.createQuery(
        { networkIds: ['network-1'], pipeline: [{ function: 'removeIsolatedNodes' }] },
        owner,
      );

      expect(access.findAllReadable).toHaveBeenCalledWith(['network-1'], owner);
      expect(queryRepository.create).toHaveBeenCalledWith({
        ownerId: 'user-1',
        networkIds: ['network-1'],
        assemblyHash: assemblyHash(['network-1']),
        seeding: [],
        pipeline: [{ function: 'removeIsolatedNodes' }],
        parentId: null,
        public: false,
      });
      expect(view).toEqual(
        expect.objectContaining({ id: 'query-2', networkIds: ['network-1'], parentId: null }),
      );
    });
  });

  describe('getQuery', () => {
    it('should hide private queries from other users', async () => {
      queryRepository.findOne.mockResolvedValueOnce(storedQuery());

      await expect(service.getQuery('query-1', stranger)).rejects.toBeInstanceOf(
        QueryNotFoundException,
      );
    });

    it('should return a public query unchanged', async () => {
      queryRepository.findOne.mockResolvedValueOnce(storedQuery({ public: true }));

      await expect(service.getQuery('query-1', stranger)).resolves.toEqual({
        id: 'query-1',
        ownerId: 'user-1',
        networkIds: ['network-1'],
        assemblyHash: 'hash',
        seeding: [{ type: 'induction', data: ['MAPT'] }],
        pipeline: [],
        parentId: null,
        public: true,
        createdAt: '2026-02-01T00:00:00.000Z',
      });
    });
  });

  describe('appendPipeline', () => {
    it('should derive a child and leave the parent untouched', async () => {
      const parent = storedQuery();
      queryRepository.findOne.mockResolvedValueOnce(parent);

      const child = await service.appendPipeline(
        'query-1',
        { function: 'expandNeighbors' },
        owner,
      );

      expect(child).toEqual(
        expect.objectContaining({
          id: 'query-2',
          parentId: 'query-1',
          seeding: [{ type: 'induction', data: ['MAPT'] }],
          pipeline: [{ function: 'expandNeighbors' }],
        }),
      );
      expect(parent.pipeline).toEqual([]);
      expect(queryRepository.save).toHaveBeenCalledTimes(1);
    });

    it('should copy the parent network ids onto the child', async () => {
      queryRepository.findOne.mockResolvedValueOnce(
        storedQuery({ networkIds: ['network-2', 'network-1'] }),
      );

      await service.appendPipeline('query-1', { function: 'expandNeighbors' }, owner);

      expect(access.findAllReadable).toHaveBeenCalledWith(['network-2', 'network-1'], owner);
      expect(queryRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({
          networkIds: ['network-1', 'network-2'],
          assemblyHash: assemblyHash(['network-1', 'network-2']),
        }),
      );
    });
  });

  describe('appendSeeding', () => {
    it('should append to the parent seeding', async () => {
      queryRepository.findOne.mockResolvedValueOnce(storedQuery({ public: true }));

      const child = await service.appendSeeding(
        'query-1',
        { type: 'neighbors', data: ['CASP3'] },
        stranger,
      );

      expect(child.seeding).toEqual([
        { type: 'induction', data: ['MAPT'] },
        { type: 'neighbors', data: ['CASP3'] },
      ]);
      expect(queryRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({ ownerId: 'user-2', parentId: 'query-1', public: false }),
      );
    });
  });

  describe('getParent / getAncestor', () => {
    it('should fail for a root query', async () => {
      queryRepository.findOne.mockResolvedValueOnce(storedQuery());

      await expect(service.getParent('query-1', owner)).rejects.toBeInstanceOf(
        QueryHasNoParentException,
      );
    });

    it('should walk up to the root of the chain', async () => {
      queryRepository.findOne
        .mockResolvedValueOnce(storedQuery({ id: 'query-3', parentId: 'query-2' }))
        .mockResolvedValueOnce(storedQuery({ id: 'query-2', parentId: 'query-1' }))
        .mockResolvedValueOnce(storedQuery({ id: 'query-1', parentId: null }));

      const ancestor = await service.getAncestor('query-3', owner);

      expect(ancestor.id).toBe('query-1');
      expect(queryRepository.findOne).toHaveBeenCalledTimes(3);
    });
  });

  describe('getResult', () => {
    it('should replay the pipeline over the assembled networks', async () => {
      queryRepository.findOne.mockResolvedValueOnce(
        storedQuery({ seeding: [], pipeline: [{ function: 'removeIsolatedNodes' }] }),
      );

      const result = await service.getResult('query-1', owner);

      expect(result['nodes']).toEqual([
        { id: 'p(HGNC:MAPT)', function: 'Protein', namespace: 'HGNC', name: 'MAPT' },
        { id: 'bp(GO:apoptosis)', function: 'BiologicalProcess', namespace: 'GO', name: 'apoptosis' },
      ]);
      expect(result['links']).toHaveLength(1);
    });

    it('should refuse to evaluate once an assembled network is gone', async () => {
      const stored = storedQuery({ networkIds: ['network-1', 'network-9'] });
      queryRepository.findOne.mockResolvedValue(stored);
      access.findAllReadable.mockRejectedValueOnce(new NetworkNotFoundException('network-9'));

      const err = await service.getResult('query-1', owner).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NetworkNotFoundException);
      expect(err).toHaveProperty('status', 404);
      expect(access.findAllReadable).toHaveBeenCalledWith(['network-1', 'network-9'], owner);
      await expect(service.getQuery('query-1', owner)).resolves.toEqual(
        expect.objectContaining({ networkIds: ['network-1', 'network-9'] }),
      );
    });
  });
});
