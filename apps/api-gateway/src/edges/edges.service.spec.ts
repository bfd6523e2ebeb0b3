import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Edge, EdgeComment, EdgeVote } from '@biocurate/database';
import { NetworkAccessService } from '../networks';
import { EdgesService } from './edges.service';
import { EdgeNotFoundException } from './exceptions';

describe('EdgesService', () => {
  let service: EdgesService;

  const curator = { userId: 'user-1', email: 'curator@example.com', isAdmin: false };
  const edge = {
    id: 'edge-1',
    networkId: 'network-1',
    sourceLabel: 'p(HGNC:MAPT)',
    targetLabel: 'bp(GO:apoptosis)',
    relation: 'increases',
    evidence: 'MAPT promotes apoptosis',
    annotations: {},
    citation: null,
    network: { id: 'network-1', public: true, ownerId: 'user-2' },
  };

  let edgeRepository: { findOne: jest.Mock };
  let voteRepository: { upsert: jest.Mock; delete: jest.Mock; find: jest.Mock };
  let commentRepository: { find: jest.Mock; create: jest.Mock; save: jest.Mock };
  let access: { canRead: jest.Mock };

  beforeEach(async () => {
    edgeRepository = { findOne: jest.fn().mockResolvedValue(edge) };
    voteRepository = {
      upsert: jest.fn().mockResolvedValue(undefined),
      delete: jest.fn().mockResolvedValue({ affected: 1 }),
      find: jest.fn().mockResolvedValue([]),
    };
    commentRepository = {
      find: jest.fn().mockResolvedValue([]),
      create: jest.fn((data: object) => ({ ...data })),
      save: jest.fn((data: object) =>
        Promise.resolve({ ...data, id: 'comment-1', createdAt: new Date('2026-02-01T10:00:00.000Z') }),
      ),
    };
    access = { canRead: jest.fn().mockResolvedValue(true) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EdgesService,
        { provide: getRepositoryToken(Edge), useValue: edgeRepository },
        { provide: getRepositoryToken(EdgeVote), useValue: voteRepository },
        { provide: getRepositoryToken(EdgeComment), useValue: commentRepository },
        { provide: NetworkAccessService, useValue: access },
      ],
    }).compile();

    service = module.get<EdgesService>(EdgesService);
  });

  describe('vote', () => {
    it('should upsert one vote per edge and user', async () => {
      voteRepository.find.mockResolvedValueOnce([
        { userId: 'user-1', agreed: false },
        { userId: 'user-3', agreed: true },
        { userId: 'user-4', agreed: true },
      ]);

      const tally = await service.vote('edge-1', false, curator);

      expect(voteRepository.upsert).toHaveBeenCalledWith(
        { edgeId: 'edge-1', userId: 'user-1', agreed: false, changedAt: expect.any(Date) },
        { conflictPaths: ['edgeId', 'userId'] },
      );
      expect(tally).toEqual({ agreed: 2, disagreed: 1, mine: false });
    });

    it('should hide edges of unreadable networks', async () => {
      access.canRead.mockResolvedValueOnce(false);

      await expect(service.vote('edge-1', true, curator)).rejects.toBeInstanceOf(
        EdgeNotFoundException,
      );
      expect(voteRepository.upsert).not.toHaveBeenCalled();
    });
  });

  describe('retractVote', () => {
    it('should delete only the caller vote', async () => {
      const tally = await service.retractVote('edge-1', curator);

      expect(voteRepository.delete).toHaveBeenCalledWith({ edgeId: 'edge-1', userId: 'user-1' });
      expect(tally).toEqual({ agreed: 0, disagreed: 0, mine: null });
    });
  });

  describe('comment', () => {
    it('should store the trimmed comment', async () => {
      const comment = await service.comment('edge-1', '  citation is a review  ', curator);

      expect(comment).toEqual({
        id: 'comment-1',
        userId: 'user-1',
        comment: 'citation is a review',
        createdAt: '2026-02-01T10:00:00.000Z',
      });
    });
  });

  describe('getEdge', () => {
    it('should return the edge with its tally and comments', async () => {
      commentRepository.find.mockResolvedValueOnce([
        {
          id: 'comment-1',
          userId: 'user-2',
          comment: 'confirmed',
          createdAt: new Date('2026-02-01T10:00:00.000Z'),
        },
      ]);

      const detail = await service.getEdge('edge-1', curator);

      expect(detail.edge).toEqual(
        expect.objectContaining({ id: 'edge-1', source: 'p(HGNC:MAPT)', citation: null }),
      );
      expect(detail.votes).toEqual({ agreed: 0, disagreed: 0, mine: null });
      expect(detail.comments).toHaveLength(1);
    });
  });
});
