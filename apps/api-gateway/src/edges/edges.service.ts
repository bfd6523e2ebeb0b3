import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Edge, EdgeComment, EdgeVote } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { NetworkAccessService, toEdgeView } from '../networks';
import { EdgeCommentDto, EdgeDetailDto, VoteTallyDto } from './dto';
import { EdgeNotFoundException } from './exceptions';

/**
 * EdgesService — curation of single edges.
 *
 * Anyone who can read an edge's network may vote on it or comment. One
 * vote per (edge, user): voting again overwrites the earlier vote.
 */
@Injectable()
export class EdgesService {
  private readonly logger = new Logger(EdgesService.name);

  constructor(
    @InjectRepository(Edge)
    private readonly edgeRepository: Repository<Edge>,

    @InjectRepository(EdgeVote)
    private readonly voteRepository: Repository<EdgeVote>,

    @InjectRepository(EdgeComment)
    private readonly commentRepository: Repository<EdgeComment>,

    private readonly access: NetworkAccessService,
  ) {}

  async getEdge(edgeId: string, user: RequestUser): Promise<EdgeDetailDto> {
    const edge = await this.findReadable(edgeId, user);

    const comments = await this.commentRepository.find({
      where: { edgeId: edge.id },
      order: { createdAt: 'ASC' },
    });

    return {
      edge: toEdgeView(edge),
      votes: await this.tally(edge.id, user.userId),
      comments: comments.map(toCommentView),
    };
  }

  async vote(edgeId: string, agreed: boolean, user: RequestUser): Promise<VoteTallyDto> {
    const edge = await this.findReadable(edgeId, user);

    await this.voteRepository.upsert(
      { edgeId: edge.id, userId: user.userId, agreed, changedAt: new Date() },
      { conflictPaths: ['edgeId', 'userId'] },
    );
    this.logger.debug(`User ${user.userId} ${agreed ? 'agreed with' : 'disputed'} edge ${edge.id}`);

    return this.tally(edge.id, user.userId);
  }

  async retractVote(edgeId: string, user: RequestUser): Promise<VoteTallyDto> {
    const edge = await this.findReadable(edgeId, user);
    await this.voteRepository.delete({ edgeId: edge.id, userId: user.userId });
    return this.tally(edge.id, user.userId);
  }

  async comment(edgeId: string, text: string, user: RequestUser): Promise<EdgeCommentDto> {
    const edge = await this.findReadable(edgeId, user);
    const saved = await this.commentRepository.save(
      this.commentRepository.create({ edgeId: edge.id, userId: user.userId, comment: text.trim() }),
    );
    return toCommentView(saved);
  }

  // ── Private helpers ──────────────────────────────────────

  private async findReadable(edgeId: string, user: RequestUser): Promise<Edge> {
    const edge = await this.edgeRepository.findOne({
      where: { id: edgeId },
      relations: { citation: true, network: true },
    });
    if (!edge || !(await this.access.canRead(edge.network, user))) {
      throw new EdgeNotFoundException(edgeId);
    }
    return edge;
  }

  private async tally(edgeId: string, userId: string): Promise<VoteTallyDto> {
    const votes = await this.voteRepository.find({ where: { edgeId } });
    return {
      agreed: votes.filter((vote) => vote.agreed).length,
      disagreed: votes.filter((vote) => !vote.agreed).length,
      mine: votes.find((vote) => vote.userId === userId)?.agreed ?? null,
    };
  }
}

function toCommentView(comment: EdgeComment): EdgeCommentDto {
  return {
    id: comment.id,
    userId: comment.userId,
    comment: comment.comment,
    createdAt: comment.createdAt.toISOString(),
  };
}
