import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, In, ObjectLiteral, Repository, SelectQueryBuilder } from 'typeorm';
import { Network, Project } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { NetworkForbiddenException, NetworkNotFoundException } from './exceptions';

/** Project memberships that grant read access to the network aliased `alias` */
function projectReadAccess(alias: string): string {
  return `EXISTS (
    SELECT 1 FROM project_networks pn
    INNER JOIN project_members pm ON pm.project_id = pn.project_id
    WHERE pn.network_id = ${alias}.id AND pm.user_id = :readerId
  )`;
}

/**
 * NetworkAccessService — who may read and manage a network.
 *
 * Read: the network is public, the caller owns it, is an admin, or belongs
 * to a project the network is in. Manage (visibility, delete): owner or admin.
 * Unreadable networks are reported as missing.
 */
@Injectable()
export class NetworkAccessService {
  constructor(
    @InjectRepository(Network)
    private readonly networkRepository: Repository<Network>,

    @InjectRepository(Project)
    private readonly projectRepository: Repository<Project>,
  ) {}

  /** Query builder over the networks `user` can read, aliased `network`. */
  readableNetworks(user: RequestUser): SelectQueryBuilder<Network> {
    return this.restrictToReadable(this.networkRepository.createQueryBuilder('network'), user);
  }

  /**
   * Adds the read rule to a query in which a network is joined as `alias`.
   * Admins read everything, so their queries are left unchanged.
   */
  restrictToReadable<T extends ObjectLiteral>(
    query: SelectQueryBuilder<T>,
    user: RequestUser,
    alias = 'network',
  ): SelectQueryBuilder<T> {
    if (user.isAdmin) {
      return query;
    }
    return query.andWhere(
      new Brackets((where) => {
        where
          .where(`${alias}.public = true`)
          .orWhere(`${alias}.ownerId = :readerId`)
          .orWhere(projectReadAccess(alias));
      }),
      { readerId: user.userId },
    );
  }

  async canRead(
    network: Pick<Network, 'id' | 'public' | 'ownerId'>,
    user: RequestUser,
  ): Promise<boolean> {
    if (network.public || user.isAdmin || network.ownerId === user.userId) {
      return true;
    }
    return this.projectRepository
      .createQueryBuilder('project')
      .innerJoin('project.members', 'member', 'member.id = :userId', { userId: user.userId })
      .innerJoin('project.networks', 'network', 'network.id = :networkId', {
        networkId: network.id,
      })
      .getExists();
  }

  /**
   * Loads a readable network; `withGraph` adds the compiled graph, which
   * default selects leave out.
   */
  async findReadable(
    networkId: string,
    user: RequestUser,
    options: { withGraph?: boolean } = {},
  ): Promise<Network> {
    const network = await this.networkRepository.findOne({
      where: { id: networkId },
      select: options.withGraph ? selectWithGraph() : undefined,
    });
    if (!network || !(await this.canRead(network, user))) {
      throw new NetworkNotFoundException(networkId);
    }
    return network;
  }

  /** All of `networkIds`, with graphs, ordered by id; any unreadable one is a 404. */
  async findAllReadable(networkIds: readonly string[], user: RequestUser): Promise<Network[]> {
    const unique = [...new Set(networkIds)];
    const networks = await this.networkRepository.find({
      where: { id: In(unique) },
      select: selectWithGraph(),
      order: { id: 'ASC' },
    });
    for (const id of unique) {
      const network = networks.find((candidate) => candidate.id === id);
      if (!network || !(await this.canRead(network, user))) {
        throw new NetworkNotFoundException(id);
      }
    }
    return networks;
  }

  assertCanManage(
    network: Pick<Network, 'id' | 'ownerId'>,
    user: RequestUser,
    action: string,
  ): void {
    if (!user.isAdmin && network.ownerId !== user.userId) {
      throw new NetworkForbiddenException(network.id, action);
    }
  }
}

function selectWithGraph(): Record<keyof Omit<Network, 'owner' | 'edges' | 'projects'>, true> {
  return {
    id: true,
    name: true,
    version: true,
    description: true,
    authors: true,
    contact: true,
    license: true,
    public: true,
    graph: true,
    numberNodes: true,
    numberEdges: true,
    ownerId: true,
    reportId: true,
    createdAt: true,
  };
}
