import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Edge, Network, Project } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { ProjectNotFoundException } from '../projects/exceptions';
import { NetworkAccessService } from './network-access.service';
import { toEdgeView, toNetworkView } from './network-views';
import { EdgeViewDto, NetworkViewDto } from './dto';

/**
 * NetworksService — browsing and managing compiled networks.
 *
 * Networks are created only by the worker; here they are listed, shown,
 * re-shared, filed into projects and deleted. Deleting a network cascades
 * to its edges and clears the producing report's network_id.
 */
@Injectable()
export class NetworksService {
  private readonly logger = new Logger(NetworksService.name);

  constructor(
    @InjectRepository(Network)
    private readonly networkRepository: Repository<Network>,

    @InjectRepository(Edge)
    private readonly edgeRepository: Repository<Edge>,

    @InjectRepository(Project)
    private readonly projectRepository: Repository<Project>,

    private readonly access: NetworkAccessService,
  ) {}

  /** Readable networks, newest first. */
  async listNetworks(user: RequestUser): Promise<NetworkViewDto[]> {
    const networks = await this.access
      .readableNetworks(user)
      .orderBy('network.createdAt', 'DESC')
      .getMany();
    return networks.map(toNetworkView);
  }

  async getNetwork(networkId: string, user: RequestUser): Promise<NetworkViewDto> {
    return toNetworkView(await this.access.findReadable(networkId, user));
  }

  /** Readable network with its compiled graph, for export. */
  async getNetworkWithGraph(networkId: string, user: RequestUser): Promise<Network> {
    return this.access.findReadable(networkId, user, { withGraph: true });
  }

  async listEdges(networkId: string, user: RequestUser): Promise<EdgeViewDto[]> {
    await this.access.findReadable(networkId, user);
    const edges = await this.edgeRepository.find({
      where: { networkId },
      relations: { citation: true },
      order: { sourceLabel: 'ASC', targetLabel: 'ASC', relation: 'ASC' },
    });
    return edges.map(toEdgeView);
  }

  async setVisibility(
    networkId: string,
    isPublic: boolean,
    user: RequestUser,
  ): Promise<NetworkViewDto> {
    const network = await this.access.findReadable(networkId, user);
    this.access.assertCanManage(network, user, 'change the visibility of');

    await this.networkRepository.update({ id: network.id }, { public: isPublic });
    this.logger.log(`Network ${network.id} is now ${isPublic ? 'public' : 'private'}`);

    return toNetworkView({ ...network, public: isPublic });
  }

  async deleteNetwork(networkId: string, user: RequestUser): Promise<void> {
    const network = await this.access.findReadable(networkId, user);
    this.access.assertCanManage(network, user, 'delete');

    await this.networkRepository.delete({ id: network.id });
    this.logger.log(`Network ${network.id} (${network.name} v${network.version}) deleted`);
  }

  /**
   * Files the network into a project. Allowed to the network's owner (or an
   * admin) when they are a member of the project. Adding twice is a no-op.
   */
  async addToProject(networkId: string, projectId: string, user: RequestUser): Promise<void> {
    const network = await this.access.findReadable(networkId, user);
    this.access.assertCanManage(network, user, 'share');

    const project = await this.projectRepository.findOne({
      where: { id: projectId, members: { id: user.userId } },
      relations: { networks: true },
    });
    if (!project) {
      throw new ProjectNotFoundException(projectId);
    }
    if (project.networks.some((candidate) => candidate.id === network.id)) {
      return;
    }

    await this.projectRepository
      .createQueryBuilder()
      .relation(Project, 'networks')
      .of(project.id)
      .add(network.id);
    this.logger.log(`Network ${network.id} added to project ${project.id}`);
  }
}
