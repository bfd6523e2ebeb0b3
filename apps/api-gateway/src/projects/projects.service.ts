import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isUniqueViolation, Project, User } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { toNetworkView } from '../networks';
import {
  CreateProjectDto,
  ProjectListItemDto,
  ProjectSummaryDto,
  ProjectViewDto,
} from './dto';
import {
  MemberNotFoundException,
  ProjectNameTakenException,
  ProjectNotFoundException,
} from './exceptions';

/**
 * ProjectsService — groups of curators sharing networks.
 *
 * Only members act on a project; to anyone else it does not exist. The
 * creator becomes the first member. Project names are unique.
 */
@Injectable()
export class ProjectsService {
  private readonly logger = new Logger(ProjectsService.name);

  constructor(
    @InjectRepository(Project)
    private readonly projectRepository: Repository<Project>,

    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async createProject(dto: CreateProjectDto, user: RequestUser): Promise<ProjectListItemDto> {
    const name = dto.name.trim();

    const existing = await this.projectRepository.findOne({ where: { name }, select: { id: true } });
    if (existing) {
      throw new ProjectNameTakenException(name);
    }

    try {
      const project = await this.projectRepository.save(
        this.projectRepository.create({
          name,
          description: dto.description?.trim() || null,
          members: [{ id: user.userId }],
        }),
      );
      this.logger.log(`Project ${project.id} (${name}) created by ${user.userId}`);
      return toListItem(project);
    } catch (err: unknown) {
      // Lost a race with another request creating the same name
      if (isUniqueViolation(err)) {
        throw new ProjectNameTakenException(name, err instanceof Error ? err : undefined);
      }
      throw err;
    }
  }

  /** Projects the caller belongs to, by name. */
  async listProjects(user: RequestUser): Promise<ProjectListItemDto[]> {
    const projects = await this.projectRepository.find({
      where: { members: { id: user.userId } },
      order: { name: 'ASC' },
    });
    return projects.map(toListItem);
  }

  async getProject(projectId: string, user: RequestUser): Promise<ProjectViewDto> {
    const project = await this.findForMember(projectId, user);
    return {
      ...toListItem(project),
      members: project.members.map((member) => ({
        id: member.id,
        email: member.email,
        fullName: member.fullName,
      })),
      networks: project.networks.map(toNetworkView),
    };
  }

  async getSummary(projectId: string, user: RequestUser): Promise<ProjectSummaryDto> {
    const project = await this.findForMember(projectId, user);
    return {
      id: project.id,
      numberNetworks: project.networks.length,
      numberNodes: project.networks.reduce((total, network) => total + network.numberNodes, 0),
      numberEdges: project.networks.reduce((total, network) => total + network.numberEdges, 0),
    };
  }

  async addMember(projectId: string, email: string, user: RequestUser): Promise<ProjectViewDto> {
    const project = await this.findForMember(projectId, user);

    const member = await this.userRepository.findOne({
      where: { email: email.trim().toLowerCase() },
      select: { id: true },
    });
    if (!member) {
      throw new MemberNotFoundException(email);
    }

    if (!project.members.some((candidate) => candidate.id === member.id)) {
      await this.projectRepository
        .createQueryBuilder()
        .relation(Project, 'members')
        .of(project.id)
        .add(member.id);
      this.logger.log(`User ${member.id} joined project ${project.id}`);
    }

    return this.getProject(project.id, user);
  }

  async removeNetwork(projectId: string, networkId: string, user: RequestUser): Promise<void> {
    const project = await this.findForMember(projectId, user);

    await this.projectRepository
      .createQueryBuilder()
      .relation(Project, 'networks')
      .of(project.id)
      .remove(networkId);
    this.logger.log(`Network ${networkId} removed from project ${project.id}`);
  }

  // ── Private helpers ──────────────────────────────────────

  /** Loads members and networks; non-members get a 404. */
  private async findForMember(projectId: string, user: RequestUser): Promise<Project> {
    const project = await this.projectRepository.findOne({
      where: { id: projectId },
      relations: { members: true, networks: true },
    });
    if (!project || !project.members.some((member) => member.id === user.userId)) {
      throw new ProjectNotFoundException(projectId);
    }
    return project;
  }
}

function toListItem(project: Project): ProjectListItemDto {
  return {
    id: project.id,
    name: project.name,
    description: project.description,
    createdAt: project.createdAt.toISOString(),
  };
}
