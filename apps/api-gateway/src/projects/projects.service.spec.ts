import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError } from 'typeorm';
import { Project, User } from '@biocurate/database';
import { ProjectsService } from './projects.service';
import {
  MemberNotFoundException,
  ProjectNameTakenException,
  ProjectNotFoundException,
} from './exceptions';

describe('ProjectsService', () => {
  let service: ProjectsService;

  const member = { userId: 'user-1', email: 'member@example.com', isAdmin: false };
  const outsider = { userId: 'user-5', email: 'outsider@example.com', isAdmin: false };
  const createdAt = new Date('2026-01-05T00:00:00.000Z');

  const project = {
    id: 'project-1',
    name: 'Neurodegeneration',
    description: null,
    createdAt,
    members: [{ id: 'user-1', email: 'member@example.com', fullName: 'Member One' }],
    networks: [
      {
        id: 'network-1',
        name: 'Tau',
        version: '1.0.0',
        description: null,
        authors: null,
        contact: null,
        license: null,
        public: false,
        numberNodes: 10,
        numberEdges: 12,
        ownerId: 'user-1',
        reportId: 'report-1',
        createdAt,
      },
      {
        id: 'network-2',
        name: 'APP',
        version: '2.0.0',
        description: null,
        authors: null,
        contact: null,
        license: null,
        public: true,
        numberNodes: 5,
        numberEdges: 4,
        ownerId: 'user-2',
        reportId: 'report-2',
        createdAt,
      },
    ],
  };

  let relation: { relation: jest.Mock; of: jest.Mock; add: jest.Mock; remove: jest.Mock };
  let projectRepository: {
    findOne: jest.Mock;
    find: jest.Mock;
    create: jest.Mock;
    save: jest.Mock;
    createQueryBuilder: jest.Mock;
  };
  let userRepository: { findOne: jest.Mock };

  beforeEach(async () => {
    relation = {
      relation: jest.fn().mockReturnThis(),
      of: jest.fn().mockReturnThis(),
      add: jest.fn().mockResolvedValue(undefined),
      remove: jest.fn().mockResolvedValue(undefined),
    };
    projectRepository = {
      findOne: jest.fn().mockResolvedValue(null),
      find: jest.fn().mockResolvedValue([]),
      create: jest.fn((data: object) => ({ ...data })),
      save: jest.fn((data: object) => Promise.resolve({ ...data, id: 'project-1', createdAt })),
      createQueryBuilder: jest.fn().mockReturnValue(relation),
    };
    userRepository = { findOne: jest.fn().mockResolvedValue(null) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProjectsService,
        { provide: getRepositoryToken(Project), useValue: projectRepository },
        { provide: getRepositoryToken(User), useValue: userRepository },
      ],
    }).compile();

    service = module.get<ProjectsService>(ProjectsService);
  });

  describe('createProject', () => {
    it('should make the creator the first member', async () => {
      const result = await service.createProject({ name: ' Neurodegeneration ' }, member);

      expect(projectRepository.create).toHaveBeenCalledWith({
        name: 'Neurodegeneration',
        description: null,
        members: [{ id: 'user-1' }],
      });
      expect(result).toEqual({
        id: 'project-1',
        name: 'Neurodegeneration',
        description: null,
        createdAt: '2026-01-05T00:00:00.000Z',
      });
    });

    it('should reject a name that is taken', async () => {
      projectRepository.findOne.mockResolvedValueOnce({ id: 'project-0' });

      await expect(
        service.createProject({ name: 'Neurodegeneration' }, member),
      ).rejects.toBeInstanceOf(ProjectNameTakenException);
      expect(projectRepository.save).not.toHaveBeenCalled();
    });

    it('should map a concurrent duplicate insert to a conflict', async () => {
      projectRepository.save.mockRejectedValueOnce(
        new QueryFailedError(
          'INSERT INTO "projects"',
          [],
          Object.assign(new Error('duplicate key value'), {
            code: '23505',
            constraint: 'UQ_projects_name',
          }),
        ),
      );

      const error = await service
        .createProject({ name: 'Neurodegeneration' }, member)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProjectNameTakenException);
      expect(error).toHaveProperty('status', 409);
    });
  });

  describe('getSummary', () => {
    it('should total nodes and edges over the project networks', async () => {
      projectRepository.findOne.mockResolvedValueOnce(project);

      await expect(service.getSummary('project-1', member)).resolves.toEqual({
        id: 'project-1',
        numberNetworks: 2,
        numberNodes: 15,
        numberEdges: 16,
      });
    });

    it('should hide the project from non-members', async () => {
      projectRepository.findOne.mockResolvedValueOnce(project);

      await expect(service.getSummary('project-1', outsider)).rejects.toBeInstanceOf(
        ProjectNotFoundException,
      );
    });
  });

  describe('addMember', () => {
    it('should look the user up by lower-cased email and add them', async () => {
      projectRepository.findOne.mockResolvedValue(project);
      userRepository.findOne.mockResolvedValueOnce({ id: 'user-7' });

      await service.addMember('project-1', 'New.Member@Example.com', member);

      expect(userRepository.findOne).toHaveBeenCalledWith({
        where: { email: 'new.member@example.com' },
        select: { id: true },
      });
      expect(relation.relation).toHaveBeenCalledWith(Project, 'members');
      expect(relation.add).toHaveBeenCalledWith('user-7');
    });

    it('should fail for an unknown email', async () => {
      projectRepository.findOne.mockResolvedValueOnce(project);

      await expect(
        service.addMember('project-1', 'nobody@example.com', member),
      ).rejects.toBeInstanceOf(MemberNotFoundException);
      expect(relation.add).not.toHaveBeenCalled();
    });
  });

  describe('removeNetwork', () => {
    it('should detach the network from the project', async () => {
      projectRepository.findOne.mockResolvedValueOnce(project);

      await service.removeNetwork('project-1', 'network-2', member);

      expect(relation.relation).toHaveBeenCalledWith(Project, 'networks');
      expect(relation.remove).toHaveBeenCalledWith('network-2');
    });
  });
});
