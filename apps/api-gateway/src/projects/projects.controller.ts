import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { ProjectsService } from './projects.service';
import {
  AddMemberDto,
  CreateProjectDto,
  ProjectListItemDto,
  ProjectSummaryDto,
  ProjectViewDto,
} from './dto';

/**
 * Routes (JWT required; members only):
 *   POST   /projects                        409 on a duplicate name
 *   GET    /projects
 *   GET    /projects/:id
 *   GET    /projects/:id/summary
 *   POST   /projects/:id/members            { email }
 *   DELETE /projects/:id/networks/:networkId
 */
@Controller('projects')
@UseGuards(JwtAuthGuard)
export class ProjectsController {
  constructor(private readonly projectsService: ProjectsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Body() dto: CreateProjectDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ProjectListItemDto> {
    return this.projectsService.createProject(dto, user);
  }

  @Get()
  async list(@CurrentUser() user: RequestUser): Promise<ProjectListItemDto[]> {
    return this.projectsService.listProjects(user);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ProjectViewDto> {
    return this.projectsService.getProject(id, user);
  }

  @Get(':id/summary')
  async summary(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ProjectSummaryDto> {
    return this.projectsService.getSummary(id, user);
  }

  @Post(':id/members')
  @HttpCode(HttpStatus.OK)
  async addMember(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AddMemberDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ProjectViewDto> {
    return this.projectsService.addMember(id, dto.email, user);
  }

  @Delete(':id/networks/:networkId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeNetwork(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('networkId', ParseUUIDPipe) networkId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    await this.projectsService.removeNetwork(id, networkId, user);
  }
}
