import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { NetworksService } from './networks.service';
import { toExportFile } from './export-file';
import { EdgeViewDto, NetworkViewDto, UpdateVisibilityDto } from './dto';

/**
 * Routes (JWT required):
 *   GET    /networks
 *   GET    /networks/:id
 *   GET    /networks/:id/edges
 *   GET    /networks/:id/export/:format   nodelink | sif | tsv | graphml | citations
 *   PATCH  /networks/:id/visibility       owner or admin
 *   POST   /networks/:id/projects/:pid    owner who is a project member
 *   DELETE /networks/:id                  owner or admin
 */
@Controller('networks')
@UseGuards(JwtAuthGuard)
export class NetworksController {
  constructor(private readonly networksService: NetworksService) {}

  @Get()
  async list(@CurrentUser() user: RequestUser): Promise<NetworkViewDto[]> {
    return this.networksService.listNetworks(user);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<NetworkViewDto> {
    return this.networksService.getNetwork(id, user);
  }

  @Get(':id/edges')
  async edges(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<EdgeViewDto[]> {
    return this.networksService.listEdges(id, user);
  }

  @Get(':id/export/:format')
  async exportNetwork(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('format') format: string,
    @CurrentUser() user: RequestUser,
  ): Promise<StreamableFile> {
    const network = await this.networksService.getNetworkWithGraph(id, user);
    return toExportFile(network.graph, format, `${network.name}-${network.version}`);
  }

  @Patch(':id/visibility')
  async setVisibility(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateVisibilityDto,
    @CurrentUser() user: RequestUser,
  ): Promise<NetworkViewDto> {
    return this.networksService.setVisibility(id, dto.public, user);
  }

  @Post(':id/projects/:projectId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async addToProject(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('projectId', ParseUUIDPipe) projectId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    await this.networksService.addToProject(id, projectId, user);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    await this.networksService.deleteNetwork(id, user);
  }
}
