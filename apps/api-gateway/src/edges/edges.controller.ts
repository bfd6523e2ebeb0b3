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
import { EdgesService } from './edges.service';
import { CommentEdgeDto, EdgeCommentDto, EdgeDetailDto, VoteEdgeDto, VoteTallyDto } from './dto';

/**
 * Routes (JWT required):
 *   GET    /edges/:id            edge, vote tally and comments
 *   POST   /edges/:id/vote       { agreed }
 *   DELETE /edges/:id/vote
 *   POST   /edges/:id/comments   { comment }
 */
@Controller('edges')
@UseGuards(JwtAuthGuard)
export class EdgesController {
  constructor(private readonly edgesService: EdgesService) {}

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<EdgeDetailDto> {
    return this.edgesService.getEdge(id, user);
  }

  @Post(':id/vote')
  @HttpCode(HttpStatus.OK)
  async vote(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: VoteEdgeDto,
    @CurrentUser() user: RequestUser,
  ): Promise<VoteTallyDto> {
    return this.edgesService.vote(id, dto.agreed, user);
  }

  @Delete(':id/vote')
  async retractVote(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<VoteTallyDto> {
    return this.edgesService.retractVote(id, user);
  }

  @Post(':id/comments')
  @HttpCode(HttpStatus.CREATED)
  async comment(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CommentEdgeDto,
    @CurrentUser() user: RequestUser,
  ): Promise<EdgeCommentDto> {
    return this.edgesService.comment(id, dto.comment, user);
  }
}
