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
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { OmicsService } from './omics.service';
import { OmicDetailDto, OmicViewDto, UploadOmicDto } from './dto';

const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024,
  },
};

/**
 * Routes (JWT required):
 *   POST   /omics        multipart table + column names
 *   GET    /omics        own and public omics
 *   GET    /omics/:id    with the gene → value table
 *   DELETE /omics/:id    owner or admin
 */
@Controller('omics')
@UseGuards(JwtAuthGuard)
export class OmicsController {
  constructor(private readonly omicsService: OmicsService) {}

  @Post()
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.CREATED)
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: UploadOmicDto,
    @CurrentUser() user: RequestUser,
  ): Promise<OmicViewDto> {
    return this.omicsService.uploadOmic(file, dto, user.userId);
  }

  @Get()
  async list(@CurrentUser() user: RequestUser): Promise<OmicViewDto[]> {
    return this.omicsService.listOmics(user);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<OmicDetailDto> {
    return this.omicsService.getOmic(id, user);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    await this.omicsService.deleteOmic(id, user);
  }
}
