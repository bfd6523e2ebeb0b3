import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Omic } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { DocumentTooLargeException, EmptyDocumentException } from '../reports/exceptions';
import { toSourceName } from '../reports/source-name';
import { OmicDetailDto, OmicViewDto, UploadOmicDto } from './dto';
import {
  InvalidOmicTableException,
  OmicForbiddenException,
  OmicNotFoundException,
} from './exceptions';
import {
  DEFAULT_DATA_COLUMN,
  DEFAULT_GENE_COLUMN,
  OmicTableError,
  parseOmicTable,
} from './omic-table.parser';

const BYTES_PER_MB = 1024 * 1024;

/**
 * OmicsService — per-gene measurement tables used to seed experiments.
 *
 * Tables are parsed at upload and only the gene → value map is stored.
 * An omic is visible to its owner, to admins, and to everyone when public.
 */
@Injectable()
export class OmicsService {
  private readonly logger = new Logger(OmicsService.name);
  private readonly maxFileSizeBytes: number;

  constructor(
    @InjectRepository(Omic)
    private readonly omicRepository: Repository<Omic>,

    configService: ConfigService,
  ) {
    const maxFileSizeMb = Number(
      configService.get<string | number>('UPLOAD_MAX_FILE_SIZE_MB', 50),
    );
    this.maxFileSizeBytes = maxFileSizeMb * BYTES_PER_MB;
  }

  async uploadOmic(
    file: Express.Multer.File | undefined,
    dto: UploadOmicDto,
    userId: string,
  ): Promise<OmicViewDto> {
    if (!file || file.size === 0) {
      throw new EmptyDocumentException();
    }
    if (file.size > this.maxFileSizeBytes) {
      throw new DocumentTooLargeException(this.maxFileSizeBytes / BYTES_PER_MB);
    }

    const geneColumn = dto.geneColumn ?? DEFAULT_GENE_COLUMN;
    const dataColumn = dto.dataColumn ?? DEFAULT_DATA_COLUMN;

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(file.buffer);
    } catch {
      throw new InvalidOmicTableException('the file is not valid UTF-8 text');
    }

    let table: ReturnType<typeof parseOmicTable>;
    try {
      table = parseOmicTable(text, { geneColumn, dataColumn });
    } catch (err: unknown) {
      if (err instanceof OmicTableError) {
        throw new InvalidOmicTableException(err.message);
      }
      throw err;
    }

    const omic = await this.omicRepository.save(
      this.omicRepository.create({
        sourceName: toSourceName(file.originalname, 'omic.tsv'),
        description: dto.description?.trim() || null,
        geneColumn,
        dataColumn,
        data: table.data,
        numberGenes: table.numberGenes,
        public: dto.public ?? false,
        ownerId: userId,
      }),
    );

    this.logger.log(
      `Omic ${omic.id} stored for ${userId}: ${table.numberGenes} genes, ` +
        `${table.skippedRows} rows skipped`,
    );
    return toOmicView(omic);
  }

  /** Own and public omics, newest first; admins see all. */
  async listOmics(user: RequestUser): Promise<OmicViewDto[]> {
    const omics = await this.omicRepository.find({
      where: user.isAdmin ? {} : [{ ownerId: user.userId }, { public: true }],
      order: { createdAt: 'DESC' },
    });
    return omics.map(toOmicView);
  }

  async getOmic(omicId: string, user: RequestUser): Promise<OmicDetailDto> {
    const omic = await this.omicRepository.findOne({
      where: { id: omicId },
      select: {
        id: true,
        sourceName: true,
        description: true,
        geneColumn: true,
        dataColumn: true,
        data: true,
        numberGenes: true,
        public: true,
        ownerId: true,
        createdAt: true,
      },
    });
    if (!omic || !canRead(omic, user)) {
      throw new OmicNotFoundException(omicId);
    }
    return { ...toOmicView(omic), data: omic.data };
  }

  async deleteOmic(omicId: string, user: RequestUser): Promise<void> {
    const omic = await this.findReadable(omicId, user);
    if (omic.ownerId !== user.userId && !user.isAdmin) {
      throw new OmicForbiddenException(omicId);
    }
    await this.omicRepository.delete({ id: omic.id });
    this.logger.log(`Omic ${omic.id} deleted by ${user.userId}`);
  }

  /** The omic without its data, or 404 when the caller cannot see it. */
  async findReadable(omicId: string, user: RequestUser): Promise<Omic> {
    const omic = await this.omicRepository.findOne({ where: { id: omicId } });
    if (!omic || !canRead(omic, user)) {
      throw new OmicNotFoundException(omicId);
    }
    return omic;
  }
}

function canRead(omic: Pick<Omic, 'public' | 'ownerId'>, user: RequestUser): boolean {
  return omic.public || omic.ownerId === user.userId || user.isAdmin;
}

function toOmicView(omic: Omic): OmicViewDto {
  return {
    id: omic.id,
    sourceName: omic.sourceName,
    description: omic.description,
    geneColumn: omic.geneColumn,
    dataColumn: omic.dataColumn,
    numberGenes: omic.numberGenes,
    public: omic.public,
    ownerId: omic.ownerId,
    createdAt: omic.createdAt.toISOString(),
  };
}
