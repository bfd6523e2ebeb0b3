import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsOptional,
  IsUUID,
  ValidateNested,
} from 'class-validator';
import { PipelineEntryDto, SeedingEntryDto } from './query-entries.dto';

export class CreateQueryDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsUUID('4', { each: true })
  networkIds!: string[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedingEntryDto)
  seeding?: SeedingEntryDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PipelineEntryDto)
  pipeline?: PipelineEntryDto[];

  @IsOptional()
  @IsBoolean()
  public?: boolean;
}
