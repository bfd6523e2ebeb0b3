import { ArrayNotEmpty, IsArray, IsIn, IsString, MaxLength } from 'class-validator';
import { PIPELINE_FUNCTIONS, SEEDING_TYPES } from '@biocurate/graph';
import type { PipelineFunction, SeedingType } from '@biocurate/graph';

export class SeedingEntryDto {
  @IsIn(SEEDING_TYPES)
  type!: SeedingType;

  /** Node keys or names; citation references for `citation` */
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @MaxLength(512, { each: true })
  data!: string[];
}

export class PipelineEntryDto {
  @IsIn(PIPELINE_FUNCTIONS)
  function!: PipelineFunction;
}
