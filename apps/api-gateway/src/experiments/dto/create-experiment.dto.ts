import { IsInt, IsOptional, IsUUID, Max, Min } from 'class-validator';

export class CreateExperimentDto {
  @IsUUID()
  queryId!: string;

  @IsUUID()
  omicId!: string;

  /** Diffusion rounds; defaults to 10 */
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  steps?: number;
}
