import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { RELATIONS } from '@biocurate/graph';

export class SearchQueryDto {
  /** Case-insensitive substring */
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  q!: string;
}

export class EdgeSearchQueryDto extends SearchQueryDto {
  @IsOptional()
  @IsIn(RELATIONS)
  relation?: string;
}
