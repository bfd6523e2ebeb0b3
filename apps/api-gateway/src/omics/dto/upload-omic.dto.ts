import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { toBooleanFlag } from '../../reports/dto/boolean-flag.transform';

/** Multipart text fields sent next to the omic table */
export class UploadOmicDto {
  /** Defaults to "Gene.symbol" */
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(128)
  geneColumn?: string;

  /** Defaults to "logFC" */
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(128)
  dataColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  /** Defaults to false */
  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  public?: boolean;
}
