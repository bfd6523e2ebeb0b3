import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';
import { toBooleanFlag } from './boolean-flag.transform';

/**
 * Compile flags sent as multipart text fields next to the file.
 * Omitted flags default to `true`.
 */
export class UploadReportDto {
  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  public?: boolean;

  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  citationClearing?: boolean;

  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  inferOrigin?: boolean;

  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  identifierValidation?: boolean;
}
