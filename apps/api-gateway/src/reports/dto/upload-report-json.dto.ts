import { IsObject, IsOptional, IsString, MaxLength } from 'class-validator';
import { UploadReportDto } from './upload-report.dto';

/** Body of POST /reports/json: the graph document inline, plus the same flags */
export class UploadReportJsonDto extends UploadReportDto {
  @IsObject()
  document!: Record<string, unknown>;

  /** Name recorded on the report; defaults to "document.json" */
  @IsOptional()
  @IsString()
  @MaxLength(255)
  sourceName?: string;
}
