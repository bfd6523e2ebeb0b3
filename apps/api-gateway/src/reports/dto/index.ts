export { UploadReportDto } from './upload-report.dto';
export { UploadReportJsonDto } from './upload-report-json.dto';
export { UploadReportResponseDto } from './upload-report-response.dto';
export { ReportViewDto } from './report-view.dto';
