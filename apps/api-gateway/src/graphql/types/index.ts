export { NetworkType } from './network.type';
export { ReportType } from './report.type';
