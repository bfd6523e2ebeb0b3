// Side-effect imports: calling registerEnumType() on module load.
// Import this barrel in the GraphQL module to ensure enums are registered
// before Apollo builds the schema.
export { ReportViewStatusEnum } from './report-view-status.enum';
