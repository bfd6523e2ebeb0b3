export { CreateQueryDto } from './create-query.dto';
export { PipelineEntryDto, SeedingEntryDto } from './query-entries.dto';
export { QueryViewDto } from './query-view.dto';
