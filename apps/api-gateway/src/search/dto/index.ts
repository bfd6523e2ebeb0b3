export { EdgeSearchQueryDto, SearchQueryDto } from './search-query.dto';
