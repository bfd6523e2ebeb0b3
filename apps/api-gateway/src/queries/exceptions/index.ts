export { QueryHasNoParentException, QueryNotFoundException } from './query.exceptions';
