export { PARSE_LIMITS, FILE_LIMITS, SEARCH_LIMITS, INDEX_TUNING } from './limits';
