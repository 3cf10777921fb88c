export {
  searchQuerySchema,
  fileListQuerySchema,
  type SearchQueryInput,
  type FileListQueryInput,
} from './search-schema';
