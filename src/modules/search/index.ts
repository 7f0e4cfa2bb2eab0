export { QueryRouter, selectPath } from './router.js';
export type { QueryPath, QueryRouterOptions, SearchHit, SearchPage } from './router.js';
export { searchFiltersSchema, simpleSearchSchema } from './schemas.js';
export type { SearchFilters, SimpleSearch } from './schemas.js';
