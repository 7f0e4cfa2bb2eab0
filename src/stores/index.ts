export { SupabaseRelationalStore, buildTextFilter, tableFor } from './relational.js';
export { ElasticSearchStore, buildQuery, documentId } from './search.js';
export { RedisCacheStore } from './cache.js';
export { withTimeout, TimeoutError } from './timeout.js';
export { FACET_FIELDS } from './types.js';
export type {
  Availability,
  CacheStore,
  FacetField,
  Facets,
  ProjectionWriteResult,
  QueryPredicate,
  RelationalStore,
  ScoredProjection,
  SearchRequest,
  SearchResultPage,
  SearchSort,
  SearchStore,
  StoreAdapter,
  Stores,
  WritableFields,
} from './types.js';
