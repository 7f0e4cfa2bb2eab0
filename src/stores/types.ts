import type { BackendName } from '../errors.js';
import type { EntityType, SearchableEntityType, SearchProjection, StoredRecord } from '../domain/entities.js';

export type Availability = 'available' | 'unavailable';

export type Scalar = string | number | boolean | null;

export interface RangeFilter {
  column: string;
  gte?: string;
  lte?: string;
  lt?: string;
}

export interface TextFilter {
  columns: string[];
  terms: string[];
  operator: 'and' | 'or';
}

/**
 * Backend-neutral filter. Relational stores translate it to SQL filters,
 * the search store to a bool query.
 */
export interface QueryPredicate {
  eq?: Record<string, Scalar>;
  in?: Record<string, ReadonlyArray<string>>;
  range?: RangeFilter[];
  text?: TextFilter;
  includeDeleted?: boolean;
  orderBy?: { column: string; ascending: boolean };
  limit?: number;
}

export type WritableFields = { id: string } & Record<string, unknown>;

export interface StoreAdapter {
  readonly backend: BackendName;
  ping(): Promise<Availability>;
}

export interface RelationalStore extends StoreAdapter {
  readonly backend: 'relational';
  read(entityType: EntityType, id: string): Promise<StoredRecord | null>;
  /**
   * Check-and-set write. `expectedVersion` 0 inserts a new row at version 1;
   * otherwise the row is updated only if its stored version still matches.
   */
  write(entityType: EntityType, fields: WritableFields, expectedVersion: number): Promise<StoredRecord>;
  query(entityType: EntityType, predicate?: QueryPredicate): AsyncIterable<StoredRecord>;
  count(entityType: EntityType, predicate?: QueryPredicate): Promise<number>;
}

export type ProjectionWriteResult = 'applied' | 'stale';

export type SearchSort = 'relevance' | 'newest';

export interface SearchRequest {
  entityTypes: ReadonlyArray<SearchableEntityType>;
  predicate: QueryPredicate;
  sort: SearchSort;
  page: number;
  pageSize: number;
}

export interface ScoredProjection {
  projection: SearchProjection;
  score: number | null;
}

export interface SearchResultPage {
  hits: ScoredProjection[];
  total: number;
}

export const FACET_FIELDS = ['status', 'owner_id', 'company_id', 'entity_type'] as const;
export type FacetField = (typeof FACET_FIELDS)[number];
export type Facets = Record<FacetField, string[]>;

export interface SearchStore extends StoreAdapter {
  readonly backend: 'search';
  read(entityType: SearchableEntityType, id: string): Promise<SearchProjection | null>;
  /** Upsert tagged with `projection.version`; `stale` when the index already holds a newer version. */
  write(projection: SearchProjection): Promise<ProjectionWriteResult>;
  query(entityType: SearchableEntityType, predicate?: QueryPredicate): AsyncIterable<SearchProjection>;
  search(request: SearchRequest): Promise<SearchResultPage>;
  facets(entityTypes: ReadonlyArray<SearchableEntityType>, predicate: QueryPredicate): Promise<Facets>;
}

export interface CacheStore extends StoreAdapter {
  readonly backend: 'cache';
  get(namespace: string, key: string): Promise<string | null>;
  set(namespace: string, key: string, value: string, ttlSeconds: number): Promise<void>;
}

export interface Stores {
  relational: RelationalStore;
  search: SearchStore;
  cache: CacheStore;
}
