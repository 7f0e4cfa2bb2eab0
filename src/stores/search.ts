import { errors, type Client, type estypes } from '@elastic/elasticsearch';
import { BackendUnavailableError } from '../errors.js';
import {
  searchProjectionSchema,
  type SearchableEntityType,
  type SearchProjection,
} from '../domain/entities.js';
import {
  FACET_FIELDS,
  type Availability,
  type Facets,
  type FacetField,
  type ProjectionWriteResult,
  type QueryPredicate,
  type SearchRequest,
  type SearchResultPage,
  type SearchStore,
} from './types.js';
import { TimeoutError, withTimeout } from './timeout.js';

const SCAN_PAGE_SIZE = 500;
const FACET_SIZE = 200;

export const PROJECTION_MAPPINGS: estypes.MappingTypeMapping = {
  properties: {
    entity_type: { type: 'keyword' },
    id: { type: 'keyword' },
    version: { type: 'long' },
    title: { type: 'text' },
    body: { type: 'text' },
    status: { type: 'keyword' },
    owner_id: { type: 'keyword' },
    company_id: { type: 'keyword' },
    created_at: { type: 'date' },
    updated_at: { type: 'date' },
    deleted: { type: 'boolean' },
  },
};

export function documentId(entityType: SearchableEntityType, id: string): string {
  return `${entityType}:${id}`;
}

export function buildQuery(
  entityTypes: ReadonlyArray<SearchableEntityType>,
  predicate: QueryPredicate
): estypes.QueryDslQueryContainer {
  const filter: estypes.QueryDslQueryContainer[] = [];
  const must: estypes.QueryDslQueryContainer[] = [];

  if (entityTypes.length) {
    filter.push({ terms: { entity_type: [...entityTypes] } });
  }

  if (!predicate.includeDeleted) {
    filter.push({ term: { deleted: false } });
  }

  for (const [field, value] of Object.entries(predicate.eq ?? {})) {
    if (value === null) {
      must.push({ bool: { must_not: [{ exists: { field } }] } });
    } else {
      filter.push({ term: { [field]: value } });
    }
  }

  for (const [field, values] of Object.entries(predicate.in ?? {})) {
    filter.push({ terms: { [field]: [...values] } });
  }

  for (const range of predicate.range ?? []) {
    filter.push({ range: { [range.column]: { gte: range.gte, lte: range.lte, lt: range.lt } } });
  }

  const terms = predicate.text?.terms.map((term) => term.trim()).filter(Boolean) ?? [];
  if (predicate.text && terms.length) {
    must.push({
      simple_query_string: {
        query: terms.join(' '),
        fields: predicate.text.columns,
        default_operator: predicate.text.operator,
      },
    });
  }

  return { bool: { filter, must } };
}

export function buildSort(sort: SearchRequest['sort']): estypes.Sort {
  if (sort === 'newest') {
    return [{ updated_at: { order: 'desc' } }, { id: { order: 'asc' } }];
  }
  return ['_score', { updated_at: { order: 'desc' } }];
}

function totalHits(total: estypes.SearchTotalHits | number | undefined, fallback: number): number {
  if (typeof total === 'number') return total;
  return total?.value ?? fallback;
}

export function toResultPage(response: estypes.SearchResponse<SearchProjection>): SearchResultPage {
  const hits = response.hits.hits.flatMap((hit) => {
    if (!hit._source) return [];
    return [{ projection: searchProjectionSchema.parse(hit._source), score: hit._score ?? null }];
  });

  return { hits, total: totalHits(response.hits.total, hits.length) };
}

export function toFacets(aggregations: Partial<Record<FacetField, estypes.AggregationsStringTermsAggregate>> | undefined): Facets {
  const facets: Facets = { status: [], owner_id: [], company_id: [], entity_type: [] };

  for (const field of FACET_FIELDS) {
    const buckets = aggregations?.[field]?.buckets ?? [];
    const list = Array.isArray(buckets) ? buckets : Object.values(buckets);
    facets[field] = list
      .map((bucket) => String(bucket.key ?? ''))
      .filter((key) => key !== '');
  }

  return facets;
}

function isStatus(error: unknown, statusCode: number): boolean {
  return error instanceof errors.ResponseError && error.statusCode === statusCode;
}

/** Whether the cluster could not be reached or failed on its side, as opposed to refusing the request. */
export function isUnreachable(error: unknown): boolean {
  if (
    error instanceof TimeoutError ||
    error instanceof errors.ConnectionError ||
    error instanceof errors.TimeoutError ||
    error instanceof errors.NoLivingConnectionsError
  ) {
    return true;
  }
  return error instanceof errors.ResponseError && (error.statusCode ?? 0) >= 500;
}

export interface ElasticSearchStoreOptions {
  index: string;
  timeoutMs: number;
}

export class ElasticSearchStore implements SearchStore {
  readonly backend = 'search';

  constructor(
    private readonly client: Client,
    private readonly options: ElasticSearchStoreOptions
  ) {}

  async ping(): Promise<Availability> {
    try {
      const ok = await withTimeout(this.client.ping(), this.options.timeoutMs, 'search ping');
      return ok ? 'available' : 'unavailable';
    } catch {
      return 'unavailable';
    }
  }

  async ensureIndex(): Promise<void> {
    await this.call(async () => {
      const exists = await this.client.indices.exists({ index: this.options.index });
      if (!exists) {
        await this.client.indices.create({ index: this.options.index, mappings: PROJECTION_MAPPINGS });
      }
    });
  }

  async read(entityType: SearchableEntityType, id: string): Promise<SearchProjection | null> {
    try {
      const result = await this.call(() =>
        this.client.get<SearchProjection>({ index: this.options.index, id: documentId(entityType, id) })
      );
      return result.found && result._source ? searchProjectionSchema.parse(result._source) : null;
    } catch (error) {
      if (isStatus(error, 404)) return null;
      throw error;
    }
  }

  async write(projection: SearchProjection): Promise<ProjectionWriteResult> {
    try {
      await this.call(() =>
        this.client.index({
          index: this.options.index,
          id: documentId(projection.entity_type, projection.id),
          version: projection.version,
          version_type: 'external_gte',
          document: projection,
        })
      );
      return 'applied';
    } catch (error) {
      if (isStatus(error, 409)) return 'stale';
      throw error;
    }
  }

  async *query(entityType: SearchableEntityType, predicate: QueryPredicate = {}): AsyncIterable<SearchProjection> {
    const limit = predicate.limit ?? Number.POSITIVE_INFINITY;
    let seen = 0;
    let searchAfter: estypes.SortResults | undefined;

    while (seen < limit) {
      const size = Math.min(SCAN_PAGE_SIZE, limit - seen);
      const response = await this.call(() =>
        this.client.search<SearchProjection>({
          index: this.options.index,
          query: buildQuery([entityType], predicate),
          sort: [{ updated_at: { order: 'asc' } }, { id: { order: 'asc' } }],
          size,
          search_after: searchAfter,
        })
      );

      const hits = response.hits.hits;
      for (const hit of hits) {
        if (hit._source) yield searchProjectionSchema.parse(hit._source);
      }

      seen += hits.length;
      searchAfter = hits.at(-1)?.sort;
      if (hits.length < size || !searchAfter) return;
    }
  }

  async search(request: SearchRequest): Promise<SearchResultPage> {
    const response = await this.call(() =>
      this.client.search<SearchProjection>({
        index: this.options.index,
        query: buildQuery(request.entityTypes, request.predicate),
        sort: buildSort(request.sort),
        from: (request.page - 1) * request.pageSize,
        size: request.pageSize,
        track_total_hits: true,
      })
    );

    return toResultPage(response);
  }

  async facets(entityTypes: ReadonlyArray<SearchableEntityType>, predicate: QueryPredicate): Promise<Facets> {
    const aggs: Record<string, estypes.AggregationsAggregationContainer> = {};
    for (const field of FACET_FIELDS) {
      aggs[field] = { terms: { field, size: FACET_SIZE, order: { _key: 'asc' } } };
    }

    const response = await this.call(() =>
      this.client.search<SearchProjection, Partial<Record<FacetField, estypes.AggregationsStringTermsAggregate>>>({
        index: this.options.index,
        query: buildQuery(entityTypes, predicate),
        size: 0,
        aggs,
      })
    );

    return toFacets(response.aggregations);
  }

  /**
   * Unreachable-cluster failures leave here as `BackendUnavailableError`.
   * Requests the cluster refused (mapping errors, conflicts, misses) keep
   * their client error.
   */
  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(operation(), this.options.timeoutMs + 100, 'search call');
    } catch (error) {
      if (isUnreachable(error)) throw new BackendUnavailableError('search', error);
      throw error;
    }
  }
}
