import { createHash } from 'node:crypto';
import { z } from 'zod';
import { isBackendUnavailable } from '../../errors.js';
import {
  SEARCHABLE_ENTITY_TYPES,
  type Page,
  type SearchableEntityType,
  type SearchProjection,
} from '../../domain/entities.js';
import {
  FACET_FIELDS,
  type Facets,
  type QueryPredicate,
  type RangeFilter,
  type Scalar,
  type SearchSort,
  type Stores,
} from '../../stores/types.js';
import type { HealthMonitor, HealthSnapshot } from '../health/monitor.js';
import { SEARCH_DESCRIPTORS, toProjection } from '../propagation/projection.js';
import { logger } from '../../utils/logger.js';
import { yearsAgo } from '../../utils/time.js';
import { searchFiltersSchema, type SearchFilters, type SimpleSearch } from './schemas.js';

const log = logger.child({ module: 'search' });

const DEFAULT_RANGE_YEARS = 2;
// Rows scanned per entity type when computing options without the index.
const FALLBACK_FACET_SCAN = 2000;
const OPTIONS_NAMESPACE = 'search-options';

const cachedOptionsSchema = z.object({
  status: z.array(z.string()),
  owner_id: z.array(z.string()),
  company_id: z.array(z.string()),
  entity_type: z.array(z.string()),
});

export type QueryPath = { kind: 'search-index' } | { kind: 'relational-fallback' };

export interface SearchHit {
  entity_type: SearchableEntityType;
  id: string;
  version: number;
  title: string;
  status: string | null;
  owner_id: string | null;
  company_id: string | null;
  updated_at: string;
  score: number | null;
}

export type SearchPage = Page<SearchHit>;

export interface QueryRouterOptions {
  optionsCacheTtlSeconds: number;
  now?: () => Date;
}

/** Filters after defaults, in the form both paths consume. */
interface Criteria {
  entityTypes: SearchableEntityType[];
  terms: string[];
  operator: 'and' | 'or';
  status: string[];
  ownerId?: string;
  companyId?: string;
  range: RangeFilter | null;
  page: number;
  pageSize: number;
}

export function selectPath(snapshot: HealthSnapshot): QueryPath {
  return snapshot.search ? { kind: 'search-index' } : { kind: 'relational-fallback' };
}

function toHit(projection: SearchProjection, score: number | null): SearchHit {
  return {
    entity_type: projection.entity_type,
    id: projection.id,
    version: projection.version,
    title: projection.title,
    status: projection.status,
    owner_id: projection.owner_id,
    company_id: projection.company_id,
    updated_at: projection.updated_at,
    score,
  };
}

function startOfDay(day: string): string {
  return `${day}T00:00:00.000Z`;
}

function endOfDay(day: string): string {
  return `${day}T23:59:59.999Z`;
}

function newestFirst(a: SearchHit, b: SearchHit): number {
  if (a.updated_at !== b.updated_at) return a.updated_at < b.updated_at ? 1 : -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Serves search reads from the full-text index while it is healthy and
 * from the relational store otherwise. The path is chosen once per request;
 * an index failure mid-request falls through to the relational path.
 */
export class QueryRouter {
  private readonly now: () => Date;

  constructor(
    private readonly stores: Stores,
    private readonly monitor: HealthMonitor,
    private readonly settings: QueryRouterOptions
  ) {
    this.now = settings.now ?? (() => new Date());
  }

  /** Free text over every searchable type, no date window. */
  results(search: SimpleSearch): Promise<SearchPage> {
    const filters = searchFiltersSchema.parse({ query: search.query, page: search.page, page_size: search.page_size });
    return this.route(this.criteria(filters, false), 'relevance');
  }

  advancedResults(filters: SearchFilters): Promise<SearchPage> {
    const criteria = this.criteria(filters, true);
    return this.route(criteria, criteria.terms.length ? 'relevance' : 'newest');
  }

  latest(filters: SearchFilters): Promise<SearchPage> {
    return this.route(this.criteria(filters, true), 'newest');
  }

  async options(filters: SearchFilters): Promise<Facets> {
    const criteria = this.criteria(filters, true);
    const path = selectPath(this.monitor.snapshot());
    const cacheKey = this.cacheKey(path, criteria);

    const cached = await this.readCache(cacheKey);
    if (cached) return cached;

    if (path.kind === 'search-index') {
      const facets = await this.fromIndex(() =>
        this.stores.search.facets(this.entityTypes(criteria), this.indexPredicate(criteria))
      );
      if (facets) {
        await this.writeCache(cacheKey, facets);
        return facets;
      }
      // The index failed mid-request; its cache key must not hold relational values.
      return this.facetsFromRelational(criteria);
    }

    const facets = await this.facetsFromRelational(criteria);
    await this.writeCache(cacheKey, facets);
    return facets;
  }

  private async route(criteria: Criteria, sort: SearchSort): Promise<SearchPage> {
    const path = selectPath(this.monitor.snapshot());

    if (path.kind === 'search-index') {
      const page = await this.fromIndex(() =>
        this.stores.search.search({
          entityTypes: this.entityTypes(criteria),
          predicate: this.indexPredicate(criteria),
          sort,
          page: criteria.page,
          pageSize: criteria.pageSize,
        })
      );
      if (page) {
        return {
          items: page.hits.map((hit) => toHit(hit.projection, hit.score)),
          total: page.total,
          page: criteria.page,
          pageSize: criteria.pageSize,
        };
      }
    }

    return this.searchRelational(criteria);
  }

  /** Runs an index call; `null` means the index failed and the caller should fall back. */
  private async fromIndex<T>(operation: () => Promise<T>): Promise<T | null> {
    try {
      const result = await operation();
      this.monitor.report('search', true);
      return result;
    } catch (error) {
      if (!isBackendUnavailable(error, 'search')) throw error;
      this.monitor.report('search', false);
      log.warn({ err: error }, 'Search index failed, serving from relational store');
      return null;
    }
  }

  private async searchRelational(criteria: Criteria): Promise<SearchPage> {
    const window = criteria.page * criteria.pageSize;
    let total = 0;
    const hits: SearchHit[] = [];

    await this.relationalCall(async () => {
      for (const entityType of this.entityTypes(criteria)) {
        const predicate = this.relationalPredicate(entityType, criteria);
        if (!predicate) continue;

        total += await this.stores.relational.count(entityType, predicate);
        for await (const row of this.stores.relational.query(entityType, {
          ...predicate,
          orderBy: { column: 'updated_at', ascending: false },
          limit: window,
        })) {
          hits.push(toHit(toProjection(entityType, row), null));
        }
      }
    });

    hits.sort(newestFirst);
    const start = (criteria.page - 1) * criteria.pageSize;
    return {
      items: hits.slice(start, start + criteria.pageSize),
      total,
      page: criteria.page,
      pageSize: criteria.pageSize,
    };
  }

  private async facetsFromRelational(criteria: Criteria): Promise<Facets> {
    const values: Record<(typeof FACET_FIELDS)[number], Set<string>> = {
      status: new Set(),
      owner_id: new Set(),
      company_id: new Set(),
      entity_type: new Set(),
    };

    await this.relationalCall(async () => {
      for (const entityType of this.entityTypes(criteria)) {
        const predicate = this.relationalPredicate(entityType, criteria);
        if (!predicate) continue;

        for await (const row of this.stores.relational.query(entityType, { ...predicate, limit: FALLBACK_FACET_SCAN })) {
          const projection = toProjection(entityType, row);
          for (const field of FACET_FIELDS) {
            const value = projection[field];
            if (value) values[field].add(value);
          }
        }
      }
    });

    return {
      status: [...values.status].sort(),
      owner_id: [...values.owner_id].sort(),
      company_id: [...values.company_id].sort(),
      entity_type: [...values.entity_type].sort(),
    };
  }

  private criteria(filters: SearchFilters, defaultRange: boolean): Criteria {
    const from = filters.date_from ?? (defaultRange ? yearsAgo(this.now(), DEFAULT_RANGE_YEARS) : undefined);
    const range: RangeFilter | null =
      from || filters.date_to
        ? {
            column: 'created_at',
            gte: from ? startOfDay(from) : undefined,
            lte: filters.date_to ? endOfDay(filters.date_to) : undefined,
          }
        : null;

    return {
      entityTypes: filters.entity_types,
      terms: filters.query.split(/\s+/).filter(Boolean),
      operator: filters.keywords_operator === 'and' ? 'and' : 'or',
      status: filters.status,
      ownerId: filters.owner_id,
      companyId: filters.company_id,
      range,
      page: filters.page,
      pageSize: filters.page_size,
    };
  }

  private entityTypes(criteria: Criteria): SearchableEntityType[] {
    return criteria.entityTypes.length ? criteria.entityTypes : [...SEARCHABLE_ENTITY_TYPES];
  }

  private indexPredicate(criteria: Criteria): QueryPredicate {
    const eq: Record<string, Scalar> = {};
    if (criteria.ownerId) eq.owner_id = criteria.ownerId;
    if (criteria.companyId) eq.company_id = criteria.companyId;

    return {
      eq,
      in: criteria.status.length ? { status: criteria.status } : undefined,
      range: criteria.range ? [criteria.range] : undefined,
      text: criteria.terms.length
        ? { columns: ['title', 'body'], terms: criteria.terms, operator: criteria.operator }
        : undefined,
    };
  }

  /** The same filters in relational columns; `null` when the type cannot match them. */
  private relationalPredicate(entityType: SearchableEntityType, criteria: Criteria): QueryPredicate | null {
    const descriptor = SEARCH_DESCRIPTORS[entityType];
    const eq: Record<string, Scalar> = {};
    const inFilter: Record<string, string[]> = {};

    if (criteria.status.length) {
      if (!descriptor.statusColumn) return null;
      inFilter[descriptor.statusColumn] = criteria.status;
    }
    if (criteria.ownerId) {
      if (!descriptor.ownerColumn) return null;
      eq[descriptor.ownerColumn] = criteria.ownerId;
    }
    if (criteria.companyId) {
      if (!descriptor.companyColumn) return null;
      eq[descriptor.companyColumn] = criteria.companyId;
    }

    return {
      eq,
      in: inFilter,
      range: criteria.range ? [criteria.range] : undefined,
      text: criteria.terms.length
        ? { columns: descriptor.textColumns, terms: criteria.terms, operator: criteria.operator }
        : undefined,
    };
  }

  private async relationalCall(operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      if (isBackendUnavailable(error, 'relational')) this.monitor.report('relational', false);
      throw error;
    }
  }

  private cacheKey(path: QueryPath, criteria: Criteria): string {
    const { page: _page, pageSize: _pageSize, ...filters } = criteria;
    const digest = createHash('sha1').update(JSON.stringify(filters)).digest('hex');
    return `${path.kind}:${digest}`;
  }

  private async readCache(key: string): Promise<Facets | null> {
    if (!this.monitor.isAvailable('cache')) return null;

    try {
      const raw = await this.stores.cache.get(OPTIONS_NAMESPACE, key);
      return raw ? this.parseCached(raw) : null;
    } catch (error) {
      this.cacheFailed(error);
      return null;
    }
  }

  private async writeCache(key: string, value: Facets): Promise<void> {
    if (!this.monitor.isAvailable('cache')) return;

    try {
      await this.stores.cache.set(OPTIONS_NAMESPACE, key, JSON.stringify(value), this.settings.optionsCacheTtlSeconds);
    } catch (error) {
      this.cacheFailed(error);
    }
  }

  private parseCached(raw: string): Facets | null {
    try {
      const result = cachedOptionsSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch (error) {
      log.debug({ err: error }, 'Ignoring unreadable cached options');
      return null;
    }
  }

  private cacheFailed(error: unknown): void {
    if (!isBackendUnavailable(error, 'cache')) throw error;
    this.monitor.report('cache', false);
    log.warn({ err: error }, 'Cache unavailable, continuing without it');
  }
}
