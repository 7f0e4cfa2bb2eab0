import { BackendUnavailableError, NotFoundError, VersionConflictError } from '../errors.js';
import {
  storedRecordSchema,
  type EntityType,
  type SearchableEntityType,
  type SearchProjection,
  type StoredRecord,
} from '../domain/entities.js';
import {
  FACET_FIELDS,
  type Availability,
  type CacheStore,
  type Facets,
  type ProjectionWriteResult,
  type QueryPredicate,
  type RelationalStore,
  type SearchRequest,
  type SearchResultPage,
  type SearchStore,
  type Stores,
  type WritableFields,
} from '../stores/types.js';

function asText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

/** Evaluates a `QueryPredicate` against a plain row the way the real stores would. */
export function matchesPredicate(row: Record<string, unknown>, predicate: QueryPredicate): boolean {
  for (const [column, value] of Object.entries(predicate.eq ?? {})) {
    if (value === null ? row[column] !== null && row[column] !== undefined : row[column] !== value) return false;
  }

  for (const [column, values] of Object.entries(predicate.in ?? {})) {
    if (!values.includes(asText(row[column]))) return false;
  }

  for (const range of predicate.range ?? []) {
    const value = asText(row[range.column]);
    if (!value) return false;
    if (range.gte !== undefined && value < range.gte) return false;
    if (range.lte !== undefined && value > range.lte) return false;
    if (range.lt !== undefined && value >= range.lt) return false;
  }

  if (predicate.text) {
    const haystack = predicate.text.columns.map((column) => asText(row[column]).toLowerCase());
    const terms = predicate.text.terms.map((term) => term.trim().toLowerCase()).filter(Boolean);
    const hit = (term: string) => haystack.some((text) => text.includes(term));
    if (terms.length) {
      const ok = predicate.text.operator === 'and' ? terms.every(hit) : terms.some(hit);
      if (!ok) return false;
    }
  }

  return true;
}

function sortRows<T extends Record<string, unknown>>(rows: T[], orderBy: QueryPredicate['orderBy']): T[] {
  if (!orderBy) return rows;
  const direction = orderBy.ascending ? 1 : -1;
  return [...rows].sort((a, b) => {
    const left = asText(a[orderBy.column]);
    const right = asText(b[orderBy.column]);
    if (left === right) return 0;
    return left < right ? -direction : direction;
  });
}

export class MemoryRelationalStore implements RelationalStore {
  readonly backend = 'relational';
  available = true;
  readonly writes: Array<{ entityType: EntityType; id: string; version: number }> = [];
  private readonly tables = new Map<EntityType, Map<string, StoredRecord>>();
  private clock = 0;
  private readonly now: () => Date;

  /** Without a clock, every write advances a fake clock by one second from 2026-01-01. */
  constructor(now?: () => Date) {
    this.now = now ?? (() => new Date(Date.UTC(2026, 0, 1) + ++this.clock * 1000));
  }

  async ping(): Promise<Availability> {
    return this.available ? 'available' : 'unavailable';
  }

  /** Inserts rows directly, bypassing check-and-set. */
  seed(entityType: EntityType, rows: Array<Record<string, unknown> & { id: string }>): void {
    const table = this.table(entityType);
    for (const row of rows) {
      const stamp = '2026-01-01T00:00:00.000Z';
      table.set(
        row.id,
        storedRecordSchema.parse({ version: 1, created_at: stamp, updated_at: stamp, deleted_at: null, ...row })
      );
    }
  }

  rows(entityType: EntityType): StoredRecord[] {
    return [...this.table(entityType).values()].map((row) => structuredClone(row));
  }

  async read(entityType: EntityType, id: string): Promise<StoredRecord | null> {
    this.guard();
    const row = this.table(entityType).get(id);
    return row ? structuredClone(row) : null;
  }

  async write(entityType: EntityType, fields: WritableFields, expectedVersion: number): Promise<StoredRecord> {
    this.guard();
    const table = this.table(entityType);
    const existing = table.get(fields.id);
    const now = this.now().toISOString();

    if (expectedVersion === 0) {
      if (existing) throw new VersionConflictError(entityType, fields.id, 0);
      const row: StoredRecord = {
        ...structuredClone(fields),
        id: fields.id,
        version: 1,
        created_at: typeof fields.created_at === 'string' ? fields.created_at : now,
        updated_at: now,
        deleted_at: typeof fields.deleted_at === 'string' ? fields.deleted_at : null,
      };
      table.set(row.id, row);
      this.writes.push({ entityType, id: row.id, version: 1 });
      return structuredClone(row);
    }

    if (!existing) throw new NotFoundError(entityType, fields.id);
    if (existing.version !== expectedVersion) throw new VersionConflictError(entityType, fields.id, expectedVersion);

    const row: StoredRecord = {
      ...existing,
      ...structuredClone(fields),
      id: existing.id,
      version: expectedVersion + 1,
      created_at: existing.created_at,
      updated_at: now,
      deleted_at: typeof fields.deleted_at === 'string' ? fields.deleted_at : existing.deleted_at,
    };
    table.set(row.id, row);
    this.writes.push({ entityType, id: row.id, version: row.version });
    return structuredClone(row);
  }

  async *query(entityType: EntityType, predicate: QueryPredicate = {}): AsyncIterable<StoredRecord> {
    this.guard();
    const rows = [...this.table(entityType).values()].filter(
      (row) => (predicate.includeDeleted || row.deleted_at === null) && matchesPredicate(row, predicate)
    );
    const limited = sortRows(rows, predicate.orderBy).slice(0, predicate.limit ?? rows.length);
    for (const row of limited) {
      yield structuredClone(row);
    }
  }

  async count(entityType: EntityType, predicate: QueryPredicate = {}): Promise<number> {
    let total = 0;
    for await (const _row of this.query(entityType, { ...predicate, limit: undefined })) total += 1;
    return total;
  }

  private guard(): void {
    if (!this.available) throw new BackendUnavailableError('relational');
  }

  private table(entityType: EntityType): Map<string, StoredRecord> {
    let table = this.tables.get(entityType);
    if (!table) {
      table = new Map();
      this.tables.set(entityType, table);
    }
    return table;
  }
}

export class MemorySearchStore implements SearchStore {
  readonly backend = 'search';
  available = true;
  readonly applied: Array<{ key: string; version: number }> = [];
  private readonly docs = new Map<string, SearchProjection>();

  async ping(): Promise<Availability> {
    return this.available ? 'available' : 'unavailable';
  }

  async read(entityType: SearchableEntityType, id: string): Promise<SearchProjection | null> {
    this.guard();
    const doc = this.docs.get(`${entityType}:${id}`);
    return doc ? structuredClone(doc) : null;
  }

  async write(projection: SearchProjection): Promise<ProjectionWriteResult> {
    this.guard();
    const key = `${projection.entity_type}:${projection.id}`;
    const stored = this.docs.get(key);
    if (stored && stored.version > projection.version) return 'stale';
    this.docs.set(key, structuredClone(projection));
    this.applied.push({ key, version: projection.version });
    return 'applied';
  }

  async *query(entityType: SearchableEntityType, predicate: QueryPredicate = {}): AsyncIterable<SearchProjection> {
    for (const doc of this.matching([entityType], predicate)) {
      yield structuredClone(doc);
    }
  }

  async search(request: SearchRequest): Promise<SearchResultPage> {
    const terms = request.predicate.text?.terms.map((term) => term.toLowerCase()) ?? [];
    const scored = this.matching(request.entityTypes, request.predicate).map((projection) => {
      const text = `${projection.title} ${projection.body}`.toLowerCase();
      return { projection, score: terms.filter((term) => text.includes(term)).length };
    });

    scored.sort((a, b) =>
      request.sort === 'relevance' && a.score !== b.score
        ? b.score - a.score
        : b.projection.updated_at.localeCompare(a.projection.updated_at)
    );

    const start = (request.page - 1) * request.pageSize;
    return {
      hits: scored.slice(start, start + request.pageSize).map((hit) => structuredClone(hit)),
      total: scored.length,
    };
  }

  async facets(entityTypes: ReadonlyArray<SearchableEntityType>, predicate: QueryPredicate): Promise<Facets> {
    const docs = this.matching(entityTypes, predicate);
    const facets: Facets = { status: [], owner_id: [], company_id: [], entity_type: [] };
    for (const field of FACET_FIELDS) {
      const values = new Set(docs.map((doc) => asText(doc[field])).filter(Boolean));
      facets[field] = [...values].sort();
    }
    return facets;
  }

  private matching(entityTypes: ReadonlyArray<SearchableEntityType>, predicate: QueryPredicate): SearchProjection[] {
    this.guard();
    return [...this.docs.values()].filter(
      (doc) =>
        (entityTypes.length === 0 || entityTypes.includes(doc.entity_type)) &&
        (predicate.includeDeleted || !doc.deleted) &&
        matchesPredicate(doc, predicate)
    );
  }

  private guard(): void {
    if (!this.available) throw new BackendUnavailableError('search');
  }
}

export class MemoryCacheStore implements CacheStore {
  readonly backend = 'cache';
  available = true;
  readonly entries = new Map<string, string>();

  async ping(): Promise<Availability> {
    return this.available ? 'available' : 'unavailable';
  }

  async get(namespace: string, key: string): Promise<string | null> {
    this.guard();
    return this.entries.get(`${namespace}:${key}`) ?? null;
  }

  async set(namespace: string, key: string, value: string): Promise<void> {
    this.guard();
    this.entries.set(`${namespace}:${key}`, value);
  }

  private guard(): void {
    if (!this.available) throw new BackendUnavailableError('cache');
  }
}

export function createMemoryStores(): Stores & {
  relational: MemoryRelationalStore;
  search: MemorySearchStore;
  cache: MemoryCacheStore;
} {
  return {
    relational: new MemoryRelationalStore(),
    search: new MemorySearchStore(),
    cache: new MemoryCacheStore(),
  };
}
