import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { BackendUnavailableError, NotFoundError, VersionConflictError } from '../errors.js';
import { storedRecordSchema, type EntityType, type StoredRecord } from '../domain/entities.js';
import type { Availability, QueryPredicate, RelationalStore, WritableFields } from './types.js';
import { withTimeout } from './timeout.js';

const TABLES: Record<EntityType, string> = {
  lead: 'sales_leads',
  lead_activity: 'sales_activities',
  offer: 'sales_offers',
  installation: 'installation_jobs',
  document: 'doc_steps',
  notification: 'notifications',
  technician: 'technicians',
  company: 'companies',
  doc_category: 'doc_categories',
  doc_subcategory: 'doc_subcategories',
  doc_subsubcategory: 'doc_subsubcategories',
};

const PAGE_SIZE = 500;

// PostgREST answers with these when it cannot reach Postgres.
const UNREACHABLE_CODES = new Set(['PGRST000', 'PGRST001', 'PGRST002', 'PGRST003']);
const SERVER_CODE = /^(PGRST\d{3}|[0-9A-Z]{5})$/;

export function tableFor(entityType: EntityType): string {
  return TABLES[entityType];
}

export function isUnreachable(error: Pick<PostgrestError, 'code'>): boolean {
  return UNREACHABLE_CODES.has(error.code) || !SERVER_CODE.test(error.code ?? '');
}

function sanitizeTerm(term: string): string {
  return term.replace(/[,().*%\\:"]/g, ' ').trim();
}

export function buildTextFilter(columns: string[], terms: string[], operator: 'and' | 'or'): string | null {
  const cleaned = terms.map(sanitizeTerm).filter(Boolean);
  if (!cleaned.length || !columns.length) return null;

  const anyColumn = (term: string) => columns.map((column) => `${column}.ilike.*${term}*`).join(',');

  if (operator === 'or' || cleaned.length === 1) {
    return cleaned.map(anyColumn).join(',');
  }

  return `and(${cleaned.map((term) => `or(${anyColumn(term)})`).join(',')})`;
}

export interface SupabaseRelationalStoreOptions {
  timeoutMs: number;
  now?: () => Date;
}

export class SupabaseRelationalStore implements RelationalStore {
  readonly backend = 'relational';
  private readonly now: () => Date;

  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseRelationalStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async ping(): Promise<Availability> {
    try {
      const { error } = await this.client
        .from(tableFor('technician'))
        .select('id', { head: true })
        .limit(1)
        .abortSignal(this.signal());
      return error && isUnreachable(error) ? 'unavailable' : 'available';
    } catch {
      return 'unavailable';
    }
  }

  async read(entityType: EntityType, id: string): Promise<StoredRecord | null> {
    const { data, error } = await this.run(() =>
      this.client.from(tableFor(entityType)).select('*').eq('id', id).abortSignal(this.signal()).maybeSingle()
    );

    if (error) throw this.translate(entityType, error);
    if (!data) return null;
    return storedRecordSchema.parse(data);
  }

  async write(entityType: EntityType, fields: WritableFields, expectedVersion: number): Promise<StoredRecord> {
    const table = tableFor(entityType);
    const now = this.now().toISOString();

    if (expectedVersion === 0) {
      const row = {
        ...fields,
        version: 1,
        created_at: typeof fields.created_at === 'string' ? fields.created_at : now,
        updated_at: now,
        deleted_at: fields.deleted_at ?? null,
      };

      const { data, error } = await this.run(() =>
        this.client.from(table).insert(row).select().abortSignal(this.signal()).single()
      );

      if (error) {
        if (error.code === '23505') throw new VersionConflictError(entityType, fields.id, 0);
        throw this.translate(entityType, error);
      }
      return storedRecordSchema.parse(data);
    }

    const patch = { ...fields, version: expectedVersion + 1, updated_at: now };

    const { data, error } = await this.run(() =>
      this.client
        .from(table)
        .update(patch)
        .eq('id', fields.id)
        .eq('version', expectedVersion)
        .select()
        .abortSignal(this.signal())
    );

    if (error) throw this.translate(entityType, error);

    if (!data || data.length === 0) {
      const existing = await this.read(entityType, fields.id);
      if (!existing) throw new NotFoundError(entityType, fields.id);
      throw new VersionConflictError(entityType, fields.id, expectedVersion);
    }

    return storedRecordSchema.parse(data[0]);
  }

  async *query(entityType: EntityType, predicate: QueryPredicate = {}): AsyncIterable<StoredRecord> {
    const limit = predicate.limit ?? Number.POSITIVE_INFINITY;
    let offset = 0;

    while (offset < limit) {
      const size = Math.min(PAGE_SIZE, limit - offset);
      const { data, error } = await this.run(() =>
        this.select(entityType, predicate)
          .range(offset, offset + size - 1)
          .abortSignal(this.signal())
      );

      if (error) throw this.translate(entityType, error);
      const rows = data ?? [];

      for (const row of rows) {
        yield storedRecordSchema.parse(row);
      }

      if (rows.length < size) return;
      offset += rows.length;
    }
  }

  async count(entityType: EntityType, predicate: QueryPredicate = {}): Promise<number> {
    const { count, error } = await this.run(() =>
      this.select(entityType, { ...predicate, orderBy: undefined }, { count: 'exact', head: true }).abortSignal(
        this.signal()
      )
    );

    if (error) throw this.translate(entityType, error);
    return count ?? 0;
  }

  private select(
    entityType: EntityType,
    predicate: QueryPredicate,
    options?: { count: 'exact'; head: boolean }
  ) {
    let query = this.client.from(tableFor(entityType)).select('*', options);

    if (!predicate.includeDeleted) {
      query = query.is('deleted_at', null);
    }

    for (const [column, value] of Object.entries(predicate.eq ?? {})) {
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }

    for (const [column, values] of Object.entries(predicate.in ?? {})) {
      query = query.in(column, [...values]);
    }

    for (const range of predicate.range ?? []) {
      if (range.gte !== undefined) query = query.gte(range.column, range.gte);
      if (range.lte !== undefined) query = query.lte(range.column, range.lte);
      if (range.lt !== undefined) query = query.lt(range.column, range.lt);
    }

    if (predicate.text) {
      const filter = buildTextFilter(predicate.text.columns, predicate.text.terms, predicate.text.operator);
      if (filter) query = query.or(filter);
    }

    if (predicate.orderBy) {
      query = query.order(predicate.orderBy.column, { ascending: predicate.orderBy.ascending });
    }

    return query;
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.options.timeoutMs);
  }

  /** Bounds the call and turns thrown transport failures into `BackendUnavailableError`. */
  private async run<T>(call: () => PromiseLike<T>): Promise<T> {
    try {
      return await withTimeout(Promise.resolve(call()), this.options.timeoutMs + 100, 'relational call');
    } catch (error) {
      throw new BackendUnavailableError('relational', error);
    }
  }

  private translate(entityType: EntityType, error: PostgrestError): Error {
    if (isUnreachable(error)) {
      return new BackendUnavailableError('relational', error);
    }
    return new Error(`Relational query on ${entityType} failed: [${error.code}] ${error.message}`);
  }
}
