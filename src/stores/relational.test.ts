import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import { BackendUnavailableError, NotFoundError, VersionConflictError } from '../errors.js';
import { SupabaseRelationalStore, buildTextFilter, isUnreachable } from './relational.js';

type Reply = { status: number; body?: unknown; headers?: Record<string, string> };

const replies: Reply[] = [];
const mockFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
  const reply = replies.shift();
  if (!reply) throw new TypeError('fetch failed');
  return new Response(reply.body === undefined ? null : JSON.stringify(reply.body), {
    status: reply.status,
    headers: { 'content-type': 'application/json', ...reply.headers },
  });
});

function request(index: number) {
  const [input, init] = mockFetch.mock.calls[index];
  const url = new URL(input instanceof Request ? input.url : String(input));
  const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
  return { url, method: init?.method ?? 'GET', body };
}

const row = {
  id: 'l1',
  version: 1,
  created_at: '2026-03-01T10:00:00.000Z',
  updated_at: '2026-03-01T10:00:00.000Z',
  deleted_at: null,
  company_name: 'Acme',
  status: 'new',
};

function createStore() {
  const client = createClient('http://localhost:54321', 'test-secret', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: mockFetch },
  });
  return new SupabaseRelationalStore(client, {
    timeoutMs: 1000,
    now: () => new Date('2026-03-01T10:00:00.000Z'),
  });
}

describe('buildTextFilter', () => {
  it('matches any term in any column', () => {
    expect(buildTextFilter(['notes', 'title'], ['pump'], 'or')).toBe('notes.ilike.*pump*,title.ilike.*pump*');
    expect(buildTextFilter(['notes'], ['heat', 'pump'], 'or')).toBe('notes.ilike.*heat*,notes.ilike.*pump*');
  });

  it('requires every term with the and operator', () => {
    expect(buildTextFilter(['notes', 'title'], ['heat', 'pump'], 'and')).toBe(
      'and(or(notes.ilike.*heat*,title.ilike.*heat*),or(notes.ilike.*pump*,title.ilike.*pump*))'
    );
  });

  it('strips characters that would break the filter syntax', () => {
    expect(buildTextFilter(['notes'], ['a,b(c)'], 'or')).toBe('notes.ilike.*a b c*');
    expect(buildTextFilter(['notes'], [' , '], 'or')).toBeNull();
  });
});

describe('isUnreachable', () => {
  it('separates connection failures from query errors', () => {
    expect(isUnreachable({ code: 'PGRST002' })).toBe(true);
    expect(isUnreachable({ code: '' })).toBe(true);
    expect(isUnreachable({ code: '42P01' })).toBe(false);
    expect(isUnreachable({ code: 'PGRST116' })).toBe(false);
  });
});

describe('SupabaseRelationalStore', () => {
  beforeEach(() => {
    replies.length = 0;
    mockFetch.mockClear();
  });

  it('reads a row by id', async () => {
    replies.push({ status: 200, body: [row] });
    const store = createStore();

    expect(await store.read('lead', 'l1')).toEqual(row);
    const { url, method } = request(0);
    expect(method).toBe('GET');
    expect(url.pathname).toBe('/rest/v1/sales_leads');
    expect(url.searchParams.get('id')).toBe('eq.l1');
  });

  it('returns null for a missing row', async () => {
    replies.push({ status: 200, body: [] });

    expect(await createStore().read('lead', 'nope')).toBeNull();
  });

  it('inserts new rows at version 1', async () => {
    replies.push({ status: 201, body: row });
    const store = createStore();

    await store.write('lead', { id: 'l1', company_name: 'Acme', status: 'new' }, 0);

    const { method, body } = request(0);
    expect(method).toBe('POST');
    expect(body).toEqual({ ...row });
  });

  it('turns a duplicate insert into a version conflict', async () => {
    replies.push({ status: 409, body: { code: '23505', message: 'duplicate key value', details: null, hint: null } });

    await expect(createStore().write('lead', { id: 'l1' }, 0)).rejects.toBeInstanceOf(VersionConflictError);
  });

  it('updates only when the stored version matches', async () => {
    replies.push({ status: 200, body: [{ ...row, version: 3, status: 'contacted' }] });
    const store = createStore();

    const updated = await store.write('lead', { id: 'l1', status: 'contacted' }, 2);

    expect(updated.version).toBe(3);
    const { method, url, body } = request(0);
    expect(method).toBe('PATCH');
    expect(url.searchParams.get('id')).toBe('eq.l1');
    expect(url.searchParams.get('version')).toBe('eq.2');
    expect(body).toEqual({ id: 'l1', status: 'contacted', version: 3, updated_at: '2026-03-01T10:00:00.000Z' });
  });

  it('tells a stale version apart from a missing row', async () => {
    replies.push({ status: 200, body: [] }, { status: 200, body: [{ ...row, version: 5 }] });
    await expect(createStore().write('lead', { id: 'l1' }, 2)).rejects.toBeInstanceOf(VersionConflictError);

    replies.push({ status: 200, body: [] }, { status: 200, body: [] });
    await expect(createStore().write('lead', { id: 'l1' }, 2)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('translates transport failures into backend unavailability', async () => {
    const store = createStore();

    await expect(store.read('lead', 'l1')).rejects.toBeInstanceOf(BackendUnavailableError);

    replies.push({ status: 503, body: { code: 'PGRST002', message: 'Could not query the database', details: null, hint: null } });
    await expect(store.read('lead', 'l1')).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it('filters queries and hides soft-deleted rows', async () => {
    replies.push({ status: 200, body: [row, { ...row, id: 'l2' }] });
    const store = createStore();

    const ids: string[] = [];
    for await (const record of store.query('lead', {
      eq: { status: 'new' },
      in: { owner_user_id: ['u1', 'u2'] },
      orderBy: { column: 'updated_at', ascending: false },
      limit: 10,
    })) {
      ids.push(record.id);
    }

    expect(ids).toEqual(['l1', 'l2']);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const { url } = request(0);
    expect(url.searchParams.get('deleted_at')).toBe('is.null');
    expect(url.searchParams.get('status')).toBe('eq.new');
    expect(url.searchParams.get('owner_user_id')).toBe('in.(u1,u2)');
    expect(url.searchParams.get('order')).toBe('updated_at.desc');
  });

  it('counts matching rows from the content range', async () => {
    replies.push({ status: 200, headers: { 'content-range': '0-1/7' } });

    expect(await createStore().count('notification', { eq: { recipient_id: 'u1', is_read: false } })).toBe(7);
    const { url, method } = request(0);
    expect(method).toBe('HEAD');
    expect(url.pathname).toBe('/rest/v1/notifications');
  });

  it('reports availability from a cheap probe', async () => {
    const store = createStore();
    replies.push({ status: 200, body: [] });
    expect(await store.ping()).toBe('available');
    expect(await store.ping()).toBe('unavailable');
  });
});
