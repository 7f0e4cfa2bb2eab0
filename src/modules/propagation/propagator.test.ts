import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BackendUnavailableError } from '../../errors.js';
import { createMemoryStores } from '../../test-utils/memory-stores.js';
import { HealthMonitor } from '../health/monitor.js';
import { ConsistencyPropagator } from './propagator.js';
import { tombstone } from './projection.js';

function setup() {
  const stores = createMemoryStores();
  const monitor = new HealthMonitor(stores, { intervalMs: 1000 });
  const clock = { now: 0 };
  const propagator = new ConsistencyPropagator(stores.relational, stores.search, monitor, {
    workers: 1,
    baseBackoffMs: 500,
    maxBackoffMs: 30_000,
    now: () => clock.now,
  });
  return { stores, monitor, clock, propagator };
}

const lead = { id: 'l1', company_name: 'Acme', status: 'new', owner_user_id: 'u1' };

describe('ConsistencyPropagator', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it('writes the record of truth first and projects it in the background', async () => {
    const { stores, propagator } = ctx;
    const record = await propagator.commit('lead', lead, 0);

    expect(record.version).toBe(1);
    expect(await stores.search.read('lead', 'l1')).toBeNull();
    expect(propagator.stats().pending).toBe(1);

    expect(await propagator.drain()).toBe(1);
    const projection = await stores.search.read('lead', 'l1');
    expect(projection?.version).toBe(1);
    expect(projection?.title).toBe('Acme');
  });

  it('projects only the newest of several queued versions', async () => {
    const { stores, propagator } = ctx;
    await propagator.commit('lead', lead, 0);
    await propagator.commit('lead', { id: 'l1', status: 'contacted' }, 1);

    expect(await propagator.drain()).toBe(1);
    expect(stores.search.applied).toEqual([{ key: 'lead:l1', version: 2 }]);
    expect((await stores.search.read('lead', 'l1'))?.status).toBe('contacted');
  });

  it('skips a queued version already covered by a newer projection', async () => {
    const { stores, propagator } = ctx;
    await propagator.commit('lead', lead, 0);
    const read = stores.relational.read.bind(stores.relational);
    vi.spyOn(stores.relational, 'read').mockImplementationOnce(async (entityType, id) => {
      // A second write lands while the first task is being projected.
      await propagator.commit('lead', { id: 'l1', status: 'contacted' }, 1);
      return read(entityType, id);
    });

    expect(await propagator.drain()).toBe(2);
    expect(stores.search.applied).toEqual([{ key: 'lead:l1', version: 2 }]);
    expect(propagator.stats()).toMatchObject({ projected: 1, skipped: 1, tracked: 0 });
  });

  it('keeps high-water marks only while work is queued', async () => {
    const { propagator } = ctx;
    for (const id of ['l1', 'l2', 'l3']) {
      await propagator.commit('lead', { ...lead, id }, 0);
    }

    expect(await propagator.drain()).toBe(3);
    expect(propagator.stats()).toMatchObject({ pending: 0, projected: 3, tracked: 0 });
  });

  it('never lets an older version overwrite a newer one in the index', async () => {
    const { stores, propagator } = ctx;
    await stores.search.write({ ...tombstone('lead', 'l1', 5, '2026-01-01T00:00:00.000Z'), deleted: false });

    await propagator.commit('lead', lead, 0);
    await propagator.drain();

    expect(propagator.stats().stale).toBe(1);
    expect((await stores.search.read('lead', 'l1'))?.version).toBe(5);
  });

  it('retries failed projections with exponential backoff', async () => {
    const { stores, monitor, clock, propagator } = ctx;
    stores.search.available = false;
    await propagator.commit('lead', lead, 0);

    expect(await propagator.drain()).toBe(1);
    expect(propagator.stats()).toMatchObject({ pending: 1, failures: 1, projected: 0 });
    expect(propagator.stats().lastError).toBe('search store is unavailable');
    expect(monitor.isAvailable('search')).toBe(false);

    // Not due before the first backoff step has passed
    clock.now = 499;
    expect(await propagator.drain()).toBe(0);

    clock.now = 500;
    expect(await propagator.drain()).toBe(1);
    expect(propagator.stats().failures).toBe(2);

    // Second failure doubles the delay
    clock.now = 1499;
    expect(await propagator.drain()).toBe(0);

    stores.search.available = true;
    clock.now = 1500;
    expect(await propagator.drain()).toBe(1);
    expect((await stores.search.read('lead', 'l1'))?.version).toBe(1);
    expect(monitor.isAvailable('search')).toBe(true);
    expect(propagator.stats().pending).toBe(0);
  });

  it('reports oldest pending age', async () => {
    const { clock, propagator } = ctx;
    await propagator.commit('lead', lead, 0);
    clock.now = 1200;

    expect(propagator.stats().oldestPendingMs).toBe(1200);
  });

  it('fails the write and queues nothing when the relational store is down', async () => {
    const { stores, monitor, propagator } = ctx;
    stores.relational.available = false;

    await expect(propagator.commit('lead', lead, 0)).rejects.toBeInstanceOf(BackendUnavailableError);
    expect(monitor.isAvailable('relational')).toBe(false);
    expect(propagator.stats().pending).toBe(0);
  });

  it('does not queue records that are not searchable', async () => {
    const { propagator } = ctx;
    await propagator.commit('company', { id: 'c1', name: 'Acme', contact_user_id: null }, 0);

    expect(propagator.stats().pending).toBe(0);
  });

  it('projects soft deletes as tombstones', async () => {
    const { stores, propagator } = ctx;
    await propagator.commit('lead', lead, 0);
    await propagator.drain();

    const removed = await propagator.remove('lead', 'l1', 1);
    expect(removed.deleted_at).toBe('1970-01-01T00:00:00.000Z');
    await propagator.drain();

    const projection = await stores.search.read('lead', 'l1');
    expect(projection).toMatchObject({ version: 2, deleted: true });
    expect((await stores.search.search({ entityTypes: ['lead'], predicate: {}, sort: 'newest', page: 1, pageSize: 10 })).total).toBe(0);
  });

  it('writes a tombstone for records missing from the relational store', async () => {
    const { stores, propagator } = ctx;
    propagator.enqueue('lead', 'ghost', 3);
    await propagator.drain();

    expect(await stores.search.read('lead', 'ghost')).toMatchObject({ version: 3, deleted: true });
  });

  it('reindexes every record of a type, deleted ones included', async () => {
    const { stores, propagator } = ctx;
    stores.relational.seed('lead', [
      { id: 'a', company_name: 'Alpha', status: 'new' },
      { id: 'b', company_name: 'Beta', status: 'lost', deleted_at: '2026-01-01T00:00:00.000Z' },
    ]);

    expect(await propagator.reindex('lead')).toBe(2);
    expect(await propagator.drain()).toBe(2);
    expect((await stores.search.read('lead', 'b'))?.deleted).toBe(true);
  });

  it('runs worker loops until stopped', async () => {
    const { stores, propagator } = ctx;
    propagator.start();
    await propagator.commit('lead', lead, 0);

    await vi.waitFor(async () => expect((await stores.search.read('lead', 'l1'))?.version).toBe(1));
    await propagator.stop();
  });
});
