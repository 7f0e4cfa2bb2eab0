import { describe, it, expect, beforeEach } from 'vitest';
import {
  createTestServices,
  installationRow,
  leadRow,
  offerRow,
  type TestServices,
} from '../../test-utils/services.js';

describe('DeadlineSweeper', () => {
  let ctx: TestServices;

  beforeEach(() => {
    ctx = createTestServices();
    ctx.stores.relational.seed('lead', [leadRow({ id: 'lead-1', status: 'converted' })]);
  });

  it('expires sent offers past their validity', async () => {
    ctx.stores.relational.seed('offer', [
      offerRow({ id: 'o-old', status: 'sent', valid_until: '2026-02-28T00:00:00.000Z' }),
      offerRow({ id: 'o-fresh', status: 'sent', valid_until: '2026-03-05T00:00:00.000Z' }),
    ]);

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 1, undone: 0, reconciled: 0, followUps: 0, staleOffers: 0 });
    expect((await ctx.lifecycle.getOffer('o-old')).status).toBe('expired');
    expect((await ctx.lifecycle.getOffer('o-fresh')).status).toBe('sent');

    const [notification] = await ctx.fanout.list('u-owner');
    expect(notification).toMatchObject({ kind: 'offer_expired', source: { entity_type: 'offer', id: 'o-old', version: 2 } });
  });

  it('marks overdue installations undone', async () => {
    ctx.stores.relational.seed('offer', [offerRow({ id: 'i1', status: 'accepted' }), offerRow({ id: 'i2', status: 'accepted' })]);
    ctx.stores.relational.seed('installation', [
      installationRow({ id: 'i1', status: 'in_progress', technician_id: 't1', deadline_at: '2026-03-01T09:00:00.000Z' }),
      installationRow({ id: 'i2', status: 'done', technician_id: 't1', deadline_at: '2026-02-01T00:00:00.000Z' }),
    ]);

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 0, undone: 1, reconciled: 0, followUps: 0, staleOffers: 0 });
    expect((await ctx.lifecycle.getInstallation('i1')).status).toBe('undone');
    expect((await ctx.lifecycle.getInstallation('i2')).status).toBe('done');

    expect((await ctx.fanout.list('t1')).map((n) => n.kind)).toEqual(['installation_undone']);
    expect((await ctx.fanout.list('u-owner')).map((n) => n.kind)).toEqual(['installation_undone']);
  });

  it('creates the missing installation for an accepted offer', async () => {
    ctx.stores.relational.seed('offer', [offerRow({ id: 'o-accepted', status: 'accepted' })]);

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 0, undone: 0, reconciled: 1, followUps: 0, staleOffers: 0 });
    expect(await ctx.lifecycle.getInstallation('o-accepted')).toMatchObject({ status: 'pending', company_id: 'c1' });

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 0, undone: 0, reconciled: 0, followUps: 0, staleOffers: 0 });
  });

  it('reminds the owner of a due follow-up once per date', async () => {
    ctx.stores.relational.seed('lead', [
      leadRow({ id: 'lead-due', status: 'contacted', next_follow_up_date: '2026-03-01' }),
      leadRow({ id: 'lead-later', status: 'new', next_follow_up_date: '2026-03-02' }),
      leadRow({ id: 'lead-lost', status: 'lost', next_follow_up_date: '2026-02-20' }),
      leadRow({ id: 'lead-unowned', status: 'qualified', owner_user_id: null, next_follow_up_date: '2026-02-27' }),
    ]);

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 0, undone: 0, reconciled: 0, followUps: 1, staleOffers: 0 });
    expect(await ctx.fanout.list('u-owner')).toMatchObject([
      { kind: 'lead_follow_up_due', source: { entity_type: 'lead', id: 'lead-due', version: 1 } },
    ]);

    expect((await ctx.sweeper.sweep()).followUps).toBe(0);

    await ctx.lifecycle.updateLeadDetails('lead-due', { next_follow_up_date: '2026-02-28' });
    expect((await ctx.sweeper.sweep()).followUps).toBe(1);
    expect(await ctx.fanout.unreadCount('u-owner')).toBe(2);
  });

  it('reminds the owner of a sent offer with no activity since', async () => {
    const sent = { status: 'sent', valid_until: '2026-03-20T00:00:00.000Z' };
    ctx.stores.relational.seed('lead', [
      leadRow({ id: 'lead-busy', status: 'converted' }),
      leadRow({ id: 'lead-lost', status: 'lost' }),
    ]);
    ctx.stores.relational.seed('offer', [
      offerRow({ id: 'o-quiet', ...sent, sent_at: '2026-02-20T09:00:00.000Z' }),
      offerRow({ id: 'o-recent', ...sent, sent_at: '2026-02-27T09:00:00.000Z' }),
      offerRow({ id: 'o-busy', ...sent, lead_id: 'lead-busy', sent_at: '2026-02-20T09:00:00.000Z' }),
      offerRow({ id: 'o-lost', ...sent, lead_id: 'lead-lost', sent_at: '2026-02-20T09:00:00.000Z' }),
    ]);
    ctx.stores.relational.seed('lead_activity', [
      { id: 'a1', lead_id: 'lead-busy', type: 'call', content: null, author_id: 'u-owner', created_at: '2026-02-28T08:00:00.000Z' },
    ]);

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 0, undone: 0, reconciled: 0, followUps: 0, staleOffers: 1 });
    expect(await ctx.fanout.list('u-owner')).toMatchObject([
      { kind: 'offer_stale', message: 'A sent offer has had no response', source: { entity_type: 'offer', id: 'o-quiet', version: 1 } },
    ]);

    expect((await ctx.sweeper.sweep()).staleOffers).toBe(0);
  });

  it('does nothing while the relational store is down', async () => {
    ctx.stores.relational.seed('offer', [
      offerRow({ id: 'o-old', status: 'sent', valid_until: '2026-02-28T00:00:00.000Z' }),
    ]);
    ctx.monitor.report('relational', false);

    expect(await ctx.sweeper.sweep()).toEqual({ expired: 0, undone: 0, reconciled: 0, followUps: 0, staleOffers: 0 });
    expect(ctx.stores.relational.writes).toEqual([]);
  });
});
