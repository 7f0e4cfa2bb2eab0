import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError } from '../../errors.js';
import { MemoryRelationalStore } from '../../test-utils/memory-stores.js';
import { NotificationFanout } from './fanout.js';

const source = { entity_type: 'lead', id: 'l1', version: 2 };

describe('NotificationFanout', () => {
  let relational: MemoryRelationalStore;
  let fanout: NotificationFanout;

  beforeEach(() => {
    relational = new MemoryRelationalStore();
    fanout = new NotificationFanout(relational);
  });

  it('writes one unread inbox row per notification', async () => {
    const notification = await fanout.notify('u1', 'lead_contacted', source);

    expect(notification).toMatchObject({
      recipient_id: 'u1',
      kind: 'lead_contacted',
      message: 'Lead was contacted',
      source,
      is_read: false,
      version: 1,
    });
    expect(relational.rows('notification')).toHaveLength(1);
  });

  it('sends a reminder once per occasion', async () => {
    expect(await fanout.notifyOnce('u1', 'lead_follow_up_due', source, '2026-03-01')).toBe(true);
    expect(await fanout.notifyOnce('u1', 'lead_follow_up_due', source, '2026-03-01')).toBe(false);
    expect(await fanout.notifyOnce('u1', 'lead_follow_up_due', source, '2026-03-08')).toBe(true);
    expect(await fanout.notifyOnce('u2', 'lead_follow_up_due', source, '2026-03-01')).toBe(true);

    expect(relational.rows('notification').map((row) => row.id)).toEqual([
      'lead_follow_up_due:lead:l1:2026-03-01:u1',
      'lead_follow_up_due:lead:l1:2026-03-08:u1',
      'lead_follow_up_due:lead:l1:2026-03-01:u2',
    ]);
    expect(await fanout.list('u1')).toMatchObject([
      { message: 'A lead is due for follow-up' },
      { message: 'A lead is due for follow-up' },
    ]);
  });

  it('lists newest first and counts unread', async () => {
    await fanout.notify('u1', 'lead_contacted', source);
    await fanout.notify('u1', 'offer_rejected', source);
    await fanout.notify('u2', 'offer_sent', source);

    expect((await fanout.list('u1')).map((n) => n.kind)).toEqual(['offer_rejected', 'lead_contacted']);
    expect(await fanout.unreadCount('u1')).toBe(2);
    expect(await fanout.list('u1', { limit: 1 })).toHaveLength(1);
  });

  it('marks a single notification read', async () => {
    const first = await fanout.notify('u1', 'lead_contacted', source);
    await fanout.notify('u1', 'lead_lost', source);

    expect(await fanout.markRead('u1', first.id)).toBe(1);
    expect(await fanout.markRead('u1', first.id)).toBe(0);
    expect(await fanout.unreadCount('u1')).toBe(1);
    expect((await fanout.list('u1', { unreadOnly: true })).map((n) => n.kind)).toEqual(['lead_lost']);
  });

  it('hides other recipients\' notifications', async () => {
    const notification = await fanout.notify('u2', 'offer_sent', source);

    await expect(fanout.markRead('u1', notification.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('marks everything read for one recipient', async () => {
    await fanout.notify('u1', 'lead_contacted', source);
    await fanout.notify('u1', 'lead_lost', source);
    await fanout.notify('u2', 'offer_sent', source);

    expect(await fanout.markRead('u1', 'all')).toBe(2);
    expect(await fanout.unreadCount('u1')).toBe(0);
    expect(await fanout.unreadCount('u2')).toBe(1);
  });
});
