import { describe, it, expect } from 'vitest';
import { INSTALLATION_STATUSES, LEAD_STATUSES, OFFER_STATUSES } from '../../domain/entities.js';
import {
  INSTALLATION_TRANSITIONS,
  LEAD_TRANSITIONS,
  OFFER_TRANSITIONS,
  canCreateOffer,
  resolveTransition,
} from './transitions.js';

describe('lead transitions', () => {
  const legal: Record<string, Record<string, string>> = {
    contact: { new: 'contacted' },
    qualify: { contacted: 'qualified' },
    markLost: { new: 'lost', contacted: 'lost', qualified: 'lost' },
    convert: { qualified: 'converted' },
  };

  for (const event of ['contact', 'qualify', 'markLost', 'convert'] as const) {
    for (const status of LEAD_STATUSES) {
      const expected = legal[event][status] ?? null;
      it(`${event} from ${status} ${expected ? `moves to ${expected}` : 'is rejected'}`, () => {
        expect(resolveTransition(LEAD_TRANSITIONS, status, event)?.to ?? null).toBe(expected);
      });
    }
  }
});

describe('offer transitions', () => {
  const legal: Record<string, Record<string, string>> = {
    send: { draft: 'sent' },
    accept: { sent: 'accepted' },
    reject: { sent: 'rejected' },
    expire: { sent: 'expired' },
  };

  for (const event of ['send', 'accept', 'reject', 'expire'] as const) {
    for (const status of OFFER_STATUSES) {
      const expected = legal[event][status] ?? null;
      it(`${event} from ${status} ${expected ? `moves to ${expected}` : 'is rejected'}`, () => {
        expect(resolveTransition(OFFER_TRANSITIONS, status, event)?.to ?? null).toBe(expected);
      });
    }
  }

  it('creates the installation when an offer is accepted', () => {
    expect(OFFER_TRANSITIONS.accept.effects).toEqual([{ kind: 'create_installation' }]);
  });

  it('tells the owner when a sent offer expires', () => {
    expect(OFFER_TRANSITIONS.expire.effects).toEqual([{ kind: 'notify', audience: 'owner', notification: 'offer_expired' }]);
  });
});

describe('installation transitions', () => {
  const legal: Record<string, Record<string, string>> = {
    schedule: { pending: 'scheduled' },
    start: { scheduled: 'in_progress' },
    finish: { in_progress: 'done' },
    markUndone: { scheduled: 'undone', in_progress: 'undone' },
  };

  for (const event of ['schedule', 'start', 'finish', 'markUndone'] as const) {
    for (const status of INSTALLATION_STATUSES) {
      const expected = legal[event][status] ?? null;
      it(`${event} from ${status} ${expected ? `moves to ${expected}` : 'is rejected'}`, () => {
        expect(resolveTransition(INSTALLATION_TRANSITIONS, status, event)?.to ?? null).toBe(expected);
      });
    }
  }

  it('notifies stakeholders when work is done or missed', () => {
    expect(INSTALLATION_TRANSITIONS.finish.effects).toEqual([
      { kind: 'notify', audience: 'stakeholders', notification: 'installation_done' },
    ]);
    expect(INSTALLATION_TRANSITIONS.markUndone.effects).toEqual([
      { kind: 'notify', audience: 'stakeholders', notification: 'installation_undone' },
    ]);
  });
});

describe('canCreateOffer', () => {
  it('allows offers for every lead that is not lost', () => {
    expect(LEAD_STATUSES.filter(canCreateOffer)).toEqual(['new', 'contacted', 'qualified', 'converted']);
  });
});
