import type { InstallationStatus, LeadStatus, NotificationKind, OfferStatus } from '../../domain/entities.js';

export type Audience = 'owner' | 'company' | 'technician' | 'stakeholders';

export type SideEffect =
  | { kind: 'notify'; audience: Audience; notification: NotificationKind }
  | { kind: 'create_installation' }
  | { kind: 'allow_offer' };

export interface TransitionRule<S extends string> {
  from: readonly S[];
  to: S;
  effects: readonly SideEffect[];
}

export type LeadEvent = 'contact' | 'qualify' | 'markLost' | 'convert';
export type OfferEvent = 'send' | 'accept' | 'reject' | 'expire';
export type InstallationEvent = 'schedule' | 'start' | 'finish' | 'markUndone';

export const LEAD_TRANSITIONS: Record<LeadEvent, TransitionRule<LeadStatus>> = {
  contact: {
    from: ['new'],
    to: 'contacted',
    effects: [{ kind: 'notify', audience: 'owner', notification: 'lead_contacted' }],
  },
  qualify: { from: ['contacted'], to: 'qualified', effects: [] },
  markLost: {
    from: ['new', 'contacted', 'qualified'],
    to: 'lost',
    effects: [{ kind: 'notify', audience: 'owner', notification: 'lead_lost' }],
  },
  convert: { from: ['qualified'], to: 'converted', effects: [{ kind: 'allow_offer' }] },
};

export const OFFER_TRANSITIONS: Record<OfferEvent, TransitionRule<OfferStatus>> = {
  send: {
    from: ['draft'],
    to: 'sent',
    effects: [{ kind: 'notify', audience: 'company', notification: 'offer_sent' }],
  },
  accept: { from: ['sent'], to: 'accepted', effects: [{ kind: 'create_installation' }] },
  reject: {
    from: ['sent'],
    to: 'rejected',
    effects: [{ kind: 'notify', audience: 'owner', notification: 'offer_rejected' }],
  },
  expire: {
    from: ['sent'],
    to: 'expired',
    effects: [{ kind: 'notify', audience: 'owner', notification: 'offer_expired' }],
  },
};

export const INSTALLATION_TRANSITIONS: Record<InstallationEvent, TransitionRule<InstallationStatus>> = {
  schedule: {
    from: ['pending'],
    to: 'scheduled',
    effects: [{ kind: 'notify', audience: 'technician', notification: 'installation_scheduled' }],
  },
  start: { from: ['scheduled'], to: 'in_progress', effects: [] },
  finish: {
    from: ['in_progress'],
    to: 'done',
    effects: [{ kind: 'notify', audience: 'stakeholders', notification: 'installation_done' }],
  },
  markUndone: {
    from: ['scheduled', 'in_progress'],
    to: 'undone',
    effects: [{ kind: 'notify', audience: 'stakeholders', notification: 'installation_undone' }],
  },
};

export function resolveTransition<S extends string, E extends string>(
  table: Record<E, TransitionRule<S>>,
  from: S,
  event: E
): TransitionRule<S> | null {
  const rule = table[event];
  return rule && rule.from.includes(from) ? rule : null;
}

/** Offers can be drafted for any lead that has not been lost. */
export function canCreateOffer(leadStatus: LeadStatus): boolean {
  return leadStatus !== 'lost';
}
