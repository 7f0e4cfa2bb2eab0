import { randomUUID } from 'node:crypto';
import {
  BackendUnavailableError,
  IllegalTransitionError,
  NotFoundError,
  ValidationError,
  VersionConflictError,
  isBackendUnavailable,
} from '../../errors.js';
import {
  companySchema,
  describeItems,
  installationSchema,
  leadActivitySchema,
  leadSchema,
  offerSchema,
  type ActivityType,
  type EntityType,
  type Installation,
  type Lead,
  type LeadActivity,
  type NotificationKind,
  type Offer,
  type OfferItem,
  type Page,
  type SourceRef,
  type StoredRecord,
} from '../../domain/entities.js';
import type { QueryPredicate, RelationalStore } from '../../stores/types.js';
import type { HealthMonitor } from '../health/monitor.js';
import type { NotificationFanout } from '../notifications/fanout.js';
import type { ConsistencyPropagator } from '../propagation/propagator.js';
import type { TechnicianDirectory } from '../technicians/directory.js';
import { logger } from '../../utils/logger.js';
import { addDays, dayOf } from '../../utils/time.js';
import {
  INSTALLATION_TRANSITIONS,
  LEAD_TRANSITIONS,
  OFFER_TRANSITIONS,
  canCreateOffer,
  resolveTransition,
  type Audience,
  type InstallationEvent,
  type LeadEvent,
  type OfferEvent,
  type SideEffect,
  type TransitionRule,
} from './transitions.js';
import type {
  ActivityInput,
  LeadInput,
  LeadListQuery,
  LeadPatch,
  OfferDecision,
  OfferInput,
  OfferPatch,
  ScheduleInput,
  UndoneJobsQuery,
} from './schemas.js';

const log = logger.child({ module: 'lifecycle' });

type LifecycleEntity = 'lead' | 'offer' | 'installation';

/** Lead statuses that still expect a follow-up from the owner. */
const OPEN_LEAD_STATUSES: string[] = ['new', 'contacted', 'qualified'];
const ACTIVITY_LIMIT = 200;

interface Tracked<S extends string> {
  id: string;
  version: number;
  status: S;
  deleted_at: string | null;
}

/** What side effects need to know about the record that just changed. */
interface EffectTarget {
  leadId: string;
  technicianId: string | null;
  offer: Offer | null;
}

interface Machine<S extends string, E extends string, T extends Tracked<S>> {
  entityType: LifecycleEntity;
  table: Record<E, TransitionRule<S>>;
  parse: (row: unknown) => T;
  target: (record: T) => EffectTarget;
}

const LEADS: Machine<Lead['status'], LeadEvent, Lead> = {
  entityType: 'lead',
  table: LEAD_TRANSITIONS,
  parse: (row) => leadSchema.parse(row),
  target: (lead) => ({ leadId: lead.id, technicianId: null, offer: null }),
};

const OFFERS: Machine<Offer['status'], OfferEvent, Offer> = {
  entityType: 'offer',
  table: OFFER_TRANSITIONS,
  parse: (row) => offerSchema.parse(row),
  target: (offer) => ({ leadId: offer.lead_id, technicianId: null, offer }),
};

const INSTALLATIONS: Machine<Installation['status'], InstallationEvent, Installation> = {
  entityType: 'installation',
  table: INSTALLATION_TRANSITIONS,
  parse: (row) => installationSchema.parse(row),
  target: (installation) => ({
    leadId: installation.lead_id,
    technicianId: installation.technician_id,
    offer: null,
  }),
};

interface ApplyOptions<T> {
  expectedVersion?: number;
  patch?: (current: T, now: string) => Record<string, unknown>;
  validate?: (current: T) => Promise<void>;
}

export interface TransitionOptions {
  /** Version the caller last saw; a mismatch fails with a version conflict. */
  expectedVersion?: number;
}

export interface LifecycleDependencies {
  relational: RelationalStore;
  propagator: ConsistencyPropagator;
  fanout: NotificationFanout;
  monitor: HealthMonitor;
  technicians: TechnicianDirectory;
}

export interface LifecycleOptions {
  offerValidityDays: number;
  installationGraceDays: number;
  /** Days a sent offer may wait without any activity on its lead. */
  staleOfferDays: number;
  now?: () => Date;
}

function definedOnly(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

/** A sent offer that has gone quiet, with the lead it belongs to. */
export interface StaleOffer {
  offer: Offer;
  lead: Lead;
}

export function offerTotal(items: OfferItem[]): number {
  const total = items.reduce((sum, item) => sum + item.quantity * item.unit_price, 0);
  return Math.round(total * 100) / 100;
}

/**
 * Lead → offer → installation workflow. Every transition is a single
 * check-and-set write; notifications and follow-up records are best-effort
 * and never undo a committed transition.
 */
export class LifecycleService {
  private readonly relational: RelationalStore;
  private readonly propagator: ConsistencyPropagator;
  private readonly fanout: NotificationFanout;
  private readonly monitor: HealthMonitor;
  private readonly technicians: TechnicianDirectory;
  private readonly now: () => Date;

  constructor(
    deps: LifecycleDependencies,
    private readonly options: LifecycleOptions
  ) {
    this.relational = deps.relational;
    this.propagator = deps.propagator;
    this.fanout = deps.fanout;
    this.monitor = deps.monitor;
    this.technicians = deps.technicians;
    this.now = options.now ?? (() => new Date());
  }

  // Leads

  async createLead(input: LeadInput): Promise<Lead> {
    this.ensureWritable();
    const row = await this.propagator.commit(
      'lead',
      { ...input, id: randomUUID(), status: 'new', loss_reason: null },
      0
    );
    const lead = leadSchema.parse(row);
    log.info({ leadId: lead.id }, 'Lead created');
    await this.record(lead.id, 'field_change', 'Lead created');
    return lead;
  }

  async getLead(id: string): Promise<Lead> {
    return this.load(LEADS, id);
  }

  async listLeads(query: LeadListQuery): Promise<Page<Lead>> {
    const eq: Record<string, string> = {};
    if (query.status) eq.status = query.status;
    if (query.owner_user_id) eq.owner_user_id = query.owner_user_id;

    const predicate: QueryPredicate = {
      eq,
      text: query.q
        ? { columns: ['company_name', 'contact_name', 'email'], terms: [query.q], operator: 'or' }
        : undefined,
      orderBy: { column: 'updated_at', ascending: false },
    };

    let scoped = predicate;
    if (query.due === 'followup') {
      scoped = {
        ...predicate,
        in: { status: OPEN_LEAD_STATUSES },
        range: [{ column: 'next_follow_up_date', lte: dayOf(this.now()) }],
      };
    } else if (query.due === 'stale') {
      const ids = [...new Set((await this.staleOffers()).map(({ lead }) => lead.id))];
      if (ids.length === 0) return { items: [], total: 0, page: query.page, pageSize: query.page_size };
      scoped = { ...predicate, in: { id: ids } };
    }

    const total = await this.guarded(() => this.relational.count('lead', scoped));
    const rows = await this.collect('lead', { ...scoped, limit: query.page * query.page_size }, LEADS.parse);

    return {
      items: rows.slice((query.page - 1) * query.page_size),
      total,
      page: query.page,
      pageSize: query.page_size,
    };
  }

  /** Open leads whose follow-up date is today or earlier. */
  leadsDueForFollowUp(): Promise<Lead[]> {
    return this.collect(
      'lead',
      {
        in: { status: OPEN_LEAD_STATUSES },
        range: [{ column: 'next_follow_up_date', lte: dayOf(this.now()) }],
        orderBy: { column: 'next_follow_up_date', ascending: true },
      },
      LEADS.parse
    );
  }

  /**
   * Offers sent at least `staleOfferDays` ago and still undecided, whose lead
   * is not lost and has logged no activity since the cutoff.
   */
  async staleOffers(): Promise<StaleOffer[]> {
    const cutoff = addDays(this.now().toISOString(), -this.options.staleOfferDays);
    const offers = await this.collect(
      'offer',
      {
        eq: { status: 'sent' },
        range: [{ column: 'sent_at', lte: cutoff }],
        orderBy: { column: 'sent_at', ascending: true },
      },
      OFFERS.parse
    );

    const stale: StaleOffer[] = [];
    for (const offer of offers) {
      const lead = await this.findLead(offer.lead_id);
      if (!lead || lead.deleted_at !== null || lead.status === 'lost') continue;

      const recent = await this.guarded(() =>
        this.relational.count('lead_activity', {
          eq: { lead_id: lead.id },
          range: [{ column: 'created_at', gte: cutoff }],
        })
      );
      if (recent === 0) stale.push({ offer, lead });
    }
    return stale;
  }

  // Activity log

  async logActivity(leadId: string, input: ActivityInput, authorId: string | null): Promise<LeadActivity> {
    this.ensureWritable();
    await this.load(LEADS, leadId);
    const row = await this.propagator.commit(
      'lead_activity',
      { id: randomUUID(), lead_id: leadId, type: input.type, content: input.content, author_id: authorId },
      0
    );
    return leadActivitySchema.parse(row);
  }

  /** Newest first. */
  async listActivities(leadId: string, limit = ACTIVITY_LIMIT): Promise<LeadActivity[]> {
    await this.load(LEADS, leadId);
    return this.collect(
      'lead_activity',
      { eq: { lead_id: leadId }, orderBy: { column: 'created_at', ascending: false }, limit },
      (row) => leadActivitySchema.parse(row)
    );
  }

  async updateLeadDetails(id: string, patch: LeadPatch): Promise<Lead> {
    this.ensureWritable();
    const { version, ...fields } = patch;
    const current = await this.load(LEADS, id);
    this.checkVersion('lead', current, version);

    const changes = definedOnly(fields);
    if (Object.keys(changes).length === 0) return current;

    const row = await this.propagator.commit('lead', { ...changes, id }, current.version);
    await this.record(id, 'field_change', `Updated ${Object.keys(changes).sort().join(', ')}`);
    return leadSchema.parse(row);
  }

  contactLead(id: string, options: TransitionOptions = {}): Promise<Lead> {
    return this.apply(LEADS, id, 'contact', options);
  }

  qualifyLead(id: string, options: TransitionOptions = {}): Promise<Lead> {
    return this.apply(LEADS, id, 'qualify', options);
  }

  markLeadLost(id: string, reason: string | null, options: TransitionOptions = {}): Promise<Lead> {
    return this.apply(LEADS, id, 'markLost', { ...options, patch: () => ({ loss_reason: reason }) });
  }

  convertLead(id: string, options: TransitionOptions = {}): Promise<Lead> {
    return this.apply(LEADS, id, 'convert', options);
  }

  // Offers

  async listOffers(leadId: string): Promise<Offer[]> {
    await this.load(LEADS, leadId);
    return this.collect('offer', { eq: { lead_id: leadId }, orderBy: { column: 'created_at', ascending: true } }, OFFERS.parse);
  }

  async createOffer(leadId: string, input: OfferInput): Promise<Offer> {
    this.ensureWritable();
    const lead = await this.load(LEADS, leadId);
    if (!canCreateOffer(lead.status)) {
      throw new IllegalTransitionError('lead', lead.status, 'createOffer');
    }

    const row = await this.propagator.commit(
      'offer',
      {
        id: randomUUID(),
        lead_id: lead.id,
        items: input.items,
        item_text: describeItems(input.items),
        amount: offerTotal(input.items),
        status: 'draft',
        valid_until: input.valid_until,
        sent_at: null,
        decided_at: null,
        notes: input.notes,
      },
      0
    );
    const offer = offerSchema.parse(row);
    log.info({ offerId: offer.id, leadId }, 'Offer drafted');
    return offer;
  }

  async getOffer(id: string): Promise<Offer> {
    return this.load(OFFERS, id);
  }

  /** Only drafts are editable; a sent offer is final. */
  async updateOfferDraft(id: string, patch: OfferPatch): Promise<Offer> {
    this.ensureWritable();
    const { version, ...fields } = patch;
    const current = await this.load(OFFERS, id);
    this.checkVersion('offer', current, version);

    if (current.status !== 'draft') {
      throw new IllegalTransitionError('offer', current.status, 'update');
    }

    const changes = definedOnly(fields);
    if (fields.items) {
      changes.item_text = describeItems(fields.items);
      changes.amount = offerTotal(fields.items);
    }
    if (Object.keys(changes).length === 0) return current;

    const row = await this.propagator.commit('offer', { ...changes, id }, current.version);
    return offerSchema.parse(row);
  }

  sendOffer(id: string, options: TransitionOptions & { validUntil?: string } = {}): Promise<Offer> {
    return this.apply(OFFERS, id, 'send', {
      expectedVersion: options.expectedVersion,
      patch: (offer, now) => ({
        sent_at: now,
        valid_until: options.validUntil ?? offer.valid_until ?? addDays(now, this.options.offerValidityDays),
      }),
    });
  }

  acceptOffer(id: string, options: TransitionOptions = {}): Promise<Offer> {
    return this.apply(OFFERS, id, 'accept', { ...options, patch: (_offer, now) => ({ decided_at: now }) });
  }

  rejectOffer(id: string, options: TransitionOptions = {}): Promise<Offer> {
    return this.apply(OFFERS, id, 'reject', { ...options, patch: (_offer, now) => ({ decided_at: now }) });
  }

  expireOffer(id: string, options: TransitionOptions = {}): Promise<Offer> {
    return this.apply(OFFERS, id, 'expire', options);
  }

  setOfferStatus(id: string, status: OfferDecision, options: TransitionOptions = {}): Promise<Offer> {
    return status === 'accepted' ? this.acceptOffer(id, options) : this.rejectOffer(id, options);
  }

  // Installations

  /**
   * Creates the pending installation for an accepted offer. The job shares
   * the offer's id, so repeated or concurrent calls converge on one row.
   */
  async createInstallationForOffer(offerId: string): Promise<Installation> {
    this.ensureWritable();
    const offer = await this.load(OFFERS, offerId);
    if (offer.status !== 'accepted') {
      throw new IllegalTransitionError('offer', offer.status, 'createInstallation');
    }

    const existing = await this.readRow('installation', offer.id);
    if (existing) return installationSchema.parse(existing);

    const lead = await this.findLead(offer.lead_id);

    try {
      const row = await this.propagator.commit(
        'installation',
        {
          id: offer.id,
          lead_id: offer.lead_id,
          offer_id: offer.id,
          company_id: lead?.company_id ?? null,
          scheduled_date: null,
          technician_id: null,
          deadline_at: null,
          status: 'pending',
          started_at: null,
          finished_at: null,
          notes: null,
        },
        0
      );
      log.info({ installationId: row.id, offerId }, 'Installation created');
      return installationSchema.parse(row);
    } catch (error) {
      if (!(error instanceof VersionConflictError)) throw error;

      // Another caller inserted it first.
      const row = await this.readRow('installation', offer.id);
      if (!row) throw error;
      return installationSchema.parse(row);
    }
  }

  async getInstallation(id: string): Promise<Installation> {
    return this.load(INSTALLATIONS, id);
  }

  scheduleInstallation(id: string, input: ScheduleInput): Promise<Installation> {
    return this.apply(INSTALLATIONS, id, 'schedule', {
      expectedVersion: input.version,
      validate: async () => {
        const technician = await this.technicians.get(input.technician_id);
        if (!technician || !technician.is_active) {
          throw new ValidationError('Technician is not available', {
            technician_id: [`Technician ${input.technician_id} does not exist or is inactive`],
          });
        }
      },
      patch: () => ({
        scheduled_date: input.scheduled_date,
        technician_id: input.technician_id,
        deadline_at: input.deadline_at ?? addDays(input.scheduled_date, this.options.installationGraceDays),
      }),
    });
  }

  startInstallation(id: string, options: TransitionOptions = {}): Promise<Installation> {
    return this.apply(INSTALLATIONS, id, 'start', { ...options, patch: (_job, now) => ({ started_at: now }) });
  }

  finishInstallation(id: string, options: TransitionOptions = {}): Promise<Installation> {
    return this.apply(INSTALLATIONS, id, 'finish', { ...options, patch: (_job, now) => ({ finished_at: now }) });
  }

  markInstallationUndone(id: string, options: TransitionOptions = {}): Promise<Installation> {
    return this.apply(INSTALLATIONS, id, 'markUndone', options);
  }

  async listUndoneInstallations(query: UndoneJobsQuery): Promise<Page<Installation>> {
    const eq: Record<string, string> = { status: 'undone' };
    if (query.company_id) eq.company_id = query.company_id;
    if (query.technician_id) eq.technician_id = query.technician_id;

    const predicate: QueryPredicate = {
      eq,
      text: query.q ? { columns: ['notes'], terms: [query.q], operator: 'or' } : undefined,
      orderBy: { column: 'updated_at', ascending: false },
    };

    const total = await this.guarded(() => this.relational.count('installation', predicate));
    const rows = await this.collect(
      'installation',
      { ...predicate, limit: query.page * query.page_size },
      INSTALLATIONS.parse
    );

    return {
      items: rows.slice((query.page - 1) * query.page_size),
      total,
      page: query.page,
      pageSize: query.page_size,
    };
  }

  private async apply<S extends string, E extends string, T extends Tracked<S>>(
    machine: Machine<S, E, T>,
    id: string,
    event: E,
    options: ApplyOptions<T> = {}
  ): Promise<T> {
    this.ensureWritable();
    const current = await this.load(machine, id);
    this.checkVersion(machine.entityType, current, options.expectedVersion);

    const rule = resolveTransition(machine.table, current.status, event);
    if (!rule) {
      throw new IllegalTransitionError(machine.entityType, current.status, event);
    }

    if (options.validate) await options.validate(current);

    const now = this.now().toISOString();
    const patch = options.patch ? options.patch(current, now) : {};
    const row = await this.propagator.commit(machine.entityType, { ...patch, id, status: rule.to }, current.version);
    const next = machine.parse(row);

    log.info(
      { entityType: machine.entityType, id, event, from: current.status, to: rule.to, version: next.version },
      'Transition applied'
    );

    const target = machine.target(next);
    if (machine.entityType === 'offer' && rule.to === 'sent') {
      await this.record(target.leadId, 'offer_sent', `offer ${id} sent`);
    } else {
      await this.record(target.leadId, 'status_change', `${machine.entityType} ${current.status} → ${rule.to}`);
    }

    await this.runEffects(rule.effects, { entity_type: machine.entityType, id, version: next.version }, target);
    return next;
  }

  /** Appends to a lead's history. A failure is logged; the write that caused it stands. */
  private async record(leadId: string, type: ActivityType, content: string): Promise<void> {
    try {
      await this.propagator.commit(
        'lead_activity',
        { id: randomUUID(), lead_id: leadId, type, content, author_id: null },
        0
      );
    } catch (error) {
      log.warn({ err: error, leadId, type }, 'Activity log write failed');
    }
  }

  private async runEffects(effects: readonly SideEffect[], source: SourceRef, target: EffectTarget): Promise<void> {
    for (const effect of effects) {
      try {
        switch (effect.kind) {
          case 'notify':
            await this.notifyAudience(effect.audience, effect.notification, source, target);
            break;
          case 'create_installation':
            if (target.offer) await this.createInstallationForOffer(target.offer.id);
            break;
          case 'allow_offer':
            // Offer creation checks the lead status itself.
            break;
        }
      } catch (error) {
        log.warn({ err: error, effect: effect.kind, source }, 'Side effect failed');
      }
    }
  }

  private async notifyAudience(
    audience: Audience,
    kind: NotificationKind,
    source: SourceRef,
    target: EffectTarget
  ): Promise<void> {
    const recipients = await this.recipients(audience, target);

    for (const recipientId of recipients) {
      try {
        await this.fanout.notify(recipientId, kind, source);
      } catch (error) {
        log.warn({ err: error, recipientId, kind, source }, 'Notification failed');
      }
    }
  }

  private async recipients(audience: Audience, target: EffectTarget): Promise<string[]> {
    switch (audience) {
      case 'technician':
        return target.technicianId ? [target.technicianId] : [];
      case 'owner': {
        const lead = await this.findLead(target.leadId);
        return lead?.owner_user_id ? [lead.owner_user_id] : [];
      }
      case 'company': {
        const lead = await this.findLead(target.leadId);
        if (!lead?.company_id) return [];
        const row = await this.readRow('company', lead.company_id);
        const company = row ? companySchema.parse(row) : null;
        return company?.contact_user_id ? [company.contact_user_id] : [];
      }
      case 'stakeholders': {
        const lead = await this.findLead(target.leadId);
        const ids = [lead?.owner_user_id ?? null, target.technicianId];
        return [...new Set(ids.filter((id): id is string => id !== null))];
      }
    }
  }

  private ensureWritable(): void {
    if (!this.monitor.isAvailable('relational')) {
      throw new BackendUnavailableError('relational');
    }
  }

  private checkVersion(entityType: LifecycleEntity, current: { id: string; version: number }, expected?: number): void {
    if (expected !== undefined && expected !== current.version) {
      throw new VersionConflictError(entityType, current.id, expected);
    }
  }

  private async findLead(id: string): Promise<Lead | null> {
    const row = await this.readRow('lead', id);
    return row ? leadSchema.parse(row) : null;
  }

  private async load<S extends string, E extends string, T extends Tracked<S>>(
    machine: Machine<S, E, T>,
    id: string
  ): Promise<T> {
    const row = await this.readRow(machine.entityType, id);
    if (!row || row.deleted_at !== null) {
      throw new NotFoundError(machine.entityType, id);
    }
    return machine.parse(row);
  }

  private readRow(entityType: EntityType, id: string): Promise<StoredRecord | null> {
    return this.guarded(() => this.relational.read(entityType, id));
  }

  private collect<T>(entityType: EntityType, predicate: QueryPredicate, parse: (row: unknown) => T): Promise<T[]> {
    return this.guarded(async () => {
      const items: T[] = [];
      for await (const row of this.relational.query(entityType, predicate)) {
        items.push(parse(row));
      }
      return items;
    });
  }

  /** Runs a relational call and tells the monitor how it went. */
  private async guarded<T>(operation: () => Promise<T>): Promise<T> {
    try {
      const result = await operation();
      this.monitor.report('relational', true);
      return result;
    } catch (error) {
      if (isBackendUnavailable(error, 'relational')) this.monitor.report('relational', false);
      throw error;
    }
  }
}
