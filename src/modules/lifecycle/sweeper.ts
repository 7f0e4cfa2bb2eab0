import { IllegalTransitionError, NotFoundError, VersionConflictError } from '../../errors.js';
import { installationSchema, offerSchema, type EntityType, type StoredRecord } from '../../domain/entities.js';
import type { QueryPredicate, RelationalStore } from '../../stores/types.js';
import type { HealthMonitor } from '../health/monitor.js';
import type { NotificationFanout } from '../notifications/fanout.js';
import { logger } from '../../utils/logger.js';
import type { LifecycleService } from './service.js';

const log = logger.child({ module: 'sweeper' });

export interface SweepResult {
  expired: number;
  undone: number;
  reconciled: number;
  followUps: number;
  staleOffers: number;
}

export interface DeadlineSweeperOptions {
  intervalMs: number;
  now?: () => Date;
}

/** Someone else moved the record first; the sweep just skips it. */
function isLostRace(error: unknown): boolean {
  return (
    error instanceof VersionConflictError || error instanceof IllegalTransitionError || error instanceof NotFoundError
  );
}

/**
 * Applies deadline-driven transitions: overdue offers expire, overdue
 * installations become undone, and accepted offers get their missing
 * installation. Also reminds lead owners of due follow-ups and of sent
 * offers gone quiet, once per occasion.
 */
export class DeadlineSweeper {
  private timer: NodeJS.Timeout | null = null;
  private sweeping: Promise<SweepResult> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly relational: RelationalStore,
    private readonly lifecycle: LifecycleService,
    private readonly fanout: NotificationFanout,
    private readonly monitor: HealthMonitor,
    private readonly options: DeadlineSweeperOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async sweep(): Promise<SweepResult> {
    if (this.sweeping) return this.sweeping;

    this.sweeping = this.run();
    try {
      return await this.sweeping;
    } finally {
      this.sweeping = null;
    }
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => log.error({ err: error }, 'Deadline sweep failed'));
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async run(): Promise<SweepResult> {
    const result: SweepResult = { expired: 0, undone: 0, reconciled: 0, followUps: 0, staleOffers: 0 };

    if (!this.monitor.isAvailable('relational')) {
      log.debug('Relational store down, skipping sweep');
      return result;
    }

    const now = this.now().toISOString();

    // Overdue offers
    const offers = await this.rows('offer', { eq: { status: 'sent' }, range: [{ column: 'valid_until', lt: now }] });
    for (const row of offers) {
      const offer = offerSchema.parse(row);
      if (await this.attempt(() => this.lifecycle.expireOffer(offer.id, { expectedVersion: offer.version }))) {
        result.expired += 1;
      }
    }

    // Overdue installations
    const installations = await this.rows('installation', {
      in: { status: ['scheduled', 'in_progress'] },
      range: [{ column: 'deadline_at', lt: now }],
    });
    for (const row of installations) {
      const installation = installationSchema.parse(row);
      const marked = await this.attempt(() =>
        this.lifecycle.markInstallationUndone(installation.id, { expectedVersion: installation.version })
      );
      if (marked) result.undone += 1;
    }

    // Accepted offers whose installation was never written
    const accepted = await this.rows('offer', { eq: { status: 'accepted' } });
    for (const row of accepted) {
      const existing = await this.relational.read('installation', row.id);
      if (existing) continue;
      if (await this.attempt(() => this.lifecycle.createInstallationForOffer(row.id))) {
        result.reconciled += 1;
      }
    }

    // Reminders; the follow-up date or send time names the occasion
    for (const lead of await this.lifecycle.leadsDueForFollowUp()) {
      if (!lead.owner_user_id || !lead.next_follow_up_date) continue;
      const source = { entity_type: 'lead', id: lead.id, version: lead.version };
      if (await this.fanout.notifyOnce(lead.owner_user_id, 'lead_follow_up_due', source, lead.next_follow_up_date)) {
        result.followUps += 1;
      }
    }

    for (const { offer, lead } of await this.lifecycle.staleOffers()) {
      if (!lead.owner_user_id || !offer.sent_at) continue;
      const source = { entity_type: 'offer', id: offer.id, version: offer.version };
      if (await this.fanout.notifyOnce(lead.owner_user_id, 'offer_stale', source, offer.sent_at)) {
        result.staleOffers += 1;
      }
    }

    if (Object.values(result).some((count) => count > 0)) {
      log.info(result, 'Deadline sweep applied transitions');
    }
    return result;
  }

  private async rows(entityType: EntityType, predicate: QueryPredicate): Promise<StoredRecord[]> {
    const rows: StoredRecord[] = [];
    for await (const row of this.relational.query(entityType, predicate)) rows.push(row);
    return rows;
  }

  private async attempt(operation: () => Promise<unknown>): Promise<boolean> {
    try {
      await operation();
      return true;
    } catch (error) {
      if (!isLostRace(error)) throw error;
      log.debug({ err: error }, 'Sweep lost a race, skipping record');
      return false;
    }
  }
}
