import { isBackendUnavailable } from '../../errors.js';
import { isSearchable, type EntityType, type SearchableEntityType, type StoredRecord } from '../../domain/entities.js';
import type { RelationalStore, SearchStore, WritableFields } from '../../stores/types.js';
import type { HealthMonitor } from '../health/monitor.js';
import { logger } from '../../utils/logger.js';
import { backoffDelay } from './backoff.js';
import { ProjectionQueue, taskKey, type ProjectionTask } from './queue.js';
import { toProjection, tombstone } from './projection.js';

const log = logger.child({ module: 'propagation' });

// Upper bound on how long an idle worker sleeps before re-checking the queue.
const IDLE_WAIT_MS = 30_000;

export interface ConsistencyPropagatorOptions {
  workers: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  now?: () => number;
}

export interface PropagationStats {
  pending: number;
  inFlight: number;
  oldestPendingMs: number | null;
  projected: number;
  /** Ids holding a projected high-water mark, kept only while more work is queued for them. */
  tracked: number;
  stale: number;
  skipped: number;
  failures: number;
  lastError: string | null;
}

/**
 * Writes go to the relational store synchronously; the search projection
 * follows from a background queue. Only the workers here retry forever.
 */
export class ConsistencyPropagator {
  private readonly queue = new ProjectionQueue();
  private readonly projected = new Map<string, number>();
  private readonly waiters = new Set<() => void>();
  private readonly now: () => number;
  private loops: Promise<void>[] = [];
  private running = false;
  private counters = { projected: 0, stale: 0, skipped: 0, failures: 0 };
  private lastError: string | null = null;

  constructor(
    private readonly relational: RelationalStore,
    private readonly search: SearchStore,
    private readonly monitor: HealthMonitor,
    private readonly options: ConsistencyPropagatorOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Check-and-set write to the system of record, then schedules the
   * projection. Never waits on the search index.
   */
  async commit(entityType: EntityType, fields: WritableFields, expectedVersion: number): Promise<StoredRecord> {
    let record: StoredRecord;

    try {
      record = await this.relational.write(entityType, fields, expectedVersion);
    } catch (error) {
      if (isBackendUnavailable(error)) this.monitor.report('relational', false);
      throw error;
    }

    this.monitor.report('relational', true);
    if (isSearchable(entityType)) {
      this.enqueue(entityType, record.id, record.version);
    }
    return record;
  }

  /** Soft delete; the index receives a tombstone, never a physical delete. */
  async remove(entityType: EntityType, id: string, expectedVersion: number): Promise<StoredRecord> {
    return this.commit(entityType, { id, deleted_at: new Date(this.now()).toISOString() }, expectedVersion);
  }

  enqueue(entityType: SearchableEntityType, id: string, version: number): void {
    if ((this.projected.get(taskKey(entityType, id)) ?? 0) >= version) return;

    const result = this.queue.enqueue(entityType, id, version, this.now());
    if (result !== 'ignored') this.wake();
  }

  /** Re-queues every record of a type, including soft-deleted ones. */
  async reindex(entityType: SearchableEntityType): Promise<number> {
    let count = 0;
    for await (const record of this.relational.query(entityType, { includeDeleted: true })) {
      this.projected.delete(taskKey(entityType, record.id));
      this.enqueue(entityType, record.id, record.version);
      count += 1;
    }
    log.info({ entityType, count }, 'Reindex queued');
    return count;
  }

  /** Processes one due task. Returns false when nothing was due. */
  async runOnce(): Promise<boolean> {
    const task = this.queue.take(this.now());
    if (!task) return false;
    await this.process(task);
    return true;
  }

  /** Processes due tasks until none are left; backed-off tasks stay queued. */
  async drain(): Promise<number> {
    let processed = 0;
    while (await this.runOnce()) processed += 1;
    return processed;
  }

  stats(): PropagationStats {
    const oldest = this.queue.oldestEnqueuedAt();
    return {
      pending: this.queue.size,
      inFlight: this.queue.inFlightCount,
      oldestPendingMs: oldest === null ? null : Math.max(0, this.now() - oldest),
      ...this.counters,
      tracked: this.projected.size,
      lastError: this.lastError,
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (let i = 0; i < this.options.workers; i += 1) {
      this.loops.push(this.loop(i));
    }
    log.info({ workers: this.options.workers }, 'Propagation workers started');
  }

  async stop(): Promise<void> {
    this.running = false;
    this.wake();
    await Promise.all(this.loops);
    this.loops = [];
  }

  private async loop(worker: number): Promise<void> {
    while (this.running) {
      try {
        const processed = await this.runOnce();
        if (!processed) await this.idle();
      } catch (error) {
        log.error({ err: error, worker }, 'Propagation worker iteration failed');
        await this.idle();
      }
    }
  }

  private async process(task: ProjectionTask): Promise<void> {
    const key = taskKey(task.entityType, task.id);

    try {
      if ((this.projected.get(key) ?? 0) >= task.version) {
        this.counters.skipped += 1;
        this.complete(task);
        return;
      }

      const record = await this.relational.read(task.entityType, task.id);
      // The current record may be newer than the task; projecting it makes
      // the newer task a no-op when it comes up.
      const projection = record
        ? toProjection(task.entityType, record)
        : tombstone(task.entityType, task.id, task.version, new Date(this.now()).toISOString());

      if ((this.projected.get(key) ?? 0) >= projection.version) {
        this.counters.skipped += 1;
        this.complete(task);
        return;
      }

      const result = await this.search.write(projection);
      this.monitor.report('search', true);
      this.markProjected(key, projection.version);
      this.counters[result === 'applied' ? 'projected' : 'stale'] += 1;
      this.complete(task);
    } catch (error) {
      if (isBackendUnavailable(error)) this.monitor.report(error.backend, false);

      this.counters.failures += 1;
      this.lastError = error instanceof Error ? error.message : String(error);

      const delay = backoffDelay(task.attempts + 1, this.options.baseBackoffMs, this.options.maxBackoffMs);
      log.warn({ err: error, key, version: task.version, attempt: task.attempts + 1, delay }, 'Projection failed, will retry');
      this.queue.retry(task, this.now() + delay);
    }
  }

  /** The index refuses older versions itself, so a mark is dropped once no task for the id remains. */
  private complete(task: ProjectionTask): void {
    this.queue.complete(task);
    if (this.queue.pendingVersion(task.entityType, task.id) === null) {
      this.projected.delete(taskKey(task.entityType, task.id));
    }
  }

  private markProjected(key: string, version: number): void {
    this.projected.set(key, Math.max(this.projected.get(key) ?? 0, version));
  }

  private idle(): Promise<void> {
    const due = this.queue.nextDueAt();
    const wait = due === null ? IDLE_WAIT_MS : Math.max(0, due - this.now());

    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, wait);
      timer.unref();
      this.waiters.add(done);
    });
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
