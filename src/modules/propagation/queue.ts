import type { SearchableEntityType } from '../../domain/entities.js';

export interface ProjectionTask {
  entityType: SearchableEntityType;
  id: string;
  version: number;
  /** When the oldest still-unprojected change for this id was queued. */
  enqueuedAt: number;
  attempts: number;
  notBefore: number;
}

export type EnqueueResult = 'queued' | 'superseded' | 'ignored';

export function taskKey(entityType: SearchableEntityType, id: string): string {
  return `${entityType}:${id}`;
}

/**
 * Pending projection work, at most one task per entity id. A newer version
 * replaces the pending one in place; an older one is dropped. Ids being
 * projected are never handed out twice, which keeps per-id writes ordered.
 */
export class ProjectionQueue {
  private readonly pending = new Map<string, ProjectionTask>();
  private readonly inFlight = new Map<string, number>();

  get size(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  enqueue(entityType: SearchableEntityType, id: string, version: number, now: number): EnqueueResult {
    const key = taskKey(entityType, id);
    const existing = this.pending.get(key);

    if (existing) {
      if (existing.version >= version) return 'ignored';
      existing.version = version;
      existing.attempts = 0;
      existing.notBefore = now;
      return 'superseded';
    }

    this.pending.set(key, { entityType, id, version, enqueuedAt: now, attempts: 0, notBefore: now });
    return 'queued';
  }

  /** Removes and returns the first due task whose id is not already in flight. */
  take(now: number): ProjectionTask | null {
    for (const [key, task] of this.pending) {
      if (task.notBefore > now || this.inFlight.has(key)) continue;
      this.pending.delete(key);
      this.inFlight.set(key, task.version);
      return { ...task };
    }
    return null;
  }

  complete(task: ProjectionTask): void {
    this.inFlight.delete(taskKey(task.entityType, task.id));
  }

  /** Puts a failed task back, merging it into any task queued for the same id meanwhile. */
  retry(task: ProjectionTask, notBefore: number): void {
    const key = taskKey(task.entityType, task.id);
    this.inFlight.delete(key);

    const queued = this.pending.get(key);
    if (queued) {
      queued.version = Math.max(queued.version, task.version);
      queued.enqueuedAt = Math.min(queued.enqueuedAt, task.enqueuedAt);
      return;
    }

    this.pending.set(key, { ...task, attempts: task.attempts + 1, notBefore });
  }

  pendingVersion(entityType: SearchableEntityType, id: string): number | null {
    return this.pending.get(taskKey(entityType, id))?.version ?? null;
  }

  nextDueAt(): number | null {
    let due: number | null = null;
    for (const [key, task] of this.pending) {
      if (this.inFlight.has(key)) continue;
      if (due === null || task.notBefore < due) due = task.notBefore;
    }
    return due;
  }

  oldestEnqueuedAt(): number | null {
    let oldest: number | null = null;
    for (const task of this.pending.values()) {
      if (oldest === null || task.enqueuedAt < oldest) oldest = task.enqueuedAt;
    }
    return oldest;
  }
}
