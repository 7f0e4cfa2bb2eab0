import type { BackendName } from '../../errors.js';
import type { StoreAdapter } from '../../stores/types.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ module: 'health' });

export interface HealthSnapshot {
  readonly ok: boolean;
  readonly relational: boolean;
  readonly search: boolean;
  readonly cache: boolean;
  readonly checkedAt: string;
}

export interface HealthMonitorOptions {
  intervalMs: number;
  now?: () => Date;
}

function freeze(state: Record<BackendName, boolean>, checkedAt: string): HealthSnapshot {
  return Object.freeze({
    ok: state.relational,
    relational: state.relational,
    search: state.search,
    cache: state.cache,
    checkedAt,
  });
}

/**
 * Process-wide view of backend availability. The snapshot is an immutable
 * object replaced wholesale on every change, so readers never see a torn
 * update and never wait on a probe.
 */
export class HealthMonitor {
  private current: HealthSnapshot;
  private timer: NodeJS.Timeout | null = null;
  private refreshing: Promise<HealthSnapshot> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly adapters: Record<BackendName, StoreAdapter>,
    private readonly options: HealthMonitorOptions
  ) {
    this.now = options.now ?? (() => new Date());
    // Optimistic until the first probe says otherwise.
    this.current = freeze({ relational: true, search: true, cache: true }, this.now().toISOString());
  }

  snapshot(): HealthSnapshot {
    return this.current;
  }

  isAvailable(backend: BackendName): boolean {
    return this.current[backend];
  }

  /** Record the outcome of a caller's own backend operation. */
  report(backend: BackendName, available: boolean): void {
    if (this.current[backend] === available) return;
    this.swap({ ...this.pick(), [backend]: available });
  }

  async refresh(): Promise<HealthSnapshot> {
    // Coalesce overlapping probes into one.
    if (this.refreshing) return this.refreshing;

    this.refreshing = (async () => {
      const [relational, search, cache] = await Promise.all([
        this.adapters.relational.ping(),
        this.adapters.search.ping(),
        this.adapters.cache.ping(),
      ]);

      this.swap({
        relational: relational === 'available',
        search: search === 'available',
        cache: cache === 'available',
      });
      return this.current;
    })();

    try {
      return await this.refreshing;
    } finally {
      this.refreshing = null;
    }
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.refresh().catch((error: unknown) => log.error({ err: error }, 'Health probe failed'));
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private pick(): Record<BackendName, boolean> {
    const { relational, search, cache } = this.current;
    return { relational, search, cache };
  }

  private swap(next: Record<BackendName, boolean>): void {
    const previous = this.current;

    for (const backend of ['relational', 'search', 'cache'] as const) {
      if (previous[backend] !== next[backend]) {
        const message = next[backend] ? 'Backend available again' : 'Backend unavailable';
        if (next[backend]) log.info({ backend }, message);
        else log.warn({ backend }, message);
      }
    }

    this.current = freeze(next, this.now().toISOString());
  }
}
