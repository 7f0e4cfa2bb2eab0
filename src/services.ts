import type { Stores } from './stores/types.js';
import { HealthMonitor } from './modules/health/index.js';
import { ConsistencyPropagator } from './modules/propagation/index.js';
import { NotificationFanout } from './modules/notifications/index.js';
import { TechnicianDirectory } from './modules/technicians/index.js';
import { DeadlineSweeper, LifecycleService } from './modules/lifecycle/index.js';
import { DocsHierarchy } from './modules/docs/index.js';
import { QueryRouter } from './modules/search/index.js';

export interface ServiceSettings {
  healthProbeIntervalMs: number;
  propagationWorkers: number;
  propagationBaseBackoffMs: number;
  propagationMaxBackoffMs: number;
  sweepIntervalMs: number;
  offerValidityDays: number;
  installationGraceDays: number;
  staleOfferDays: number;
  optionsCacheTtlSeconds: number;
}

export interface Services {
  stores: Stores;
  monitor: HealthMonitor;
  propagator: ConsistencyPropagator;
  fanout: NotificationFanout;
  technicians: TechnicianDirectory;
  lifecycle: LifecycleService;
  sweeper: DeadlineSweeper;
  docs: DocsHierarchy;
  router: QueryRouter;
}

export const DEFAULT_SETTINGS: ServiceSettings = {
  healthProbeIntervalMs: 5000,
  propagationWorkers: 1,
  propagationBaseBackoffMs: 500,
  propagationMaxBackoffMs: 30_000,
  sweepIntervalMs: 60_000,
  offerValidityDays: 30,
  installationGraceDays: 3,
  staleOfferDays: 5,
  optionsCacheTtlSeconds: 43_200,
};

/** Wires every service over one set of stores. Nothing is started here. */
export function createServices(
  stores: Stores,
  settings: ServiceSettings = DEFAULT_SETTINGS,
  clock: { now?: () => Date } = {}
): Services {
  const now = clock.now ?? (() => new Date());
  const monitor = new HealthMonitor(stores, { intervalMs: settings.healthProbeIntervalMs, now });
  const propagator = new ConsistencyPropagator(stores.relational, stores.search, monitor, {
    workers: settings.propagationWorkers,
    baseBackoffMs: settings.propagationBaseBackoffMs,
    maxBackoffMs: settings.propagationMaxBackoffMs,
    now: () => now().getTime(),
  });
  const fanout = new NotificationFanout(stores.relational);
  const technicians = new TechnicianDirectory(stores.relational, monitor);
  const lifecycle = new LifecycleService(
    { relational: stores.relational, propagator, fanout, monitor, technicians },
    {
      offerValidityDays: settings.offerValidityDays,
      installationGraceDays: settings.installationGraceDays,
      staleOfferDays: settings.staleOfferDays,
      now,
    }
  );
  const sweeper = new DeadlineSweeper(stores.relational, lifecycle, fanout, monitor, {
    intervalMs: settings.sweepIntervalMs,
    now,
  });
  const docs = new DocsHierarchy(stores.relational, propagator, monitor);
  const router = new QueryRouter(stores, monitor, { optionsCacheTtlSeconds: settings.optionsCacheTtlSeconds, now });

  return { stores, monitor, propagator, fanout, technicians, lifecycle, sweeper, docs, router };
}
