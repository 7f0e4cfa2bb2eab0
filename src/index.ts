import { env } from './config/index.js';
import { supabase, elastic, redis } from './db/index.js';
import { SupabaseRelationalStore, ElasticSearchStore, RedisCacheStore } from './stores/index.js';
import { createServices } from './services.js';
import { buildApp } from './app.js';
import { logger } from './utils/logger.js';

async function main() {
  const search = new ElasticSearchStore(elastic, { index: env.SEARCH_INDEX, timeoutMs: env.BACKEND_TIMEOUT_MS });
  const stores = {
    relational: new SupabaseRelationalStore(supabase, { timeoutMs: env.BACKEND_TIMEOUT_MS }),
    search,
    cache: new RedisCacheStore(redis, { timeoutMs: env.BACKEND_TIMEOUT_MS }),
  };

  const services = createServices(stores, {
    healthProbeIntervalMs: env.HEALTH_PROBE_INTERVAL_MS,
    propagationWorkers: env.PROPAGATION_WORKERS,
    propagationBaseBackoffMs: env.PROPAGATION_BASE_BACKOFF_MS,
    propagationMaxBackoffMs: env.PROPAGATION_MAX_BACKOFF_MS,
    sweepIntervalMs: env.SWEEP_INTERVAL_MS,
    offerValidityDays: env.OFFER_VALIDITY_DAYS,
    installationGraceDays: env.INSTALLATION_GRACE_DAYS,
    staleOfferDays: env.STALE_OFFER_DAYS,
    optionsCacheTtlSeconds: env.OPTIONS_CACHE_TTL_SECONDS,
  });

  // The index may be down at boot; search then runs on the fallback path
  try {
    await search.ensureIndex();
  } catch (err) {
    logger.warn({ err }, 'Could not ensure search index, continuing without it');
  }

  const snapshot = await services.monitor.refresh();
  logger.info(snapshot, 'Initial backend health');

  services.monitor.start();
  services.propagator.start();
  services.sweeper.start();

  const fastify = await buildApp(services, {
    logger: { level: env.LOG_LEVEL },
    corsOrigins: env.CORS_ORIGINS,
  });

  // Start HTTP server
  try {
    await fastify.listen({ port: env.PORT, host: '0.0.0.0' });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    services.sweeper.stop();
    services.monitor.stop();
    await fastify.close();
    await services.propagator.stop();
    redis.disconnect();
    await elastic.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
