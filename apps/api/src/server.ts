import Fastify, { type FastifyInstance } from 'fastify';
import type Database from 'better-sqlite3';
import type { LedgerConfig } from '@alert-ledger/config';
import { initDb, loggerOptions, SqliteAlertStore, createReconciler } from '@alert-ledger/ledger-core';
import { createMetrics, type LedgerMetrics } from '@alert-ledger/metrics';
import { getConfig } from './lib/config.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';
import { webhookRoutes } from './routes/webhooks.js';
import { alertRoutes } from './routes/alerts.js';

export interface BuildServerOptions {
  /** Configuration (default: loaded from the environment) */
  config?: LedgerConfig;

  /** Already-open database; the caller keeps ownership */
  db?: Database.Database;

  /** Metrics registry (default: a fresh one per server) */
  metrics?: LedgerMetrics;
}

/**
 * Build and configure the Fastify server
 */
export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();

  const server = Fastify({
    logger: loggerOptions(config.logging.level, config.logging.format),
    bodyLimit: config.api.bodyLimitBytes,
  });

  const ownsDb = options.db === undefined;
  const db = options.db ?? initDb(config.storage.dbPath, { busyTimeoutMs: config.storage.busyTimeoutMs });
  const store = new SqliteAlertStore(db);
  const metrics =
    options.metrics ??
    createMetrics({ prefix: config.metrics.prefix, collectDefaults: config.metrics.collectDefaults });
  const reconciler = createReconciler({ store, reporter: metrics, logger: server.log });

  // Register routes
  await server.register(healthRoutes, { db });
  await server.register(metricsRoutes, { metrics });
  await server.register(webhookRoutes, { reconciler });
  await server.register(alertRoutes, { store });

  server.addHook('onClose', async () => {
    if (ownsDb && db.open) db.close();
  });

  return server;
}

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = getConfig();
  const server = await buildServer({ config });

  try {
    await server.listen({
      port: config.api.port,
      host: config.api.host,
    });

    server.log.info(
      {
        port: config.api.port,
        host: config.api.host,
        dbPath: config.storage.dbPath,
      },
      'Alert ledger API started'
    );
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  const shutdown = (signal: string): void => {
    server.log.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// Run if this is the main module
const isMain = process.argv[1]?.endsWith('server.js') || process.argv[1]?.endsWith('server.ts');
if (isMain) {
  start().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
