#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { loadConfig, type LedgerConfig } from '@alert-ledger/config';
import {
  createLogger,
  createReconciler,
  httpStatusFor,
  initDb,
  SqliteAlertStore,
  toAlertView,
} from '@alert-ledger/ledger-core';
import { ALERT_TABLE_HEADER, formatAlertRow, formatCounts, formatFailures, ingestFile } from './commands.js';

const program = new Command();

program
  .name('alert-ledger')
  .description('CLI utilities for the alert ledger')
  .version('0.1.0');

function openStore(config: LedgerConfig, dbPath?: string) {
  const db = initDb(dbPath ?? config.storage.dbPath, { busyTimeoutMs: config.storage.busyTimeoutMs });
  return { db, store: new SqliteAlertStore(db) };
}

function fail(title: string, err: unknown): never {
  console.log(pc.red(title));
  console.log(pc.red(`  ${err instanceof Error ? err.message : 'Unknown error'}`));
  process.exit(1);
}

/**
 * Create the database and apply migrations
 */
program
  .command('init-db')
  .description('Create the alert database and apply migrations')
  .option('--db <path>', 'Database path (default: ALERT_LEDGER_DB_PATH)')
  .action((options: { db?: string }) => {
    try {
      const config = loadConfig();
      const path = options.db ?? config.storage.dbPath;
      const { db } = openStore(config, path);
      db.close();
      console.log(pc.green(`Database ready at ${path}`));
    } catch (err) {
      fail('Database Error:', err);
    }
  });

/**
 * Reconcile alerts from a JSON file, as if posted to the webhook
 */
program
  .command('ingest <file>')
  .description('Reconcile alerts from an Alertmanager notification file')
  .option('--db <path>', 'Database path (default: ALERT_LEDGER_DB_PATH)')
  .action(async (file: string, options: { db?: string }) => {
    try {
      const config = loadConfig();
      const logger = createLogger(config.logging.level, config.logging.format);
      const { db, store } = openStore(config, options.db);
      const reconciler = createReconciler({ store, logger });

      const result = await ingestFile(file, reconciler).finally(() => db.close());

      console.log(pc.bold(`\n${formatCounts(result.counts)}\n`));
      for (const line of formatFailures(result)) {
        console.log(pc.red(`  ${line}`));
      }

      process.exit(httpStatusFor(result) === 200 ? 0 : 1);
    } catch (err) {
      fail('Ingest Error:', err);
    }
  });

/**
 * List stored alerts
 */
program
  .command('list')
  .description('List stored alerts, newest first')
  .option('-s, --status <status>', 'Only alerts with this status')
  .option('-l, --limit <number>', 'Maximum number of alerts', '20')
  .option('--db <path>', 'Database path (default: ALERT_LEDGER_DB_PATH)')
  .action(async (options: { status?: string; limit: string; db?: string }) => {
    try {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`--limit must be a positive integer, got ${options.limit}`);
      }

      const config = loadConfig();
      const { db, store } = openStore(config, options.db);
      const [records, total] = await Promise.all([
        store.list({ status: options.status, limit }),
        store.count({ status: options.status }),
      ]).finally(() => db.close());

      if (records.length === 0) {
        console.log(pc.yellow('No alerts stored.'));
        return;
      }

      console.log(pc.gray(ALERT_TABLE_HEADER));
      for (const record of records) {
        const line = formatAlertRow(toAlertView(record));
        console.log(record.status === 'firing' ? pc.red(line) : line);
      }
      console.log(pc.gray(`\n${records.length} of ${total} alert(s)`));
    } catch (err) {
      fail('List Error:', err);
    }
  });

/**
 * Show one stored alert
 */
program
  .command('show <fingerprint>')
  .description('Show the stored state of one alert')
  .option('--db <path>', 'Database path (default: ALERT_LEDGER_DB_PATH)')
  .action(async (fingerprint: string, options: { db?: string }) => {
    try {
      const config = loadConfig();
      const { db, store } = openStore(config, options.db);
      const record = await store.findByFingerprint(fingerprint).finally(() => db.close());

      if (!record) {
        console.log(pc.yellow(`No alert with fingerprint ${fingerprint}`));
        process.exit(1);
      }

      console.log(JSON.stringify(toAlertView(record), null, 2));
    } catch (err) {
      fail('Show Error:', err);
    }
  });

/**
 * Check config command - validates environment configuration
 */
program
  .command('check-config')
  .description('Validate environment configuration')
  .action(() => {
    console.log(pc.bold('\nConfiguration Validation\n'));

    try {
      const config = loadConfig();

      const items = [
        { key: 'API_HOST', value: config.api.host },
        { key: 'API_PORT', value: config.api.port.toString() },
        { key: 'WEBHOOK_BODY_LIMIT_BYTES', value: config.api.bodyLimitBytes.toString() },
        { key: 'ALERT_LEDGER_DB_PATH', value: config.storage.dbPath },
        { key: 'ALERT_LEDGER_BUSY_TIMEOUT_MS', value: config.storage.busyTimeoutMs.toString() },
        { key: 'METRICS_PREFIX', value: config.metrics.prefix },
        { key: 'METRICS_DEFAULT_ENABLED', value: config.metrics.collectDefaults.toString() },
        { key: 'LOG_LEVEL', value: config.logging.level },
        { key: 'LOG_FORMAT', value: config.logging.format },
      ];

      for (const item of items) {
        console.log(`  ${pc.cyan(item.key)}: ${item.value}`);
      }

      console.log('');
      console.log(pc.green(pc.bold('Configuration is valid!')));
      process.exit(0);
    } catch (err) {
      fail('Configuration Error:', err);
    }
  });

program.parseAsync().catch((err: unknown) => fail('Error:', err));
