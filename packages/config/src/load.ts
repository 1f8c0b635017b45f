import { type LedgerConfig, ledgerConfigSchema } from './schema.js';

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns Validated alert ledger configuration
 * @throws Error if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const rawConfig = {
    api: {
      port: env.API_PORT,
      host: env.API_HOST,
      bodyLimitBytes: env.WEBHOOK_BODY_LIMIT_BYTES,
    },
    storage: {
      dbPath: env.ALERT_LEDGER_DB_PATH,
      busyTimeoutMs: env.ALERT_LEDGER_BUSY_TIMEOUT_MS,
    },
    metrics: {
      prefix: env.METRICS_PREFIX,
      collectDefaults: env.METRICS_DEFAULT_ENABLED,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    nodeEnv: env.NODE_ENV,
  };

  const result = ledgerConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

