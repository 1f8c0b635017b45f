import { z } from 'zod';

/**
 * Boolean read from an environment variable.
 *
 * Accepts real booleans plus the strings `true`, `false`, `1` and `0`;
 * anything else is rejected rather than coerced.
 */
export const envBooleanSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * API server configuration
 */
export const apiConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  host: z.string().min(1).default('0.0.0.0'),

  /** Largest accepted webhook body in bytes (default: 1 MiB) */
  bodyLimitBytes: z.coerce.number().int().min(1024).default(1024 * 1024),
});
export type ApiConfig = z.infer<typeof apiConfigSchema>;

/**
 * Alert store configuration
 */
export const storageConfigSchema = z.object({
  /** SQLite database file (parent directory is created on open) */
  dbPath: z.string().min(1).default('./data/alert-ledger.db'),

  /** How long a writer waits on a locked database, in milliseconds */
  busyTimeoutMs: z.coerce.number().int().min(0).max(60000).default(5000),
});
export type StorageConfig = z.infer<typeof storageConfigSchema>;

/**
 * Prometheus metrics configuration
 */
export const metricsConfigSchema = z.object({
  /** Prefix prepended to every counter name */
  prefix: z
    .string()
    .regex(/^([a-zA-Z_:][a-zA-Z0-9_:]*)?$/, 'METRICS_PREFIX must be a valid Prometheus name prefix')
    .default('irm_'),

  /** Also expose the default Node.js process metrics */
  collectDefaults: envBooleanSchema.default(true),
});
export type MetricsConfig = z.infer<typeof metricsConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Complete alert ledger configuration
 */
export const ledgerConfigSchema = z.object({
  api: apiConfigSchema,
  storage: storageConfigSchema,
  metrics: metricsConfigSchema,
  logging: loggingConfigSchema,
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});
export type LedgerConfig = z.infer<typeof ledgerConfigSchema>;
