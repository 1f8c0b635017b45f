import { loadConfig, type LedgerConfig } from '@alert-ledger/config';

/**
 * Load API configuration
 *
 * Uses environment variables with defaults for development
 */
export function loadApiConfig(): LedgerConfig {
  return loadConfig(process.env);
}

/**
 * Singleton config instance
 */
let configInstance: LedgerConfig | null = null;

/**
 * Get the singleton config instance
 */
export function getConfig(): LedgerConfig {
  if (!configInstance) {
    configInstance = loadApiConfig();
  }
  return configInstance;
}
