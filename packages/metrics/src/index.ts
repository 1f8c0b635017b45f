import { Counter, Registry, collectDefaultMetrics } from 'prom-client';

/**
 * Options for building a metrics instance
 */
export interface MetricsOptions {
  /** Prefix for every counter name (default: `irm_`) */
  prefix?: string;

  /** Register default Node.js process metrics (default: true) */
  collectDefaults?: boolean;

  /** Registry to register into (default: a fresh registry) */
  registry?: Registry;
}

/**
 * Prometheus counters for Alertmanager webhook reconciliation.
 *
 * One instance is built at process start and handed to the reconciler as
 * its outcome reporter; the method names line up with that interface.
 */
export class LedgerMetrics {
  readonly registry: Registry;

  private readonly received: Counter;
  private readonly created: Counter;
  private readonly duplicates: Counter;
  private readonly updated: Counter;
  private readonly errors: Counter<'kind'>;

  constructor(options: MetricsOptions = {}) {
    const prefix = options.prefix ?? 'irm_';
    this.registry = options.registry ?? new Registry();

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.received = new Counter({
      name: `${prefix}webhooks_alertmanager_total`,
      help: 'Total number of received webhook alerts',
      registers: [this.registry],
    });
    this.created = new Counter({
      name: `${prefix}webhooks_alertmanager_new_total`,
      help: 'Total number of new unique alerts inserted into the database',
      registers: [this.registry],
    });
    this.duplicates = new Counter({
      name: `${prefix}webhooks_alertmanager_duplicate_total`,
      help: 'Total number of duplicate alerts (already stored with the same status)',
      registers: [this.registry],
    });
    this.updated = new Counter({
      name: `${prefix}webhooks_alertmanager_updated_total`,
      help: 'Total number of alerts whose status was updated',
      registers: [this.registry],
    });
    this.errors = new Counter({
      name: `${prefix}webhooks_alertmanager_errors_total`,
      help: 'Total number of alerts that could not be reconciled, by error kind',
      labelNames: ['kind'] as const,
      registers: [this.registry],
    });
  }

  incrementReceived(count: number): void {
    if (count > 0) {
      this.received.inc(count);
    }
  }

  incrementNew(): void {
    this.created.inc();
  }

  incrementDuplicate(): void {
    this.duplicates.inc();
  }

  incrementUpdated(): void {
    this.updated.inc();
  }

  incrementError(kind: string): void {
    this.errors.inc({ kind });
  }

  /**
   * Prometheus exposition text for everything in the registry
   */
  getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Reset all counters (for testing)
   */
  reset(): void {
    this.registry.resetMetrics();
  }
}

/**
 * Create a metrics instance
 */
export function createMetrics(options: MetricsOptions = {}): LedgerMetrics {
  return new LedgerMetrics(options);
}
