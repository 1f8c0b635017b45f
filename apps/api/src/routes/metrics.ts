import type { FastifyInstance } from 'fastify';
import type { LedgerMetrics } from '@alert-ledger/metrics';

/**
 * Prometheus metrics endpoint
 */
export async function metricsRoutes(fastify: FastifyInstance, opts: { metrics: LedgerMetrics }): Promise<void> {
  const { metrics } = opts;

  /**
   * GET /metrics - Prometheus metrics endpoint
   */
  fastify.get('/metrics', async (_request, reply) => {
    const metricsOutput = await metrics.getMetrics();
    return reply
      .header('Content-Type', metrics.getContentType())
      .send(metricsOutput);
  });
}
