import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type Database from 'better-sqlite3';
import { pingDb } from '@alert-ledger/ledger-core';

export const VERSION = '0.1.0';

/**
 * Health check response
 */
interface HealthResponse {
  status: 'ok' | 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  error?: string;
}

/**
 * Register health check routes
 */
export async function healthRoutes(fastify: FastifyInstance, opts: { db: Database.Database }): Promise<void> {
  const { db } = opts;
  const startTime = Date.now();

  const base = () => ({
    timestamp: new Date().toISOString(),
    version: VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
  });

  /**
   * GET /health
   *
   * Liveness probe - returns 200 if the process is serving requests
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = { status: 'ok', ...base() };
    return reply.send(response);
  });

  /**
   * GET /healthz
   *
   * Readiness probe - 200 only while the alert database answers queries
   */
  fastify.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!pingDb(db)) {
      const response: HealthResponse = { status: 'unhealthy', error: 'database unreachable', ...base() };
      return reply.status(500).send(response);
    }

    const response: HealthResponse = { status: 'healthy', ...base() };
    return reply.send(response);
  });
}
