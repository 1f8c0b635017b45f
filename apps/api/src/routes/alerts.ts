import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { toAlertView, type AlertStore } from '@alert-ledger/ledger-core';

const listQuerySchema = z.object({
  status: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

/**
 * Read-only access to the stored alert state
 */
export async function alertRoutes(fastify: FastifyInstance, opts: { store: AlertStore }): Promise<void> {
  const { store } = opts;

  /**
   * GET /api/v1/alerts
   * Lists stored alerts, newest first, optionally filtered by status.
   */
  fastify.get('/api/v1/alerts', async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      const issues = query.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      return reply.status(400).send({ error: `invalid query: ${issues}` });
    }

    const { status, limit, offset } = query.data;
    const [records, total] = await Promise.all([
      store.list({ status, limit, offset }),
      store.count({ status }),
    ]);

    return reply.send({ alerts: records.map(toAlertView), total, limit, offset });
  });

  /**
   * GET /api/v1/alerts/:fingerprint
   * Returns the stored state of one alert.
   */
  fastify.get<{ Params: { fingerprint: string } }>(
    '/api/v1/alerts/:fingerprint',
    async (request, reply) => {
      const record = await store.findByFingerprint(request.params.fingerprint);
      if (!record) {
        return reply.status(404).send({ error: 'alert not found' });
      }
      return reply.send(toAlertView(record));
    },
  );
}
