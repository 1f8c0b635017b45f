import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  AlertmanagerWebhookSchema,
  httpStatusFor,
  type BatchCounts,
  type EventOutcome,
  type Reconciler,
} from '@alert-ledger/ledger-core';

/**
 * Webhook response
 */
interface WebhookResponse {
  status: 'alerts processed' | 'partial failure';
  counts: BatchCounts;
  outcomes: EventOutcome[];
}

/**
 * Register Alertmanager webhook intake
 */
export async function webhookRoutes(fastify: FastifyInstance, opts: { reconciler: Reconciler }): Promise<void> {
  const { reconciler } = opts;

  /**
   * POST /api/v1/webhooks/alertmanager
   *
   * Reconcile every alert of an Alertmanager notification. Answers 200 when
   * all alerts were applied, 400 when some were invalid, and 500 when the
   * store failed for any of them; the body always carries per-alert detail.
   */
  fastify.post(
    '/api/v1/webhooks/alertmanager',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = AlertmanagerWebhookSchema.safeParse(request.body);
      if (!parsed.success) {
        const issues = parsed.error.errors
          .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
          .join('; ');
        return reply.status(400).send({ error: `invalid webhook payload: ${issues}` });
      }

      const result = await reconciler.processBatch(parsed.data.alerts);
      const statusCode = httpStatusFor(result);

      request.log.info(
        { receiver: parsed.data.receiver, groupKey: parsed.data.groupKey, counts: result.counts },
        'Alertmanager webhook processed',
      );

      const response: WebhookResponse = {
        status: statusCode === 200 ? 'alerts processed' : 'partial failure',
        counts: result.counts,
        outcomes: result.outcomes,
      };

      return reply.status(statusCode).send(response);
    },
  );
}
