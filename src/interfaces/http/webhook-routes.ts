import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { webhookPayloadSchema, normalizeEvent, handleWebhook } from '../../application/index.js';
import { ChatDeliveryError } from '../../domain/index.js';

/**
 * Registers the webhook routes.
 *
 * POST /webhook  CI event ingestion, forwarded to chat
 * GET  /health   liveness check
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates → normalizes → renders/routes → delivers.
   *
   * 400 on an invalid body, 200 "Filtered" for dropped events,
   * 200 "OK" once delivered, 500 when the chat server refuses.
   */
  fastify.post(
    '/webhook',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = webhookPayloadSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      request.log.debug({ event: parsed.data.event }, 'Received webhook');

      try {
        const outcome = await handleWebhook(normalizeEvent(parsed.data), {
          defaultChannel: fastify.defaultChannel,
          deliver: (message) => fastify.chat.sendMessage(message),
          log: request.log,
        });

        return reply.status(200).send({
          message: outcome.status === 'filtered' ? 'Filtered' : 'OK',
        });
      } catch (err: unknown) {
        if (err instanceof ChatDeliveryError) {
          request.log.error(
            { err, status: err.status, body: err.responseBody, event: parsed.data.event },
            'Failed to send message to chat server',
          );
          return reply.status(500).send({ error: 'Delivery failed' });
        }
        throw err;
      }
    },
  );

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['chat'],
  fastify: '5.x',
});
