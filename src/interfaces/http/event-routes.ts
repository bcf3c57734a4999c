import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { visitSchema, buySchema, recordVisit, recordBuy } from '../../application/index.js';
import type { RequestOrigin } from '../../application/index.js';
import { extractClientIp, extractGenerationTime } from './request-origin.js';

function originOf(request: FastifyRequest): RequestOrigin {
  return {
    ip_address: extractClientIp(request.headers, request.ip),
    generated_at: extractGenerationTime(request.headers),
  };
}

/**
 * Registers the event ingestion routes.
 *
 * POST /api/v1/visits — log a page visit
 * POST /api/v1/buys   — log a product purchase
 *
 * Both validate the body, enrich it with the client address and
 * generation time, append to the ledger and answer with the updated
 * running total. The append is awaited: a failed append never
 * produces a success response.
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/visits',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = visitSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const total = await recordVisit(fastify.ledger, parsed.data, originOf(request));

      request.log.debug({ user_id: parsed.data.user_id, total }, 'Visit recorded');

      return reply.status(201).send({
        success: true,
        event_count: total,
        message: `Visit logged successfully. Total events: ${total}`,
      });
    },
  );

  fastify.post(
    '/api/v1/buys',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = buySchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const total = await recordBuy(fastify.ledger, parsed.data, originOf(request));

      request.log.debug(
        { user_id: parsed.data.user_id, product_id: parsed.data.product_id, total },
        'Buy recorded',
      );

      return reply.status(201).send({
        success: true,
        buy_count: total,
        message: `Buy logged successfully. Total buys: ${total}`,
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['ledger'],
  fastify: '5.x',
});
