import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { createStatsQuerySchema, getStats, uptimeSeconds } from '../../application/index.js';
import type { WindowBounds } from '../../application/index.js';

export interface StatsRoutesOptions {
  startedAt: Date;
  bounds: WindowBounds;
}

/**
 * Status and statistics routes.
 *
 * GET /api/v1/stats  — uptime, running total, events in the last N hours
 * GET /api/v1/health — liveness check
 */
async function statsRoutes(
  fastify: FastifyInstance,
  opts: StatsRoutesOptions,
): Promise<void> {
  const statsQuerySchema = createStatsQuerySchema(opts.bounds);

  fastify.get(
    '/api/v1/stats',
    async (
      request: FastifyRequest<{ Querystring: { timeframe_hours?: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = statsQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const result = await getStats(fastify.windowQuery, {
          timeframe_hours: parsed.data.timeframe_hours,
          startedAt: opts.startedAt,
        });
        return reply.status(200).send(result);
      } catch (err: unknown) {
        request.log.error({ err }, 'Failed to retrieve statistics');
        const reason = err instanceof Error ? err.message : String(err);
        return reply.status(500).send({
          error: 'Internal Server Error',
          message: `Failed to retrieve statistics: ${reason}`,
        });
      }
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const now = new Date();
      return reply.status(200).send({
        status: 'healthy',
        timestamp: now.toISOString(),
        uptime_seconds: uptimeSeconds(opts.startedAt, now),
      });
    },
  );
}

export default fp(statsRoutes, {
  name: 'stats-routes',
  dependencies: ['ledger'],
  fastify: '5.x',
});
