import Fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyServerOptions } from 'fastify';
import type { EventLedger } from './domain/index.js';
import { InvalidQuantityError, InvalidRecordError } from './domain/index.js';
import { DEFAULT_WINDOW_BOUNDS } from './application/index.js';
import type { WindowBounds } from './application/index.js';
import { ledgerPlugin } from './infrastructure/index.js';
import { eventRoutes, statsRoutes } from './interfaces/http/index.js';

export const SERVICE_NAME = 'Traffic Ledger API';
export const SERVICE_VERSION = '0.1.0';

const ENDPOINTS = {
  'POST /api/v1/visits': 'Log a page visit',
  'POST /api/v1/buys': 'Log a product purchase',
  'GET /api/v1/stats': 'Get server statistics',
  'GET /api/v1/health': 'Health check',
} as const;

const AVAILABLE_PATHS = ['/', '/api/v1/visits', '/api/v1/buys', '/api/v1/stats', '/api/v1/health'];

export interface BuildAppOptions {
  /** Ledger owned by the app from now on; closed with it. */
  readonly ledger: EventLedger;
  readonly logger?: FastifyServerOptions['logger'];
  /** Reference point for uptime. Default: now. */
  readonly startedAt?: Date;
  readonly windowBounds?: WindowBounds;
}

/**
 * Creates the Fastify app with plugins and routes registered.
 *
 * Kept apart from the entry point so tests can build an app around
 * a fresh ledger and drive it with `inject()` without listening.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  // --------------------------------------------------
  // Errors
  // --------------------------------------------------

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof InvalidQuantityError || error instanceof InvalidRecordError) {
      return reply.status(400).send({ error: error.code, message: error.message });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, 'Request failed');
      return reply.status(status).send({ error: 'Internal Server Error', message: error.message });
    }

    return reply.status(status).send({ error: error.name, message: error.message });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'Not Found',
      message: `The requested path '${request.url.split('?')[0] ?? ''}' was not found`,
      available_endpoints: AVAILABLE_PATHS,
    });
  });

  // --------------------------------------------------
  // Ledger
  // --------------------------------------------------

  await fastify.register(ledgerPlugin, { ledger: options.ledger });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  fastify.get('/', async () => ({
    message: SERVICE_NAME,
    version: SERVICE_VERSION,
    endpoints: ENDPOINTS,
  }));

  await fastify.register(eventRoutes);
  await fastify.register(statsRoutes, {
    startedAt: options.startedAt ?? new Date(),
    bounds: options.windowBounds ?? DEFAULT_WINDOW_BOUNDS,
  });

  return fastify;
}
