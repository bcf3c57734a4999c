import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventLedger } from '../domain/index.js';
import { WindowQueryEngine } from '../application/window-query.js';

export interface LedgerPluginOptions {
  ledger: EventLedger;
}

/**
 * Fastify plugin that owns the injected ledger for the server's lifetime.
 *
 * - Decorates `fastify.ledger` and `fastify.windowQuery` for routes.
 * - Closes the ledger's backing connection on server close.
 *
 * The ledger is constructed by the caller and passed in; the plugin
 * never creates one itself.
 */
async function ledgerPlugin(
  fastify: FastifyInstance,
  opts: LedgerPluginOptions,
): Promise<void> {
  const { ledger } = opts;

  fastify.decorate('ledger', ledger);
  fastify.decorate('windowQuery', new WindowQueryEngine(ledger));

  fastify.addHook('onClose', async () => {
    await ledger.close();
    fastify.log.info('Ledger closed');
  });
}

export default fp(ledgerPlugin, {
  name: 'ledger',
  fastify: '5.x',
});

/** Extend Fastify's type system so the ledger is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    ledger: EventLedger;
    windowQuery: WindowQueryEngine;
  }
}
