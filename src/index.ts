import cluster from 'node:cluster';
import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig, windowBounds } from './config.js';
import type { AppConfig } from './config.js';
import { createLedger } from './infrastructure/index.js';
import { buildApp } from './app.js';

/**
 * Bootstrap.
 *
 * WORKERS=1: this process builds the ledger and serves HTTP.
 * WORKERS>1: this process becomes the cluster primary and forks the
 * workers; every worker connects to the same Redis ledger (enforced
 * by config validation), which is the single owner of ledger state.
 */
const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL });

async function startServer(cfg: AppConfig, logger: Logger): Promise<void> {
  const ledger = await createLedger(cfg, logger);

  const fastify = await buildApp({
    ledger,
    logger: { level: cfg.LOG_LEVEL },
    windowBounds: windowBounds(cfg),
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    fastify.log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({ host: cfg.HOST, port: cfg.PORT });
}

function startPrimary(cfg: AppConfig, logger: Logger): void {
  let stopping = false;

  logger.info(
    { workers: cfg.WORKERS, backend: cfg.LEDGER_BACKEND, port: cfg.PORT },
    'Starting worker pool',
  );

  for (let i = 0; i < cfg.WORKERS; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    if (stopping) return;
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker exited, forking a replacement');
    cluster.fork();
  });

  const stop = (signal: NodeJS.Signals): void => {
    stopping = true;
    logger.info({ signal }, 'Stopping worker pool...');
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.kill('SIGTERM');
    }
  };

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

if (config.WORKERS > 1 && cluster.isPrimary) {
  startPrimary(config, log);
} else {
  startServer(config, log).catch((err: unknown) => {
    log.fatal({ err }, 'Fatal: failed to start server');
    process.exit(1);
  });
}
