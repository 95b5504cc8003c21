/**
 * planrunner - main entry point
 *
 * Starts the HTTP server, the periodic job retention sweep and graceful shutdown.
 */

import { getConfig, getLogger } from './utils/index.js';
import { sweepExpiredJobs } from './services/index.js';
import { createApp, createAppContext } from './app.js';

const SHUTDOWN_TIMEOUT_MS = 30_000;

function startServer(): void {
  const logger = getLogger();
  const config = getConfig();
  const ctx = createAppContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      {
        port: config.port,
        host: config.host,
        env: config.nodeEnv,
        llm: { provider: config.llm.provider, model: config.llm.model },
        maxConcurrent: config.jobs.maxConcurrent,
      },
      'planrunner started'
    );
  });

  const cleanupTimer = setInterval(() => {
    sweepExpiredJobs(ctx.jobStore, ctx.artifactStore, config.jobs.retentionHours)
      .then((removed) => {
        if (removed.length > 0) {
          logger.info({ removed: removed.length }, 'Expired jobs removed');
        }
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Retention sweep failed');
      });
  }, config.jobs.cleanupIntervalMinutes * 60_000);
  cleanupTimer.unref();

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');
    clearInterval(cleanupTimer);

    // Force exit after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    ctx.jobRunner
      .shutdown(true)
      .then(() => {
        server.close(() => {
          logger.info('HTTP server closed');
          process.exit(0);
        });
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Job runner shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

startServer();
