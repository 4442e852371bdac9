/**
 * School API Server
 *
 * Starts one profile (default, reader or writer) of the School API.
 */

import { closeDatabasePools, createLogger } from '@schoolreg/core';
import { runMigrations } from '@schoolreg/infrastructure';

import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { createSchoolService } from './services.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    name: `school-api-${config.serviceType}`,
    level: config.logger.level,
  });

  const wiring = createSchoolService(config, { logger });
  logger.info({ serviceType: config.serviceType, backend: wiring.backend }, 'School service wired');

  // Readers never touch the schema
  if (config.serviceType !== 'reader' && config.database.runMigrations && wiring.primaryPool) {
    const report = await runMigrations(wiring.primaryPool, {
      logger: logger.child({ component: 'migrations' }),
    });
    logger.info({ applied: report.applied, skipped: report.skipped.length }, 'Migrations complete');
  }

  const app = await buildApp({
    config,
    service: wiring.service,
    healthPool: wiring.healthPool,
  });

  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => closeDatabasePools(wiring.pools))
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info({ address, env: config.env, serviceType: config.serviceType }, 'School API started');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await closeDatabasePools(wiring.pools);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  const logger = createLogger({ name: 'school-api' });
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
