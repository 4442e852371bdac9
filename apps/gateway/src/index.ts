/**
 * School API Gateway entry point
 */

import { createLogger } from '@schoolreg/core';

import { buildGateway } from './app.js';
import { loadGatewayConfig } from './config.js';
import { FetchForwarder } from './forwarder.js';

async function main(): Promise<void> {
  const config = loadGatewayConfig();
  const logger = createLogger({ name: 'school-gateway', level: config.logger.level });

  const app = await buildGateway({ config, forwarder: new FetchForwarder(config.timeoutMs) });

  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) return;
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => {
          logger.info('Gateway closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  const address = await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(
    { address, routes: config.routes.length, pools: config.pools, timeoutMs: config.timeoutMs },
    'Gateway started'
  );
}

main().catch((error: unknown) => {
  const logger = createLogger({ name: 'school-gateway' });
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
