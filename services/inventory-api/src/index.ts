import * as dotenv from 'dotenv';

// Load environment variables before anything reads them
dotenv.config();

import { closePool } from '@stockflow/shared/src/db/client';
import { createStockEngineFromEnv } from '@stockflow/shared/src/engine';
import { closeConnection } from '@stockflow/shared/src/messaging/client';
import { logger } from '@stockflow/shared/src/utils/logger';
import { buildApp } from './app';

const PORT = parseInt(process.env.INVENTORY_API_PORT || '3000', 10);
const HOST = process.env.INVENTORY_API_HOST || '0.0.0.0';

async function main() {
     const engine = createStockEngineFromEnv();
     const app = await buildApp(engine);

     // Start server
     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Inventory API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     const onSignal = () => {
          shutdown().catch((err) => {
               logger.error({ err }, 'Shutdown failed');
               process.exit(1);
          });
     };

     process.on('SIGINT', onSignal);
     process.on('SIGTERM', onSignal);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
