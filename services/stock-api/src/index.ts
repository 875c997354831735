import * as dotenv from 'dotenv';
import { closePool } from '@webstock/shared/src/db/client';
import { logger } from '@webstock/shared/src/utils/logger';
import { buildApp } from './app';

dotenv.config();

const PORT = parseInt(process.env.STOCK_API_PORT || '3000', 10);
const HOST = process.env.STOCK_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildApp();

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Stock API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closePool();
          process.exit(0);
     };

     const onSignal = () => {
          shutdown().catch((err) => {
               logger.error({ err }, 'Error during shutdown');
               process.exit(1);
          });
     };

     process.on('SIGINT', onSignal);
     process.on('SIGTERM', onSignal);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in stock API');
     process.exit(1);
});
