import dotenv from 'dotenv';
import { closePool } from '@webstock/shared/src/db/client';
import { closeConnection } from '@webstock/shared/src/messaging/client';
import { logger } from '@webstock/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

dotenv.config();

async function main() {
     const dispatcher = new EventDispatcher();

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await closeConnection();
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

     await dispatcher.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
