import dotenv from 'dotenv';
import { closePool } from '@webstock/shared/src/db/client';
import { logger } from '@webstock/shared/src/utils/logger';
import { ReservationSweeper } from './sweeper';

dotenv.config();

function main() {
     const sweeper = new ReservationSweeper();

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await sweeper.stop();
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

     sweeper.start();
}

try {
     main();
} catch (err) {
     logger.fatal({ err }, 'Fatal error in reservation sweeper');
     process.exit(1);
}
