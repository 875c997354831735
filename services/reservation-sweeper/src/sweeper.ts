import { PoolClient } from 'pg';
import { withTransaction } from '@webstock/shared/src/db/client';
import { ReservationManager } from '@webstock/shared/src/services/reservation-manager';
import type { Reservation } from '@webstock/shared/src/types/stock.types';
import { positiveIntSetting } from '@webstock/shared/src/utils/config';
import { logger } from '@webstock/shared/src/utils/logger';

export interface ReservationSweeperOptions {
     manager?: ReservationManager;
     intervalMs?: number;
     batchSize?: number;
     now?: () => Date;
     transaction?: <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;
}

/**
 * Periodically expires reservations whose TTL has elapsed. A run that hits
 * the batch limit is followed by another run straight away.
 */
export class ReservationSweeper {
     private timer: NodeJS.Timeout | null = null;
     private inFlight: Promise<number> | null = null;
     private readonly manager: ReservationManager;
     private readonly intervalMs: number;
     private readonly batchSize: number;
     private readonly now: () => Date;
     private readonly transaction: <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;

     constructor(options: ReservationSweeperOptions = {}) {
          this.manager = options.manager ?? new ReservationManager();
          this.intervalMs = positiveIntSetting('SWEEP_INTERVAL_MS', options.intervalMs, 60000);
          this.batchSize = positiveIntSetting('SWEEP_BATCH_SIZE', options.batchSize, 500);
          this.now = options.now ?? (() => new Date());
          this.transaction = options.transaction ?? withTransaction;
     }

     start(): void {
          if (this.timer) return;

          logger.info(
               { intervalMs: this.intervalMs, batchSize: this.batchSize },
               'Starting reservation sweeper'
          );

          this.timer = setInterval(() => this.tick(), this.intervalMs);
          this.tick();
     }

     async stop(): Promise<void> {
          logger.info('Stopping reservation sweeper');
          if (this.timer) {
               clearInterval(this.timer);
               this.timer = null;
          }
          if (this.inFlight) {
               await this.inFlight;
          }
     }

     /**
      * Sweep until a batch comes back short. Returns how many reservations expired.
      */
     async runOnce(): Promise<number> {
          const now = this.now();
          let total = 0;

          for (;;) {
               const expired: Reservation[] = await this.transaction((client) =>
                    this.manager.sweepExpired(client, now, this.batchSize)
               );
               total += expired.length;
               if (expired.length < this.batchSize) break;
          }

          logger.debug({ expired: total, now: now.toISOString() }, 'Sweep run finished');
          return total;
     }

     // Overlapping ticks are skipped
     private tick(): void {
          if (this.inFlight) return;

          this.inFlight = this.runOnce()
               .catch((error) => {
                    logger.error({ error }, 'Reservation sweep failed');
                    return 0;
               })
               .finally(() => {
                    this.inFlight = null;
               });
     }
}
