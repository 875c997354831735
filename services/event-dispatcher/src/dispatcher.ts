import { PoolClient } from 'pg';
import { withTransaction } from '@webstock/shared/src/db/client';
import {
     Channel,
     getChannel,
     routingKeyFor,
     STOCK_EVENTS_EXCHANGE,
} from '@webstock/shared/src/messaging/client';
import { positiveIntSetting } from '@webstock/shared/src/utils/config';
import { logger } from '@webstock/shared/src/utils/logger';

interface DomainEventRow {
     id: number;
     type: string;
     payload: unknown;
     created_at: Date;
}

export interface EventDispatcherOptions {
     batchSize?: number;
     pollIntervalMs?: number;
     channel?: () => Promise<Channel>;
}

export interface BatchResult {
     sent: number;
     failed: number;
}

export class EventDispatcher {
     private running = false;
     private readonly batchSize: number;
     private readonly pollIntervalMs: number;
     private readonly channel: () => Promise<Channel>;

     constructor(options: EventDispatcherOptions = {}) {
          this.batchSize = positiveIntSetting('EVENT_BATCH_SIZE', options.batchSize, 100);
          this.pollIntervalMs = positiveIntSetting(
               'EVENT_POLL_INTERVAL_MS',
               options.pollIntervalMs,
               200
          );
          this.channel = options.channel ?? getChannel;
     }

     async start(): Promise<void> {
          this.running = true;
          logger.info(
               { batchSize: this.batchSize, pollIntervalMs: this.pollIntervalMs },
               'Starting event dispatcher'
          );

          while (this.running) {
               try {
                    await this.runOnce();
               } catch (error) {
                    logger.error({ error }, 'Error processing event batch');
               }

               await this.sleep(this.pollIntervalMs);
          }
     }

     runOnce(): Promise<BatchResult> {
          return withTransaction((client) => this.processBatch(client));
     }

     /**
      * Publish one batch of pending outbox events. A publish failure marks that
      * event FAILED and the rest of the batch still goes out.
      */
     async processBatch(client: PoolClient): Promise<BatchResult> {
          const { rows: events } = await client.query<DomainEventRow>(
               `
      SELECT id, type, payload, created_at
      FROM domain_event
      WHERE status = 'PENDING'
      ORDER BY created_at
      LIMIT $1
      FOR UPDATE SKIP LOCKED
    `,
               [this.batchSize]
          );

          const result: BatchResult = { sent: 0, failed: 0 };

          if (events.length === 0) {
               return result;
          }

          logger.debug({ eventCount: events.length }, 'Processing event batch');

          const channel = await this.channel();

          for (const event of events) {
               try {
                    const published = channel.publish(
                         STOCK_EVENTS_EXCHANGE,
                         routingKeyFor(event.type),
                         Buffer.from(JSON.stringify(event.payload)),
                         {
                              persistent: true,
                              contentType: 'application/json',
                              timestamp: Date.now(),
                              messageId: event.id.toString(),
                         }
                    );

                    if (!published) {
                         throw new Error('Channel write buffer is full');
                    }

                    await client.query(
                         `
          UPDATE domain_event
          SET status = 'SENT', updated_at = NOW()
          WHERE id = $1
        `,
                         [event.id]
                    );

                    result.sent += 1;
                    logger.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
               } catch (error) {
                    logger.error({ error, eventId: event.id }, 'Failed to dispatch event');

                    await client.query(
                         `
          UPDATE domain_event
          SET status = 'FAILED',
              updated_at = NOW(),
              retry_count = retry_count + 1,
              error = $2
          WHERE id = $1
        `,
                         [event.id, error instanceof Error ? error.message : 'Unknown error']
                    );

                    result.failed += 1;
               }
          }

          logger.info({ dispatched: result.sent, failed: result.failed }, 'Event batch processed');

          return result;
     }

     stop(): void {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
