import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const STOCK_EVENTS_EXCHANGE = 'stock.events';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, next publish will reconnect');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();
     await ch.assertExchange(STOCK_EVENTS_EXCHANGE, 'topic', { durable: true });

     logger.info({ exchange: STOCK_EVENTS_EXCHANGE }, 'RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export function routingKeyFor(eventType: string): string {
     return `stock.${eventType}`;
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}

export type { Channel };
