import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;
let pendingChannel: Promise<Channel> | null = null;

export const INVENTORY_EVENTS_EXCHANGE = 'inventory.events';
export const AUDIT_QUEUE = 'inventory.audit';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next publish');
          connection = null;
          channel = null;
          pendingChannel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

// Concurrent callers share one connect and channel setup
export function getChannel(): Promise<Channel> {
     if (!pendingChannel) {
          pendingChannel = openChannel().catch((err: unknown) => {
               pendingChannel = null;
               throw err;
          });
     }
     return pendingChannel;
}

async function openChannel(): Promise<Channel> {
     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();

     await ch.assertExchange(INVENTORY_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange('dlx.inventory', 'topic', { durable: true });

     // Audit consumers read every stock and workflow event
     await ch.assertQueue(AUDIT_QUEUE, {
          durable: true,
          deadLetterExchange: 'dlx.inventory',
          deadLetterRoutingKey: 'dlq.inventory.audit',
     });
     await ch.assertQueue('dlq.inventory.audit', { durable: true });

     await ch.bindQueue(AUDIT_QUEUE, INVENTORY_EVENTS_EXCHANGE, 'inventory.#');
     await ch.bindQueue('dlq.inventory.audit', 'dlx.inventory', 'dlq.inventory.audit');

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
     });
}

export async function closeConnection(): Promise<void> {
     pendingChannel = null;
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
