import * as amqplib from 'amqplib';
import { closeConnection, getChannel, publishEvent } from '@stockflow/shared/src/messaging/client';

jest.mock('amqplib', () => ({
     connect: jest.fn(),
}));

function createMockConnection() {
     const channel = {
          assertExchange: jest.fn().mockResolvedValue({}),
          assertQueue: jest.fn().mockResolvedValue({}),
          bindQueue: jest.fn().mockResolvedValue({}),
          publish: jest.fn().mockReturnValue(true),
          close: jest.fn().mockResolvedValue(undefined),
     };
     const connection = {
          on: jest.fn<void, [string, () => void]>(),
          createChannel: jest.fn().mockResolvedValue(channel),
          close: jest.fn().mockResolvedValue(undefined),
     };
     return { channel, connection };
}

describe('RabbitMQ client', () => {
     const connect = jest.mocked(amqplib.connect);
     let mock: ReturnType<typeof createMockConnection>;

     beforeEach(() => {
          mock = createMockConnection();
          connect.mockResolvedValue(mock.connection as never);
     });

     afterEach(async () => {
          await closeConnection();
          jest.clearAllMocks();
     });

     describe('getChannel', () => {
          it('should open one connection for concurrent callers', async () => {
               const [first, second] = await Promise.all([getChannel(), getChannel()]);

               expect(first).toBe(mock.channel);
               expect(second).toBe(first);
               expect(connect).toHaveBeenCalledTimes(1);
               expect(mock.connection.createChannel).toHaveBeenCalledTimes(1);
          });

          it('should declare the events exchange and the audit queue', async () => {
               await getChannel();

               expect(mock.channel.assertExchange).toHaveBeenCalledWith('inventory.events', 'topic', {
                    durable: true,
               });
               expect(mock.channel.bindQueue).toHaveBeenCalledWith(
                    'inventory.audit',
                    'inventory.events',
                    'inventory.#'
               );
          });

          it('should retry after a failed connect', async () => {
               connect.mockRejectedValueOnce(new Error('connection refused'));

               await expect(getChannel()).rejects.toThrow('connection refused');
               await expect(getChannel()).resolves.toBe(mock.channel);
               expect(connect).toHaveBeenCalledTimes(2);
          });

          it('should reconnect once the connection closes', async () => {
               await getChannel();
               const onClose = mock.connection.on.mock.calls.find(([event]) => event === 'close')?.[1];
               onClose?.();

               await getChannel();

               expect(onClose).toBeDefined();
               expect(connect).toHaveBeenCalledTimes(2);
          });
     });

     describe('publishEvent', () => {
          it('should publish a persistent JSON message', async () => {
               await publishEvent('inventory.events', 'inventory.StockReserved', { productId: 1 });

               expect(mock.channel.publish).toHaveBeenCalledWith(
                    'inventory.events',
                    'inventory.StockReserved',
                    Buffer.from(JSON.stringify({ productId: 1 })),
                    expect.objectContaining({ persistent: true, contentType: 'application/json' })
               );
          });
     });
});
