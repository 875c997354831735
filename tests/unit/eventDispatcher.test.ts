import type { Channel } from 'amqplib';
import { EventDispatcher } from '../../services/event-dispatcher/src/dispatcher';
import { createMockClient, queueRows } from '../helpers/testUtils';

describe('EventDispatcher (Unit)', () => {
     let mockClient: ReturnType<typeof createMockClient>;
     let publish: jest.Mock;
     let getChannel: jest.Mock;
     let dispatcher: EventDispatcher;

     const createdAt = new Date('2026-03-01T12:00:00.000Z');

     beforeEach(() => {
          mockClient = createMockClient();
          publish = jest.fn().mockReturnValue(true);
          getChannel = jest.fn().mockResolvedValue({ publish } as unknown as Channel);
          dispatcher = new EventDispatcher({ batchSize: 10, pollIntervalMs: 5, channel: getChannel });
     });

     it('should publish pending events and mark them sent', async () => {
          const payload = { reservationId: 1, saleId: 100, variantId: 10, quantity: 2 };
          queueRows(mockClient, [{ id: 1, type: 'StockReserved', payload, created_at: createdAt }], []);

          const result = await dispatcher.processBatch(mockClient);

          expect(result).toEqual({ sent: 1, failed: 0 });
          expect(mockClient.query).toHaveBeenNthCalledWith(
               1,
               expect.stringContaining('FOR UPDATE SKIP LOCKED'),
               [10]
          );
          expect(publish).toHaveBeenCalledWith(
               'stock.events',
               'stock.StockReserved',
               Buffer.from(JSON.stringify(payload)),
               expect.objectContaining({
                    persistent: true,
                    contentType: 'application/json',
                    messageId: '1',
               })
          );
          expect(mockClient.query).toHaveBeenNthCalledWith(
               2,
               expect.stringContaining("SET status = 'SENT'"),
               [1]
          );
     });

     it('should mark a failed publish and continue with the batch', async () => {
          queueRows(
               mockClient,
               [
                    { id: 1, type: 'ReservationExpired', payload: {}, created_at: createdAt },
                    { id: 2, type: 'ReservationReleased', payload: {}, created_at: createdAt },
               ],
               [],
               []
          );
          publish
               .mockImplementationOnce(() => {
                    throw new Error('Channel closed');
               })
               .mockReturnValueOnce(true);

          const result = await dispatcher.processBatch(mockClient);

          expect(result).toEqual({ sent: 1, failed: 1 });
          expect(mockClient.query).toHaveBeenNthCalledWith(
               2,
               expect.stringContaining("SET status = 'FAILED'"),
               [1, 'Channel closed']
          );
          expect(mockClient.query).toHaveBeenNthCalledWith(
               3,
               expect.stringContaining("SET status = 'SENT'"),
               [2]
          );
     });

     it('should treat a full write buffer as a failure', async () => {
          queueRows(mockClient, [{ id: 3, type: 'ReservationCommitted', payload: {}, created_at: createdAt }], []);
          publish.mockReturnValueOnce(false);

          const result = await dispatcher.processBatch(mockClient);

          expect(result).toEqual({ sent: 0, failed: 1 });
          expect(mockClient.query).toHaveBeenNthCalledWith(
               2,
               expect.stringContaining("SET status = 'FAILED'"),
               [3, 'Channel write buffer is full']
          );
     });

     it('should not open a channel when nothing is pending', async () => {
          queueRows(mockClient, []);

          await expect(dispatcher.processBatch(mockClient)).resolves.toEqual({ sent: 0, failed: 0 });
          expect(getChannel).not.toHaveBeenCalled();
     });
});
