import {
     InsufficientAvailableError,
     InsufficientStockError,
     InvalidQuantityError,
     InvalidTransitionError,
     UnknownEntityError,
} from '@stockflow/shared/src/utils/errors';
import { TEST_ACTOR, TestEngine, collect, createTestEngine, provisionStock } from '../helpers/testUtils';

describe('TransferCoordinator', () => {
     let engine: TestEngine;

     beforeEach(async () => {
          engine = createTestEngine();
          await provisionStock(engine, [
               [7, 3, 250, 40],
               [7, 1, 180, 30],
          ]);
     });

     const createTransfer = (quantity = 40) =>
          engine.transfers.create(
               { productId: 7, sourceLocationId: 3, destinationLocationId: 1, quantity },
               TEST_ACTOR
          );

     describe('create', () => {
          it('should create a pending transfer without moving stock', async () => {
               const transfer = await createTransfer();

               expect(transfer).toMatchObject({
                    productId: 7,
                    sourceLocationId: 3,
                    destinationLocationId: 1,
                    quantity: 40,
                    status: 'pending',
                    createdBy: TEST_ACTOR,
               });
               expect(transfer.id).toMatch(/^[0-9a-f-]{36}$/);
               expect((await engine.ledger.get(7, 3)).onHand).toBe(250);
               expect(await engine.transfers.get(transfer.id)).toEqual(transfer);
          });

          it('should reject a quantity above the available source stock', async () => {
               await expect(createTransfer(211)).rejects.toThrow(InsufficientAvailableError);
          });

          it('should reject identical source and destination', async () => {
               await expect(
                    engine.transfers.create(
                         { productId: 7, sourceLocationId: 3, destinationLocationId: 3, quantity: 1 },
                         TEST_ACTOR
                    )
               ).rejects.toThrow(InvalidQuantityError);
          });

          it('should reject an unknown source entry', async () => {
               await expect(
                    engine.transfers.create(
                         { productId: 7, sourceLocationId: 9, destinationLocationId: 1, quantity: 1 },
                         TEST_ACTOR
                    )
               ).rejects.toThrow(UnknownEntityError);
          });
     });

     describe('dispatch and complete', () => {
          it('should debit the source on dispatch and credit the destination on complete', async () => {
               const transfer = await createTransfer();

               const dispatched = await engine.transfers.dispatch(transfer.id, TEST_ACTOR);
               expect(dispatched.status).toBe('inTransit');
               expect(dispatched.dispatchedAt).toBeDefined();
               expect((await engine.ledger.get(7, 3)).onHand).toBe(210);
               expect((await engine.ledger.get(7, 1)).onHand).toBe(180);

               const completed = await engine.transfers.complete(transfer.id, TEST_ACTOR);
               expect(completed.status).toBe('completed');
               expect((await engine.ledger.get(7, 3)).onHand).toBe(210);
               expect((await engine.ledger.get(7, 1)).onHand).toBe(220);
          });

          it('should journal both legs against the transfer', async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);
               await engine.transfers.complete(transfer.id, TEST_ACTOR);

               const source = await collect(engine.journal.entriesFor(7, 3));
               const destination = await collect(engine.journal.entriesFor(7, 1));

               expect(source).toHaveLength(1);
               expect(source[0]).toMatchObject({
                    kind: 'transferOut',
                    delta: -40,
                    referenceKind: 'transfer',
                    referenceId: transfer.id,
               });
               expect(destination.map(({ kind, delta }) => ({ kind, delta }))).toEqual([
                    { kind: 'transferIn', delta: 40 },
               ]);
          });

          it('should treat a second complete as a no-op', async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);
               const first = await engine.transfers.complete(transfer.id, TEST_ACTOR);

               const second = await engine.transfers.complete(transfer.id, TEST_ACTOR);

               expect(second).toEqual(first);
               expect((await engine.ledger.get(7, 1)).onHand).toBe(220);
          });

          it('should refuse to complete a pending transfer', async () => {
               const transfer = await createTransfer();
               await expect(engine.transfers.complete(transfer.id, TEST_ACTOR)).rejects.toThrow(
                    InvalidTransitionError
               );
          });

          it('should refuse to dispatch twice', async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);

               await expect(engine.transfers.dispatch(transfer.id, TEST_ACTOR)).rejects.toThrow(
                    InvalidTransitionError
               );
               expect((await engine.ledger.get(7, 3)).onHand).toBe(210);
          });

          it('should leave the transfer pending when the source can no longer cover it', async () => {
               const transfer = await createTransfer(200);
               await engine.ledger.reserve(7, 3, 11, TEST_ACTOR);

               await expect(engine.transfers.dispatch(transfer.id, TEST_ACTOR)).rejects.toThrow(
                    InsufficientStockError
               );
               expect((await engine.transfers.get(transfer.id)).status).toBe('pending');
          });

          it('should not debit again when the dispatch leg is already journaled', async () => {
               const transfer = await createTransfer();
               await engine.ledger.adjust(7, 3, -40, {
                    kind: 'transferOut',
                    referenceKind: 'transfer',
                    referenceId: transfer.id,
                    actor: TEST_ACTOR,
               });

               const dispatched = await engine.transfers.dispatch(transfer.id, TEST_ACTOR);

               expect(dispatched.status).toBe('inTransit');
               expect((await engine.ledger.get(7, 3)).onHand).toBe(210);
          });
     });

     describe('cancel', () => {
          it('should cancel a pending transfer without touching stock', async () => {
               const transfer = await createTransfer();

               const cancelled = await engine.transfers.cancel(transfer.id, TEST_ACTOR);

               expect(cancelled.status).toBe('cancelled');
               expect((await engine.ledger.get(7, 3)).onHand).toBe(250);
               expect(await collect(engine.journal.entriesFor(7, 3))).toEqual([]);
          });

          it('should credit the source back when cancelled in transit', async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);

               await engine.transfers.cancel(transfer.id, TEST_ACTOR);

               expect((await engine.ledger.get(7, 3)).onHand).toBe(250);
               expect((await engine.ledger.get(7, 1)).onHand).toBe(180);
               const deltas = (await collect(engine.journal.entriesFor(7, 3))).map((entry) => entry.delta);
               expect(deltas).toEqual([-40, 40]);
          });

          it('should refuse to cancel a completed transfer', async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);
               await engine.transfers.complete(transfer.id, TEST_ACTOR);

               await expect(engine.transfers.cancel(transfer.id, TEST_ACTOR)).rejects.toThrow(
                    'Cannot cancel transfer'
               );
          });
     });

     describe('recovery after a failed status write', () => {
          const failNextSave = () =>
               jest.spyOn(engine.transfers['transfers'], 'save').mockRejectedValueOnce(new Error('save failed'));

          const stockAt = async (locationId: number) => (await engine.ledger.get(7, locationId)).onHand;

          const dispatchedTransfer = async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);
               return transfer;
          };

          it('should keep the destination credit when complete is retried', async () => {
               const transfer = await dispatchedTransfer();
               failNextSave();

               await expect(engine.transfers.complete(transfer.id, TEST_ACTOR)).rejects.toThrow('save failed');
               expect((await engine.transfers.get(transfer.id)).status).toBe('inTransit');
               expect(await stockAt(1)).toBe(220);

               const completed = await engine.transfers.complete(transfer.id, TEST_ACTOR);

               expect(completed.status).toBe('completed');
               expect(await stockAt(3)).toBe(210);
               expect(await stockAt(1)).toBe(220);
               expect((await stockAt(3)) + (await stockAt(1))).toBe(430);
          });

          it('should keep the credit-back when cancel is retried', async () => {
               const transfer = await dispatchedTransfer();
               failNextSave();

               await expect(engine.transfers.cancel(transfer.id, TEST_ACTOR)).rejects.toThrow('save failed');
               expect((await engine.transfers.get(transfer.id)).status).toBe('inTransit');
               expect(await stockAt(3)).toBe(250);

               const cancelled = await engine.transfers.cancel(transfer.id, TEST_ACTOR);

               expect(cancelled.status).toBe('cancelled');
               expect(await stockAt(3)).toBe(250);
               expect(await stockAt(1)).toBe(180);
               expect((await stockAt(3)) + (await stockAt(1))).toBe(430);
          });

          it('should finish as completed when cancelled after the destination was credited', async () => {
               const transfer = await dispatchedTransfer();
               failNextSave();
               await expect(engine.transfers.complete(transfer.id, TEST_ACTOR)).rejects.toThrow('save failed');

               const result = await engine.transfers.cancel(transfer.id, TEST_ACTOR);

               expect(result.status).toBe('completed');
               expect(result.completedAt).toBeDefined();
               expect(await stockAt(3)).toBe(210);
               expect(await stockAt(1)).toBe(220);
               expect((await engine.transfers.get(transfer.id)).status).toBe('completed');
          });

          it('should finish as cancelled when completed after the source was credited back', async () => {
               const transfer = await dispatchedTransfer();
               failNextSave();
               await expect(engine.transfers.cancel(transfer.id, TEST_ACTOR)).rejects.toThrow('save failed');

               const result = await engine.transfers.complete(transfer.id, TEST_ACTOR);

               expect(result.status).toBe('cancelled');
               expect(result.cancelledAt).toBeDefined();
               expect(await stockAt(3)).toBe(250);
               expect(await stockAt(1)).toBe(180);
               expect(await collect(engine.journal.entriesFor(7, 1))).toEqual([]);
          });

          it('should not dispatch a pending transfer whose debit was already credited back', async () => {
               const transfer = await createTransfer();
               failNextSave();
               await expect(engine.transfers.dispatch(transfer.id, TEST_ACTOR)).rejects.toThrow('save failed');
               failNextSave();
               await expect(engine.transfers.cancel(transfer.id, TEST_ACTOR)).rejects.toThrow('save failed');
               expect((await engine.transfers.get(transfer.id)).status).toBe('pending');

               const result = await engine.transfers.dispatch(transfer.id, TEST_ACTOR);

               expect(result.status).toBe('cancelled');
               expect(await stockAt(3)).toBe(250);
               expect(await engine.journal.sumDeltas(7, 3)).toBe(0);
          });
     });

     describe('events', () => {
          it('should publish each status change', async () => {
               const transfer = await createTransfer();
               await engine.transfers.dispatch(transfer.id, TEST_ACTOR);
               await engine.transfers.complete(transfer.id, TEST_ACTOR);

               const changes = engine.publisher
                    .ofType('TransferStatusChanged')
                    .map((event) => [event.payload.from, event.payload.to]);
               expect(changes).toEqual([
                    [null, 'pending'],
                    ['pending', 'inTransit'],
                    ['inTransit', 'completed'],
               ]);
          });
     });

     it('should reject an unknown transfer id', async () => {
          await expect(engine.transfers.dispatch('missing', TEST_ACTOR)).rejects.toThrow(UnknownEntityError);
     });
});
