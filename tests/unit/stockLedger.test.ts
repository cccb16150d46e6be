import { StockLedger, toStockLevel } from '@stockflow/shared/src/services/stock-ledger';
import { MemoryLedgerStore } from '@stockflow/shared/src/stores/memory-ledger-store';
import type { JournalMeta } from '@stockflow/shared/src/types/inventory.types';
import {
     InsufficientAvailableError,
     InsufficientStockError,
     InvalidQuantityError,
     OverReleaseError,
     UnknownEntityError,
} from '@stockflow/shared/src/utils/errors';
import { RecordingPublisher, TEST_ACTOR } from '../helpers/testUtils';

const adjustment = (referenceId: string): JournalMeta => ({
     kind: 'adjustment',
     referenceKind: 'adjustment',
     referenceId,
     actor: TEST_ACTOR,
});

describe('StockLedger', () => {
     let store: MemoryLedgerStore;
     let publisher: RecordingPublisher;
     let ledger: StockLedger;

     beforeEach(async () => {
          store = new MemoryLedgerStore();
          publisher = new RecordingPublisher();
          ledger = new StockLedger(store, publisher);
          await ledger.provision(1, 1, { onHand: 150, reserved: 25 }, TEST_ACTOR);
     });

     describe('toStockLevel', () => {
          it('should derive available from the counters', () => {
               const level = toStockLevel({
                    productId: 1,
                    locationId: 1,
                    onHand: 150,
                    reserved: 25,
                    initialOnHand: 150,
                    version: 1,
                    updatedAt: new Date(),
               });
               expect(level.available).toBe(125);
               expect(JSON.parse(JSON.stringify(level)).available).toBe(125);
          });
     });

     describe('provision', () => {
          it('should create an entry with the opening quantities', async () => {
               const level = await ledger.get(1, 1);
               expect(level).toMatchObject({ onHand: 150, reserved: 25, initialOnHand: 150, version: 1 });
               expect(level.available).toBe(125);
          });

          it('should return the existing entry when provisioned twice', async () => {
               const level = await ledger.provision(1, 1, { onHand: 999 }, TEST_ACTOR);
               expect(level.onHand).toBe(150);
          });

          it('should reject reserved above on-hand', async () => {
               await expect(ledger.provision(2, 1, { onHand: 10, reserved: 11 }, TEST_ACTOR)).rejects.toThrow(
                    InvalidQuantityError
               );
          });

          it('should reject negative on-hand', async () => {
               await expect(ledger.provision(2, 1, { onHand: -1 }, TEST_ACTOR)).rejects.toThrow(
                    InvalidQuantityError
               );
          });
     });

     describe('adjust', () => {
          it('should apply the delta and journal it', async () => {
               const level = await ledger.adjust(1, 1, -30, adjustment('ADJ-1'));

               expect(level.onHand).toBe(120);
               expect(level.available).toBe(95);

               const journal = await store.journalPage({ productId: 1, locationId: 1 }, 0, 10);
               expect(journal).toHaveLength(1);
               expect(journal[0]).toMatchObject({
                    id: 1,
                    kind: 'adjustment',
                    delta: -30,
                    referenceKind: 'adjustment',
                    referenceId: 'ADJ-1',
                    actor: TEST_ACTOR,
               });
          });

          it('should reject a debit below reserved and leave the entry unchanged', async () => {
               await expect(ledger.adjust(1, 1, -130, adjustment('ADJ-2'))).rejects.toThrow(InsufficientStockError);

               const level = await ledger.get(1, 1);
               expect(level.onHand).toBe(150);
               expect(await store.journalPage({ productId: 1, locationId: 1 }, 0, 10)).toEqual([]);
          });

          it('should allow a debit down to the reserved quantity', async () => {
               const level = await ledger.adjust(1, 1, -125, adjustment('ADJ-3'));
               expect(level.onHand).toBe(25);
               expect(level.available).toBe(0);
          });

          it('should create an unknown key from zero on a credit', async () => {
               const level = await ledger.adjust(5, 9, 40, adjustment('ADJ-4'));
               expect(level).toMatchObject({ onHand: 40, reserved: 0, initialOnHand: 0, version: 1 });
          });

          it('should reject a debit on an unknown key', async () => {
               await expect(ledger.adjust(5, 9, -1, adjustment('ADJ-5'))).rejects.toThrow(InsufficientStockError);
               expect(await ledger.find(5, 9)).toBeUndefined();
          });

          it('should reject a zero delta', async () => {
               await expect(ledger.adjust(1, 1, 0, adjustment('ADJ-6'))).rejects.toThrow(InvalidQuantityError);
          });

          it('should publish a StockAdjusted event', async () => {
               await ledger.adjust(1, 1, 10, adjustment('ADJ-7'));

               const [event] = publisher.ofType('StockAdjusted');
               expect(event.actor).toBe(TEST_ACTOR);
               expect(event.payload).toMatchObject({
                    productId: 1,
                    locationId: 1,
                    delta: 10,
                    onHand: 160,
                    reserved: 25,
                    available: 135,
                    journalId: 1,
               });
          });
     });

     describe('reserve and release', () => {
          it('should move available into reserved without touching on-hand', async () => {
               const level = await ledger.reserve(1, 1, 100, TEST_ACTOR);
               expect(level).toMatchObject({ onHand: 150, reserved: 125 });
               expect(level.available).toBe(25);
          });

          it('should reject a reservation above available', async () => {
               await expect(ledger.reserve(1, 1, 126, TEST_ACTOR)).rejects.toThrow(InsufficientAvailableError);
               expect((await ledger.get(1, 1)).reserved).toBe(25);
          });

          it('should release reserved quantity', async () => {
               const level = await ledger.release(1, 1, 25, TEST_ACTOR);
               expect(level.reserved).toBe(0);
               expect(level.available).toBe(150);
          });

          it('should reject releasing more than is reserved', async () => {
               await expect(ledger.release(1, 1, 26, TEST_ACTOR)).rejects.toThrow(OverReleaseError);
          });

          it('should reject reserving on an unknown key', async () => {
               await expect(ledger.reserve(9, 9, 1, TEST_ACTOR)).rejects.toThrow(UnknownEntityError);
          });

          it('should not journal reservations', async () => {
               await ledger.reserve(1, 1, 10, TEST_ACTOR);
               await ledger.release(1, 1, 10, TEST_ACTOR);
               expect(await store.journalPage({ productId: 1, locationId: 1 }, 0, 10)).toEqual([]);
          });

          it('should publish reserve and release events', async () => {
               await ledger.reserve(1, 1, 10, TEST_ACTOR);
               await ledger.release(1, 1, 4, TEST_ACTOR);

               expect(publisher.events.map((event) => event.type)).toEqual(['StockReserved', 'StockReleased']);
               expect(publisher.ofType('StockReleased')[0].payload).toMatchObject({ quantity: 4, reserved: 31 });
          });
     });

     describe('withEntries', () => {
          it('should consume reserved stock in one journaled commit', async () => {
               const level = await ledger.withEntries([{ productId: 1, locationId: 1 }], (session) =>
                    session.consumeReserved(1, 1, 20, {
                         kind: 'sale',
                         referenceKind: 'saleLine',
                         referenceId: 'L1',
                         actor: TEST_ACTOR,
                    })
               );

               expect(level).toMatchObject({ onHand: 130, reserved: 5 });
               const journal = await store.journalPage({ productId: 1, locationId: 1 }, 0, 10);
               expect(journal.map((entry) => entry.delta)).toEqual([-20]);
          });

          it('should refuse keys the session does not hold', async () => {
               await ledger.provision(2, 1, { onHand: 10 }, TEST_ACTOR);

               await expect(
                    ledger.withEntries([{ productId: 1, locationId: 1 }], (session) =>
                         session.reserve(2, 1, 1, TEST_ACTOR)
                    )
               ).rejects.toThrow('Stock entry 2:1 is not locked by this session');
          });

          it('should publish events only after the callback finishes', async () => {
               let seenDuring = -1;
               await ledger.withEntries([{ productId: 1, locationId: 1 }], async (session) => {
                    await session.reserve(1, 1, 5, TEST_ACTOR);
                    seenDuring = publisher.events.length;
               });

               expect(seenDuring).toBe(0);
               expect(publisher.events).toHaveLength(1);
          });

          it('should keep the committed mutation when publishing fails', async () => {
               jest.spyOn(publisher, 'publish').mockRejectedValueOnce(new Error('broker down'));

               const level = await ledger.reserve(1, 1, 5, TEST_ACTOR);

               expect(level.reserved).toBe(30);
               expect((await ledger.get(1, 1)).reserved).toBe(30);
          });
     });

     describe('recordStockCheck', () => {
          it('should store the check time', async () => {
               const checkedAt = new Date('2025-05-01T00:00:00.000Z');
               const level = await ledger.recordStockCheck(1, 1, checkedAt, TEST_ACTOR);
               expect(level.lastCheckedAt).toEqual(checkedAt);
               expect(level.onHand).toBe(150);
          });
     });

     describe('listForProduct', () => {
          it('should list locations in ascending order', async () => {
               await ledger.provision(1, 3, { onHand: 5 }, TEST_ACTOR);
               await ledger.provision(1, 2, { onHand: 7 }, TEST_ACTOR);

               const levels = await ledger.listForProduct(1);
               expect(levels.map((level) => level.locationId)).toEqual([1, 2, 3]);
          });

          it('should return an empty list for an unknown product', async () => {
               expect(await ledger.listForProduct(42)).toEqual([]);
          });
     });
});
