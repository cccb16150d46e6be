import { RecordRepository } from '../stores/record-repository';
import {
     OrderReservation,
     ReservationRequestLine,
     ReservedLine,
     StockKey,
     StockLevel,
} from '../types/inventory.types';
import { CompensationStack } from '../utils/compensation';
import {
     DomainError,
     InvalidQuantityError,
     OrderAlreadyReservedError,
     PartialReservationFailureError,
     UnknownEntityError,
} from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { createChildLogger } from '../utils/logger';
import { LedgerSession, StockLedger, assertPositiveQuantity } from './stock-ledger';

/**
 * Picks the location a line reserves from: highest available quantity,
 * ties broken by the lowest location id.
 */
export function selectLocation(levels: StockLevel[]): StockLevel | undefined {
     const ranked = [...levels].sort(
          (a, b) => b.available - a.available || a.locationId - b.locationId
     );
     return ranked[0];
}

export class ReservationManager {
     private readonly orderLocks = new KeyedLock();
     private readonly log = createChildLogger({ component: 'reservation-manager' });

     constructor(
          private readonly ledger: StockLedger,
          private readonly reservations: RecordRepository<OrderReservation>
     ) {}

     /**
      * Reserves every line of an order or none of them.
      */
     async reserveForOrder(
          orderId: string,
          lines: ReservationRequestLine[],
          actor: string
     ): Promise<OrderReservation> {
          if (!lines || lines.length === 0) {
               throw new InvalidQuantityError('Order must have at least one line');
          }
          for (const line of lines) {
               assertPositiveQuantity(line.quantity, `Quantity of line ${line.lineId}`);
          }

          return this.orderLocks.runExclusive([orderId], async () => {
               if (await this.reservations.get(orderId)) {
                    throw new OrderAlreadyReservedError(orderId);
               }

               this.log.info({ orderId, lineCount: lines.length }, 'Reserving inventory for order');

               const keys = await this.candidateKeys(lines);
               const reserved = await this.ledger.withEntries(keys, (session) =>
                    this.reserveLines(session, orderId, lines, actor)
               );

               const reservation: OrderReservation = {
                    id: orderId,
                    lines: reserved,
                    createdAt: new Date().toISOString(),
               };

               try {
                    await this.reservations.insert(reservation);
               } catch (err) {
                    await this.releaseLines(reserved, actor);
                    throw err;
               }

               this.log.info({ orderId }, 'Inventory reserved successfully');
               return reservation;
          });
     }

     /**
      * Releases everything held for the order. Releasing an order with no
      * reservations is a no-op.
      */
     async releaseForOrder(orderId: string, actor: string): Promise<ReservedLine[]> {
          return this.orderLocks.runExclusive([orderId], async () => {
               const reservation = await this.reservations.get(orderId);
               if (!reservation) {
                    this.log.debug({ orderId }, 'No reservations to release');
                    return [];
               }

               await this.releaseLines(reservation.lines, actor);
               await this.reservations.delete(orderId);

               this.log.info({ orderId, releasedCount: reservation.lines.length }, 'Inventory released');
               return reservation.lines;
          });
     }

     async getForOrder(orderId: string): Promise<OrderReservation | undefined> {
          return this.reservations.get(orderId);
     }

     /**
      * Forgets an order's reservations once a shipment consumed them.
      */
     async settleForOrder(orderId: string): Promise<void> {
          await this.orderLocks.runExclusive([orderId], () => this.reservations.delete(orderId));
     }

     private async candidateKeys(lines: ReservationRequestLine[]): Promise<StockKey[]> {
          const keys: StockKey[] = [];

          for (const line of lines) {
               if (line.locationId !== undefined) {
                    keys.push({ productId: line.productId, locationId: line.locationId });
                    continue;
               }
               const levels = await this.ledger.listForProduct(line.productId);
               keys.push(...levels.map(({ productId, locationId }) => ({ productId, locationId })));
          }

          return keys;
     }

     private async reserveLines(
          session: LedgerSession,
          orderId: string,
          lines: ReservationRequestLine[],
          actor: string
     ): Promise<ReservedLine[]> {
          const reserved: ReservedLine[] = [];
          const undo = new CompensationStack(this.log);

          for (const line of lines) {
               try {
                    const locationId = await this.resolveLocation(session, line);
                    await session.reserve(line.productId, locationId, line.quantity, actor);

                    const held: ReservedLine = {
                         lineId: line.lineId,
                         productId: line.productId,
                         locationId,
                         quantity: line.quantity,
                    };
                    reserved.push(held);
                    undo.push(`release line ${line.lineId}`, () =>
                         session.release(held.productId, held.locationId, held.quantity, actor)
                    );
               } catch (err) {
                    await undo.unwind();

                    if (err instanceof DomainError) {
                         this.log.warn(
                              { orderId, lineId: line.lineId, code: err.code },
                              'Reservation rolled back'
                         );
                         throw new PartialReservationFailureError(
                              orderId,
                              { lineId: line.lineId, productId: line.productId, quantity: line.quantity },
                              err
                         );
                    }
                    throw err;
               }
          }

          return reserved;
     }

     private async resolveLocation(session: LedgerSession, line: ReservationRequestLine): Promise<number> {
          if (line.locationId !== undefined) {
               return line.locationId;
          }

          const current: StockLevel[] = [];
          for (const key of session.heldKeys(line.productId)) {
               const level = await session.find(key.productId, key.locationId);
               if (level) current.push(level);
          }

          const best = selectLocation(current);
          if (!best) {
               throw new UnknownEntityError('stock entry', `product ${line.productId}`);
          }
          return best.locationId;
     }

     private async releaseLines(lines: ReservedLine[], actor: string): Promise<void> {
          if (lines.length === 0) return;

          await this.ledger.withEntries(lines, async (session) => {
               const undo = new CompensationStack(this.log);
               try {
                    for (const line of lines) {
                         await session.release(line.productId, line.locationId, line.quantity, actor);
                         undo.push(`re-reserve line ${line.lineId}`, () =>
                              session.reserve(line.productId, line.locationId, line.quantity, actor)
                         );
                    }
               } catch (err) {
                    await undo.unwind();
                    throw err;
               }
          });
     }
}
