import { EventPublisher, LogEventPublisher, domainEvent, emitAll } from '../events/event-publisher';
import { RecordRepository } from '../stores/record-repository';
import {
     CreateSalesOrderRequest,
     ReservedLine,
     SalesLine,
     SalesOrder,
     SalesOrderStatus,
} from '../types/inventory.types';
import { CompensationStack } from '../utils/compensation';
import {
     InvalidQuantityError,
     InvalidTransitionError,
     UnknownEntityError,
} from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { createChildLogger } from '../utils/logger';
import { lineTotal } from './purchase-fulfillment';
import { ReservationManager } from './reservation-manager';
import { LedgerSession, StockLedger, assertPositiveQuantity } from './stock-ledger';

export function salesOrderTotal(order: SalesOrder): number {
     const cents = order.lines.reduce(
          (sum, line) => sum + Math.round(lineTotal(line.quantity, line.unitPrice) * 100),
          0
     );
     return cents / 100;
}

function validateLine(line: SalesLine): void {
     assertPositiveQuantity(line.quantity, `Quantity of line ${line.id}`);
     if (!Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
          throw new InvalidQuantityError(`Unit price of line ${line.id} must be non-negative`);
     }
}

/**
 * Sales order lifecycle: pending -> processing -> shipped -> delivered.
 * Confirmation reserves stock for every line, shipping consumes those
 * reservations, cancelling gives them back.
 */
export class SalesFulfillment {
     private readonly orderLocks = new KeyedLock();
     private readonly log = createChildLogger({ component: 'sales-fulfillment' });

     constructor(
          private readonly ledger: StockLedger,
          private readonly reservations: ReservationManager,
          private readonly orders: RecordRepository<SalesOrder>,
          private readonly events: EventPublisher = new LogEventPublisher()
     ) {}

     async createOrder(request: CreateSalesOrderRequest, actor: string): Promise<SalesOrder> {
          request.lines.forEach(validateLine);
          assertUniqueLineIds(request.lines.map((line) => line.id));

          const now = new Date().toISOString();
          const order: SalesOrder = {
               id: request.id,
               customerId: request.customerId,
               status: 'pending',
               orderDate: request.orderDate ?? now.slice(0, 10),
               notes: request.notes,
               createdBy: actor,
               lines: request.lines.map((line) => ({ ...line })),
               updatedAt: now,
          };
          await this.orders.insert(order);

          this.log.info({ salesOrderId: order.id, lineCount: order.lines.length }, 'Sales order created');
          return order;
     }

     async get(salesOrderId: string): Promise<SalesOrder> {
          const order = await this.orders.get(salesOrderId);
          if (!order) {
               throw new UnknownEntityError('sales order', salesOrderId);
          }
          return order;
     }

     async addLine(salesOrderId: string, line: SalesLine, actor: string): Promise<SalesOrder> {
          validateLine(line);
          return this.edit(salesOrderId, actor, 'add line to', (order) => {
               assertUniqueLineIds([...order.lines.map((existing) => existing.id), line.id]);
               return [...order.lines, { ...line }];
          });
     }

     async updateLine(
          salesOrderId: string,
          lineId: string,
          changes: Partial<Pick<SalesLine, 'quantity' | 'unitPrice' | 'locationId'>>,
          actor: string
     ): Promise<SalesOrder> {
          return this.edit(salesOrderId, actor, 'update line of', (order) => {
               const updated = { ...findLine(order, lineId), ...changes };
               validateLine(updated);
               return order.lines.map((existing) => (existing.id === lineId ? updated : existing));
          });
     }

     async removeLine(salesOrderId: string, lineId: string, actor: string): Promise<SalesOrder> {
          return this.edit(salesOrderId, actor, 'remove line from', (order) => {
               findLine(order, lineId);
               return order.lines.filter((existing) => existing.id !== lineId);
          });
     }

     /**
      * Reserves stock for every line and moves the order to processing. When
      * any line cannot be reserved the order stays pending and nothing is held.
      */
     async confirm(salesOrderId: string, actor: string): Promise<SalesOrder> {
          return this.transition(salesOrderId, actor, async (order) => {
               expectStatus(order, ['pending'], 'confirm');

               await this.reservations.reserveForOrder(
                    order.id,
                    order.lines.map((line) => ({
                         lineId: line.id,
                         productId: line.productId,
                         quantity: line.quantity,
                         locationId: line.locationId,
                    })),
                    actor
               );

               const next: SalesOrder = { ...order, status: 'processing', updatedAt: new Date().toISOString() };
               try {
                    await this.orders.save(next);
               } catch (err) {
                    await this.reservations.releaseForOrder(order.id, actor);
                    throw err;
               }
               return next;
          });
     }

     /**
      * Turns the order's reservations into stock debits. Reserved and on-hand
      * drop together at each reserving location.
      */
     async ship(salesOrderId: string, actor: string): Promise<SalesOrder> {
          return this.transition(salesOrderId, actor, async (order) => {
               expectStatus(order, ['processing'], 'ship');

               const reservation = await this.reservations.getForOrder(order.id);
               if (!reservation) {
                    throw new UnknownEntityError('reservation', order.id);
               }

               const next: SalesOrder = {
                    ...order,
                    status: 'shipped',
                    shippedAt: new Date().toISOString(),
                    updatedAt: new Date().toISOString(),
               };

               await this.ledger.withEntries(reservation.lines, async (session) => {
                    const undo = new CompensationStack(this.log);
                    try {
                         for (const line of reservation.lines) {
                              await session.consumeReserved(line.productId, line.locationId, line.quantity, {
                                   kind: 'sale',
                                   referenceKind: 'saleLine',
                                   referenceId: line.lineId,
                                   actor,
                              });
                              undo.push(`restore line ${line.lineId}`, () => this.restoreLine(session, line, actor));
                         }
                         await this.orders.save(next);
                    } catch (err) {
                         await undo.unwind();
                         throw err;
                    }
               });
               await this.reservations.settleForOrder(order.id);

               this.log.info({ salesOrderId: order.id, lineCount: reservation.lines.length }, 'Sales order shipped');
               return next;
          });
     }

     async deliver(salesOrderId: string, actor: string): Promise<SalesOrder> {
          return this.transition(salesOrderId, actor, async (order) => {
               expectStatus(order, ['shipped'], 'deliver');
               return this.persist({ ...order, status: 'delivered', deliveredAt: new Date().toISOString() });
          });
     }

     /**
      * Cancels a pending or processing order. Held reservations are released;
      * on-hand is never touched.
      */
     async cancel(salesOrderId: string, actor: string): Promise<SalesOrder> {
          return this.transition(salesOrderId, actor, async (order) => {
               expectStatus(order, ['pending', 'processing'], 'cancel');

               const released = await this.reservations.releaseForOrder(order.id, actor);
               this.log.info({ salesOrderId: order.id, releasedCount: released.length }, 'Sales order reservations released');

               return this.persist({ ...order, status: 'cancelled', cancelledAt: new Date().toISOString() });
          });
     }

     private async restoreLine(
          session: LedgerSession,
          line: ReservedLine,
          actor: string
     ): Promise<void> {
          await session.adjust(line.productId, line.locationId, line.quantity, {
               kind: 'adjustment',
               referenceKind: 'saleLine',
               referenceId: line.lineId,
               actor,
               notes: 'shipment rolled back',
          });
          await session.reserve(line.productId, line.locationId, line.quantity, actor);
     }

     private async persist(order: SalesOrder): Promise<SalesOrder> {
          const next = { ...order, updatedAt: new Date().toISOString() };
          await this.orders.save(next);
          return next;
     }

     private async edit(
          salesOrderId: string,
          actor: string,
          action: string,
          change: (order: SalesOrder) => SalesLine[]
     ): Promise<SalesOrder> {
          return this.orderLocks.runExclusive([salesOrderId], async () => {
               const order = await this.get(salesOrderId);
               expectStatus(order, ['pending'], action);

               const next = await this.persist({ ...order, lines: change(order) });
               this.log.debug(
                    { salesOrderId, lineCount: next.lines.length, total: salesOrderTotal(next), actor },
                    'Sales order lines edited'
               );
               return next;
          });
     }

     /**
      * Runs `step` under the order lock. The step persists the order it returns.
      */
     private async transition(
          salesOrderId: string,
          actor: string,
          step: (order: SalesOrder) => Promise<SalesOrder>
     ): Promise<SalesOrder> {
          const { order, from } = await this.orderLocks.runExclusive([salesOrderId], async () => {
               const current = await this.get(salesOrderId);
               const next = await step(current);
               this.log.info({ salesOrderId, from: current.status, to: next.status }, 'Sales order status changed');
               return { order: next, from: current.status };
          });

          await emitAll(
               this.events,
               [
                    domainEvent('SalesOrderStatusChanged', actor, {
                         salesOrderId,
                         from,
                         to: order.status,
                         total: salesOrderTotal(order),
                    }),
               ],
               this.log
          );
          return order;
     }
}

function expectStatus(order: SalesOrder, allowed: SalesOrderStatus[], action: string): void {
     if (!allowed.includes(order.status)) {
          throw new InvalidTransitionError('sales order', order.id, order.status, action);
     }
}

function findLine(order: SalesOrder, lineId: string): SalesLine {
     const line = order.lines.find((candidate) => candidate.id === lineId);
     if (!line) {
          throw new UnknownEntityError('sales line', `${order.id}/${lineId}`);
     }
     return line;
}

function assertUniqueLineIds(ids: string[]): void {
     const seen = new Set<string>();
     for (const id of ids) {
          if (seen.has(id)) {
               throw new InvalidQuantityError(`Duplicate line id ${id}`);
          }
          seen.add(id);
     }
}
