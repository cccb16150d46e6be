import { EventPublisher, LogEventPublisher, domainEvent, emitAll } from '../events/event-publisher';
import { RecordRepository } from '../stores/record-repository';
import {
     CreatePurchaseOrderRequest,
     LineReceipt,
     PurchaseLine,
     PurchaseLineInput,
     PurchaseOrder,
     PurchaseOrderStatus,
} from '../types/inventory.types';
import { CompensationStack } from '../utils/compensation';
import {
     InvalidQuantityError,
     InvalidTransitionError,
     OverReceiptError,
     UnknownEntityError,
} from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { createChildLogger } from '../utils/logger';
import { StockLedger, assertPositiveQuantity } from './stock-ledger';

const OPEN_STATUSES: PurchaseOrderStatus[] = ['draft', 'submitted', 'approved', 'shipped'];

export function lineTotal(quantity: number, unitPrice: number): number {
     return Math.round(quantity * unitPrice * 100) / 100;
}

export function purchaseOrderTotal(order: PurchaseOrder): number {
     const cents = order.lines.reduce(
          (sum, line) => sum + Math.round(lineTotal(line.quantityOrdered, line.unitPrice) * 100),
          0
     );
     return cents / 100;
}

function validateLine(line: PurchaseLineInput): void {
     assertPositiveQuantity(line.quantityOrdered, `Ordered quantity of line ${line.id}`);
     if (!Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
          throw new InvalidQuantityError(`Unit price of line ${line.id} must be non-negative`);
     }
}

/**
 * Purchase order lifecycle: draft -> submitted -> approved -> shipped -> received,
 * with cancellation from any open status. Receipts credit the ledger.
 */
export class PurchaseFulfillment {
     private readonly orderLocks = new KeyedLock();
     private readonly log = createChildLogger({ component: 'purchase-fulfillment' });

     constructor(
          private readonly ledger: StockLedger,
          private readonly orders: RecordRepository<PurchaseOrder>,
          private readonly events: EventPublisher = new LogEventPublisher()
     ) {}

     async createOrder(request: CreatePurchaseOrderRequest, actor: string): Promise<PurchaseOrder> {
          request.lines.forEach(validateLine);
          assertUniqueLineIds(request.lines.map((line) => line.id));

          const now = new Date().toISOString();
          const order: PurchaseOrder = {
               id: request.id,
               supplierId: request.supplierId,
               status: 'draft',
               orderDate: request.orderDate ?? now.slice(0, 10),
               expectedDeliveryDate: request.expectedDeliveryDate,
               notes: request.notes,
               createdBy: actor,
               lines: request.lines.map((line) => ({ ...line, quantityReceived: 0 })),
               updatedAt: now,
          };
          await this.orders.insert(order);

          this.log.info({ purchaseOrderId: order.id, lineCount: order.lines.length }, 'Purchase order created');
          return order;
     }

     async get(purchaseOrderId: string): Promise<PurchaseOrder> {
          const order = await this.orders.get(purchaseOrderId);
          if (!order) {
               throw new UnknownEntityError('purchase order', purchaseOrderId);
          }
          return order;
     }

     async addLine(purchaseOrderId: string, line: PurchaseLineInput, actor: string): Promise<PurchaseOrder> {
          validateLine(line);
          return this.edit(purchaseOrderId, actor, 'add line to', (order) => {
               assertUniqueLineIds([...order.lines.map((existing) => existing.id), line.id]);
               return [...order.lines, { ...line, quantityReceived: 0 }];
          });
     }

     async updateLine(
          purchaseOrderId: string,
          lineId: string,
          changes: Partial<Pick<PurchaseLine, 'quantityOrdered' | 'unitPrice'>>,
          actor: string
     ): Promise<PurchaseOrder> {
          return this.edit(purchaseOrderId, actor, 'update line of', (order) => {
               const line = findLine(order, lineId);
               const updated = { ...line, ...changes };
               validateLine(updated);
               return order.lines.map((existing) => (existing.id === lineId ? updated : existing));
          });
     }

     async removeLine(purchaseOrderId: string, lineId: string, actor: string): Promise<PurchaseOrder> {
          return this.edit(purchaseOrderId, actor, 'remove line from', (order) => {
               findLine(order, lineId);
               return order.lines.filter((existing) => existing.id !== lineId);
          });
     }

     async submit(purchaseOrderId: string, actor: string): Promise<PurchaseOrder> {
          return this.transition(purchaseOrderId, actor, async (order) => {
               expectStatus(order, ['draft'], 'submit');
               if (order.lines.length === 0) {
                    throw new InvalidQuantityError('Purchase order must have at least one line');
               }
               return { ...order, status: 'submitted' };
          });
     }

     async approve(purchaseOrderId: string, actor: string): Promise<PurchaseOrder> {
          return this.transition(purchaseOrderId, actor, async (order) => {
               expectStatus(order, ['submitted'], 'approve');
               return { ...order, status: 'approved' };
          });
     }

     async markShipped(purchaseOrderId: string, actor: string): Promise<PurchaseOrder> {
          return this.transition(purchaseOrderId, actor, async (order) => {
               expectStatus(order, ['approved'], 'ship');
               return { ...order, status: 'shipped' };
          });
     }

     async cancel(purchaseOrderId: string, actor: string): Promise<PurchaseOrder> {
          return this.transition(purchaseOrderId, actor, async (order) => {
               expectStatus(order, OPEN_STATUSES, 'cancel');
               return { ...order, status: 'cancelled' };
          });
     }

     /**
      * Books received quantities into stock at the receiving locations. All
      * receipts of one call commit together. The order becomes `received`
      * once every line is fully received.
      */
     async receive(purchaseOrderId: string, receipts: LineReceipt[], actor: string): Promise<PurchaseOrder> {
          if (receipts.length === 0) {
               throw new InvalidQuantityError('Receipt must have at least one line');
          }

          return this.transition(purchaseOrderId, actor, async (order) => {
               expectStatus(order, ['shipped'], 'receive');

               const received = new Map(order.lines.map((line) => [line.id, line.quantityReceived]));
               const postings = receipts.map((receipt) => {
                    assertPositiveQuantity(receipt.quantity, `Received quantity of line ${receipt.lineId}`);
                    const line = findLine(order, receipt.lineId);
                    const soFar = received.get(line.id) ?? 0;

                    if (soFar + receipt.quantity > line.quantityOrdered) {
                         throw new OverReceiptError(order.id, line.id, line.quantityOrdered, soFar, receipt.quantity);
                    }
                    received.set(line.id, soFar + receipt.quantity);
                    return { receipt, productId: line.productId };
               });

               const lines = order.lines.map((line) => ({
                    ...line,
                    quantityReceived: received.get(line.id) ?? line.quantityReceived,
               }));
               const complete = lines.every((line) => line.quantityReceived === line.quantityOrdered);
               const next: PurchaseOrder = {
                    ...order,
                    lines,
                    status: complete ? 'received' : 'shipped',
                    actualDeliveryDate: complete ? new Date().toISOString().slice(0, 10) : order.actualDeliveryDate,
               };

               const keys = postings.map(({ receipt, productId }) => ({ productId, locationId: receipt.locationId }));
               await this.ledger.withEntries(keys, async (session) => {
                    const undo = new CompensationStack(this.log);
                    try {
                         for (const { receipt, productId } of postings) {
                              await session.adjust(productId, receipt.locationId, receipt.quantity, {
                                   kind: 'purchase',
                                   referenceKind: 'poLine',
                                   referenceId: receipt.lineId,
                                   actor,
                              });
                              undo.push(`reverse receipt of line ${receipt.lineId}`, () =>
                                   session.adjust(productId, receipt.locationId, -receipt.quantity, {
                                        kind: 'adjustment',
                                        referenceKind: 'poLine',
                                        referenceId: receipt.lineId,
                                        actor,
                                        notes: 'receipt rolled back',
                                   })
                              );
                         }
                         await this.orders.save(next);
                    } catch (err) {
                         await undo.unwind();
                         throw err;
                    }
               });

               this.log.info(
                    { purchaseOrderId: order.id, receiptCount: receipts.length, complete },
                    'Purchase order receipt booked'
               );
               return next;
          });
     }

     private async edit(
          purchaseOrderId: string,
          actor: string,
          action: string,
          change: (order: PurchaseOrder) => PurchaseLine[]
     ): Promise<PurchaseOrder> {
          return this.orderLocks.runExclusive([purchaseOrderId], async () => {
               const order = await this.get(purchaseOrderId);
               expectStatus(order, ['draft'], action);

               const next = { ...order, lines: change(order), updatedAt: new Date().toISOString() };
               await this.orders.save(next);

               this.log.debug(
                    { purchaseOrderId, lineCount: next.lines.length, total: purchaseOrderTotal(next), actor },
                    'Purchase order lines edited'
               );
               return next;
          });
     }

     /**
      * Runs a status change under the order lock and saves the stepped order.
      */
     private async transition(
          purchaseOrderId: string,
          actor: string,
          step: (order: PurchaseOrder) => Promise<PurchaseOrder>
     ): Promise<PurchaseOrder> {
          const { order, from } = await this.orderLocks.runExclusive([purchaseOrderId], async () => {
               const current = await this.get(purchaseOrderId);
               const stepped = await step(current);
               const next = { ...stepped, updatedAt: new Date().toISOString() };
               await this.orders.save(next);

               if (next.status !== current.status) {
                    this.log.info(
                         { purchaseOrderId, from: current.status, to: next.status },
                         'Purchase order status changed'
                    );
               }
               return { order: next, from: current.status };
          });

          if (order.status !== from) {
               await emitAll(
                    this.events,
                    [
                         domainEvent('PurchaseOrderStatusChanged', actor, {
                              purchaseOrderId,
                              from,
                              to: order.status,
                              total: purchaseOrderTotal(order),
                         }),
                    ],
                    this.log
               );
          }
          return order;
     }
}

function expectStatus(order: PurchaseOrder, allowed: PurchaseOrderStatus[], action: string): void {
     if (!allowed.includes(order.status)) {
          throw new InvalidTransitionError('purchase order', order.id, order.status, action);
     }
}

function findLine(order: PurchaseOrder, lineId: string): PurchaseLine {
     const line = order.lines.find((candidate) => candidate.id === lineId);
     if (!line) {
          throw new UnknownEntityError('purchase line', `${order.id}/${lineId}`);
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
