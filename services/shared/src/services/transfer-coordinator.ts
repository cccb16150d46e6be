import { v4 as uuidv4 } from 'uuid';
import { EventPublisher, LogEventPublisher, domainEvent, emitAll } from '../events/event-publisher';
import { RecordRepository } from '../stores/record-repository';
import {
     CreateTransferRequest,
     JournalKind,
     JournalMeta,
     Transfer,
     TransferStatus,
} from '../types/inventory.types';
import {
     InsufficientAvailableError,
     InvalidQuantityError,
     InvalidTransitionError,
     UnknownEntityError,
} from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { createChildLogger } from '../utils/logger';
import { StockLedger, assertPositiveQuantity } from './stock-ledger';
import { TransactionJournal } from './transaction-journal';

/**
 * Moves stock between two locations as a debit at the source (dispatch)
 * followed by a credit at the destination (complete).
 *
 * The two legs touch different ledger keys and commit separately. The
 * journal doubles as the idempotency marker: each leg is applied only if no
 * journal entry for this transfer and leg exists yet. A journaled final leg
 * (destination credit or source credit-back) also fixes the outcome when the
 * status write after it failed.
 */
export class TransferCoordinator {
     private readonly transferLocks = new KeyedLock();
     private readonly log = createChildLogger({ component: 'transfer-coordinator' });

     constructor(
          private readonly ledger: StockLedger,
          private readonly journal: TransactionJournal,
          private readonly transfers: RecordRepository<Transfer>,
          private readonly events: EventPublisher = new LogEventPublisher()
     ) {}

     async create(request: CreateTransferRequest, actor: string): Promise<Transfer> {
          const { productId, sourceLocationId, destinationLocationId, quantity } = request;

          assertPositiveQuantity(quantity, 'Transfer quantity');
          if (sourceLocationId === destinationLocationId) {
               throw new InvalidQuantityError('Transfer source and destination must differ');
          }

          const source = await this.ledger.get(productId, sourceLocationId);
          if (quantity > source.available) {
               throw new InsufficientAvailableError(productId, sourceLocationId, quantity, source.available);
          }

          const transfer: Transfer = {
               id: uuidv4(),
               productId,
               sourceLocationId,
               destinationLocationId,
               quantity,
               status: 'pending',
               requestedAt: new Date().toISOString(),
               notes: request.notes,
               createdBy: actor,
          };
          await this.transfers.insert(transfer);

          this.log.info({ transferId: transfer.id, productId, sourceLocationId, destinationLocationId, quantity }, 'Transfer created');
          await this.emit(transfer, actor, undefined);
          return transfer;
     }

     async get(transferId: string): Promise<Transfer> {
          const transfer = await this.transfers.get(transferId);
          if (!transfer) {
               throw new UnknownEntityError('transfer', transferId);
          }
          return transfer;
     }

     /**
      * pending -> inTransit. Debits the source; the quantity is in flight
      * until the transfer completes or is cancelled.
      */
     async dispatch(transferId: string, actor: string): Promise<Transfer> {
          return this.transition(transferId, actor, async (transfer) => {
               this.expectStatus(transfer, ['pending'], 'dispatch');

               const settled = await this.settle(transfer);
               if (settled) return settled;

               await this.applyLeg(transfer, transfer.sourceLocationId, -transfer.quantity, {
                    kind: 'transferOut',
                    referenceKind: 'transfer',
                    referenceId: transfer.id,
                    actor,
               });

               return { ...transfer, status: 'inTransit', dispatchedAt: new Date().toISOString() };
          });
     }

     /**
      * inTransit -> completed. Credits the destination. Completing a completed
      * transfer returns it unchanged; one whose credit-back is already
      * journaled ends up cancelled.
      */
     async complete(transferId: string, actor: string): Promise<Transfer> {
          return this.transition(transferId, actor, async (transfer) => {
               if (transfer.status === 'completed') {
                    this.log.debug({ transferId }, 'Transfer already completed');
                    return transfer;
               }
               this.expectStatus(transfer, ['inTransit'], 'complete');

               const settled = await this.settle(transfer);
               if (settled) return settled;

               await this.applyLeg(transfer, transfer.destinationLocationId, transfer.quantity, {
                    kind: 'transferIn',
                    referenceKind: 'transfer',
                    referenceId: transfer.id,
                    actor,
               });

               return { ...transfer, status: 'completed', completedAt: new Date().toISOString() };
          });
     }

     /**
      * pending -> cancelled, or inTransit -> cancelled with the debit credited
      * back to the source. A transfer whose destination credit is already
      * journaled ends up completed.
      */
     async cancel(transferId: string, actor: string): Promise<Transfer> {
          return this.transition(transferId, actor, async (transfer) => {
               this.expectStatus(transfer, ['pending', 'inTransit'], 'cancel');

               const settled = await this.settle(transfer);
               if (settled) return settled;

               // A pending transfer may still carry a debit whose status write failed
               const debited =
                    transfer.status === 'inTransit' ||
                    (await this.legApplied(transfer, transfer.sourceLocationId, 'transferOut'));

               if (debited) {
                    await this.applyLeg(transfer, transfer.sourceLocationId, transfer.quantity, {
                         kind: 'transferIn',
                         referenceKind: 'transfer',
                         referenceId: transfer.id,
                         actor,
                         notes: 'transfer cancelled in transit',
                    });
               }

               return { ...transfer, status: 'cancelled', cancelledAt: new Date().toISOString() };
          });
     }

     private async transition(
          transferId: string,
          actor: string,
          step: (transfer: Transfer) => Promise<Transfer>
     ): Promise<Transfer> {
          const result = await this.transferLocks.runExclusive(
               [transferId],
               async (): Promise<{ transfer: Transfer; from?: TransferStatus }> => {
                    const transfer = await this.get(transferId);
                    const next = await step(transfer);
                    if (next === transfer) {
                         return { transfer };
                    }

                    await this.transfers.save(next);
                    this.log.info({ transferId, from: transfer.status, to: next.status }, 'Transfer status changed');
                    return { transfer: next, from: transfer.status };
               }
          );

          if (result.from !== undefined) {
               await this.emit(result.transfer, actor, result.from);
          }
          return result.transfer;
     }

     /**
      * Final status already decided by the journal, if any. Completing and
      * cancelling exclude each other, so only one of the two credits can exist.
      */
     private async settle(transfer: Transfer): Promise<Transfer | undefined> {
          const now = new Date().toISOString();

          if (await this.legApplied(transfer, transfer.destinationLocationId, 'transferIn')) {
               this.log.warn({ transferId: transfer.id, status: transfer.status }, 'Transfer already credited, completing');
               return { ...transfer, status: 'completed', completedAt: transfer.completedAt ?? now };
          }
          if (await this.legApplied(transfer, transfer.sourceLocationId, 'transferIn')) {
               this.log.warn({ transferId: transfer.id, status: transfer.status }, 'Transfer already credited back, cancelling');
               return { ...transfer, status: 'cancelled', cancelledAt: transfer.cancelledAt ?? now };
          }
          return undefined;
     }

     /**
      * Applies one ledger leg of the transfer unless the journal already has it.
      */
     private async applyLeg(
          transfer: Transfer,
          locationId: number,
          delta: number,
          meta: JournalMeta
     ): Promise<void> {
          if (await this.legApplied(transfer, locationId, meta.kind)) {
               this.log.warn({ transferId: transfer.id, locationId, kind: meta.kind }, 'Transfer leg already applied');
               return;
          }

          await this.ledger.adjust(transfer.productId, locationId, delta, meta);
     }

     private async legApplied(transfer: Transfer, locationId: number, kind: JournalKind): Promise<boolean> {
          const entry = await this.journal.findByReference(transfer.productId, locationId, {
               kind,
               referenceKind: 'transfer',
               referenceId: transfer.id,
          });
          return entry !== undefined;
     }

     private expectStatus(transfer: Transfer, allowed: TransferStatus[], action: string): void {
          if (!allowed.includes(transfer.status)) {
               throw new InvalidTransitionError('transfer', transfer.id, transfer.status, action);
          }
     }

     private async emit(transfer: Transfer, actor: string, from: TransferStatus | undefined): Promise<void> {
          await emitAll(
               this.events,
               [
                    domainEvent('TransferStatusChanged', actor, {
                         transferId: transfer.id,
                         productId: transfer.productId,
                         sourceLocationId: transfer.sourceLocationId,
                         destinationLocationId: transfer.destinationLocationId,
                         quantity: transfer.quantity,
                         from: from ?? null,
                         to: transfer.status,
                    }),
               ],
               this.log
          );
     }
}
