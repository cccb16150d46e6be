import type { Logger } from 'pino';
import { LedgerStore } from '../stores/ledger-store';
import { EventPublisher, LogEventPublisher, domainEvent, emitAll } from '../events/event-publisher';
import {
     DomainEvent,
     JournalMeta,
     StockEntry,
     StockKey,
     StockLevel,
} from '../types/inventory.types';
import {
     InsufficientAvailableError,
     InsufficientStockError,
     InvalidQuantityError,
     OverReleaseError,
     UnknownEntityError,
} from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { createChildLogger } from '../utils/logger';
import { compareStockKeyIds, parseStockKeyId, stockKeyId } from '../utils/stock-keys';

export interface ProvisionRequest {
     onHand: number;
     reserved?: number;
     lastCheckedAt?: Date;
}

export function toStockLevel(entry: StockEntry): StockLevel {
     return Object.freeze({
          ...entry,
          get available(): number {
               return this.onHand - this.reserved;
          },
     });
}

export function assertPositiveQuantity(quantity: number, what: string): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidQuantityError(`${what} must be a positive integer, got ${quantity}`);
     }
}

/**
 * Mutation handle over a set of locked stock keys. Obtained from
 * {@link StockLedger.withEntries}; touching a key outside the set is a bug.
 */
export class LedgerSession {
     private readonly events: DomainEvent[] = [];

     constructor(
          private readonly store: LedgerStore,
          private readonly held: ReadonlySet<string>,
          private readonly log: Logger
     ) {}

     async find(productId: number, locationId: number): Promise<StockLevel | undefined> {
          const entry = await this.store.findEntry({ productId, locationId });
          return entry ? toStockLevel(entry) : undefined;
     }

     async get(productId: number, locationId: number): Promise<StockLevel> {
          return toStockLevel(await this.load({ productId, locationId }));
     }

     async provision(
          productId: number,
          locationId: number,
          request: ProvisionRequest,
          actor: string
     ): Promise<StockLevel> {
          const key = { productId, locationId };
          this.assertHeld(key);

          const reserved = request.reserved ?? 0;
          if (!Number.isInteger(request.onHand) || request.onHand < 0) {
               throw new InvalidQuantityError(`Opening on-hand must be a non-negative integer, got ${request.onHand}`);
          }
          if (!Number.isInteger(reserved) || reserved < 0 || reserved > request.onHand) {
               throw new InvalidQuantityError(
                    `Opening reserved must be an integer between 0 and ${request.onHand}, got ${reserved}`
               );
          }

          const existing = await this.store.findEntry(key);
          if (existing) {
               this.log.warn({ productId, locationId }, 'Stock entry already provisioned');
               return toStockLevel(existing);
          }

          const entry: StockEntry = {
               productId,
               locationId,
               onHand: request.onHand,
               reserved,
               initialOnHand: request.onHand,
               lastCheckedAt: request.lastCheckedAt,
               version: 1,
               updatedAt: new Date(),
          };
          await this.store.save(entry, 0);

          this.log.info({ productId, locationId, onHand: entry.onHand, reserved, actor }, 'Stock entry provisioned');
          return toStockLevel(entry);
     }

     /**
      * Applies a signed delta to on-hand and journals it in the same commit.
      * A key that was never seen starts from zero.
      */
     async adjust(
          productId: number,
          locationId: number,
          delta: number,
          meta: JournalMeta
     ): Promise<StockLevel> {
          const key = { productId, locationId };
          this.assertHeld(key);

          if (!Number.isInteger(delta) || delta === 0) {
               throw new InvalidQuantityError(`Adjustment delta must be a non-zero integer, got ${delta}`);
          }

          const current = (await this.store.findEntry(key)) ?? emptyEntry(key);
          const onHand = current.onHand + delta;

          if (onHand < 0 || onHand < current.reserved) {
               throw new InsufficientStockError(productId, locationId, delta, current.onHand, current.reserved);
          }

          const next: StockEntry = {
               ...current,
               onHand,
               version: current.version + 1,
               updatedAt: new Date(),
          };
          const journal = await this.store.commit(next, current.version, {
               ...meta,
               productId,
               locationId,
               delta,
               timestamp: next.updatedAt,
          });

          const level = toStockLevel(next);
          this.events.push(
               domainEvent('StockAdjusted', meta.actor, {
                    productId,
                    locationId,
                    delta,
                    kind: meta.kind,
                    referenceKind: meta.referenceKind,
                    referenceId: meta.referenceId,
                    journalId: journal.id,
                    onHand: level.onHand,
                    reserved: level.reserved,
                    available: level.available,
               })
          );
          this.log.debug({ productId, locationId, delta, onHand, journalId: journal.id }, 'Stock adjusted');

          return level;
     }

     async reserve(
          productId: number,
          locationId: number,
          quantity: number,
          actor: string
     ): Promise<StockLevel> {
          const key = { productId, locationId };
          this.assertHeld(key);
          assertPositiveQuantity(quantity, 'Reservation quantity');

          const current = await this.load(key);
          const available = current.onHand - current.reserved;

          if (quantity > available) {
               throw new InsufficientAvailableError(productId, locationId, quantity, available);
          }

          const next = await this.write(current, { reserved: current.reserved + quantity });
          this.events.push(
               domainEvent('StockReserved', actor, {
                    productId,
                    locationId,
                    quantity,
                    reserved: next.reserved,
                    available: next.available,
               })
          );

          return next;
     }

     async release(
          productId: number,
          locationId: number,
          quantity: number,
          actor: string
     ): Promise<StockLevel> {
          const key = { productId, locationId };
          this.assertHeld(key);
          assertPositiveQuantity(quantity, 'Release quantity');

          const current = await this.load(key);
          if (quantity > current.reserved) {
               throw new OverReleaseError(productId, locationId, quantity, current.reserved);
          }

          const next = await this.write(current, { reserved: current.reserved - quantity });
          this.events.push(
               domainEvent('StockReleased', actor, {
                    productId,
                    locationId,
                    quantity,
                    reserved: next.reserved,
                    available: next.available,
               })
          );

          return next;
     }

     /**
      * Converts a reservation into a stock debit: reserved and on-hand drop by
      * the same quantity in one journaled commit.
      */
     async consumeReserved(
          productId: number,
          locationId: number,
          quantity: number,
          meta: JournalMeta
     ): Promise<StockLevel> {
          const key = { productId, locationId };
          this.assertHeld(key);
          assertPositiveQuantity(quantity, 'Consumed quantity');

          const current = await this.load(key);
          if (quantity > current.reserved) {
               throw new OverReleaseError(productId, locationId, quantity, current.reserved);
          }

          const next: StockEntry = {
               ...current,
               onHand: current.onHand - quantity,
               reserved: current.reserved - quantity,
               version: current.version + 1,
               updatedAt: new Date(),
          };
          const journal = await this.store.commit(next, current.version, {
               ...meta,
               productId,
               locationId,
               delta: -quantity,
               timestamp: next.updatedAt,
          });

          const level = toStockLevel(next);
          this.events.push(
               domainEvent('StockAdjusted', meta.actor, {
                    productId,
                    locationId,
                    delta: -quantity,
                    released: quantity,
                    kind: meta.kind,
                    referenceKind: meta.referenceKind,
                    referenceId: meta.referenceId,
                    journalId: journal.id,
                    onHand: level.onHand,
                    reserved: level.reserved,
                    available: level.available,
               })
          );

          return level;
     }

     async recordStockCheck(
          productId: number,
          locationId: number,
          checkedAt: Date,
          actor: string
     ): Promise<StockLevel> {
          const key = { productId, locationId };
          this.assertHeld(key);

          const current = await this.load(key);
          const next = await this.write(current, { lastCheckedAt: checkedAt });
          this.log.info({ productId, locationId, checkedAt, actor }, 'Stock check recorded');
          return next;
     }

     /** Locked keys of one product, ascending by location. */
     heldKeys(productId: number): StockKey[] {
          return [...this.held]
               .map(parseStockKeyId)
               .filter((key) => key.productId === productId)
               .sort((a, b) => a.locationId - b.locationId);
     }

     drainEvents(): DomainEvent[] {
          return this.events.splice(0, this.events.length);
     }

     private async load(key: StockKey): Promise<StockEntry> {
          const entry = await this.store.findEntry(key);
          if (!entry) {
               throw new UnknownEntityError('stock entry', stockKeyId(key));
          }
          return entry;
     }

     private async write(
          current: StockEntry,
          changes: Partial<Pick<StockEntry, 'reserved' | 'lastCheckedAt'>>
     ): Promise<StockLevel> {
          const next: StockEntry = {
               ...current,
               ...changes,
               version: current.version + 1,
               updatedAt: new Date(),
          };
          await this.store.save(next, current.version);
          return toStockLevel(next);
     }

     private assertHeld(key: StockKey): void {
          if (!this.held.has(stockKeyId(key))) {
               throw new Error(`Stock entry ${stockKeyId(key)} is not locked by this session`);
          }
     }
}

/**
 * Authoritative per-(product, location) stock counters.
 *
 * Every mutation runs under the key's lock, so writers of one key are
 * serialized while disjoint keys proceed independently.
 */
export class StockLedger {
     private readonly locks = new KeyedLock(compareStockKeyIds);
     private readonly log = createChildLogger({ component: 'stock-ledger' });

     constructor(
          private readonly store: LedgerStore,
          private readonly events: EventPublisher = new LogEventPublisher()
     ) {}

     /**
      * Locks `keys` in global order and runs `fn` with a session over them.
      * Events of committed mutations are published once the locks are released.
      */
     async withEntries<T>(keys: StockKey[], fn: (session: LedgerSession) => Promise<T>): Promise<T> {
          const ids = keys.map(stockKeyId);
          const release = await this.locks.acquire(ids);
          const session = new LedgerSession(this.store, new Set(ids), this.log);

          try {
               return await fn(session);
          } finally {
               release();
               await emitAll(this.events, session.drainEvents(), this.log);
          }
     }

     async provision(
          productId: number,
          locationId: number,
          request: ProvisionRequest,
          actor: string
     ): Promise<StockLevel> {
          return this.withEntries([{ productId, locationId }], (session) =>
               session.provision(productId, locationId, request, actor)
          );
     }

     async adjust(
          productId: number,
          locationId: number,
          delta: number,
          meta: JournalMeta
     ): Promise<StockLevel> {
          return this.withEntries([{ productId, locationId }], (session) =>
               session.adjust(productId, locationId, delta, meta)
          );
     }

     async reserve(
          productId: number,
          locationId: number,
          quantity: number,
          actor: string
     ): Promise<StockLevel> {
          return this.withEntries([{ productId, locationId }], (session) =>
               session.reserve(productId, locationId, quantity, actor)
          );
     }

     async release(
          productId: number,
          locationId: number,
          quantity: number,
          actor: string
     ): Promise<StockLevel> {
          return this.withEntries([{ productId, locationId }], (session) =>
               session.release(productId, locationId, quantity, actor)
          );
     }

     async recordStockCheck(
          productId: number,
          locationId: number,
          checkedAt: Date,
          actor: string
     ): Promise<StockLevel> {
          return this.withEntries([{ productId, locationId }], (session) =>
               session.recordStockCheck(productId, locationId, checkedAt, actor)
          );
     }

     async find(productId: number, locationId: number): Promise<StockLevel | undefined> {
          const entry = await this.store.findEntry({ productId, locationId });
          return entry ? toStockLevel(entry) : undefined;
     }

     async get(productId: number, locationId: number): Promise<StockLevel> {
          const level = await this.find(productId, locationId);
          if (!level) {
               throw new UnknownEntityError('stock entry', stockKeyId({ productId, locationId }));
          }
          return level;
     }

     async listForProduct(productId: number): Promise<StockLevel[]> {
          const entries = await this.store.listEntries(productId);
          return entries.map(toStockLevel);
     }
}

function emptyEntry(key: StockKey): StockEntry {
     return {
          ...key,
          onHand: 0,
          reserved: 0,
          initialOnHand: 0,
          version: 0,
          updatedAt: new Date(),
     };
}
