import { LedgerStore } from '../stores/ledger-store';
import {
     JournalEntry,
     JournalReference,
     Reconciliation,
     StockKey,
} from '../types/inventory.types';
import { UnknownEntityError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { stockKeyId } from '../utils/stock-keys';

const DEFAULT_PAGE_SIZE = parseInt(process.env.JOURNAL_PAGE_SIZE || '100', 10);

/**
 * Read side of the append-only stock journal. Appends happen only through
 * the ledger store's commit, together with the counter they explain.
 */
export class TransactionJournal {
     private readonly log = createChildLogger({ component: 'transaction-journal' });

     constructor(private readonly store: LedgerStore) {}

     /**
      * Lazy sequence of a key's journal in insertion order. Each iteration
      * starts a fresh cursor, so the sequence can be replayed.
      */
     entriesFor(
          productId: number,
          locationId: number,
          options: { pageSize?: number } = {}
     ): AsyncIterable<JournalEntry> {
          const store = this.store;
          const key: StockKey = { productId, locationId };
          const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;

          return {
               async *[Symbol.asyncIterator]() {
                    let afterId = 0;
                    for (;;) {
                         const page = await store.journalPage(key, afterId, pageSize);
                         yield* page;
                         if (page.length < pageSize) return;
                         afterId = page[page.length - 1].id;
                    }
               },
          };
     }

     async sumDeltas(productId: number, locationId: number): Promise<number> {
          let total = 0;
          for await (const entry of this.entriesFor(productId, locationId)) {
               total += entry.delta;
          }
          return total;
     }

     async findByReference(
          productId: number,
          locationId: number,
          reference: JournalReference
     ): Promise<JournalEntry | undefined> {
          return this.store.findJournalEntry({ productId, locationId }, reference);
     }

     /**
      * Replays the journal against the stored counter:
      * onHand - initialOnHand must equal the sum of journal deltas.
      */
     async reconcile(productId: number, locationId: number): Promise<Reconciliation> {
          const key = { productId, locationId };
          const entry = await this.store.findEntry(key);
          if (!entry) {
               throw new UnknownEntityError('stock entry', stockKeyId(key));
          }

          const journalTotal = await this.sumDeltas(productId, locationId);
          const balanced = entry.onHand - entry.initialOnHand === journalTotal;

          if (!balanced) {
               this.log.error(
                    { productId, locationId, onHand: entry.onHand, initialOnHand: entry.initialOnHand, journalTotal },
                    'Stock entry does not match its journal'
               );
          }

          return {
               productId,
               locationId,
               onHand: entry.onHand,
               initialOnHand: entry.initialOnHand,
               journalTotal,
               balanced,
          };
     }
}
