import {
     JournalEntry,
     JournalReference,
     NewJournalEntry,
     StockEntry,
     StockKey,
} from '../types/inventory.types';

/**
 * Durable backing of the stock ledger and its journal.
 *
 * Writes are compare-and-swap on `StockEntry.version`: `expectedVersion` is the
 * version the caller read (0 for a key that does not exist yet) and the store
 * rejects the write with `StaleEntryError` if the row moved on in between.
 */
export interface LedgerStore {
     findEntry(key: StockKey): Promise<StockEntry | undefined>;
     listEntries(productId: number): Promise<StockEntry[]>;

     /** Writes the entry without a journal entry (provisioning, reservations, stock checks). */
     save(entry: StockEntry, expectedVersion: number): Promise<void>;

     /** Writes the entry and appends the journal entry as one atomic unit. */
     commit(entry: StockEntry, expectedVersion: number, journal: NewJournalEntry): Promise<JournalEntry>;

     /** Journal entries for a key with id > afterId, ascending by id. */
     journalPage(key: StockKey, afterId: number, limit: number): Promise<JournalEntry[]>;
     findJournalEntry(key: StockKey, reference: JournalReference): Promise<JournalEntry | undefined>;

     ping(): Promise<boolean>;
}
