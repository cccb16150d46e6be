import {
     JournalEntry,
     JournalReference,
     NewJournalEntry,
     StockEntry,
     StockKey,
} from '../types/inventory.types';
import { StaleEntryError } from '../utils/errors';
import { stockKeyId } from '../utils/stock-keys';
import { LedgerStore } from './ledger-store';

export class MemoryLedgerStore implements LedgerStore {
     private readonly entries = new Map<string, StockEntry>();
     private readonly journal = new Map<string, JournalEntry[]>();
     private nextJournalId = 1;

     async findEntry(key: StockKey): Promise<StockEntry | undefined> {
          const entry = this.entries.get(stockKeyId(key));
          return entry ? { ...entry } : undefined;
     }

     async listEntries(productId: number): Promise<StockEntry[]> {
          return [...this.entries.values()]
               .filter((entry) => entry.productId === productId)
               .sort((a, b) => a.locationId - b.locationId)
               .map((entry) => ({ ...entry }));
     }

     async save(entry: StockEntry, expectedVersion: number): Promise<void> {
          this.checkVersion(entry, expectedVersion);
          this.entries.set(stockKeyId(entry), { ...entry });
     }

     async commit(
          entry: StockEntry,
          expectedVersion: number,
          journal: NewJournalEntry
     ): Promise<JournalEntry> {
          this.checkVersion(entry, expectedVersion);

          const id = stockKeyId(entry);
          const appended: JournalEntry = { ...journal, id: this.nextJournalId++ };
          const log = this.journal.get(id) ?? [];
          log.push(appended);

          this.journal.set(id, log);
          this.entries.set(id, { ...entry });

          return { ...appended };
     }

     async journalPage(key: StockKey, afterId: number, limit: number): Promise<JournalEntry[]> {
          return (this.journal.get(stockKeyId(key)) ?? [])
               .filter((entry) => entry.id > afterId)
               .slice(0, limit)
               .map((entry) => ({ ...entry }));
     }

     async findJournalEntry(
          key: StockKey,
          reference: JournalReference
     ): Promise<JournalEntry | undefined> {
          const match = (this.journal.get(stockKeyId(key)) ?? []).find(
               (entry) =>
                    entry.kind === reference.kind &&
                    entry.referenceKind === reference.referenceKind &&
                    entry.referenceId === reference.referenceId
          );
          return match ? { ...match } : undefined;
     }

     async ping(): Promise<boolean> {
          return true;
     }

     private checkVersion(entry: StockEntry, expectedVersion: number): void {
          const current = this.entries.get(stockKeyId(entry));
          if ((current?.version ?? 0) !== expectedVersion) {
               throw new StaleEntryError(stockKeyId(entry), expectedVersion);
          }
     }
}
