import { Pool, PoolClient } from 'pg';
import { checkConnection, pool, withConnection, withTransaction } from '../db/client';
import {
     JournalEntry,
     JournalKind,
     JournalReference,
     NewJournalEntry,
     ReferenceKind,
     StockEntry,
     StockKey,
} from '../types/inventory.types';
import { StaleEntryError } from '../utils/errors';
import { stockKeyId } from '../utils/stock-keys';
import { LedgerStore } from './ledger-store';

interface StockEntryRow {
     product_id: number;
     location_id: number;
     on_hand: number;
     reserved: number;
     initial_on_hand: number;
     last_checked_at: Date | null;
     version: number;
     updated_at: Date;
}

interface JournalRow {
     // BIGSERIAL comes back as a string
     id: string | number;
     product_id: number;
     location_id: number;
     kind: JournalKind;
     delta: number;
     reference_kind: ReferenceKind;
     reference_id: string;
     actor: string;
     notes: string | null;
     created_at: Date;
}

const ENTRY_COLUMNS = `product_id, location_id, on_hand, reserved, initial_on_hand,
       last_checked_at, version, updated_at`;

const JOURNAL_COLUMNS = `id, product_id, location_id, kind, delta, reference_kind,
       reference_id, actor, notes, created_at`;

/**
 * PostgreSQL-backed ledger store. Each commit runs in one transaction, so the
 * counter update and its journal row are either both visible or neither is.
 */
export class PgLedgerStore implements LedgerStore {
     constructor(private readonly db: Pool = pool) {}

     async findEntry(key: StockKey): Promise<StockEntry | undefined> {
          const { rows } = await this.db.query<StockEntryRow>(
               `
      SELECT ${ENTRY_COLUMNS}
      FROM stock_entry
      WHERE product_id = $1 AND location_id = $2
    `,
               [key.productId, key.locationId]
          );

          return rows.length > 0 ? toEntry(rows[0]) : undefined;
     }

     async listEntries(productId: number): Promise<StockEntry[]> {
          const { rows } = await this.db.query<StockEntryRow>(
               `
      SELECT ${ENTRY_COLUMNS}
      FROM stock_entry
      WHERE product_id = $1
      ORDER BY location_id
    `,
               [productId]
          );

          return rows.map(toEntry);
     }

     async save(entry: StockEntry, expectedVersion: number): Promise<void> {
          await withConnection((client) => writeEntry(client, entry, expectedVersion), this.db);
     }

     async commit(
          entry: StockEntry,
          expectedVersion: number,
          journal: NewJournalEntry
     ): Promise<JournalEntry> {
          return withTransaction(async (client) => {
               await writeEntry(client, entry, expectedVersion);

               const { rows } = await client.query<JournalRow>(
                    `
        INSERT INTO stock_journal (
          product_id,
          location_id,
          kind,
          delta,
          reference_kind,
          reference_id,
          actor,
          notes,
          created_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING ${JOURNAL_COLUMNS}
      `,
                    [
                         journal.productId,
                         journal.locationId,
                         journal.kind,
                         journal.delta,
                         journal.referenceKind,
                         journal.referenceId,
                         journal.actor,
                         journal.notes ?? null,
                         journal.timestamp,
                    ]
               );

               return toJournalEntry(rows[0]);
          }, this.db);
     }

     async journalPage(key: StockKey, afterId: number, limit: number): Promise<JournalEntry[]> {
          const { rows } = await this.db.query<JournalRow>(
               `
      SELECT ${JOURNAL_COLUMNS}
      FROM stock_journal
      WHERE product_id = $1 AND location_id = $2 AND id > $3
      ORDER BY id
      LIMIT $4
    `,
               [key.productId, key.locationId, afterId, limit]
          );

          return rows.map(toJournalEntry);
     }

     async findJournalEntry(
          key: StockKey,
          reference: JournalReference
     ): Promise<JournalEntry | undefined> {
          const { rows } = await this.db.query<JournalRow>(
               `
      SELECT ${JOURNAL_COLUMNS}
      FROM stock_journal
      WHERE product_id = $1
        AND location_id = $2
        AND kind = $3
        AND reference_kind = $4
        AND reference_id = $5
      ORDER BY id
      LIMIT 1
    `,
               [key.productId, key.locationId, reference.kind, reference.referenceKind, reference.referenceId]
          );

          return rows.length > 0 ? toJournalEntry(rows[0]) : undefined;
     }

     async ping(): Promise<boolean> {
          return checkConnection(this.db);
     }
}

async function writeEntry(
     client: PoolClient,
     entry: StockEntry,
     expectedVersion: number
): Promise<void> {
     const values = [
          entry.productId,
          entry.locationId,
          entry.onHand,
          entry.reserved,
          entry.initialOnHand,
          entry.lastCheckedAt ?? null,
          entry.version,
          entry.updatedAt,
     ];

     const result =
          expectedVersion === 0
               ? await client.query(
                      `
        INSERT INTO stock_entry (${ENTRY_COLUMNS})
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        ON CONFLICT (product_id, location_id) DO NOTHING
      `,
                      values
                 )
               : await client.query(
                      `
        UPDATE stock_entry
        SET on_hand = $3,
            reserved = $4,
            initial_on_hand = $5,
            last_checked_at = $6,
            version = $7,
            updated_at = $8
        WHERE product_id = $1 AND location_id = $2 AND version = $9
      `,
                      [...values, expectedVersion]
                 );

     if ((result.rowCount ?? 0) === 0) {
          throw new StaleEntryError(stockKeyId(entry), expectedVersion);
     }
}

function toEntry(row: StockEntryRow): StockEntry {
     return {
          productId: row.product_id,
          locationId: row.location_id,
          onHand: row.on_hand,
          reserved: row.reserved,
          initialOnHand: row.initial_on_hand,
          lastCheckedAt: row.last_checked_at ?? undefined,
          version: row.version,
          updatedAt: row.updated_at,
     };
}

function toJournalEntry(row: JournalRow): JournalEntry {
     return {
          id: parseInt(String(row.id), 10),
          productId: row.product_id,
          locationId: row.location_id,
          kind: row.kind,
          delta: row.delta,
          referenceKind: row.reference_kind,
          referenceId: row.reference_id,
          actor: row.actor,
          notes: row.notes ?? undefined,
          timestamp: row.created_at,
     };
}
