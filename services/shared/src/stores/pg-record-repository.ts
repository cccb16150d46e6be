import { Pool } from 'pg';
import { pool } from '../db/client';
import { DuplicateEntityError } from '../utils/errors';
import { RecordRepository, StoredRecord } from './record-repository';

/**
 * Stores records as JSONB documents in `engine_record`, one `kind` per repository.
 */
export class PgRecordRepository<T extends StoredRecord> implements RecordRepository<T> {
     constructor(
          private readonly kind: string,
          private readonly db: Pool = pool
     ) {}

     async get(id: string): Promise<T | undefined> {
          const { rows } = await this.db.query<{ body: T }>(
               `SELECT body FROM engine_record WHERE kind = $1 AND id = $2`,
               [this.kind, id]
          );
          return rows.length > 0 ? rows[0].body : undefined;
     }

     async insert(record: T): Promise<void> {
          const result = await this.db.query(
               `
      INSERT INTO engine_record (kind, id, body)
      VALUES ($1, $2, $3::jsonb)
      ON CONFLICT (kind, id) DO NOTHING
    `,
               [this.kind, record.id, JSON.stringify(record)]
          );

          if ((result.rowCount ?? 0) === 0) {
               throw new DuplicateEntityError(this.kind, record.id);
          }
     }

     async save(record: T): Promise<void> {
          await this.db.query(
               `
      INSERT INTO engine_record (kind, id, body)
      VALUES ($1, $2, $3::jsonb)
      ON CONFLICT (kind, id) DO UPDATE
      SET body = EXCLUDED.body,
          updated_at = NOW()
    `,
               [this.kind, record.id, JSON.stringify(record)]
          );
     }

     async delete(id: string): Promise<void> {
          await this.db.query(`DELETE FROM engine_record WHERE kind = $1 AND id = $2`, [
               this.kind,
               id,
          ]);
     }
}
