import { DuplicateEntityError } from '../utils/errors';
import { RecordRepository, StoredRecord } from './record-repository';

export class MemoryRecordRepository<T extends StoredRecord> implements RecordRepository<T> {
     private readonly records = new Map<string, T>();

     constructor(private readonly kind: string) {}

     async get(id: string): Promise<T | undefined> {
          const record = this.records.get(id);
          return record ? structuredClone(record) : undefined;
     }

     async insert(record: T): Promise<void> {
          if (this.records.has(record.id)) {
               throw new DuplicateEntityError(this.kind, record.id);
          }
          this.records.set(record.id, structuredClone(record));
     }

     async save(record: T): Promise<void> {
          this.records.set(record.id, structuredClone(record));
     }

     async delete(id: string): Promise<void> {
          this.records.delete(id);
     }
}
