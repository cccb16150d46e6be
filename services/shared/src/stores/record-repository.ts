export interface StoredRecord {
     id: string;
}

/**
 * Keyed document storage for workflow state (transfers, orders, reservations).
 */
export interface RecordRepository<T extends StoredRecord> {
     get(id: string): Promise<T | undefined>;
     /** Fails with DuplicateEntityError when the id is taken. */
     insert(record: T): Promise<void>;
     save(record: T): Promise<void>;
     delete(id: string): Promise<void>;
}
