import { Pool } from 'pg';
import { pool } from './db/client';
import { EventPublisher, createEventPublisher } from './events/event-publisher';
import { PurchaseFulfillment } from './services/purchase-fulfillment';
import { ReservationManager } from './services/reservation-manager';
import { SalesFulfillment } from './services/sales-fulfillment';
import { StockLedger } from './services/stock-ledger';
import { TransactionJournal } from './services/transaction-journal';
import { TransferCoordinator } from './services/transfer-coordinator';
import { LedgerStore } from './stores/ledger-store';
import { MemoryLedgerStore } from './stores/memory-ledger-store';
import { MemoryRecordRepository } from './stores/memory-record-repository';
import { PgLedgerStore } from './stores/pg-ledger-store';
import { PgRecordRepository } from './stores/pg-record-repository';
import { RecordRepository } from './stores/record-repository';
import {
     OrderReservation,
     PurchaseOrder,
     SalesOrder,
     Transfer,
} from './types/inventory.types';
import { logger } from './utils/logger';

export interface EngineRepositories {
     transfers: RecordRepository<Transfer>;
     purchaseOrders: RecordRepository<PurchaseOrder>;
     salesOrders: RecordRepository<SalesOrder>;
     reservations: RecordRepository<OrderReservation>;
}

export interface StockEngine {
     store: LedgerStore;
     ledger: StockLedger;
     journal: TransactionJournal;
     reservations: ReservationManager;
     transfers: TransferCoordinator;
     purchasing: PurchaseFulfillment;
     sales: SalesFulfillment;
}

export interface StockEngineOptions {
     store: LedgerStore;
     repositories: EngineRepositories;
     publisher: EventPublisher;
}

export function createStockEngine({ store, repositories, publisher }: StockEngineOptions): StockEngine {
     const ledger = new StockLedger(store, publisher);
     const journal = new TransactionJournal(store);
     const reservations = new ReservationManager(ledger, repositories.reservations);

     return {
          store,
          ledger,
          journal,
          reservations,
          transfers: new TransferCoordinator(ledger, journal, repositories.transfers, publisher),
          purchasing: new PurchaseFulfillment(ledger, repositories.purchaseOrders, publisher),
          sales: new SalesFulfillment(ledger, reservations, repositories.salesOrders, publisher),
     };
}

export function memoryRepositories(): EngineRepositories {
     return {
          transfers: new MemoryRecordRepository<Transfer>('transfer'),
          purchaseOrders: new MemoryRecordRepository<PurchaseOrder>('purchase order'),
          salesOrders: new MemoryRecordRepository<SalesOrder>('sales order'),
          reservations: new MemoryRecordRepository<OrderReservation>('reservation'),
     };
}

export function pgRepositories(db: Pool = pool): EngineRepositories {
     return {
          transfers: new PgRecordRepository<Transfer>('transfer', db),
          purchaseOrders: new PgRecordRepository<PurchaseOrder>('purchase order', db),
          salesOrders: new PgRecordRepository<SalesOrder>('sales order', db),
          reservations: new PgRecordRepository<OrderReservation>('reservation', db),
     };
}

/**
 * Wires an engine from LEDGER_STORE (memory | pg) and EVENT_PUBLISHER (log | amqp).
 */
export function createStockEngineFromEnv(): StockEngine {
     const storeType = process.env.LEDGER_STORE || 'memory';
     const publisher = createEventPublisher();

     logger.info({ storeType, publisher: process.env.EVENT_PUBLISHER || 'log' }, 'Creating stock engine');

     if (storeType === 'memory') {
          return createStockEngine({ store: new MemoryLedgerStore(), repositories: memoryRepositories(), publisher });
     }

     return createStockEngine({ store: new PgLedgerStore(), repositories: pgRepositories(), publisher });
}
