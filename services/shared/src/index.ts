// Database
export * from './db/client';

// Messaging
export * from './messaging/client';
export * from './events/event-publisher';

// Stores
export * from './stores/ledger-store';
export * from './stores/memory-ledger-store';
export * from './stores/pg-ledger-store';
export * from './stores/record-repository';
export * from './stores/memory-record-repository';
export * from './stores/pg-record-repository';

// Services
export * from './services/stock-ledger';
export * from './services/transaction-journal';
export * from './services/reservation-manager';
export * from './services/transfer-coordinator';
export * from './services/purchase-fulfillment';
export * from './services/sales-fulfillment';
export * from './engine';

// Types
export * from './types/inventory.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/keyed-lock';
export * from './utils/compensation';
export * from './utils/stock-keys';
