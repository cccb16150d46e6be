// Type definitions for domain models

export interface StockKey {
     productId: number;
     locationId: number;
}

/**
 * Persisted counter pair for one product at one location.
 * `available` is not stored; the ledger derives it on read.
 */
export interface StockEntry extends StockKey {
     onHand: number;
     reserved: number;
     initialOnHand: number;
     lastCheckedAt?: Date;
     version: number;
     updatedAt: Date;
}

export interface StockLevel extends StockEntry {
     readonly available: number;
}

export type JournalKind = 'purchase' | 'sale' | 'adjustment' | 'transferIn' | 'transferOut' | 'return';

export type ReferenceKind = 'poLine' | 'saleLine' | 'adjustment' | 'transfer';

export interface JournalMeta {
     kind: JournalKind;
     referenceKind: ReferenceKind;
     referenceId: string;
     actor: string;
     notes?: string;
}

export interface NewJournalEntry extends StockKey, JournalMeta {
     delta: number;
     timestamp: Date;
}

export interface JournalEntry extends NewJournalEntry {
     id: number;
}

export interface JournalReference {
     kind: JournalKind;
     referenceKind: ReferenceKind;
     referenceId: string;
}

export interface Reconciliation extends StockKey {
     onHand: number;
     initialOnHand: number;
     journalTotal: number;
     balanced: boolean;
}

// Transfers

export type TransferStatus = 'pending' | 'inTransit' | 'completed' | 'cancelled';

export interface Transfer {
     id: string;
     productId: number;
     sourceLocationId: number;
     destinationLocationId: number;
     quantity: number;
     status: TransferStatus;
     requestedAt: string;
     dispatchedAt?: string;
     completedAt?: string;
     cancelledAt?: string;
     notes?: string;
     createdBy: string;
}

export interface CreateTransferRequest {
     productId: number;
     sourceLocationId: number;
     destinationLocationId: number;
     quantity: number;
     notes?: string;
}

// Purchase orders

export type PurchaseOrderStatus = 'draft' | 'submitted' | 'approved' | 'shipped' | 'received' | 'cancelled';

export interface PurchaseLine {
     id: string;
     productId: number;
     quantityOrdered: number;
     unitPrice: number;
     quantityReceived: number;
}

export interface PurchaseOrder {
     id: string;
     supplierId: number;
     status: PurchaseOrderStatus;
     orderDate: string;
     expectedDeliveryDate?: string;
     actualDeliveryDate?: string;
     notes?: string;
     createdBy: string;
     lines: PurchaseLine[];
     updatedAt: string;
}

export interface PurchaseLineInput {
     id: string;
     productId: number;
     quantityOrdered: number;
     unitPrice: number;
}

export interface CreatePurchaseOrderRequest {
     id: string;
     supplierId: number;
     lines: PurchaseLineInput[];
     orderDate?: string;
     expectedDeliveryDate?: string;
     notes?: string;
}

export interface LineReceipt {
     lineId: string;
     quantity: number;
     locationId: number;
}

// Sales orders

export type SalesOrderStatus = 'pending' | 'processing' | 'shipped' | 'delivered' | 'cancelled';

export interface SalesLine {
     id: string;
     productId: number;
     quantity: number;
     unitPrice: number;
     locationId?: number;
}

export interface SalesOrder {
     id: string;
     customerId?: number;
     status: SalesOrderStatus;
     orderDate: string;
     notes?: string;
     createdBy: string;
     lines: SalesLine[];
     shippedAt?: string;
     deliveredAt?: string;
     cancelledAt?: string;
     updatedAt: string;
}

export interface CreateSalesOrderRequest {
     id: string;
     customerId?: number;
     lines: SalesLine[];
     orderDate?: string;
     notes?: string;
}

// Reservations

export interface ReservationRequestLine {
     lineId: string;
     productId: number;
     quantity: number;
     locationId?: number;
}

export interface ReservedLine extends StockKey {
     lineId: string;
     quantity: number;
}

export interface OrderReservation {
     id: string;
     lines: ReservedLine[];
     createdAt: string;
}

// Domain events

export type DomainEventType =
     | 'StockAdjusted'
     | 'StockReserved'
     | 'StockReleased'
     | 'TransferStatusChanged'
     | 'PurchaseOrderStatusChanged'
     | 'SalesOrderStatusChanged';

export interface DomainEvent {
     type: DomainEventType;
     actor: string;
     payload: Record<string, unknown>;
     occurredAt: string;
}
