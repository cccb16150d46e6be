// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly productId: number,
          public readonly locationId: number,
          public readonly delta: number,
          public readonly onHand: number,
          public readonly reserved: number
     ) {
          super(
               `Insufficient stock for product ${productId} at location ${locationId}: ` +
                    `delta ${delta}, on hand ${onHand}, reserved ${reserved}`,
               'INSUFFICIENT_STOCK',
               409
          );
     }
}

export class InsufficientAvailableError extends DomainError {
     constructor(
          public readonly productId: number,
          public readonly locationId: number,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient available quantity for product ${productId} at location ${locationId}: ` +
                    `requested ${requested}, available ${available}`,
               'INSUFFICIENT_AVAILABLE',
               409
          );
     }
}

export class OverReleaseError extends DomainError {
     constructor(
          public readonly productId: number,
          public readonly locationId: number,
          public readonly requested: number,
          public readonly reserved: number
     ) {
          super(
               `Cannot release ${requested} of product ${productId} at location ${locationId}: only ${reserved} reserved`,
               'OVER_RELEASE',
               409
          );
     }
}

export class OverReceiptError extends DomainError {
     constructor(
          public readonly purchaseOrderId: string,
          public readonly lineId: string,
          public readonly quantityOrdered: number,
          public readonly quantityReceived: number,
          public readonly requested: number
     ) {
          super(
               `Receipt of ${requested} on line ${lineId} of purchase order ${purchaseOrderId} exceeds ordered quantity ` +
                    `(ordered ${quantityOrdered}, received ${quantityReceived})`,
               'OVER_RECEIPT',
               409
          );
     }
}

export class InvalidTransitionError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly entityId: string,
          public readonly from: string,
          public readonly action: string
     ) {
          super(`Cannot ${action} ${entity} ${entityId} in status ${from}`, 'INVALID_TRANSITION', 409);
     }
}

export interface FailedLine {
     lineId: string;
     productId: number;
     quantity: number;
}

export class PartialReservationFailureError extends DomainError {
     constructor(
          public readonly orderId: string,
          public readonly failedLine: FailedLine,
          public readonly lineError: DomainError
     ) {
          super(
               `Reservation for order ${orderId} rolled back: line ${failedLine.lineId} failed (${lineError.message})`,
               'PARTIAL_RESERVATION_FAILURE',
               409
          );
     }
}

export class UnknownEntityError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly entityId: string
     ) {
          super(`Unknown ${entity} ${entityId}`, 'UNKNOWN_ENTITY', 404);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class OrderAlreadyReservedError extends DomainError {
     constructor(
          public readonly orderId: string,
          message: string = `Order ${orderId} already holds reservations`
     ) {
          super(message, 'ORDER_ALREADY_RESERVED', 409);
     }
}

export class DuplicateEntityError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly entityId: string
     ) {
          super(`${entity} ${entityId} already exists`, 'DUPLICATE_ENTITY', 409);
     }
}

/**
 * Thrown by a store when the row changed since it was read (compare-and-swap miss).
 */
export class StaleEntryError extends DomainError {
     constructor(
          public readonly key: string,
          public readonly expectedVersion: number
     ) {
          super(
               `Stock entry ${key} was modified concurrently (expected version ${expectedVersion})`,
               'STALE_ENTRY',
               409
          );
     }
}
