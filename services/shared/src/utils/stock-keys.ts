import { StockKey } from '../types/inventory.types';

export function stockKeyId(key: StockKey): string {
     return `${key.productId}:${key.locationId}`;
}

export function parseStockKeyId(id: string): StockKey {
     const [productId, locationId] = id.split(':').map((part) => parseInt(part, 10));
     return { productId, locationId };
}

// Global lock order: ascending productId, then locationId
export function compareStockKeyIds(a: string, b: string): number {
     const left = parseStockKeyId(a);
     const right = parseStockKeyId(b);
     return left.productId - right.productId || left.locationId - right.locationId;
}
