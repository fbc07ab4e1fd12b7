/**
 * Decode Metrics
 *
 * Counters for decode outcomes, tolerated anomalies and transport round trips.
 */

import type { AccountType } from '../types.js';
import { AccountType as A } from '../types.js';

export interface DecodeMetricsSnapshot {
    decodeSuccessCount: bigint;
    decodeFailureCount: bigint;
    byType: Record<'mapping' | 'product' | 'price', bigint>;

    nullKeysSkipped: bigint;
    duplicateKeysSkipped: bigint;
    priceTypeCollisions: bigint;
    componentCountMismatches: bigint;

    singleFetches: bigint;
    batchFetches: bigint;
    batchFetchedAccounts: bigint;
}

function typeLabel(type: AccountType): 'mapping' | 'product' | 'price' | null {
    switch (type) {
        case A.Mapping: return 'mapping';
        case A.Product: return 'product';
        case A.Price: return 'price';
        default: return null;
    }
}

export class DecodeMetrics {
    decodeSuccessCount = 0n;
    decodeFailureCount = 0n;
    private byType = { mapping: 0n, product: 0n, price: 0n };

    nullKeysSkipped = 0n;
    duplicateKeysSkipped = 0n;
    priceTypeCollisions = 0n;
    componentCountMismatches = 0n;

    singleFetches = 0n;
    batchFetches = 0n;
    batchFetchedAccounts = 0n;

    // --- Increment methods ---

    incrDecodeSuccess(type: AccountType): void {
        this.decodeSuccessCount++;
        const label = typeLabel(type);
        if (label !== null) this.byType[label]++;
    }
    incrDecodeFailure(): void { this.decodeFailureCount++; }

    incrNullKey(): void { this.nullKeysSkipped++; }
    incrDuplicateKey(): void { this.duplicateKeysSkipped++; }
    incrPriceTypeCollision(): void { this.priceTypeCollisions++; }
    incrComponentCountMismatch(): void { this.componentCountMismatches++; }

    incrSingleFetch(): void { this.singleFetches++; }
    incrBatchFetch(size: number): void {
        this.batchFetches++;
        this.batchFetchedAccounts += BigInt(size);
    }

    // --- Computed ---

    decodeSuccessRate(): number {
        const total = this.decodeSuccessCount + this.decodeFailureCount;
        if (total === 0n) return 100;
        return Number((this.decodeSuccessCount * 10000n) / total) / 100;
    }

    snapshot(): DecodeMetricsSnapshot {
        return {
            decodeSuccessCount: this.decodeSuccessCount,
            decodeFailureCount: this.decodeFailureCount,
            byType: { ...this.byType },
            nullKeysSkipped: this.nullKeysSkipped,
            duplicateKeysSkipped: this.duplicateKeysSkipped,
            priceTypeCollisions: this.priceTypeCollisions,
            componentCountMismatches: this.componentCountMismatches,
            singleFetches: this.singleFetches,
            batchFetches: this.batchFetches,
            batchFetchedAccounts: this.batchFetchedAccounts,
        };
    }

    reset(): void {
        this.decodeSuccessCount = 0n;
        this.decodeFailureCount = 0n;
        this.byType = { mapping: 0n, product: 0n, price: 0n };
        this.nullKeysSkipped = 0n;
        this.duplicateKeysSkipped = 0n;
        this.priceTypeCollisions = 0n;
        this.componentCountMismatches = 0n;
        this.singleFetches = 0n;
        this.batchFetches = 0n;
        this.batchFetchedAccounts = 0n;
    }
}

/**
 * Global metrics instance
 */
export const metrics = new DecodeMetrics();
