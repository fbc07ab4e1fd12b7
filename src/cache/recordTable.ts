/**
 * Record Table
 *
 * Identifier-keyed store for decoded records. Keyed by hex pubkey since
 * Uint8Array equality doesn't work in Map.
 *
 * A product node owns its derived price map. Price records point back at
 * their product by key only; productOf() resolves that through the table.
 * The price index holds exactly the records of the products' current maps.
 */

import type { MappingRecord, PriceMap, PriceRecord, ProductRecord } from '../types.js';
import { toKeyHex } from '../utils/pubkey.js';

export interface ProductNode {
    record: ProductRecord;
    /** null until loaded; replaced wholesale, never edited in place */
    prices: PriceMap | null;
}

function emptyPrices(): PriceMap {
    return new Map();
}

export interface RecordTableStats {
    mappings: number;
    products: number;
    prices: number;
}

export class RecordTable {
    private mappings: Map<string, MappingRecord> = new Map();
    private products: Map<string, ProductNode> = new Map();
    private prices: Map<string, PriceRecord> = new Map();

    // --- Mappings ---

    putMapping(record: MappingRecord): void {
        this.mappings.set(toKeyHex(record.key), record);
    }

    getMapping(key: Uint8Array): MappingRecord | null {
        return this.mappings.get(toKeyHex(key)) ?? null;
    }

    // --- Products ---

    /**
     * Store a freshly decoded product. An existing price map is kept unless
     * the product now has no first price key, in which case it becomes empty.
     */
    putProduct(record: ProductRecord): ProductNode {
        const hex = toKeyHex(record.key);
        const previous = this.products.get(hex)?.prices ?? null;
        const prices = record.firstPriceKey === null ? emptyPrices() : previous;
        if (previous !== null && prices !== previous) {
            this.evictPrices(previous, prices);
        }
        const node: ProductNode = { record, prices };
        this.products.set(hex, node);
        return node;
    }

    getProduct(key: Uint8Array): ProductNode | null {
        return this.products.get(toKeyHex(key)) ?? null;
    }

    /**
     * Swap in a completed price map and index its records
     */
    replacePrices(productKey: Uint8Array, prices: PriceMap): void {
        const hex = toKeyHex(productKey);
        const node = this.products.get(hex);
        if (!node) {
            throw new Error(`[RecordTable] no product ${hex} to attach prices to`);
        }
        if (node.prices !== null) {
            this.evictPrices(node.prices, prices);
        }
        for (const price of prices.values()) {
            this.prices.set(toKeyHex(price.key), price);
        }
        this.products.set(hex, { record: node.record, prices });
    }

    /** Drop index entries of `previous` that `next` no longer holds */
    private evictPrices(previous: PriceMap, next: PriceMap | null): void {
        const kept = new Set<string>();
        for (const price of next?.values() ?? []) {
            kept.add(toKeyHex(price.key));
        }
        for (const price of previous.values()) {
            const hex = toKeyHex(price.key);
            if (!kept.has(hex)) this.prices.delete(hex);
        }
    }

    // --- Prices ---

    getPrice(key: Uint8Array): PriceRecord | null {
        return this.prices.get(toKeyHex(key)) ?? null;
    }

    /**
     * Resolve a price record's back-reference
     */
    productOf(price: PriceRecord): ProductRecord | null {
        return this.products.get(toKeyHex(price.productKey))?.record ?? null;
    }

    stats(): RecordTableStats {
        return {
            mappings: this.mappings.size,
            products: this.products.size,
            prices: this.prices.size,
        };
    }
}
