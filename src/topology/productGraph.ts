/**
 * Product Graph
 *
 * Owns the record table and the product -> price-map views derived from the
 * on-chain price chains.
 *
 * Rules:
 * - A product's price map is built off to the side and swapped in only once
 *   the whole chain has been read. A failed or abandoned walk leaves the
 *   previous map untouched.
 * - Refreshes of the same product are not serialized here; concurrent
 *   callers each build a full map and the last one to finish wins.
 */

import type { AccountSource, PriceDiff, PriceMap, PriceRecord, ProductRecord } from '../types.js';
import { RecordTable, type ProductNode } from '../cache/recordTable.js';
import { decodeProductAccount } from '../decode/account.js';
import { AccountNotFoundError, NotLoadedError } from '../decode/error.js';
import { productSymbol } from '../decode/programs/product.js';
import { toKeyHex, formatKey } from '../utils/pubkey.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../instrument/metrics.js';
import { walkMappings } from './mappingWalker.js';
import {
    collectPriceMap,
    indexPrefetched,
    loadPriceRecord,
    validatePriceChain,
    walkPriceChain,
    type KeyedAccount,
    type PrefetchedAccounts,
} from './priceChain.js';

export interface DiffRefreshOptions {
    /**
     * Batch-fetch the product and every previously known price account in one
     * round trip before walking. Default true.
     */
    prefetch?: boolean;
}

export class ProductGraph {
    constructor(
        private readonly source: AccountSource,
        readonly table: RecordTable = new RecordTable()
    ) {}

    // ========================================================================
    // PRODUCTS
    // ========================================================================

    async loadProduct(key: Uint8Array): Promise<ProductNode> {
        metrics.incrSingleFetch();
        const account = await this.source.fetch(key);
        return this.table.putProduct(decodeProductAccount(key, account));
    }

    /**
     * Walk every mapping page from `mappingKey` and batch-fetch each page's
     * products. Returns product records in mapping order.
     */
    async loadProducts(mappingKey: Uint8Array): Promise<ProductRecord[]> {
        const products: ProductRecord[] = [];
        for await (const page of walkMappings(this.source, mappingKey)) {
            this.table.putMapping(page);
            if (page.entries.length === 0) continue;

            metrics.incrBatchFetch(page.entries.length);
            const accounts = await this.source.fetchBatch(page.entries);
            for (let i = 0; i < page.entries.length; i++) {
                const account = accounts[i];
                if (account === null) {
                    throw new AccountNotFoundError(page.entries[i]);
                }
                const node = this.table.putProduct(decodeProductAccount(page.entries[i], account));
                products.push(node.record);
            }
        }
        logger.debug(`[ProductGraph] loaded ${products.length} products from ${formatKey(mappingKey)}`);
        return products;
    }

    private async productNode(key: Uint8Array): Promise<ProductNode> {
        return this.table.getProduct(key) ?? this.loadProduct(key);
    }

    // ========================================================================
    // PRICES
    // ========================================================================

    /**
     * Cached price map; throws NotLoadedError if the chain was never read
     */
    prices(productKey: Uint8Array): PriceMap {
        const node = this.table.getProduct(productKey);
        if (!node || node.prices === null) {
            throw new NotLoadedError(productKey);
        }
        return node.prices;
    }

    /**
     * Cached price map, or a refresh if not loaded yet
     */
    async getPrices(productKey: Uint8Array): Promise<PriceMap> {
        const node = await this.productNode(productKey);
        if (node.prices !== null) return node.prices;
        return this.refreshPrices(productKey);
    }

    /**
     * Walk the whole chain from the product's first price key and replace
     * the cached map with the result.
     */
    async refreshPrices(productKey: Uint8Array): Promise<PriceMap> {
        const node = await this.productNode(productKey);
        const records: PriceRecord[] = [];
        for await (const price of walkPriceChain(this.source, node.record.firstPriceKey)) {
            records.push(price);
        }
        const prices = collectPriceMap(productKey, records);
        this.table.replacePrices(productKey, prices);
        return prices;
    }

    /**
     * Re-walk the chain and report which price accounts joined or left it.
     * With prefetch on, the product and all previously known price accounts
     * are fetched in one batch first; only keys new to the chain are then
     * fetched one by one. A known price account that no longer exists is
     * left out of the batch; if the chain still reaches it, the walk's own
     * fetch reports it.
     */
    async diffRefresh(productKey: Uint8Array, options: DiffRefreshOptions = {}): Promise<PriceDiff> {
        const node = await this.productNode(productKey);
        if (node.prices === null) {
            const prices = await this.refreshPrices(productKey);
            return { added: [...prices.values()], removed: [] };
        }

        if (options.prefetch === false) {
            return this.reconcileChain(node.record, node.prices, new Map());
        }

        const known = [...node.prices.values()].map((price) => price.key);
        const keys = [productKey, ...known];
        metrics.incrBatchFetch(keys.length);
        const accounts = await this.source.fetchBatch(keys);

        const [productAccount, ...priceAccounts] = accounts;
        if (!productAccount) {
            throw new AccountNotFoundError(productKey);
        }
        const product = decodeProductAccount(productKey, productAccount);

        const fetched: KeyedAccount[] = [];
        known.forEach((key, i) => {
            const account = priceAccounts[i];
            if (account) fetched.push({ key, account });
        });
        const batch = indexPrefetched(fetched);
        const diff = await this.reconcileChain(product, node.prices, batch);
        this.table.putProduct(product);
        return diff;
    }

    /**
     * Bulk reconciliation entry point: `prefetched` holds bytes already
     * fetched for previously known price accounts. Those are decoded from
     * the batch; keys not in it are fetched sequentially as the walk
     * reaches them.
     */
    async reconcile(productKey: Uint8Array, prefetched: readonly KeyedAccount[]): Promise<PriceDiff> {
        const node = await this.productNode(productKey);
        return this.reconcileChain(node.record, node.prices ?? new Map(), indexPrefetched(prefetched));
    }

    private async reconcileChain(
        product: ProductRecord,
        previousPrices: PriceMap,
        batch: PrefetchedAccounts
    ): Promise<PriceDiff> {
        const previous = new Map<string, PriceRecord>();
        for (const price of previousPrices.values()) {
            previous.set(toKeyHex(price.key), price);
        }

        const added: PriceRecord[] = [];
        const records: PriceRecord[] = [];

        let key = product.firstPriceKey;
        while (key !== null) {
            const price = await loadPriceRecord(this.source, key, batch);
            if (!previous.delete(toKeyHex(key))) {
                added.push(price);
            }
            records.push(price);
            key = price.nextPriceKey;
        }

        const removed = [...previous.values()];
        const prices = collectPriceMap(product.key, records);
        this.table.replacePrices(product.key, prices);

        if (added.length > 0 || removed.length > 0) {
            logger.info(
                `[ProductGraph] ${productSymbol(product)}: +${added.length} -${removed.length} price accounts`
            );
        }
        return { added, removed };
    }

    /**
     * Adopt price records fetched elsewhere. They must be the product's
     * chain in order, start to end, or ChainConsistencyError is thrown and
     * the cached map is left as it was.
     */
    usePriceRecords(productKey: Uint8Array, records: readonly PriceRecord[]): PriceMap {
        const node = this.table.getProduct(productKey);
        if (!node) {
            throw new Error(`[ProductGraph] product ${formatKey(productKey)} not loaded`);
        }
        validatePriceChain(productKey, node.record.firstPriceKey, records);
        const prices = collectPriceMap(productKey, records);
        this.table.replacePrices(productKey, prices);
        return prices;
    }

    /**
     * Resolve a price record's owning product through the table
     */
    productOf(price: PriceRecord): ProductRecord | null {
        return this.table.productOf(price);
    }
}
