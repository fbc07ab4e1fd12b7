/**
 * Price chain walking
 *
 * A product's price records form a forward-linked list:
 *   product.firstPriceKey -> price.nextPriceKey -> ... -> null
 *
 * Each hop needs the previous hop's decoded next key, so the walk is strictly
 * sequential. Bytes already fetched in bulk can be handed in as `prefetched`
 * to skip the round trip for keys the caller already knew about.
 */

import type { AccountSource, FetchedAccount, PriceMap, PriceRecord } from '../types.js';
import { decodePriceAccount } from '../decode/account.js';
import { ChainConsistencyError } from '../decode/error.js';
import { formatKey, keysEqual, toKeyHex } from '../utils/pubkey.js';
import { logAnomaly } from '../utils/logger.js';
import { metrics } from '../instrument/metrics.js';

/** Hex pubkey -> bytes fetched earlier in the same refresh */
export type PrefetchedAccounts = ReadonlyMap<string, FetchedAccount>;

export interface KeyedAccount {
    key: Uint8Array;
    account: FetchedAccount;
}

export function indexPrefetched(accounts: readonly KeyedAccount[]): PrefetchedAccounts {
    const out = new Map<string, FetchedAccount>();
    for (const { key, account } of accounts) {
        out.set(toKeyHex(key), account);
    }
    return out;
}

/**
 * Fetch-and-decode one price record, preferring prefetched bytes
 */
export async function loadPriceRecord(
    source: AccountSource,
    key: Uint8Array,
    prefetched?: PrefetchedAccounts
): Promise<PriceRecord> {
    const cached = prefetched?.get(toKeyHex(key));
    if (cached) {
        return decodePriceAccount(key, cached);
    }
    metrics.incrSingleFetch();
    const account = await source.fetch(key);
    return decodePriceAccount(key, account);
}

/**
 * Yield price records in chain order starting at `firstKey`.
 * No cycle detection: the on-chain list is trusted to terminate.
 */
export async function* walkPriceChain(
    source: AccountSource,
    firstKey: Uint8Array | null,
    prefetched?: PrefetchedAccounts
): AsyncGenerator<PriceRecord> {
    let key = firstKey;
    while (key !== null) {
        const price = await loadPriceRecord(source, key, prefetched);
        yield price;
        key = price.nextPriceKey;
    }
}

/**
 * Key the records by price type. A repeated type is logged and the later
 * record wins.
 */
export function collectPriceMap(productKey: Uint8Array, records: Iterable<PriceRecord>): PriceMap {
    const prices: PriceMap = new Map();
    for (const price of records) {
        const previous = prices.get(price.priceType);
        if (previous) {
            metrics.incrPriceTypeCollision();
            logAnomaly({
                type: 'priceChain',
                account: formatKey(productKey),
                related: formatKey(price.key),
                reason: `price type ${price.priceType} already held by ${formatKey(previous.key)}, replacing`,
            });
        }
        prices.set(price.priceType, price);
    }
    return prices;
}

/**
 * Check that `records` is exactly the chain starting at `firstKey`:
 * records[0].key === firstKey, records[i+1].key === records[i].nextPriceKey,
 * and the last record ends the chain.
 */
export function validatePriceChain(
    productKey: Uint8Array,
    firstKey: Uint8Array | null,
    records: readonly PriceRecord[]
): void {
    let expected = firstKey;
    for (const price of records) {
        if (!keysEqual(price.key, expected)) {
            throw new ChainConsistencyError(
                `expected price account ${formatKey(expected)}, got ${formatKey(price.key)}`,
                productKey,
                expected,
                price.key
            );
        }
        expected = price.nextPriceKey;
    }
    if (expected !== null) {
        throw new ChainConsistencyError(
            `expected price account ${formatKey(expected)} but end of list reached`,
            productKey,
            expected,
            null
        );
    }
}
