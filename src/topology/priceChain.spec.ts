import test from 'node:test';
import assert from 'node:assert/strict';

import {
    collectPriceMap,
    indexPrefetched,
    loadPriceRecord,
    validatePriceChain,
    walkPriceChain,
} from './priceChain.js';
import { MemoryAccountSource } from '../ingest/memorySource.js';
import { decodePriceAccount } from '../decode/account.js';
import { ChainConsistencyError } from '../decode/error.js';
import { PriceType } from '../types.js';
import type { PriceRecord } from '../types.js';
import { buildPrice, key } from '../testing/fixtures.js';

const PRODUCT = key(100);

function priceBytes(priceType: PriceType, next?: Uint8Array): Buffer {
    return buildPrice({ version: 1, priceType, productKey: PRODUCT, nextPriceKey: next, aggregate: { price: 1n } });
}

function record(seed: number, priceType: PriceType, next?: Uint8Array): PriceRecord {
    return decodePriceAccount(key(seed), { slot: 1, data: priceBytes(priceType, next) });
}

test('loadPriceRecord decodes prefetched bytes without a fetch', async () => {
    const source = new MemoryAccountSource();
    const prefetched = indexPrefetched([{ key: key(1), account: { slot: 5, data: priceBytes(PriceType.Twap) } }]);

    const price = await loadPriceRecord(source, key(1), prefetched);

    assert.equal(price.priceType, PriceType.Twap);
    assert.equal(price.slot, 5);
    assert.deepEqual(source.fetchLog, []);
});

test('loadPriceRecord fetches keys missing from the prefetched set', async () => {
    const source = new MemoryAccountSource().set(key(2), priceBytes(PriceType.Price));
    const price = await loadPriceRecord(source, key(2), indexPrefetched([]));
    assert.equal(price.priceType, PriceType.Price);
    assert.deepEqual(source.fetchLog, [key(2)]);
});

test('walkPriceChain yields records until the next key is null', async () => {
    const source = new MemoryAccountSource()
        .set(key(1), priceBytes(PriceType.Price, key(2)))
        .set(key(2), priceBytes(PriceType.Twap));

    const seen: Uint8Array[] = [];
    for await (const price of walkPriceChain(source, key(1))) {
        seen.push(price.key);
    }
    assert.deepEqual(seen, [key(1), key(2)]);
});

test('walkPriceChain from a null key yields nothing', async () => {
    const source = new MemoryAccountSource();
    for await (const price of walkPriceChain(source, null)) {
        assert.fail(`unexpected record ${price.priceType}`);
    }
    assert.deepEqual(source.fetchLog, []);
});

test('collectPriceMap keeps the later record for a repeated type', () => {
    const first = record(1, PriceType.Price, key(2));
    const second = record(2, PriceType.Price);
    const prices = collectPriceMap(PRODUCT, [first, second]);
    assert.equal(prices.size, 1);
    assert.equal(prices.get(PriceType.Price), second);
});

test('validatePriceChain accepts an empty chain for a product with no prices', () => {
    assert.doesNotThrow(() => validatePriceChain(PRODUCT, null, []));
});

test('validatePriceChain rejects records when the product has no prices', () => {
    assert.throws(() => validatePriceChain(PRODUCT, null, [record(1, PriceType.Price)]), ChainConsistencyError);
});

test('validatePriceChain reports a skipped link', () => {
    const records = [record(1, PriceType.Price, key(2)), record(3, PriceType.Twap)];
    assert.throws(
        () => validatePriceChain(PRODUCT, key(1), records),
        (err: unknown) => err instanceof ChainConsistencyError && err.kind === 'consistency' && err.actual === records[1].key
    );
});
