import test from 'node:test';
import assert from 'node:assert/strict';

import { decodeProductAccount } from '../account.js';
import { productSymbol } from './product.js';
import { OracleFormatError } from '../error.js';
import { buildProduct, key } from '../../testing/fixtures.js';

const PRODUCT = key(100);

test('product: reads first price key and attributes in order', () => {
    const data = buildProduct({
        firstPriceKey: key(1),
        attrs: [['symbol', 'Crypto.BTC/USD'], ['asset_type', 'Crypto'], ['quote_currency', 'USD']],
    });
    const product = decodeProductAccount(PRODUCT, { slot: 3, data });

    assert.deepEqual(product.firstPriceKey, key(1));
    assert.deepEqual([...product.attrs.entries()], [
        ['symbol', 'Crypto.BTC/USD'],
        ['asset_type', 'Crypto'],
        ['quote_currency', 'USD'],
    ]);
    assert.equal(productSymbol(product), 'Crypto.BTC/USD');
});

test('product: zero first price key means no prices', () => {
    const product = decodeProductAccount(PRODUCT, { slot: 1, data: buildProduct({ attrs: [['symbol', 'X']] }) });
    assert.equal(product.firstPriceKey, null);
});

test('product: zero-length name ends the attributes even with bytes left', () => {
    const data = buildProduct({
        firstPriceKey: key(1),
        attrs: [['symbol', 'ETH']],
        trailing: Uint8Array.from([0, 3, 0x61, 0x62, 0x63, 1, 0x7a]),
    });
    const product = decodeProductAccount(PRODUCT, { slot: 1, data });
    assert.deepEqual([...product.attrs.entries()], [['symbol', 'ETH']]);
});

test('product: empty value decodes to an empty string and ends the list', () => {
    const data = buildProduct({ attrs: [['symbol', 'SOL'], ['note', ''], ['asset_type', 'Crypto']] });
    const product = decodeProductAccount(PRODUCT, { slot: 1, data });
    assert.deepEqual([...product.attrs.entries()], [
        ['symbol', 'SOL'],
        ['note', ''],
    ]);
});

test('product: value running past the declared size is a format error', () => {
    const data = buildProduct({ attrs: [['symbol', 'BTC/USD']] });
    // header + key + "symbol" attr + length byte of value + 2 of its 7 bytes
    data.writeUInt32LE(16 + 32 + 7 + 1 + 2, 12);
    assert.throws(() => decodeProductAccount(PRODUCT, { slot: 1, data }), OracleFormatError);
});

test('product: name with no value after it is a format error', () => {
    const data = buildProduct({ trailing: Uint8Array.from([3, 0x61, 0x62, 0x63]) });
    assert.throws(() => decodeProductAccount(PRODUCT, { slot: 1, data }), OracleFormatError);
});

test('product: symbol falls back to Unknown', () => {
    const product = decodeProductAccount(PRODUCT, { slot: 1, data: buildProduct({ attrs: [['asset_type', 'FX']] }) });
    assert.equal(productSymbol(product), 'Unknown');
});
