/**
 * Product Account Decoder
 *
 * Layout (after the 16-byte header):
 *   [0..32]   first price key (pubkey, zero = product has no prices)
 *   [32..]    attributes: { name (attr string), value (attr string) }*
 *
 * The attribute list ends at the end of the declared size, at a
 * zero-length name, or after a zero-length value, whichever comes first.
 */

import type { LayoutVersion, ProductRecord } from '../../types.js';
import { AccountType } from '../../types.js';
import { readAttributeString, readPublicKey } from '../primitives.js';
import { isNullKey, PUBKEY_LENGTH } from '../../utils/pubkey.js';

export function decodeProduct(
    key: Uint8Array,
    slot: number,
    data: Uint8Array,
    version: LayoutVersion,
    offset: number
): ProductRecord {
    const firstPriceKey = readPublicKey(data, offset, key);
    offset += PUBKEY_LENGTH;

    const attrs = new Map<string, string>();
    while (offset < data.length) {
        const name = readAttributeString(data, offset, key);
        if (name.value === null) break;

        const value = readAttributeString(data, name.offset, key);
        // an empty value leaves the offset on its zero length byte, which
        // then reads as an empty name
        attrs.set(name.value, value.value ?? '');
        if (value.value === null) break;
        offset = value.offset;
    }

    return {
        accountType: AccountType.Product,
        key,
        slot,
        version,
        firstPriceKey: isNullKey(firstPriceKey) ? null : firstPriceKey,
        attrs,
    };
}

export function productSymbol(product: ProductRecord): string {
    return product.attrs.get('symbol') ?? 'Unknown';
}
