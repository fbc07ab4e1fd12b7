/**
 * Mapping Account Decoder
 *
 * Layout (after the 16-byte header):
 *   [0..4]    product count (u32)
 *   [4..8]    unused (u32)
 *   [8..40]   next mapping key (pubkey, zero = last page)
 *   [40..]    product keys (pubkey * product count)
 *
 * Null and duplicate product keys are skipped with a warning, so
 * entries.length can be smaller than numProducts.
 */

import type { LayoutVersion, MappingRecord } from '../../types.js';
import { AccountType } from '../../types.js';
import { OracleFormatError } from '../error.js';
import { readPublicKey, readPublicKeyOrNull, viewOf } from '../primitives.js';
import { formatKey, isNullKey, PUBKEY_LENGTH, toKeyHex } from '../../utils/pubkey.js';
import { logAnomaly } from '../../utils/logger.js';
import { metrics } from '../../instrument/metrics.js';

const MAPPING_PREFIX_BYTES = 8 + PUBKEY_LENGTH;

export function decodeMapping(
    key: Uint8Array,
    slot: number,
    data: Uint8Array,
    version: LayoutVersion,
    offset: number
): MappingRecord {
    if (offset + MAPPING_PREFIX_BYTES > data.length) {
        throw new OracleFormatError(
            `mapping data too short: ${data.length - offset} bytes after header (need ${MAPPING_PREFIX_BYTES})`,
            key
        );
    }

    const view = viewOf(data);
    const numProducts = view.getUint32(offset, true);
    const nextMappingKey = readPublicKeyOrNull(data, offset + 8);
    offset += MAPPING_PREFIX_BYTES;

    const entries: Uint8Array[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < numProducts; i++) {
        const entry = readPublicKey(data, offset, key);
        offset += PUBKEY_LENGTH;

        if (isNullKey(entry)) {
            metrics.incrNullKey();
            logAnomaly({ type: 'mapping', account: formatKey(key), reason: `null product key at index ${i}` });
            continue;
        }

        const hex = toKeyHex(entry);
        if (seen.has(hex)) {
            metrics.incrDuplicateKey();
            logAnomaly({
                type: 'mapping',
                account: formatKey(key),
                related: formatKey(entry),
                reason: `duplicate product key at index ${i}`,
            });
            continue;
        }

        seen.add(hex);
        entries.push(entry);
    }

    return {
        accountType: AccountType.Mapping,
        key,
        slot,
        version,
        numProducts,
        entries,
        nextMappingKey,
    };
}
