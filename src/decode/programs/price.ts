/**
 * Price Account Decoder
 *
 * Two incompatible prefixes, selected by the header version.
 *
 * Version 1 (128 bytes after the header):
 *   [0..4]     price type (u32)
 *   [4..8]     exponent (i32)
 *   [8..12]    component count (u32, declared only)
 *   [12..16]   unused (u32)
 *   [16..24]   last valid slot (u64)
 *   [24..32]   current aggregation slot (u64)
 *   [32..64]   product key
 *   [64..96]   next price key (zero = end of chain)
 *   [96..128]  aggregator key (read, not retained)
 *
 * Version 2 (160 bytes after the header):
 *   [0..16]    price type, exponent, component count, unused
 *   [16..32]   last valid slot, current aggregation slot
 *   [32..96]   EMA accumulators (i64 * 8, index = TwEmaType - 1)
 *   [96..128]  product key
 *   [128..160] next price key
 *
 * Shared suffix:
 *   aggregate PriceInfo (32 bytes)
 *   PriceComponent (96 bytes) * up to 16 (v1) / 32 (v2), null publisher ends the list
 */

import type { PriceLayout, PriceRecord, PriceType } from '../../types.js';
import { AccountType, PriceType as P, TwEmaType } from '../../types.js';
import { OracleFormatError } from '../error.js';
import { readPublicKey, readPublicKeyOrNull, viewOf } from '../primitives.js';
import { decodePriceInfo, iterateComponents, PRICE_INFO_LENGTH } from '../priceInfo.js';
import { formatKey, PUBKEY_LENGTH } from '../../utils/pubkey.js';
import { logger } from '../../utils/logger.js';
import { metrics } from '../../instrument/metrics.js';

export const PRICE_PREFIX_V1_BYTES = 128;
export const PRICE_PREFIX_V2_BYTES = 160;

export const MAX_COMPONENTS_V1 = 16;
export const MAX_COMPONENTS_V2 = 32;

const EMA_SLOTS = 8;
const EXPOSED_EMA: readonly TwEmaType[] = [TwEmaType.TwapValue, TwEmaType.TwacValue];

interface PricePrefix {
    priceType: number;
    exponent: number;
    numComponents: number;
    lastSlot: bigint;
    validSlot: bigint;
    productKey: Uint8Array;
    nextPriceKey: Uint8Array | null;
    layout: PriceLayout;
    /** Offset of the aggregate PriceInfo */
    end: number;
    maxComponents: number;
}

function isPriceType(value: number): value is PriceType {
    return value === P.Unknown || value === P.Price || value === P.Twap || value === P.Volatility;
}

function requirePrefix(data: Uint8Array, offset: number, prefixBytes: number, key: Uint8Array): void {
    const need = prefixBytes + PRICE_INFO_LENGTH;
    if (offset + need > data.length) {
        throw new OracleFormatError(
            `price data too short: ${data.length - offset} bytes after header (need ${need})`,
            key
        );
    }
}

function readPrefixV1(data: Uint8Array, offset: number, key: Uint8Array): PricePrefix {
    requirePrefix(data, offset, PRICE_PREFIX_V1_BYTES, key);
    const view = viewOf(data);

    // aggregator key at offset + 96 is skipped
    return {
        priceType: view.getUint32(offset, true),
        exponent: view.getInt32(offset + 4, true),
        numComponents: view.getUint32(offset + 8, true),
        lastSlot: view.getBigUint64(offset + 16, true),
        validSlot: view.getBigUint64(offset + 24, true),
        productKey: readPublicKey(data, offset + 32, key),
        nextPriceKey: readPublicKeyOrNull(data, offset + 64),
        layout: { version: 1 },
        end: offset + PRICE_PREFIX_V1_BYTES,
        maxComponents: MAX_COMPONENTS_V1,
    };
}

function readPrefixV2(data: Uint8Array, offset: number, key: Uint8Array): PricePrefix {
    requirePrefix(data, offset, PRICE_PREFIX_V2_BYTES, key);
    const view = viewOf(data);

    const emaOffset = offset + 32;
    const ema = new Map<TwEmaType, bigint>();
    for (const type of EXPOSED_EMA) {
        ema.set(type, view.getBigInt64(emaOffset + (type - 1) * 8, true));
    }

    const keysOffset = emaOffset + EMA_SLOTS * 8;
    return {
        priceType: view.getUint32(offset, true),
        exponent: view.getInt32(offset + 4, true),
        numComponents: view.getUint32(offset + 8, true),
        lastSlot: view.getBigUint64(offset + 16, true),
        validSlot: view.getBigUint64(offset + 24, true),
        productKey: readPublicKey(data, keysOffset, key),
        nextPriceKey: readPublicKeyOrNull(data, keysOffset + PUBKEY_LENGTH),
        layout: { version: 2, ema },
        end: offset + PRICE_PREFIX_V2_BYTES,
        maxComponents: MAX_COMPONENTS_V2,
    };
}

/**
 * Decode a price account body. `version` is taken as a plain number so the
 * decoder fails closed on anything the header validator would have rejected.
 */
export function decodePrice(
    key: Uint8Array,
    slot: number,
    data: Uint8Array,
    version: number,
    offset: number
): PriceRecord {
    let prefix: PricePrefix;
    switch (version) {
        case 1:
            prefix = readPrefixV1(data, offset, key);
            break;
        case 2:
            prefix = readPrefixV2(data, offset, key);
            break;
        default:
            throw new OracleFormatError(`unsupported price layout version ${version}`, key);
    }

    if (!isPriceType(prefix.priceType)) {
        throw new OracleFormatError(`unknown price type ${prefix.priceType}`, key);
    }

    const { exponent } = prefix;
    const aggregatePriceInfo = decodePriceInfo(data, prefix.end, exponent, key);
    const priceComponents = [
        ...iterateComponents(data, prefix.end + PRICE_INFO_LENGTH, exponent, prefix.maxComponents, key),
    ];

    if (priceComponents.length !== prefix.numComponents) {
        metrics.incrComponentCountMismatch();
        logger.debug(
            `[price] ${formatKey(key)} declares ${prefix.numComponents} components, found ${priceComponents.length}`
        );
    }

    return {
        accountType: AccountType.Price,
        key,
        slot,
        version: prefix.layout.version,
        priceType: prefix.priceType,
        exponent,
        numComponents: prefix.numComponents,
        lastSlot: prefix.lastSlot,
        validSlot: prefix.validSlot,
        productKey: prefix.productKey,
        nextPriceKey: prefix.nextPriceKey,
        aggregatePriceInfo,
        priceComponents,
        layout: prefix.layout,
    };
}

export function aggregatePrice(price: PriceRecord): number {
    return price.aggregatePriceInfo.price;
}

export function aggregateConfidenceInterval(price: PriceRecord): number {
    return price.aggregatePriceInfo.confidenceInterval;
}

/**
 * Declared vs scanned component count. Divergence is legal on-chain; callers decide.
 */
export function componentCountMismatch(price: PriceRecord): boolean {
    return price.numComponents !== price.priceComponents.length;
}
