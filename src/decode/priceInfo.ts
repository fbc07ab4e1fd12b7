/**
 * Price primitives
 *
 * PriceInfo layout (32 bytes):
 *   [0..8]    price (i64)
 *   [8..16]   confidence interval (u64)
 *   [16..20]  status (u32)
 *   [20..24]  corporate action (u32, unused)
 *   [24..32]  publish slot (u64)
 *
 * PriceComponent layout (96 bytes):
 *   [0..32]   publisher key
 *   [32..64]  PriceInfo used in the last aggregate
 *   [64..96]  latest PriceInfo
 *
 * The exponent lives on the owning price record and is passed in.
 */

import type { PriceComponent, PriceInfo, PriceStatus } from '../types.js';
import { PriceStatus as S } from '../types.js';
import { OracleFormatError } from './error.js';
import { readPublicKeyOrNull, viewOf } from './primitives.js';
import { PUBKEY_LENGTH } from '../utils/pubkey.js';

export const PRICE_INFO_LENGTH = 32;
export const PRICE_COMPONENT_LENGTH = PUBKEY_LENGTH + 2 * PRICE_INFO_LENGTH;

function isPriceStatus(value: number): value is PriceStatus {
    return value === S.Unknown || value === S.Trading || value === S.Halted || value === S.Auction;
}

/**
 * raw * 10^exponent as a float. Negative exponents divide so that
 * 12345e-2 comes out as 123.45 rather than 123.45000000000002.
 */
export function scalePrice(raw: bigint, exponent: number): number {
    if (exponent >= 0) {
        return Number(raw) * 10 ** exponent;
    }
    return Number(raw) / 10 ** -exponent;
}

/**
 * Exact decimal text for raw * 10^exponent, trailing fraction zeros dropped
 */
export function formatScaled(raw: bigint, exponent: number): string {
    if (exponent >= 0) {
        return (raw * 10n ** BigInt(exponent)).toString();
    }

    const digits = -exponent;
    const negative = raw < 0n;
    const text = (negative ? -raw : raw).toString().padStart(digits + 1, '0');
    const whole = text.slice(0, text.length - digits);
    const fraction = text.slice(text.length - digits).replace(/0+$/, '');
    const body = fraction.length > 0 ? `${whole}.${fraction}` : whole;
    return negative ? `-${body}` : body;
}

export function decodePriceInfo(
    data: Uint8Array,
    offset: number,
    exponent: number,
    key: Uint8Array | null = null
): PriceInfo {
    if (offset + PRICE_INFO_LENGTH > data.length) {
        throw new OracleFormatError(
            `price info at offset ${offset} runs past end of data (${data.length} bytes)`,
            key
        );
    }

    const view = viewOf(data);
    const rawPrice = view.getBigInt64(offset, true);
    const rawConfidenceInterval = view.getBigUint64(offset + 8, true);
    const status = view.getUint32(offset + 16, true);
    const slot = view.getBigUint64(offset + 24, true);

    if (!isPriceStatus(status)) {
        throw new OracleFormatError(`unknown price status ${status} at offset ${offset + 16}`, key);
    }

    return {
        rawPrice,
        rawConfidenceInterval,
        priceStatus: status,
        slot,
        exponent,
        price: scalePrice(rawPrice, exponent),
        confidenceInterval: scalePrice(rawConfidenceInterval, exponent),
    };
}

/**
 * Returns null for the all-zero publisher sentinel
 */
export function decodePriceComponent(
    data: Uint8Array,
    offset: number,
    exponent: number,
    key: Uint8Array | null = null
): PriceComponent | null {
    const publisherKey = readPublicKeyOrNull(data, offset);
    if (publisherKey === null) return null;

    if (offset + PRICE_COMPONENT_LENGTH > data.length) {
        throw new OracleFormatError(
            `price component at offset ${offset} runs past end of data (${data.length} bytes)`,
            key
        );
    }

    return {
        publisherKey,
        lastAggregatePriceInfo: decodePriceInfo(data, offset + PUBKEY_LENGTH, exponent, key),
        latestPriceInfo: decodePriceInfo(data, offset + PUBKEY_LENGTH + PRICE_INFO_LENGTH, exponent, key),
        exponent,
    };
}

/**
 * Sentinel-terminated scan. Stops at the null publisher, end of data or
 * `cap`, whichever comes first. The declared component count is not used.
 */
export function* iterateComponents(
    data: Uint8Array,
    offset: number,
    exponent: number,
    cap: number,
    key: Uint8Array | null = null
): Generator<PriceComponent> {
    for (let i = 0; i < cap && offset < data.length; i++) {
        const component = decodePriceComponent(data, offset, exponent, key);
        if (component === null) return;
        yield component;
        offset += PRICE_COMPONENT_LENGTH;
    }
}
