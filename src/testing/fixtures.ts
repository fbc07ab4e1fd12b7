/**
 * Account byte builders for tests
 */

import { ACCOUNT_HEADER_BYTES, ORACLE_MAGIC } from '../decode/header.js';
import { PRICE_COMPONENT_LENGTH, PRICE_INFO_LENGTH } from '../decode/priceInfo.js';
import { PRICE_PREFIX_V1_BYTES, PRICE_PREFIX_V2_BYTES } from '../decode/programs/price.js';
import { AccountType, PriceStatus, PriceType } from '../types.js';

export function key(seed: number): Uint8Array {
    const out = new Uint8Array(32);
    out[0] = seed;
    out[31] = 0xee;
    return out;
}

export const ZERO32 = new Uint8Array(32);

export interface HeaderFields {
    magic?: number;
    version?: number;
    accountType?: number;
    /** Declared size; defaults to the buffer length */
    size?: number;
}

export function writeHeader(buf: Buffer, fields: HeaderFields): void {
    buf.writeUInt32LE(fields.magic ?? ORACLE_MAGIC, 0);
    buf.writeUInt32LE(fields.version ?? 2, 4);
    buf.writeUInt32LE(fields.accountType ?? AccountType.Unknown, 8);
    buf.writeUInt32LE(fields.size ?? buf.length, 12);
}

// ============================================================================
// MAPPING
// ============================================================================

export interface MappingFields {
    version?: number;
    numProducts?: number;
    next?: Uint8Array;
    entries: Uint8Array[];
}

export function buildMapping(fields: MappingFields): Buffer {
    const buf = Buffer.alloc(ACCOUNT_HEADER_BYTES + 40 + fields.entries.length * 32);
    writeHeader(buf, { version: fields.version, accountType: AccountType.Mapping });
    buf.writeUInt32LE(fields.numProducts ?? fields.entries.length, 16);
    buf.set(fields.next ?? ZERO32, 24);
    fields.entries.forEach((entry, i) => buf.set(entry, 56 + i * 32));
    return buf;
}

// ============================================================================
// PRODUCT
// ============================================================================

export interface ProductFields {
    version?: number;
    firstPriceKey?: Uint8Array;
    attrs?: Array<[string, string]>;
    /** Raw bytes appended after the attributes */
    trailing?: Uint8Array;
}

function attrString(text: string): Buffer {
    const bytes = Buffer.from(text, 'utf8');
    return Buffer.concat([Buffer.from([bytes.length]), bytes]);
}

export function buildProduct(fields: ProductFields): Buffer {
    const parts: Buffer[] = [Buffer.alloc(ACCOUNT_HEADER_BYTES), Buffer.from(fields.firstPriceKey ?? ZERO32)];
    for (const [name, value] of fields.attrs ?? []) {
        parts.push(attrString(name), attrString(value));
    }
    if (fields.trailing) parts.push(Buffer.from(fields.trailing));

    const buf = Buffer.concat(parts);
    writeHeader(buf, { version: fields.version, accountType: AccountType.Product });
    return buf;
}

// ============================================================================
// PRICE
// ============================================================================

export interface PriceInfoFields {
    price: bigint;
    conf?: bigint;
    status?: number;
    slot?: bigint;
}

export interface ComponentFields {
    publisher: Uint8Array;
    last: PriceInfoFields;
    latest: PriceInfoFields;
}

export interface PriceFields {
    version: number;
    priceType?: number;
    exponent?: number;
    /** Declared count; defaults to components.length */
    numComponents?: number;
    lastSlot?: bigint;
    validSlot?: bigint;
    productKey?: Uint8Array;
    nextPriceKey?: Uint8Array;
    aggregatorKey?: Uint8Array;
    /** Version 2 only, 8 slots */
    ema?: bigint[];
    aggregate: PriceInfoFields;
    components?: ComponentFields[];
    /** Zero bytes appended after the components */
    padding?: number;
}

export function writePriceInfo(buf: Buffer, offset: number, info: PriceInfoFields): void {
    buf.writeBigInt64LE(info.price, offset);
    buf.writeBigUInt64LE(info.conf ?? 0n, offset + 8);
    buf.writeUInt32LE(info.status ?? PriceStatus.Trading, offset + 16);
    buf.writeBigUInt64LE(info.slot ?? 0n, offset + 24);
}

export function buildPrice(fields: PriceFields): Buffer {
    const components = fields.components ?? [];
    const prefix = fields.version === 1 ? PRICE_PREFIX_V1_BYTES : PRICE_PREFIX_V2_BYTES;
    const buf = Buffer.alloc(
        ACCOUNT_HEADER_BYTES + prefix + PRICE_INFO_LENGTH +
        components.length * PRICE_COMPONENT_LENGTH + (fields.padding ?? 0)
    );
    writeHeader(buf, { version: fields.version, accountType: AccountType.Price });

    let offset = ACCOUNT_HEADER_BYTES;
    buf.writeUInt32LE(fields.priceType ?? PriceType.Price, offset);
    buf.writeInt32LE(fields.exponent ?? -8, offset + 4);
    buf.writeUInt32LE(fields.numComponents ?? components.length, offset + 8);
    buf.writeBigUInt64LE(fields.lastSlot ?? 0n, offset + 16);
    buf.writeBigUInt64LE(fields.validSlot ?? 0n, offset + 24);

    if (fields.version === 1) {
        buf.set(fields.productKey ?? ZERO32, offset + 32);
        buf.set(fields.nextPriceKey ?? ZERO32, offset + 64);
        buf.set(fields.aggregatorKey ?? ZERO32, offset + 96);
    } else {
        (fields.ema ?? []).forEach((value, i) => buf.writeBigInt64LE(value, offset + 32 + i * 8));
        buf.set(fields.productKey ?? ZERO32, offset + 96);
        buf.set(fields.nextPriceKey ?? ZERO32, offset + 128);
    }
    offset += prefix;

    writePriceInfo(buf, offset, fields.aggregate);
    offset += PRICE_INFO_LENGTH;

    for (const component of components) {
        buf.set(component.publisher, offset);
        writePriceInfo(buf, offset + 32, component.last);
        writePriceInfo(buf, offset + 64, component.latest);
        offset += PRICE_COMPONENT_LENGTH;
    }
    return buf;
}
