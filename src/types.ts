/**
 * Core type definitions for the oracle account decoder
 * These interfaces define the boundaries between decode, cache and topology
 */

// ============================================================================
// ON-CHAIN ENUMS
// ============================================================================

export const AccountType = {
    Unknown: 0,
    Mapping: 1,
    Product: 2,
    Price: 3,
} as const;

export type AccountType = (typeof AccountType)[keyof typeof AccountType];

export const PriceStatus = {
    Unknown: 0,
    Trading: 1,
    Halted: 2,
    Auction: 3,
} as const;

export type PriceStatus = (typeof PriceStatus)[keyof typeof PriceStatus];

/** Twap and Volatility only appear in version 1 accounts */
export const PriceType = {
    Unknown: 0,
    Price: 1,
    Twap: 2,
    Volatility: 3,
} as const;

export type PriceType = (typeof PriceType)[keyof typeof PriceType];

/** Time-weighted EMA slots; value = 1-based index into the on-chain array */
export const TwEmaType = {
    Unknown: 0,
    TwapValue: 1,
    TwapNumerator: 2,
    TwapDenominator: 3,
    TwacValue: 4,
    TwacNumerator: 5,
    TwacDenominator: 6,
} as const;

export type TwEmaType = (typeof TwEmaType)[keyof typeof TwEmaType];

export const SUPPORTED_VERSIONS = [1, 2] as const;

export type LayoutVersion = (typeof SUPPORTED_VERSIONS)[number];

// ============================================================================
// TRANSPORT
// ============================================================================

/** One account as returned by the transport */
export interface FetchedAccount {
    slot: number;
    data: Uint8Array;
}

/**
 * Capability the graph engine consumes to read account bytes.
 * Errors thrown here are passed through untouched.
 */
export interface AccountSource {
    fetch(key: Uint8Array): Promise<FetchedAccount>;
    /** Order-preserving: result[i] belongs to keys[i], null if that account does not exist */
    fetchBatch(keys: Uint8Array[]): Promise<Array<FetchedAccount | null>>;
}

// ============================================================================
// DECODED RECORDS
// ============================================================================

export interface AccountHeader {
    accountType: AccountType;
    /** Declared byte size, header included */
    size: number;
    version: LayoutVersion;
}

interface RecordBase {
    key: Uint8Array;
    /** Slot the bytes were fetched at */
    slot: number;
    version: LayoutVersion;
}

export interface MappingRecord extends RecordBase {
    accountType: typeof AccountType.Mapping;
    /** Declared product count; entries may be shorter after null/duplicate skips */
    numProducts: number;
    entries: Uint8Array[];
    nextMappingKey: Uint8Array | null;
}

export interface ProductRecord extends RecordBase {
    accountType: typeof AccountType.Product;
    /** null means the product has no prices, not that they are unknown */
    firstPriceKey: Uint8Array | null;
    attrs: Map<string, string>;
}

export interface PriceInfo {
    rawPrice: bigint;
    rawConfidenceInterval: bigint;
    priceStatus: PriceStatus;
    slot: bigint;
    exponent: number;
    price: number;
    confidenceInterval: number;
}

export interface PriceComponent {
    publisherKey: Uint8Array;
    /** Quote that went into the last aggregate */
    lastAggregatePriceInfo: PriceInfo;
    latestPriceInfo: PriceInfo;
    exponent: number;
}

export interface PriceLayoutV1 {
    version: 1;
}

export interface PriceLayoutV2 {
    version: 2;
    /** Only TwapValue and TwacValue are exposed */
    ema: Map<TwEmaType, bigint>;
}

export type PriceLayout = PriceLayoutV1 | PriceLayoutV2;

export interface PriceRecord extends RecordBase {
    accountType: typeof AccountType.Price;
    priceType: PriceType;
    exponent: number;
    /** Declared count; may disagree with priceComponents.length */
    numComponents: number;
    lastSlot: bigint;
    validSlot: bigint;
    /** Back-reference, resolved through the record table */
    productKey: Uint8Array;
    nextPriceKey: Uint8Array | null;
    aggregatePriceInfo: PriceInfo;
    priceComponents: PriceComponent[];
    layout: PriceLayout;
}

export type OracleRecord = MappingRecord | ProductRecord | PriceRecord;

// ============================================================================
// GRAPH RESULTS
// ============================================================================

export type PriceMap = Map<PriceType, PriceRecord>;

export interface PriceDiff {
    added: PriceRecord[];
    removed: PriceRecord[];
}
