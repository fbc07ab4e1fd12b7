/**
 * Oracle account decoder and product/price graph
 */

export * from './types.js';

export { ACCOUNT_HEADER_BYTES, ORACLE_MAGIC, parseHeader } from './decode/header.js';
export { readAttributeString, readPublicKey, readPublicKeyOrNull } from './decode/primitives.js';
export {
    decodePriceComponent,
    decodePriceInfo,
    formatScaled,
    iterateComponents,
    PRICE_COMPONENT_LENGTH,
    PRICE_INFO_LENGTH,
    scalePrice,
} from './decode/priceInfo.js';
export { decodeMapping } from './decode/programs/mapping.js';
export { decodeProduct, productSymbol } from './decode/programs/product.js';
export {
    aggregateConfidenceInterval,
    aggregatePrice,
    componentCountMismatch,
    decodePrice,
    MAX_COMPONENTS_V1,
    MAX_COMPONENTS_V2,
} from './decode/programs/price.js';
export {
    decodeAccount,
    decodeMappingAccount,
    decodePriceAccount,
    decodeProductAccount,
} from './decode/account.js';
export {
    AccountNotFoundError,
    ChainConsistencyError,
    NotLoadedError,
    OracleError,
    OracleFormatError,
    type OracleErrorKind,
} from './decode/error.js';

export { RecordTable, type ProductNode, type RecordTableStats } from './cache/recordTable.js';
export { listProductKeys, loadAllMappings, walkMappings } from './topology/mappingWalker.js';
export {
    collectPriceMap,
    validatePriceChain,
    walkPriceChain,
    type KeyedAccount,
} from './topology/priceChain.js';
export { ProductGraph, type DiffRefreshOptions } from './topology/productGraph.js';

export { RpcAccountSource, type AccountRpc } from './ingest/rpcSource.js';
export { MemoryAccountSource } from './ingest/memorySource.js';
export { loadConfig, type OracleConfig } from './config.js';
export { DecodeMetrics, metrics, type DecodeMetricsSnapshot } from './instrument/metrics.js';
export { formatKey, keysEqual, parseKey, toKeyHex } from './utils/pubkey.js';
export { logger, setDebugLogging } from './utils/logger.js';
