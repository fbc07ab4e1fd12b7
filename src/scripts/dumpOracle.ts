#!/usr/bin/env node
/**
 * dumpOracle.ts: print every product and its aggregate prices
 *
 * Usage:
 *   MAPPING_KEY=<base58> RPC_URL=<url> tsx src/scripts/dumpOracle.ts
 *   tsx src/scripts/dumpOracle.ts <mapping key>
 *
 * Variables may also come from a .env file in the working directory.
 */

import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { RpcAccountSource } from '../ingest/rpcSource.js';
import { ProductGraph } from '../topology/productGraph.js';
import { productSymbol } from '../decode/programs/product.js';
import { formatScaled } from '../decode/priceInfo.js';
import { PriceStatus, PriceType } from '../types.js';
import { formatKey, parseKey } from '../utils/pubkey.js';
import { logger, setDebugLogging } from '../utils/logger.js';
import { metrics } from '../instrument/metrics.js';

const PRICE_TYPE_NAMES: Record<PriceType, string> = {
    [PriceType.Unknown]: 'unknown',
    [PriceType.Price]: 'price',
    [PriceType.Twap]: 'twap',
    [PriceType.Volatility]: 'volatility',
};

const STATUS_NAMES: Record<PriceStatus, string> = {
    [PriceStatus.Unknown]: 'unknown',
    [PriceStatus.Trading]: 'trading',
    [PriceStatus.Halted]: 'halted',
    [PriceStatus.Auction]: 'auction',
};

dotenv.config();

async function main(): Promise<void> {
    const config = loadConfig();
    setDebugLogging(config.debug);

    const mappingKey = process.argv[2] ? parseKey(process.argv[2]) : config.mappingKey;
    if (mappingKey === null) {
        throw new Error('No mapping key: pass one as an argument or set MAPPING_KEY');
    }

    logger.info(`RPC: ${config.rpcUrl} (${config.commitment})`);
    const graph = new ProductGraph(RpcAccountSource.fromConfig(config));
    const products = await graph.loadProducts(mappingKey);
    logger.info(`${products.length} products under ${formatKey(mappingKey)}`);

    for (const product of products) {
        const prices = await graph.getPrices(product.key);
        console.log(`${productSymbol(product)} (${formatKey(product.key)})`);
        for (const price of prices.values()) {
            const info = price.aggregatePriceInfo;
            console.log(
                `  ${PRICE_TYPE_NAMES[price.priceType]}: ` +
                `${formatScaled(info.rawPrice, info.exponent)} ± ${formatScaled(info.rawConfidenceInterval, info.exponent)} ` +
                `[${STATUS_NAMES[info.priceStatus]}] slot=${info.slot} publishers=${price.priceComponents.length}`
            );
        }
    }

    const m = metrics.snapshot();
    logger.info(`decoded ${m.decodeSuccessCount} accounts, ${m.decodeFailureCount} failures, ${m.batchFetches} batch fetches`);
}

main().catch((err) => {
    logger.error(err instanceof Error ? err.message : err);
    process.exit(1);
});
