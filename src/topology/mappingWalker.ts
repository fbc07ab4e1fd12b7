/**
 * Mapping pagination
 *
 * Mapping pages link forward through nextMappingKey until it is null.
 * walkMappings() is lazy (one fetch per page pulled); loadAllMappings()
 * drains it.
 */

import type { AccountSource, MappingRecord } from '../types.js';
import { decodeMappingAccount } from '../decode/account.js';
import { formatKey } from '../utils/pubkey.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../instrument/metrics.js';

export async function* walkMappings(
    source: AccountSource,
    firstKey: Uint8Array
): AsyncGenerator<MappingRecord> {
    let key: Uint8Array | null = firstKey;
    let page = 0;
    while (key !== null) {
        metrics.incrSingleFetch();
        const account = await source.fetch(key);
        const mapping = decodeMappingAccount(key, account);
        logger.debug(`[mapping] page ${page} ${formatKey(key)}: ${mapping.entries.length} products`);
        yield mapping;
        key = mapping.nextMappingKey;
        page++;
    }
}

export async function loadAllMappings(source: AccountSource, firstKey: Uint8Array): Promise<MappingRecord[]> {
    const pages: MappingRecord[] = [];
    for await (const page of walkMappings(source, firstKey)) {
        pages.push(page);
    }
    return pages;
}

/**
 * Product keys of every page, in page order
 */
export async function listProductKeys(source: AccountSource, firstKey: Uint8Array): Promise<Uint8Array[]> {
    const keys: Uint8Array[] = [];
    for await (const page of walkMappings(source, firstKey)) {
        keys.push(...page.entries);
    }
    return keys;
}
