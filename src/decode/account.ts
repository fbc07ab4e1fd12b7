/**
 * Account Decoder Dispatcher
 *
 * Validates the header, truncates to the declared size and routes to the
 * record decoder for the declared type. The typed entry points also check
 * that the declared type is the one the caller asked for.
 */

import type {
    AccountType,
    FetchedAccount,
    MappingRecord,
    OracleRecord,
    PriceRecord,
    ProductRecord,
} from '../types.js';
import { AccountType as A } from '../types.js';
import { OracleFormatError } from './error.js';
import { ACCOUNT_HEADER_BYTES, parseHeader } from './header.js';
import { decodeMapping } from './programs/mapping.js';
import { decodeProduct } from './programs/product.js';
import { decodePrice } from './programs/price.js';
import { metrics } from '../instrument/metrics.js';

const TYPE_NAMES: Record<AccountType, string> = {
    [A.Unknown]: 'unknown',
    [A.Mapping]: 'mapping',
    [A.Product]: 'product',
    [A.Price]: 'price',
};

function decodeChecked(key: Uint8Array, account: FetchedAccount, expected: AccountType | null): OracleRecord {
    try {
        const header = parseHeader(account.data, 0, key);
        if (expected !== null && header.accountType !== expected) {
            throw new OracleFormatError(
                `wrong account type ${TYPE_NAMES[header.accountType]}, expected ${TYPE_NAMES[expected]}`,
                key
            );
        }

        const body = account.data.subarray(0, header.size);
        let record: OracleRecord;
        switch (header.accountType) {
            case A.Mapping:
                record = decodeMapping(key, account.slot, body, header.version, ACCOUNT_HEADER_BYTES);
                break;
            case A.Product:
                record = decodeProduct(key, account.slot, body, header.version, ACCOUNT_HEADER_BYTES);
                break;
            case A.Price:
                record = decodePrice(key, account.slot, body, header.version, ACCOUNT_HEADER_BYTES);
                break;
            default:
                throw new OracleFormatError('account type unknown, nothing to decode', key);
        }

        metrics.incrDecodeSuccess(header.accountType);
        return record;
    } catch (err) {
        metrics.incrDecodeFailure();
        throw err;
    }
}

/**
 * Decode any oracle account by its declared type
 */
export function decodeAccount(key: Uint8Array, account: FetchedAccount): OracleRecord {
    return decodeChecked(key, account, null);
}

export function decodeMappingAccount(key: Uint8Array, account: FetchedAccount): MappingRecord {
    const record = decodeChecked(key, account, A.Mapping);
    if (record.accountType !== A.Mapping) throw new OracleFormatError('expected mapping record', key);
    return record;
}

export function decodeProductAccount(key: Uint8Array, account: FetchedAccount): ProductRecord {
    const record = decodeChecked(key, account, A.Product);
    if (record.accountType !== A.Product) throw new OracleFormatError('expected product record', key);
    return record;
}

export function decodePriceAccount(key: Uint8Array, account: FetchedAccount): PriceRecord {
    const record = decodeChecked(key, account, A.Price);
    if (record.accountType !== A.Price) throw new OracleFormatError('expected price record', key);
    return record;
}
