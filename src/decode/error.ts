/**
 * Decode and graph errors
 *
 * FormatError and ConsistencyError are fatal to the single attempt and never
 * retried here. Transport errors are not wrapped.
 */

import { formatKey } from '../utils/pubkey.js';

export type OracleErrorKind = 'format' | 'consistency' | 'not-loaded' | 'not-found';

export abstract class OracleError extends Error {
    abstract readonly kind: OracleErrorKind;

    constructor(
        message: string,
        public readonly key: Uint8Array | null
    ) {
        super(key === null ? message : `${formatKey(key)}: ${message}`);
    }
}

/**
 * Bad magic/version/size, malformed attribute strings, wrong account type
 */
export class OracleFormatError extends OracleError {
    readonly kind = 'format';

    constructor(message: string, key: Uint8Array | null) {
        super(message, key);
        this.name = 'OracleFormatError';
    }
}

/**
 * A price record does not sit where the caller expected it in the chain
 */
export class ChainConsistencyError extends OracleError {
    readonly kind = 'consistency';

    constructor(
        message: string,
        key: Uint8Array | null,
        public readonly expected: Uint8Array | null,
        public readonly actual: Uint8Array | null
    ) {
        super(message, key);
        this.name = 'ChainConsistencyError';
    }
}

export class NotLoadedError extends OracleError {
    readonly kind = 'not-loaded';

    constructor(key: Uint8Array) {
        super('price records not loaded', key);
        this.name = 'NotLoadedError';
    }
}

export class AccountNotFoundError extends OracleError {
    readonly kind = 'not-found';

    constructor(key: Uint8Array) {
        super('account does not exist', key);
        this.name = 'AccountNotFoundError';
    }
}
