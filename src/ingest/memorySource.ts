/**
 * In-memory Account Source
 *
 * Serves account bytes from a table. Used for replaying captured accounts
 * and as the transport stand-in in tests.
 */

import type { AccountSource, FetchedAccount } from '../types.js';
import { AccountNotFoundError } from '../decode/error.js';
import { toKeyHex } from '../utils/pubkey.js';

export class MemoryAccountSource implements AccountSource {
    private accounts: Map<string, FetchedAccount> = new Map();

    /** Keys passed to fetch(), in call order */
    readonly fetchLog: Uint8Array[] = [];
    /** Key lists passed to fetchBatch(), in call order */
    readonly batchLog: Uint8Array[][] = [];

    set(key: Uint8Array, data: Uint8Array, slot = 1): this {
        this.accounts.set(toKeyHex(key), { slot, data });
        return this;
    }

    delete(key: Uint8Array): boolean {
        return this.accounts.delete(toKeyHex(key));
    }

    async fetch(key: Uint8Array): Promise<FetchedAccount> {
        this.fetchLog.push(key);
        return this.lookup(key);
    }

    async fetchBatch(keys: Uint8Array[]): Promise<Array<FetchedAccount | null>> {
        this.batchLog.push([...keys]);
        return keys.map((key) => this.accounts.get(toKeyHex(key)) ?? null);
    }

    private lookup(key: Uint8Array): FetchedAccount {
        const account = this.accounts.get(toKeyHex(key));
        if (!account) {
            throw new AccountNotFoundError(key);
        }
        return account;
    }
}
