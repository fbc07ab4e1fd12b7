/**
 * RPC Account Source
 *
 * AccountSource over a @solana/web3.js Connection. getMultipleAccounts takes
 * at most 100 keys per call, so batches are split and re-joined in order.
 * A missing account is an error for fetch() and a null slot for fetchBatch().
 * RPC failures propagate unchanged; there is no retry here.
 */

import { Connection, PublicKey } from '@solana/web3.js';
import type { AccountInfo, Commitment, RpcResponseAndContext } from '@solana/web3.js';
import type { AccountSource, FetchedAccount } from '../types.js';
import { AccountNotFoundError } from '../decode/error.js';
import type { OracleConfig } from '../config.js';

export const MAX_KEYS_PER_BATCH = 100;

/** The slice of Connection this source calls */
export interface AccountRpc {
    getAccountInfoAndContext(
        publicKey: PublicKey,
        commitment?: Commitment
    ): Promise<RpcResponseAndContext<AccountInfo<Buffer> | null>>;
    getMultipleAccountsInfoAndContext(
        publicKeys: PublicKey[],
        commitment?: Commitment
    ): Promise<RpcResponseAndContext<(AccountInfo<Buffer> | null)[]>>;
}

export class RpcAccountSource implements AccountSource {
    constructor(
        private readonly rpc: AccountRpc,
        private readonly commitment: Commitment = 'confirmed'
    ) {}

    static fromConfig(config: OracleConfig): RpcAccountSource {
        return new RpcAccountSource(new Connection(config.rpcUrl, config.commitment), config.commitment);
    }

    async fetch(key: Uint8Array): Promise<FetchedAccount> {
        const { context, value } = await this.rpc.getAccountInfoAndContext(new PublicKey(key), this.commitment);
        if (value === null) {
            throw new AccountNotFoundError(key);
        }
        return { slot: context.slot, data: new Uint8Array(value.data) };
    }

    async fetchBatch(keys: Uint8Array[]): Promise<Array<FetchedAccount | null>> {
        const out: Array<FetchedAccount | null> = [];
        for (let start = 0; start < keys.length; start += MAX_KEYS_PER_BATCH) {
            const chunk = keys.slice(start, start + MAX_KEYS_PER_BATCH);
            const { context, value } = await this.rpc.getMultipleAccountsInfoAndContext(
                chunk.map((key) => new PublicKey(key)),
                this.commitment
            );
            if (value.length !== chunk.length) {
                throw new Error(`[RpcAccountSource] RPC returned ${value.length} accounts but requested ${chunk.length}`);
            }
            for (const info of value) {
                out.push(info === null ? null : { slot: context.slot, data: new Uint8Array(info.data) });
            }
        }
        return out;
    }
}
