// src/config.ts
// Runtime configuration from environment variables

import type { Commitment } from '@solana/web3.js';
import { parseKey } from './utils/pubkey.js';

export const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

const COMMITMENTS = ['processed', 'confirmed', 'finalized'] as const;

export interface OracleConfig {
    rpcUrl: string;
    commitment: Commitment;
    /** First mapping page, if configured */
    mappingKey: Uint8Array | null;
    debug: boolean;
}

function isCommitment(value: string): value is (typeof COMMITMENTS)[number] {
    return COMMITMENTS.some((commitment) => commitment === value);
}

/**
 * RPC_URL > SOLANA_RPC_URL > default
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OracleConfig {
    const rpcUrl = env.RPC_URL ?? env.SOLANA_RPC_URL ?? DEFAULT_RPC_URL;
    if (!/^https?:\/\//.test(rpcUrl)) {
        throw new Error(`Invalid RPC_URL: ${rpcUrl} (expected http:// or https://)`);
    }

    const commitment = env.COMMITMENT ?? 'confirmed';
    if (!isCommitment(commitment)) {
        throw new Error(`Invalid COMMITMENT: ${commitment} (expected one of ${COMMITMENTS.join(', ')})`);
    }

    let mappingKey: Uint8Array | null = null;
    if (env.MAPPING_KEY) {
        try {
            mappingKey = parseKey(env.MAPPING_KEY);
        } catch (err) {
            throw new Error(`Invalid MAPPING_KEY: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    return {
        rpcUrl,
        commitment,
        mappingKey,
        debug: env.DEBUG === '1',
    };
}
