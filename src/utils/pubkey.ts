/**
 * Public key helpers
 *
 * Keys stay as raw 32-byte arrays through decode and topology.
 * Hex is used for map keys (no base58 on the hot path), base58 only for display.
 */

import bs58 from 'bs58';

export const PUBKEY_LENGTH = 32;

export const NULL_KEY = new Uint8Array(PUBKEY_LENGTH);

export function isNullKey(key: Uint8Array): boolean {
    for (let i = 0; i < key.length; i++) {
        if (key[i] !== 0) return false;
    }
    return true;
}

/**
 * Fast 32-byte comparison
 */
export function keysEqual(a: Uint8Array | null, b: Uint8Array | null): boolean {
    if (a === null || b === null) return a === b;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Map key for a pubkey. Uint8Array equality doesn't work in Map.
 */
export function toKeyHex(key: Uint8Array): string {
    let out = '';
    for (let i = 0; i < key.length; i++) {
        out += key[i].toString(16).padStart(2, '0');
    }
    return out;
}

export function formatKey(key: Uint8Array | null): string {
    return key === null ? 'null' : bs58.encode(key);
}

export function parseKey(text: string): Uint8Array {
    const bytes = bs58.decode(text);
    if (bytes.length !== PUBKEY_LENGTH) {
        throw new Error(`[parseKey] expected ${PUBKEY_LENGTH} bytes, got ${bytes.length} for ${text}`);
    }
    return Uint8Array.from(bytes);
}
