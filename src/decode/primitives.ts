/**
 * Primitive field readers shared by the record decoders
 */

import { OracleFormatError } from './error.js';
import { isNullKey, PUBKEY_LENGTH } from '../utils/pubkey.js';

// fatal: false -> invalid sequences become U+FFFD instead of throwing
const utf8 = new TextDecoder('utf-8', { fatal: false });

export function viewOf(data: Uint8Array): DataView {
    return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Copy a 32-byte key into a plain Uint8Array (Buffer.slice would alias).
 * Throws when the slot runs past the buffer.
 */
export function readPublicKey(data: Uint8Array, offset: number, key: Uint8Array | null): Uint8Array {
    if (offset + PUBKEY_LENGTH > data.length) {
        throw new OracleFormatError(
            `public key at offset ${offset} runs past end of data (${data.length} bytes)`,
            key
        );
    }
    return Uint8Array.from(data.subarray(offset, offset + PUBKEY_LENGTH));
}

/**
 * All-zero (or truncated) slot decodes to null. Never throws.
 */
export function readPublicKeyOrNull(data: Uint8Array, offset: number): Uint8Array | null {
    if (offset + PUBKEY_LENGTH > data.length) return null;
    const slice = data.subarray(offset, offset + PUBKEY_LENGTH);
    if (isNullKey(slice)) return null;
    return Uint8Array.from(slice);
}

export interface AttributeString {
    /** null on a zero length byte; offset is then unchanged */
    value: string | null;
    offset: number;
}

/**
 * Attribute string: length (u8) followed by `length` UTF-8 bytes
 */
export function readAttributeString(
    data: Uint8Array,
    offset: number,
    key: Uint8Array | null = null
): AttributeString {
    if (offset >= data.length) {
        throw new OracleFormatError(`attribute string at offset ${offset} is past end of data`, key);
    }

    const length = data[offset];
    if (length === 0) {
        return { value: null, offset };
    }

    const end = offset + 1 + length;
    if (end > data.length) {
        throw new OracleFormatError(
            `attribute string of ${length} bytes at offset ${offset} runs past end of data (${data.length} bytes)`,
            key
        );
    }

    return { value: utf8.decode(data.subarray(offset + 1, end)), offset: end };
}
