/**
 * Account Header Validator
 *
 * Layout (16 bytes, little-endian):
 *   [0..4]    magic (u32) = 0xa1b2c3d4
 *   [4..8]    version (u32) - 1 or 2
 *   [8..12]   account type (u32)
 *   [12..16]  declared size (u32), header included
 *
 * Every check runs before a record field is read.
 */

import type { AccountHeader, LayoutVersion } from '../types.js';
import { AccountType, SUPPORTED_VERSIONS } from '../types.js';
import { OracleFormatError } from './error.js';

export const ORACLE_MAGIC = 0xa1b2c3d4;
export const ACCOUNT_HEADER_BYTES = 16;

export function isSupportedVersion(version: number): version is LayoutVersion {
    return SUPPORTED_VERSIONS.some((supported) => supported === version);
}

export function isAccountType(tag: number): tag is AccountType {
    return tag === AccountType.Unknown ||
        tag === AccountType.Mapping ||
        tag === AccountType.Product ||
        tag === AccountType.Price;
}

export function parseHeader(
    data: Uint8Array,
    offset: number,
    key: Uint8Array | null
): AccountHeader {
    if (data.length - offset < ACCOUNT_HEADER_BYTES) {
        throw new OracleFormatError(
            `account data too short for header: ${data.length - offset} bytes (need ${ACCOUNT_HEADER_BYTES})`,
            key
        );
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const magic = view.getUint32(offset, true);
    const version = view.getUint32(offset + 4, true);
    const typeTag = view.getUint32(offset + 8, true);
    const size = view.getUint32(offset + 12, true);

    if (data.length < size) {
        throw new OracleFormatError(
            `header says data is ${size} bytes, but buffer only has ${data.length} bytes`,
            key
        );
    }

    if (size < ACCOUNT_HEADER_BYTES) {
        throw new OracleFormatError(`declared size ${size} is smaller than the header`, key);
    }

    if (magic !== ORACLE_MAGIC) {
        throw new OracleFormatError(
            `header has wrong magic: expected ${ORACLE_MAGIC.toString(16).padStart(8, '0')}, got ${magic.toString(16).padStart(8, '0')}`,
            key
        );
    }

    if (!isSupportedVersion(version)) {
        throw new OracleFormatError(`unsupported version ${version}`, key);
    }

    if (!isAccountType(typeTag)) {
        throw new OracleFormatError(`unknown account type ${typeTag}`, key);
    }

    return { accountType: typeTag, size, version };
}
