/**
 * Content identifiers.
 *
 * Schemas, registries and data objects are addressed by the SHA-256 digest
 * of their canonical encoding. A digest is a plain 32-byte Uint8Array; use
 * `toHex` wherever one has to serve as a map key.
 */
import { createHash } from 'crypto';
import { MalformedDataError } from './errors';

export const DIGEST_SIZE = 32;
export const PUBKEY_SIZE = 33;
export const SIGNATURE_SIZE = 65;

/** A SHA-256 digest (32 bytes). */
export type Digest = Uint8Array;
/** Digest of an encoded schema. */
export type SchemaRef = Digest;
/** Digest of an encoded registry. */
export type RegistryRef = Digest;

export function sha256(data: Uint8Array): Digest {
    return new Uint8Array(createHash('sha256').update(data).digest());
}

export function blankDigest(): Digest {
    return new Uint8Array(DIGEST_SIZE);
}

export function isBlank(digest: Uint8Array): boolean {
    return digest.every(b => b === 0);
}

export function digestEquals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

export function fromHex(hex: string): Uint8Array {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new MalformedDataError(`invalid hex string "${hex}"`);
    }
    const out = new Uint8Array(hex.length / 2);
    for (let i = 0; i < out.length; i++) {
        out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return out;
}

/**
 * Parses a hex digest and checks its width.
 */
export function digestFromHex(hex: string): Digest {
    const bytes = fromHex(hex);
    if (bytes.length !== DIGEST_SIZE) {
        throw new MalformedDataError(`digest must be ${DIGEST_SIZE} bytes, got ${bytes.length}`);
    }
    return bytes;
}
