/**
 * Pack: the storage surface values dereference through.
 *
 * A pack binds one registry to a content-addressed object store. Keys are
 * object digests; `add` computes the key from the content.
 */

import type { Digest } from '../digest';
import type { Registry } from '../schema/Registry';

/**
 * Behaviour bits for structures built on top of a pack. The bits are carried
 * and toggled here; interpreting them is up to those structures.
 */
export enum Flags {
    /** Keep an index of reference list elements by hash. */
    HashTableIndex = 2,
    /** Load whole reference lists instead of walking them lazily. */
    EntireRefs = 4,
    /** Defer updating tree nodes until the next save. */
    LazyUpdating = 8,
}

export interface Pack {
    registry(): Registry;
    get(key: Digest): Promise<Uint8Array | undefined>;
    set(key: Digest, value: Uint8Array): Promise<void>;
    /** Stores `value` under its SHA-256 digest and returns that digest. */
    add(value: Uint8Array): Promise<Digest>;
    flags(): number;
    setFlags(flags: number): void;
    unsetFlags(flags: number): void;
}
