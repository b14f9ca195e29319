import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryPack } from '../../src/adapters/InMemoryPack';
import { sha256, toHex } from '../../src/digest';
import { Flags } from '../../src/storage/Pack';
import { cxoRegistry, digestOf } from '../test-utils';

describe('InMemoryPack', () => {
    const registry = cxoRegistry();
    let pack: InMemoryPack;

    beforeEach(() => {
        pack = new InMemoryPack(registry);
    });

    it('exposes its registry', () => {
        expect(pack.registry()).toBe(registry);
    });

    it('stores and retrieves by key', async () => {
        const key = digestOf('k');
        await pack.set(key, new Uint8Array([1, 2, 3]));
        expect(Array.from((await pack.get(key)) ?? [])).toEqual([1, 2, 3]);
        expect(await pack.get(digestOf('other'))).toBeUndefined();
    });

    it('adds values under their SHA-256 digest', async () => {
        const value = new Uint8Array([4, 5, 6]);
        const key = await pack.add(value);
        expect(toHex(key)).toBe(toHex(sha256(value)));
        expect(pack.size).toBe(1);

        // same content, same key
        await pack.add(new Uint8Array([4, 5, 6]));
        expect(pack.size).toBe(1);
    });

    it('keeps its own copy of stored values', async () => {
        const value = new Uint8Array([1]);
        const key = await pack.add(value);
        value[0] = 9;
        expect(Array.from((await pack.get(key)) ?? [])).toEqual([1]);
    });

    it('sets and clears flag bits', () => {
        expect(pack.flags()).toBe(0);
        pack.setFlags(Flags.HashTableIndex | Flags.LazyUpdating);
        expect(pack.flags()).toBe(10);
        pack.unsetFlags(Flags.HashTableIndex);
        expect(pack.flags()).toBe(Flags.LazyUpdating);
        expect(new InMemoryPack(registry, Flags.EntireRefs).flags()).toBe(4);
    });
});
