import { sha256, toHex, type Digest } from '../digest';
import type { Registry } from '../schema/Registry';
import type { Pack } from '../storage/Pack';

/**
 * In-Memory Pack
 * Map-backed object store, used by tests and the CLI.
 */
export class InMemoryPack implements Pack {
    private data: Map<string, Uint8Array> = new Map();
    private bits = 0;

    constructor(private readonly reg: Registry, flags: number = 0) {
        this.bits = flags;
    }

    registry(): Registry {
        return this.reg;
    }

    get(key: Digest): Promise<Uint8Array | undefined> {
        return Promise.resolve(this.data.get(toHex(key)));
    }

    set(key: Digest, value: Uint8Array): Promise<void> {
        this.data.set(toHex(key), value.slice());
        return Promise.resolve();
    }

    async add(value: Uint8Array): Promise<Digest> {
        const key = sha256(value);
        await this.set(key, value);
        return key;
    }

    /** Number of stored objects. */
    get size(): number {
        return this.data.size;
    }

    flags(): number {
        return this.bits;
    }

    setFlags(flags: number): void {
        this.bits |= flags;
    }

    unsetFlags(flags: number): void {
        this.bits &= ~flags;
    }
}
