/**
 * @file codec.ts
 * @brief Primitive binary encoding for objgraph.
 *
 * Every structure on the wire (schemas, registries, data objects, messages)
 * is built from the same primitives:
 *
 * - fixed-width integers and IEEE-754 floats, little-endian
 * - booleans as a single 0/1 byte
 * - byte sequences and strings as a uint32 length followed by the raw bytes
 * - fixed-size byte arrays (digests, keys, signatures) with no prefix
 *
 * @example
 * ```typescript
 * const writer = new BufferWriter();
 * writer.writeString('cxo.User');
 * writer.writeUint32(42);
 *
 * const reader = new BufferReader(writer.finish());
 * reader.readString(); // 'cxo.User'
 * reader.readUint32(); // 42
 * ```
 */

import { MalformedDataError } from './errors';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export class BufferWriter {
    private buf: Uint8Array;
    private offset: number;
    private view: DataView;

    constructor(initialSize: number = 256) {
        this.buf = new Uint8Array(initialSize);
        this.offset = 0;
        this.view = new DataView(this.buf.buffer);
    }

    private ensure(bytes: number) {
        if (this.offset + bytes > this.buf.length) {
            const newBuf = new Uint8Array(Math.max(this.buf.length * 2, this.offset + bytes));
            newBuf.set(this.buf);
            this.buf = newBuf;
            this.view = new DataView(this.buf.buffer);
        }
    }

    get length(): number {
        return this.offset;
    }

    writeUint8(val: number) {
        this.ensure(1);
        this.view.setUint8(this.offset, val);
        this.offset += 1;
    }

    writeInt8(val: number) {
        this.ensure(1);
        this.view.setInt8(this.offset, val);
        this.offset += 1;
    }

    writeBool(val: boolean) {
        this.writeUint8(val ? 1 : 0);
    }

    writeUint16(val: number) {
        this.ensure(2);
        this.view.setUint16(this.offset, val, true);
        this.offset += 2;
    }

    writeInt16(val: number) {
        this.ensure(2);
        this.view.setInt16(this.offset, val, true);
        this.offset += 2;
    }

    writeUint32(val: number) {
        this.ensure(4);
        this.view.setUint32(this.offset, val, true);
        this.offset += 4;
    }

    writeInt32(val: number) {
        this.ensure(4);
        this.view.setInt32(this.offset, val, true);
        this.offset += 4;
    }

    writeUint64(val: bigint) {
        this.ensure(8);
        this.view.setBigUint64(this.offset, val, true);
        this.offset += 8;
    }

    writeInt64(val: bigint) {
        this.ensure(8);
        this.view.setBigInt64(this.offset, val, true);
        this.offset += 8;
    }

    writeFloat32(val: number) {
        this.ensure(4);
        this.view.setFloat32(this.offset, val, true);
        this.offset += 4;
    }

    writeFloat64(val: number) {
        this.ensure(8);
        this.view.setFloat64(this.offset, val, true);
        this.offset += 8;
    }

    /** Length-prefixed byte sequence. */
    writeBytes(bytes: Uint8Array) {
        this.writeUint32(bytes.length);
        this.writeRaw(bytes);
    }

    /** Bytes with no length prefix (fixed-size arrays). */
    writeRaw(bytes: Uint8Array) {
        this.ensure(bytes.length);
        this.buf.set(bytes, this.offset);
        this.offset += bytes.length;
    }

    writeString(str: string) {
        this.writeBytes(textEncoder.encode(str));
    }

    finish(): Uint8Array {
        return this.buf.slice(0, this.offset);
    }
}

export class BufferReader {
    private offset: number = 0;
    private view: DataView;

    constructor(private buf: Uint8Array) {
        this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
    }

    getOffset() { return this.offset; }

    remaining(): number {
        return this.buf.length - this.offset;
    }

    private need(bytes: number): void {
        if (this.offset + bytes > this.buf.length) {
            throw new MalformedDataError(
                `unexpected end of buffer: need ${bytes} bytes at offset ${this.offset}, have ${this.remaining()}`
            );
        }
    }

    readUint8(): number {
        this.need(1);
        return this.view.getUint8(this.offset++);
    }

    readInt8(): number {
        this.need(1);
        return this.view.getInt8(this.offset++);
    }

    readBool(): boolean {
        return this.readUint8() !== 0;
    }

    readUint16(): number {
        this.need(2);
        const val = this.view.getUint16(this.offset, true);
        this.offset += 2;
        return val;
    }

    readInt16(): number {
        this.need(2);
        const val = this.view.getInt16(this.offset, true);
        this.offset += 2;
        return val;
    }

    readUint32(): number {
        this.need(4);
        const val = this.view.getUint32(this.offset, true);
        this.offset += 4;
        return val;
    }

    readInt32(): number {
        this.need(4);
        const val = this.view.getInt32(this.offset, true);
        this.offset += 4;
        return val;
    }

    readUint64(): bigint {
        this.need(8);
        const val = this.view.getBigUint64(this.offset, true);
        this.offset += 8;
        return val;
    }

    readInt64(): bigint {
        this.need(8);
        const val = this.view.getBigInt64(this.offset, true);
        this.offset += 8;
        return val;
    }

    readFloat32(): number {
        this.need(4);
        const val = this.view.getFloat32(this.offset, true);
        this.offset += 4;
        return val;
    }

    readFloat64(): number {
        this.need(8);
        const val = this.view.getFloat64(this.offset, true);
        this.offset += 8;
        return val;
    }

    readBytes(): Uint8Array {
        const len = this.readUint32();
        return this.readRaw(len);
    }

    /** Copies `len` unprefixed bytes out of the buffer. */
    readRaw(len: number): Uint8Array {
        this.need(len);
        const bytes = this.buf.slice(this.offset, this.offset + len);
        this.offset += len;
        return bytes;
    }

    readString(): string {
        const len = this.readUint32();
        this.need(len);
        const str = textDecoder.decode(this.buf.subarray(this.offset, this.offset + len));
        this.offset += len;
        return str;
    }
}

/**
 * Reads the uint32 length prefix at the start of `data`.
 */
export function readLength(data: Uint8Array): number {
    return new BufferReader(data).readUint32();
}

/**
 * Bytewise comparison, used for canonical ordering.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

export function encodeUtf8(str: string): Uint8Array {
    return textEncoder.encode(str);
}
