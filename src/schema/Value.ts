/**
 * Value: a lazy, read-only view over an encoded object.
 *
 * Nothing is decoded up front. Each accessor measures its way to the bytes it
 * needs with the size engine and reads only those, so opening a large object
 * to look at one field costs a walk over the preceding fields' sizes.
 */

import { BufferReader, readLength } from '../codec';
import { DIGEST_SIZE, isBlank, toHex, type Digest } from '../digest';
import {
    IndexOutOfRangeError,
    InvalidDynamicReferenceError,
    InvalidSchemaError,
    MalformedDataError,
    MissingObjectError,
    NoSuchFieldError,
} from '../errors';
import type { Pack } from '../storage/Pack';
import {
    Kind,
    ReferenceType,
    kindName,
    type DynamicReference,
    type Field,
    type Schema,
    type StructSchema,
} from './Schema';
import { LENGTH_PREFIX_SIZE, schemaSize } from './size';

export class Value {
    constructor(
        readonly schema: Schema,
        readonly data: Uint8Array,
    ) { }

    /** Ptr for single and dynamic references, Slice for reference lists. */
    get kind(): Kind {
        return this.schema.kind;
    }

    // ========================================================================
    // Scalars
    // ========================================================================

    int(): bigint {
        const reader = this.reader();
        switch (this.scalarKind('int')) {
            case Kind.Int8: return BigInt(reader.readInt8());
            case Kind.Int16: return BigInt(reader.readInt16());
            case Kind.Int32: return BigInt(reader.readInt32());
            case Kind.Int64: return reader.readInt64();
            default: throw this.wrongKind('int');
        }
    }

    uint(): bigint {
        const reader = this.reader();
        switch (this.scalarKind('uint')) {
            case Kind.Uint8: return BigInt(reader.readUint8());
            case Kind.Uint16: return BigInt(reader.readUint16());
            case Kind.Uint32: return BigInt(reader.readUint32());
            case Kind.Uint64: return reader.readUint64();
            default: throw this.wrongKind('uint');
        }
    }

    float(): number {
        const reader = this.reader();
        switch (this.scalarKind('float')) {
            case Kind.Float32: return reader.readFloat32();
            case Kind.Float64: return reader.readFloat64();
            default: throw this.wrongKind('float');
        }
    }

    string(): string {
        if (this.scalarKind('string') !== Kind.String) {
            throw this.wrongKind('string');
        }
        return this.reader().readString();
    }

    bool(): boolean {
        if (this.scalarKind('bool') !== Kind.Bool) {
            throw this.wrongKind('bool');
        }
        return this.reader().readBool();
    }

    /** Contents of a byte slice. */
    bytes(): Uint8Array {
        const schema = this.schema;
        if (schema.type !== 'slice' || schema.elem.type !== 'scalar' || schema.elem.kind !== Kind.Uint8) {
            throw this.wrongKind('bytes');
        }
        return this.reader().readBytes();
    }

    // ========================================================================
    // Arrays, slices and reference lists
    // ========================================================================

    len(): number {
        const schema = this.schema;
        switch (schema.type) {
            case 'array':
                return schema.length;
            case 'slice':
                return readLength(this.data);
            case 'reference':
                if (schema.referenceType === ReferenceType.Slice) {
                    return readLength(this.data);
                }
                break;
            default:
                break;
        }
        throw this.wrongKind('len');
    }

    index(i: number): Value {
        const length = this.len();
        if (!Number.isInteger(i) || i < 0 || i >= length) {
            throw new IndexOutOfRangeError(i, length);
        }

        const schema = this.schema;
        if (schema.type === 'reference' && schema.referenceType === ReferenceType.Slice) {
            const start = LENGTH_PREFIX_SIZE + i * DIGEST_SIZE;
            return new Value(singleReference(schema.elem), this.window(start, DIGEST_SIZE));
        }
        if (schema.type !== 'array' && schema.type !== 'slice') {
            throw this.wrongKind('index');
        }

        let offset = schema.type === 'slice' ? LENGTH_PREFIX_SIZE : 0;
        for (let k = 0; k < i; k++) {
            offset += schemaSize(schema.elem, this.data.subarray(offset));
        }
        const tail = this.data.subarray(offset);
        return new Value(schema.elem, tail.subarray(0, schemaSize(schema.elem, tail)));
    }

    /**
     * Visits elements in order. Throwing from the callback stops the walk;
     * the error reaches the caller as is.
     */
    rangeIndex(callback: (index: number, value: Value) => void): void {
        const length = this.len();
        const schema = this.schema;

        if (schema.type === 'reference' && schema.referenceType === ReferenceType.Slice) {
            const elem = singleReference(schema.elem);
            for (let i = 0; i < length; i++) {
                callback(i, new Value(elem, this.window(LENGTH_PREFIX_SIZE + i * DIGEST_SIZE, DIGEST_SIZE)));
            }
            return;
        }
        if (schema.type !== 'array' && schema.type !== 'slice') {
            throw this.wrongKind('rangeIndex');
        }

        let offset = schema.type === 'slice' ? LENGTH_PREFIX_SIZE : 0;
        for (let i = 0; i < length; i++) {
            const tail = this.data.subarray(offset);
            const size = schemaSize(schema.elem, tail);
            callback(i, new Value(schema.elem, tail.subarray(0, size)));
            offset += size;
        }
    }

    // ========================================================================
    // Structs
    // ========================================================================

    fieldNum(): number {
        return this.struct('fieldNum').fields.length;
    }

    /** Field names in declaration order. */
    fields(): string[] {
        return this.struct('fields').fields.map(f => f.name);
    }

    fieldByName(name: string): Value {
        const fields = this.struct('fieldByName').fields;
        const index = fields.findIndex(f => f.name === name);
        if (index < 0) {
            throw new NoSuchFieldError(name);
        }
        return this.fieldAt(fields, index);
    }

    fieldByIndex(i: number): Value {
        const fields = this.struct('fieldByIndex').fields;
        if (!Number.isInteger(i) || i < 0 || i >= fields.length) {
            throw new IndexOutOfRangeError(i, fields.length);
        }
        return this.fieldAt(fields, i);
    }

    /**
     * Visits fields in declaration order. Throwing from the callback stops
     * the walk; the error reaches the caller as is.
     */
    rangeFields(callback: (name: string, value: Value) => void): void {
        let offset = 0;
        for (const field of this.struct('rangeFields').fields) {
            const tail = this.data.subarray(offset);
            const size = schemaSize(field.schema, tail);
            callback(field.name, new Value(field.schema, tail.subarray(0, size)));
            offset += size;
        }
    }

    private fieldAt(fields: Field[], index: number): Value {
        let offset = 0;
        for (let k = 0; k < index; k++) {
            offset += schemaSize(fields[k].schema, this.data.subarray(offset));
        }
        const schema = fields[index].schema;
        const tail = this.data.subarray(offset);
        return new Value(schema, tail.subarray(0, schemaSize(schema, tail)));
    }

    // ========================================================================
    // References
    // ========================================================================

    /** Target digest of a single reference; blank when unset. */
    reference(): Digest {
        if (this.schema.type !== 'reference' || this.schema.referenceType !== ReferenceType.Single) {
            throw this.wrongKind('reference');
        }
        return this.reader().readRaw(DIGEST_SIZE);
    }

    dynamic(): DynamicReference {
        if (this.schema.type !== 'reference' || this.schema.referenceType !== ReferenceType.Dynamic) {
            throw this.wrongKind('dynamic');
        }
        const reader = this.reader();
        const schema = reader.readRaw(DIGEST_SIZE);
        const object = reader.readRaw(DIGEST_SIZE);
        if (isBlank(schema) !== isBlank(object)) {
            throw new InvalidDynamicReferenceError();
        }
        return { schema, object };
    }

    /** Target digests of a reference list. */
    references(): Digest[] {
        if (this.schema.type !== 'reference' || this.schema.referenceType !== ReferenceType.Slice) {
            throw this.wrongKind('references');
        }
        const reader = this.reader();
        const count = reader.readUint32();
        const refs: Digest[] = [];
        for (let i = 0; i < count; i++) {
            refs.push(reader.readRaw(DIGEST_SIZE));
        }
        return refs;
    }

    /**
     * Loads the target of a single or dynamic reference from `pack`.
     * Resolves to null for a blank reference.
     */
    async dereference(pack: Pack): Promise<Value | null> {
        const schema = this.schema;
        if (schema.type !== 'reference' || schema.referenceType === ReferenceType.Slice) {
            throw this.wrongKind('dereference');
        }

        let target: Schema;
        let key: Digest;
        if (schema.referenceType === ReferenceType.Single) {
            key = this.reference();
            if (isBlank(key)) {
                return null;
            }
            target = schema.elem;
        } else {
            const dr = this.dynamic();
            key = dr.object;
            if (isBlank(key)) {
                return null;
            }
            target = pack.registry().schemaByReference(dr.schema);
        }

        const data = await pack.get(key);
        if (data === undefined) {
            throw new MissingObjectError(toHex(key));
        }
        return new Value(target, data);
    }

    // ========================================================================
    // Helpers
    // ========================================================================

    private reader(): BufferReader {
        return new BufferReader(this.data);
    }

    private window(start: number, size: number): Uint8Array {
        if (start + size > this.data.length) {
            throw new MalformedDataError(`need ${start + size} bytes, have ${this.data.length}`);
        }
        return this.data.subarray(start, start + size);
    }

    private scalarKind(accessor: string): Kind {
        if (this.schema.type !== 'scalar') {
            throw this.wrongKind(accessor);
        }
        return this.schema.kind;
    }

    private struct(accessor: string): StructSchema {
        if (this.schema.type !== 'struct') {
            throw this.wrongKind(accessor);
        }
        return this.schema;
    }

    private wrongKind(accessor: string): InvalidSchemaError {
        return new InvalidSchemaError(`${accessor}() called on a value of kind ${kindName(this.kind)}`);
    }
}

function singleReference(elem: Schema): Schema {
    return { type: 'reference', kind: Kind.Ptr, name: '', referenceType: ReferenceType.Single, elem };
}
