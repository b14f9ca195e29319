/**
 * Value Encoder: serializes plain JS values against a resolved schema.
 *
 * The produced bytes are exactly what the size engine measures and what
 * `Value` reads back. Accepted inputs per kind:
 *
 * | Schema             | JS value                                      |
 * |--------------------|-----------------------------------------------|
 * | bool               | boolean                                       |
 * | (u)int8..32        | number or bigint                              |
 * | (u)int64           | bigint or safe-integer number                 |
 * | float32/64         | number                                        |
 * | string             | string                                        |
 * | []uint8            | Uint8Array or number[]                        |
 * | array / slice      | array (arrays need the exact length)          |
 * | struct             | object holding every field                    |
 * | single reference   | 32-byte digest, or undefined for blank        |
 * | dynamic reference  | `{ schema, object }`, or undefined for blank  |
 * | reference list     | array of 32-byte digests                      |
 */

import { BufferWriter } from '../codec';
import { DIGEST_SIZE, blankDigest } from '../digest';
import { InvalidSchemaError, ValueError } from '../errors';
import { Kind, ReferenceType, kindName, type ReferenceSchema, type Schema } from './Schema';

const INT_RANGES: Partial<Record<Kind, [bigint, bigint]>> = {
    [Kind.Int8]: [-(2n ** 7n), 2n ** 7n - 1n],
    [Kind.Int16]: [-(2n ** 15n), 2n ** 15n - 1n],
    [Kind.Int32]: [-(2n ** 31n), 2n ** 31n - 1n],
    [Kind.Int64]: [-(2n ** 63n), 2n ** 63n - 1n],
    [Kind.Uint8]: [0n, 2n ** 8n - 1n],
    [Kind.Uint16]: [0n, 2n ** 16n - 1n],
    [Kind.Uint32]: [0n, 2n ** 32n - 1n],
    [Kind.Uint64]: [0n, 2n ** 64n - 1n],
};

export function encodeValue(schema: Schema, value: unknown): Uint8Array {
    const writer = new BufferWriter();
    write(writer, schema, value, schema.name || kindName(schema.kind));
    return writer.finish();
}

function write(w: BufferWriter, schema: Schema, value: unknown, path: string): void {
    switch (schema.type) {
        case 'scalar':
            writeScalar(w, schema.kind, value, path);
            return;
        case 'array': {
            const items = toItems(schema.elem, value, path);
            if (items.length !== schema.length) {
                throw new ValueError(`${path}: expected ${schema.length} elements, got ${items.length}`);
            }
            items.forEach((item, i) => write(w, schema.elem, item, `${path}[${i}]`));
            return;
        }
        case 'slice': {
            const items = toItems(schema.elem, value, path);
            w.writeUint32(items.length);
            items.forEach((item, i) => write(w, schema.elem, item, `${path}[${i}]`));
            return;
        }
        case 'struct': {
            if (!isRecord(value)) {
                throw new ValueError(`${path}: expected an object`);
            }
            for (const field of schema.fields) {
                const fieldPath = `${path}.${field.name}`;
                if (!(field.name in value) && field.schema.type !== 'reference') {
                    throw new ValueError(`${fieldPath}: missing field`);
                }
                write(w, field.schema, value[field.name], fieldPath);
            }
            return;
        }
        case 'reference':
            writeReference(w, schema, value, path);
            return;
        case 'placeholder':
            throw new InvalidSchemaError(`unresolved schema "${schema.name}"`);
    }
}

function writeScalar(w: BufferWriter, kind: Kind, value: unknown, path: string): void {
    switch (kind) {
        case Kind.Bool:
            if (typeof value !== 'boolean') {
                throw new ValueError(`${path}: expected a boolean`);
            }
            w.writeBool(value);
            return;
        case Kind.String:
            if (typeof value !== 'string') {
                throw new ValueError(`${path}: expected a string`);
            }
            w.writeString(value);
            return;
        case Kind.Float32:
        case Kind.Float64:
            if (typeof value !== 'number') {
                throw new ValueError(`${path}: expected a number`);
            }
            if (kind === Kind.Float32) {
                w.writeFloat32(value);
            } else {
                w.writeFloat64(value);
            }
            return;
        default:
            writeInteger(w, kind, value, path);
    }
}

function writeInteger(w: BufferWriter, kind: Kind, value: unknown, path: string): void {
    const range = INT_RANGES[kind];
    if (range === undefined) {
        throw new InvalidSchemaError(`${path}: unsupported kind ${kind}`);
    }

    let n: bigint;
    if (typeof value === 'bigint') {
        n = value;
    } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
        n = BigInt(value);
    } else {
        throw new ValueError(`${path}: expected an integer`);
    }
    if (n < range[0] || n > range[1]) {
        throw new ValueError(`${path}: ${n} is out of range for ${kindName(kind)}`);
    }

    switch (kind) {
        case Kind.Int8: w.writeInt8(Number(n)); break;
        case Kind.Int16: w.writeInt16(Number(n)); break;
        case Kind.Int32: w.writeInt32(Number(n)); break;
        case Kind.Int64: w.writeInt64(n); break;
        case Kind.Uint8: w.writeUint8(Number(n)); break;
        case Kind.Uint16: w.writeUint16(Number(n)); break;
        case Kind.Uint32: w.writeUint32(Number(n)); break;
        case Kind.Uint64: w.writeUint64(n); break;
    }
}

function writeReference(w: BufferWriter, schema: ReferenceSchema, value: unknown, path: string): void {
    switch (schema.referenceType) {
        case ReferenceType.Single:
            w.writeRaw(value === undefined ? blankDigest() : toDigest(value, path));
            return;
        case ReferenceType.Dynamic:
            if (value === undefined) {
                w.writeRaw(blankDigest());
                w.writeRaw(blankDigest());
                return;
            }
            if (!isRecord(value)) {
                throw new ValueError(`${path}: expected { schema, object }`);
            }
            w.writeRaw(toDigest(value.schema, `${path}.schema`));
            w.writeRaw(toDigest(value.object, `${path}.object`));
            return;
        case ReferenceType.Slice: {
            const list = value === undefined ? [] : value;
            if (!Array.isArray(list)) {
                throw new ValueError(`${path}: expected an array of digests`);
            }
            w.writeUint32(list.length);
            list.forEach((item: unknown, i) => w.writeRaw(toDigest(item, `${path}[${i}]`)));
            return;
        }
    }
}

function toItems(elem: Schema, value: unknown, path: string): unknown[] {
    // byte slices also take a Uint8Array
    if (value instanceof Uint8Array && elem.type === 'scalar' && elem.kind === Kind.Uint8) {
        return Array.from(value);
    }
    if (!Array.isArray(value)) {
        throw new ValueError(`${path}: expected an array`);
    }
    return value;
}

function toDigest(value: unknown, path: string): Uint8Array {
    if (!(value instanceof Uint8Array) || value.length !== DIGEST_SIZE) {
        throw new ValueError(`${path}: expected a ${DIGEST_SIZE}-byte digest`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}
