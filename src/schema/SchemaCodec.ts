/**
 * Schema Codec: wire (de)serialization of schema descriptors.
 *
 * Layout of one encoded schema:
 *
 * ```
 * [uint32] reference type   (0 none, 1 single, 2 slice, 3 dynamic)
 * [uint32] kind
 * [bytes]  name
 * [uint32] array length     (0 unless kind is array)
 * [uint32] field count, then per field [bytes] (encoded field)
 * [bytes]  element schema   (empty when there is none)
 *
 * encoded field = [bytes] name, [bytes] tag, [bytes] schema
 * ```
 *
 * Nested schemas that are registered (named) are written as placeholders,
 * kind and name only; the registry links them back up by name. That keeps
 * the encoding of cyclic vocabularies finite.
 */

import { BufferReader, BufferWriter } from '../codec';
import { sha256, type SchemaRef } from '../digest';
import { InvalidEncodedSchemaError, MalformedDataError } from '../errors';
import {
    Kind,
    ReferenceType,
    isRegistered,
    isScalarKind,
    isValueKind,
    nestedSchema,
    placeholder,
    referenceTypeOf,
    type Field,
    type Schema,
} from './Schema';

const WIRE_KINDS: readonly Kind[] = [
    Kind.Bool,
    Kind.Int8, Kind.Int16, Kind.Int32, Kind.Int64,
    Kind.Uint8, Kind.Uint16, Kind.Uint32, Kind.Uint64,
    Kind.Float32, Kind.Float64,
    Kind.Array, Kind.Ptr, Kind.Slice, Kind.String, Kind.Struct,
];

const EMPTY = new Uint8Array(0);

interface EncodedSchema {
    referenceType: number;
    kind: Kind;
    name: string;
    length: number;
    fields: Uint8Array[];
    elem: Uint8Array;
}

// =============================================================================
// Encoder
// =============================================================================

/** Encode a schema in full; nested named schemas become placeholders. */
export function encodeSchema(schema: Schema): Uint8Array {
    const writer = new BufferWriter();

    writer.writeUint32(referenceTypeOf(schema));
    writer.writeUint32(schema.kind);
    writer.writeString(schema.name);
    writer.writeUint32(schema.type === 'array' ? schema.length : 0);

    if (schema.type === 'struct') {
        writer.writeUint32(schema.fields.length);
        for (const field of schema.fields) {
            writer.writeBytes(encodeField(field));
        }
    } else {
        writer.writeUint32(0);
    }

    const elem = elementOf(schema);
    writer.writeBytes(elem ? encodeSchema(nestedSchema(elem)) : EMPTY);

    return writer.finish();
}

function encodeField(field: Field): Uint8Array {
    const writer = new BufferWriter();
    writer.writeString(field.name);
    writer.writeString(field.tag);
    writer.writeBytes(encodeSchema(nestedSchema(field.schema)));
    return writer.finish();
}

function elementOf(schema: Schema): Schema | undefined {
    switch (schema.type) {
        case 'array':
        case 'slice':
            return schema.elem;
        case 'reference':
            return schema.referenceType === ReferenceType.Dynamic ? undefined : schema.elem;
        default:
            return undefined;
    }
}

/** Content identifier of a schema: SHA-256 of its encoding. */
export function schemaReference(schema: Schema): SchemaRef {
    return sha256(encodeSchema(schema));
}

// =============================================================================
// Decoder
// =============================================================================

/**
 * Decode a schema. Registered schemas nested inside it come back as placeholders.
 * Throws InvalidEncodedSchemaError for anything outside the recognized shapes.
 */
export function decodeSchema(data: Uint8Array): Schema {
    return decode(data, false);
}

function decode(data: Uint8Array, nested: boolean): Schema {
    const x = readEncoded(data);

    switch (x.referenceType) {
        case ReferenceType.None:
            return nested && x.name !== '' ? decodePlaceholder(x) : decodeValueSchema(x);
        case ReferenceType.Single:
        case ReferenceType.Slice:
        case ReferenceType.Dynamic:
            return decodeReference(x);
        default:
            throw new InvalidEncodedSchemaError(`unknown reference type ${x.referenceType}`);
    }
}

function readEncoded(data: Uint8Array): EncodedSchema {
    const reader = new BufferReader(data);
    try {
        const referenceType = reader.readUint32();
        const rawKind = reader.readUint32();
        const name = reader.readString();
        const length = reader.readUint32();
        const count = reader.readUint32();
        const fields: Uint8Array[] = [];
        for (let i = 0; i < count; i++) {
            fields.push(reader.readBytes());
        }
        const elem = reader.readBytes();

        if (reader.remaining() !== 0) {
            throw new InvalidEncodedSchemaError(`${reader.remaining()} trailing bytes`);
        }
        const kind = WIRE_KINDS.find(k => k === rawKind);
        if (kind === undefined) {
            throw new InvalidEncodedSchemaError(`unknown kind ${rawKind}`);
        }
        return { referenceType, kind, name, length, fields, elem };
    } catch (e) {
        if (e instanceof MalformedDataError) {
            throw new InvalidEncodedSchemaError('truncated schema', e);
        }
        throw e;
    }
}

function decodePlaceholder(x: EncodedSchema): Schema {
    if (!isValueKind(x.kind) || x.length !== 0 || x.fields.length !== 0 || x.elem.length !== 0) {
        throw new InvalidEncodedSchemaError(`malformed placeholder "${x.name}"`);
    }
    return placeholder(x.kind, x.name);
}

function decodeReference(x: EncodedSchema): Schema {
    if (x.name !== '' || x.length !== 0 || x.fields.length !== 0) {
        throw new InvalidEncodedSchemaError('reference schema with name, length or fields');
    }

    if (x.referenceType === ReferenceType.Dynamic) {
        if (x.kind !== Kind.Ptr || x.elem.length !== 0) {
            throw new InvalidEncodedSchemaError('malformed dynamic reference');
        }
        return { type: 'reference', kind: Kind.Ptr, name: '', referenceType: ReferenceType.Dynamic };
    }

    if (x.elem.length === 0) {
        throw new InvalidEncodedSchemaError('reference without target schema');
    }
    const elem = decode(x.elem, true);
    if (!isRegistered(elem)) {
        throw new InvalidEncodedSchemaError('reference to an unnamed schema');
    }

    if (x.referenceType === ReferenceType.Single && x.kind === Kind.Ptr) {
        return { type: 'reference', kind: Kind.Ptr, name: '', referenceType: ReferenceType.Single, elem };
    }
    if (x.referenceType === ReferenceType.Slice && x.kind === Kind.Slice) {
        return { type: 'reference', kind: Kind.Slice, name: '', referenceType: ReferenceType.Slice, elem };
    }
    throw new InvalidEncodedSchemaError(`reference type ${x.referenceType} with kind ${x.kind}`);
}

function decodeValueSchema(x: EncodedSchema): Schema {
    if (isScalarKind(x.kind)) {
        if (x.length !== 0 || x.fields.length !== 0 || x.elem.length !== 0) {
            throw new InvalidEncodedSchemaError(`scalar schema "${x.name}" with a payload`);
        }
        return { type: 'scalar', kind: x.kind, name: x.name };
    }

    switch (x.kind) {
        case Kind.Array:
            return { type: 'array', kind: Kind.Array, name: x.name, length: x.length, elem: decodeElement(x) };
        case Kind.Slice:
            if (x.length !== 0) {
                throw new InvalidEncodedSchemaError('slice schema with a length');
            }
            return { type: 'slice', kind: Kind.Slice, name: x.name, elem: decodeElement(x) };
        case Kind.Struct:
            if (x.length !== 0 || x.elem.length !== 0) {
                throw new InvalidEncodedSchemaError('struct schema with a length or element');
            }
            return { type: 'struct', kind: Kind.Struct, name: x.name, fields: x.fields.map(decodeField) };
        default:
            throw new InvalidEncodedSchemaError(`kind ${x.kind} is not valid for a non-reference schema`);
    }
}

function decodeElement(x: EncodedSchema): Schema {
    if (x.fields.length !== 0 || x.elem.length === 0) {
        throw new InvalidEncodedSchemaError('array or slice schema without element');
    }
    const elem = decode(x.elem, true);
    if (elem.type === 'reference') {
        throw new InvalidEncodedSchemaError('reference used as array or slice element');
    }
    return elem;
}

function decodeField(data: Uint8Array): Field {
    const reader = new BufferReader(data);
    let name: string;
    let tag: string;
    let schema: Uint8Array;
    try {
        name = reader.readString();
        tag = reader.readString();
        schema = reader.readBytes();
    } catch (e) {
        if (e instanceof MalformedDataError) {
            throw new InvalidEncodedSchemaError('truncated field', e);
        }
        throw e;
    }
    if (reader.remaining() !== 0) {
        throw new InvalidEncodedSchemaError(`field "${name}" has trailing bytes`);
    }
    return { name, tag, schema: decode(schema, true) };
}
