/**
 * Size Engine.
 *
 * Given a schema and a buffer whose prefix holds one value encoded with it,
 * returns how many leading bytes belong to that value without decoding it.
 * Value traversal leans on this to jump straight to a field or element.
 *
 * Reference layouts are fixed:
 *
 * - single reference: one digest (32 bytes)
 * - dynamic reference: schema digest + object digest (64 bytes)
 * - reference list, wire contract v1: [uint32 count] [count × 32-byte digest]
 *
 * Every size that runs past the end of the buffer is reported as a
 * MalformedDataError; a truncated value never passes as a shorter one.
 */

import { readLength } from '../codec';
import { DIGEST_SIZE } from '../digest';
import { InvalidSchemaError, MalformedDataError } from '../errors';
import { Kind, ReferenceType, fixedSize, type ReferenceSchema, type Schema } from './Schema';

/** Size of the uint32 count/length prefix of strings, slices and reference lists. */
export const LENGTH_PREFIX_SIZE = 4;

export function schemaSize(schema: Schema, data: Uint8Array): number {
    const n = measure(schema, data);
    if (n > data.length) {
        throw new MalformedDataError(`value of ${n} bytes does not fit in ${data.length}`);
    }
    return n;
}

function measure(schema: Schema, data: Uint8Array): number {
    switch (schema.type) {
        case 'reference':
            return referenceSize(schema, data);
        case 'scalar':
            if (schema.kind === Kind.String) {
                return LENGTH_PREFIX_SIZE + readLength(data);
            }
            if (fixedSize(schema.kind) > 0) {
                return fixedSize(schema.kind);
            }
            throw new InvalidSchemaError(`unsupported kind ${schema.kind}`);
        case 'slice':
            return elementsSize(schema.elem, readLength(data), LENGTH_PREFIX_SIZE, data);
        case 'array':
            return elementsSize(schema.elem, schema.length, 0, data);
        case 'struct': {
            let n = 0;
            for (const field of schema.fields) {
                n += schemaSize(field.schema, data.subarray(n));
            }
            return n;
        }
        case 'placeholder':
            throw new InvalidSchemaError(`unresolved schema "${schema.name}"`);
    }
}

function referenceSize(schema: ReferenceSchema, data: Uint8Array): number {
    switch (schema.referenceType) {
        case ReferenceType.Single:
            return DIGEST_SIZE;
        case ReferenceType.Dynamic:
            return 2 * DIGEST_SIZE;
        case ReferenceType.Slice:
            return LENGTH_PREFIX_SIZE + readLength(data) * DIGEST_SIZE;
    }
}

/**
 * Size of `count` consecutive elements starting `shift` bytes into `data`.
 */
function elementsSize(elem: Schema, count: number, shift: number, data: Uint8Array): number {
    const size = elem.type === 'scalar' ? fixedSize(elem.kind) : -1;
    if (size > 0) {
        return shift + count * size;
    }

    let n = shift;
    for (let i = 0; i < count; i++) {
        const m = schemaSize(elem, data.subarray(n));
        if (m === 0) {
            // zero-width element (empty struct or array): all of them are
            return shift;
        }
        n += m;
    }
    return n;
}
