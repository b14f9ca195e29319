import { sha256, type Digest } from '../src/digest';
import { encodeUtf8 } from '../src/codec';
import { createRegistry, type Registry } from '../src/schema/Registry';
import { array, dynamic, ref, refs, slice, struct } from '../src/schema/SchemaBuilder';

/**
 * Users, groups and a grab-bag record covering every kind.
 */
export function cxoRegistry(): Registry {
    return createRegistry(reg => {
        reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
        reg.register('cxo.Group', struct({
            Name: 'string',
            Members: refs('cxo.User'),
            Leader: ref('cxo.User'),
            Extra: dynamic(),
        }));
        reg.register('test.Kitchen', struct({
            Flag: 'bool',
            I8: 'int8',
            I16: 'int16',
            I32: 'int32',
            I64: 'int64',
            U8: 'uint8',
            U16: 'uint16',
            U32: 'uint32',
            U64: 'uint64',
            F32: 'float32',
            F64: 'float64',
            Label: 'string',
            Blob: 'bytes',
            Pair: array(2, 'uint16'),
            Tags: slice('string'),
            Owner: 'cxo.User',
        }));
    });
}

/** A deterministic placeholder digest. */
export function digestOf(text: string): Digest {
    return sha256(encodeUtf8(text));
}
