import { describe, it, expect } from 'vitest';
import { BufferWriter } from '../src/codec';
import { toHex } from '../src/digest';
import { InvalidEncodedSchemaError, MissingSchemaError, RegistrationError } from '../src/errors';
import { Registry, createRegistry, decodeRegistry } from '../src/schema/Registry';
import { Kind, ReferenceType, placeholder, schemaToString, type Schema } from '../src/schema/Schema';
import { encodeSchema } from '../src/schema/SchemaCodec';
import { Registrar, dynamic, ref, refs, struct } from '../src/schema/SchemaBuilder';

const user = struct({ Name: 'string', Age: 'uint32' });
const group = struct({ Name: 'string', Members: refs('cxo.User'), Leader: ref('cxo.User'), Extra: dynamic() });

function encodeEntries(entries: Array<[string, Schema]>): Uint8Array {
    const w = new BufferWriter();
    w.writeUint32(entries.length);
    for (const [name, schema] of entries) {
        w.writeString(name);
        w.writeBytes(encodeSchema(schema));
    }
    return w.finish();
}

function refStruct(name: string, target: string): Schema {
    return {
        type: 'struct',
        kind: Kind.Struct,
        name,
        fields: [{
            name: 'Target',
            tag: `schema=${target}`,
            schema: {
                type: 'reference',
                kind: Kind.Ptr,
                name: '',
                referenceType: ReferenceType.Single,
                elem: placeholder(Kind.Struct, target),
            },
        }],
    };
}

function targetOf(schema: Schema, field: number): Schema {
    if (schema.type !== 'struct') throw new Error('expected a struct');
    const ref = schema.fields[field].schema;
    if (ref.type !== 'reference' || ref.referenceType === ReferenceType.Dynamic) {
        throw new Error('expected a typed reference');
    }
    return ref.elem;
}

describe('Registry', () => {
    it('does not depend on registration order', () => {
        const a = createRegistry(reg => {
            reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
            reg.register('cxo.Group', struct({ Name: 'string', Members: refs('cxo.User') }));
        });
        const b = createRegistry(reg => {
            reg.register('cxo.Group', struct({ Name: 'string', Members: refs('cxo.User') }));
            reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
        });

        expect(toHex(a.reference())).toBe(toHex(b.reference()));
        expect(toHex(a.encode())).toBe(toHex(b.encode()));
    });

    it('changes reference when any schema changes', () => {
        const a = createRegistry(reg => reg.register('cxo.User', struct({ Name: 'string' })));
        const b = createRegistry(reg => reg.register('cxo.User', struct({ Name: 'string', Age: 'uint8' })));
        expect(toHex(a.reference())).not.toBe(toHex(b.reference()));
    });

    it('sorts entries by name bytes in the encoding', () => {
        const registry = createRegistry(reg => {
            reg.register('b', 'uint8');
            reg.register('B', 'uint8');
            reg.register('a', 'uint8');
        });
        expect(registry.names()).toEqual(['B', 'a', 'b']);

        const expected = encodeEntries([
            ['B', { type: 'scalar', kind: Kind.Uint8, name: 'B' }],
            ['a', { type: 'scalar', kind: Kind.Uint8, name: 'a' }],
            ['b', { type: 'scalar', kind: Kind.Uint8, name: 'b' }],
        ]);
        expect(toHex(registry.encode())).toBe(toHex(expected));
    });

    it('round-trips through its encoding with the same reference', () => {
        const local = createRegistry(reg => {
            reg.register('cxo.User', user);
            reg.register('cxo.Group', group);
        });
        const remote = decodeRegistry(local.encode());

        expect(toHex(remote.reference())).toBe(toHex(local.reference()));
        expect(remote.names()).toEqual(['cxo.Group', 'cxo.User']);
        expect(schemaToString(remote.schemaByName('cxo.Group'))).toBe(
            'cxo.Group struct{Name string; Members []*cxo.User; Leader *cxo.User; Extra *dynamic}'
        );
        for (const name of local.names()) {
            expect(toHex(remote.schemaReference(name))).toBe(toHex(local.schemaReference(name)));
        }
    });

    it('links references to the registered schema objects', () => {
        const registry = createRegistry(reg => {
            reg.register('cxo.User', user);
            reg.register('cxo.Group', group);
        });
        const g = registry.schemaByName('cxo.Group');
        expect(targetOf(g, 1)).toBe(registry.schemaByName('cxo.User'));
        expect(targetOf(g, 2)).toBe(registry.schemaByName('cxo.User'));
    });

    it('resolves cyclic vocabularies', () => {
        const registry = createRegistry(reg => {
            reg.register('A', struct({ Next: ref('B') }));
            reg.register('B', struct({ Back: ref('A'), Peers: refs('B') }));
        });
        const a = registry.schemaByName('A');
        const b = registry.schemaByName('B');

        expect(targetOf(a, 0)).toBe(b);
        expect(targetOf(b, 0)).toBe(a);
        expect(targetOf(b, 1)).toBe(b);
        expect(schemaToString(b)).toBe('B struct{Back *A; Peers []*B}');

        const decoded = decodeRegistry(registry.encode());
        expect(toHex(decoded.reference())).toBe(toHex(registry.reference()));
    });

    it('looks schemas up by reference', () => {
        const registry = createRegistry(reg => reg.register('cxo.User', user));
        const ref = registry.schemaReference('cxo.User');
        expect(registry.schemaByReference(ref)).toBe(registry.schemaByName('cxo.User'));
        expect(() => registry.schemaByReference(new Uint8Array(32))).toThrow(MissingSchemaError);
        expect(() => registry.schemaByName('cxo.Nobody')).toThrow('missing schema "cxo.Nobody"');
        expect(() => registry.schemaReference('cxo.Nobody')).toThrow(MissingSchemaError);
    });

    it('exposes declarations only when built locally', () => {
        const local = createRegistry(reg => reg.register('cxo.User', user));
        expect(local.canBuild).toBe(true);
        expect(local.types().direct.get('cxo.User')).toBe(user);
        expect(local.types().inverse.get(user)).toBe('cxo.User');
        expect(local.schemaOf(user)).toBe(local.schemaByName('cxo.User'));

        const remote = decodeRegistry(local.encode());
        expect(remote.canBuild).toBe(false);
        expect(remote.types().direct.size).toBe(0);
        expect(() => remote.schemaOf(user)).toThrow(MissingSchemaError);
    });

    it('ignores registrations made after it was built', () => {
        const registrar = new Registrar();
        registrar.register('cxo.User', user);
        const registry = Registry.fromRegistrar(registrar);

        const late = struct({ Title: 'string' });
        registrar.register('cxo.Late', late);

        expect(registry.size).toBe(1);
        expect(Array.from(registry.types().direct.keys())).toEqual(['cxo.User']);
        expect(registry.types().inverse.has(late)).toBe(false);
        expect(() => registry.schemaOf(late)).toThrow(MissingSchemaError);
        expect(registry.schemaOf(user)).toBe(registry.schemaByName('cxo.User'));
    });

    it('surfaces unknown type names as RegistrationError', () => {
        expect(() => createRegistry(reg => reg.register('cxo.Group', group))).toThrow(RegistrationError);
    });

    it('handles an empty vocabulary', () => {
        const registry = createRegistry(() => undefined);
        expect(registry.size).toBe(0);
        expect(Array.from(registry.encode())).toEqual([0, 0, 0, 0]);
        expect(decodeRegistry(registry.encode()).size).toBe(0);
    });

    describe('decode', () => {
        it('fails when a referenced schema is absent', () => {
            const data = encodeEntries([['cxo.Group', refStruct('cxo.Group', 'cxo.User')]]);
            expect(() => decodeRegistry(data)).toThrow(MissingSchemaError);
        });

        it('fails when a placeholder kind disagrees with the registered schema', () => {
            const data = encodeEntries([
                ['cxo.Group', refStruct('cxo.Group', 'cxo.User')],
                ['cxo.User', { type: 'scalar', kind: Kind.String, name: 'cxo.User' }],
            ]);
            expect(() => decodeRegistry(data)).toThrow(InvalidEncodedSchemaError);
            expect(() => decodeRegistry(data)).toThrow(
                'invalid encoded schema: "cxo.User" is referenced with kind 25, registered with kind 24'
            );
        });

        it('rejects entries whose schema carries another name', () => {
            const data = encodeEntries([['X', { type: 'scalar', kind: Kind.Uint8, name: 'Y' }]]);
            expect(() => decodeRegistry(data)).toThrow('entry "X" holds schema "Y"');
        });

        it('rejects entries with an empty name', () => {
            const data = encodeEntries([['', { type: 'scalar', kind: Kind.Uint8, name: '' }]]);
            expect(() => decodeRegistry(data)).toThrow('invalid encoded schema: entry with an empty name');
        });

        it('rejects top-level reference entries', () => {
            const dyn: Schema = { type: 'reference', kind: Kind.Ptr, name: '', referenceType: ReferenceType.Dynamic };
            expect(() => decodeRegistry(encodeEntries([['', dyn]]))).toThrow(InvalidEncodedSchemaError);

            expect(() => decodeRegistry(encodeEntries([['X', dyn]]))).toThrow('entry "X" is a reference type');
        });

        it('rejects duplicate entries', () => {
            const schema: Schema = { type: 'scalar', kind: Kind.Uint8, name: 'X' };
            expect(() => decodeRegistry(encodeEntries([['X', schema], ['X', schema]]))).toThrow('duplicate entry "X"');
        });

        it('rejects truncated and trailing input', () => {
            const good = createRegistry(reg => reg.register('cxo.User', user)).encode();
            expect(() => decodeRegistry(good.subarray(0, good.length - 1))).toThrow(InvalidEncodedSchemaError);

            const long = new Uint8Array(good.length + 2);
            long.set(good);
            expect(() => decodeRegistry(long)).toThrow('2 trailing bytes after registry');
        });
    });
});
