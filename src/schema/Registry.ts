/**
 * Registry: the finalized, content-addressed vocabulary of named schemas.
 *
 * A registry is built once, either locally from type declarations
 * (`createRegistry`) or from wire bytes received from a peer
 * (`decodeRegistry`), and is immutable afterwards. Reads are safe from any
 * number of consumers.
 *
 * Canonical encoding:
 *
 * ```
 * [uint32] entry count
 * per entry, sorted by the UTF-8 bytes of the name:
 *   [bytes] name
 *   [bytes] encoded schema
 * ```
 *
 * The registry reference is the SHA-256 of that encoding, so it depends only
 * on the set of (name, schema) pairs and never on registration order.
 */

import { BufferReader, BufferWriter, compareBytes, encodeUtf8 } from '../codec';
import { sha256, toHex, type RegistryRef, type SchemaRef } from '../digest';
import { InvalidEncodedSchemaError, InvalidSchemaError, MalformedDataError, MissingSchemaError } from '../errors';
import { logger } from '../utils/Logger';
import { ReferenceType, type Schema } from './Schema';
import { decodeSchema, encodeSchema } from './SchemaCodec';
import { Registrar, type TypeDescriptor } from './SchemaBuilder';
import { encodeValue } from './ValueEncoder';
import { Value } from './Value';

const log = logger.child('registry');

/**
 * Declaration-time correspondence between names and descriptors.
 * Only a locally built registry has one.
 */
export interface Types {
    direct: ReadonlyMap<string, TypeDescriptor>;
    inverse: ReadonlyMap<TypeDescriptor, string>;
}

export class Registry {
    private ref: RegistryRef = new Uint8Array(0);
    private readonly byName = new Map<string, Schema>();
    private readonly byRef = new Map<string, Schema>();
    private readonly refOf = new Map<string, SchemaRef>();
    private encoded: Uint8Array = new Uint8Array(0);
    private done = false;

    private constructor(private readonly declared?: Types) { }

    /**
     * Builds a registry from a registrar populated by the caller.
     * Unknown type names surface here as RegistrationError. The declarations
     * are copied, so later registrations do not reach the registry.
     */
    static fromRegistrar(registrar: Registrar): Registry {
        const direct = new Map<string, TypeDescriptor>();
        const inverse = new Map<TypeDescriptor, string>();
        for (const name of registrar.names()) {
            const descriptor = registrar.descriptor(name);
            if (descriptor !== undefined) {
                direct.set(name, descriptor);
                if (typeof descriptor === 'object') {
                    inverse.set(descriptor, name);
                }
            }
        }

        const registry = new Registry({ direct, inverse });
        for (const name of direct.keys()) {
            registry.byName.set(name, registrar.schemaOf(name));
        }
        registry.finalize();
        return registry;
    }

    /**
     * Decodes a registry received from the wire. The result answers lookups
     * but has no local type declarations.
     */
    static decode(data: Uint8Array): Registry {
        const registry = new Registry();
        const reader = new BufferReader(data);
        try {
            const count = reader.readUint32();
            for (let i = 0; i < count; i++) {
                const name = reader.readString();
                const schema = decodeSchema(reader.readBytes());
                if (name === '') {
                    throw new InvalidEncodedSchemaError('entry with an empty name');
                }
                if (schema.type === 'reference') {
                    throw new InvalidEncodedSchemaError(`entry "${name}" is a reference type`);
                }
                if (schema.name !== name) {
                    throw new InvalidEncodedSchemaError(`entry "${name}" holds schema "${schema.name}"`);
                }
                if (registry.byName.has(name)) {
                    throw new InvalidEncodedSchemaError(`duplicate entry "${name}"`);
                }
                registry.byName.set(name, schema);
            }
        } catch (e) {
            if (e instanceof MalformedDataError) {
                throw new InvalidEncodedSchemaError('truncated registry', e);
            }
            throw e;
        }
        if (reader.remaining() !== 0) {
            throw new InvalidEncodedSchemaError(`${reader.remaining()} trailing bytes after registry`);
        }
        registry.finalize();
        return registry;
    }

    /**
     * Links every reachable placeholder to the registered schema of the same
     * name, then computes schema references and the registry reference.
     * Runs exactly once, before the registry is handed out.
     */
    private finalize(): void {
        if (this.done) {
            return;
        }

        const visited = new Set<Schema>();
        const pending: Schema[] = Array.from(this.byName.values());

        while (pending.length > 0) {
            const schema = pending.pop();
            if (schema === undefined || visited.has(schema)) {
                continue;
            }
            visited.add(schema);

            switch (schema.type) {
                case 'array':
                case 'slice':
                    schema.elem = this.resolve(schema.elem);
                    pending.push(schema.elem);
                    break;
                case 'struct':
                    for (const field of schema.fields) {
                        field.schema = this.resolve(field.schema);
                        pending.push(field.schema);
                    }
                    break;
                case 'reference':
                    if (schema.referenceType !== ReferenceType.Dynamic) {
                        schema.elem = this.resolve(schema.elem);
                        pending.push(schema.elem);
                    }
                    break;
                default:
                    break;
            }
        }

        for (const [name, schema] of this.byName) {
            const ref = sha256(encodeSchema(schema));
            this.byRef.set(toHex(ref), schema);
            this.refOf.set(name, ref);
        }

        this.encoded = this.encodeEntries();
        this.ref = sha256(this.encoded);
        this.done = true;

        log.debug(`finalized ${this.byName.size} schemas, reference ${toHex(this.ref)}`);
    }

    private resolve(schema: Schema): Schema {
        if (schema.type !== 'placeholder') {
            return schema;
        }
        const target = this.schemaByName(schema.name);
        if (target.kind !== schema.kind) {
            const message = `"${schema.name}" is referenced with kind ${schema.kind}, registered with kind ${target.kind}`;
            throw this.declared === undefined
                ? new InvalidEncodedSchemaError(message)
                : new InvalidSchemaError(message);
        }
        return target;
    }

    private encodeEntries(): Uint8Array {
        const entries = Array.from(this.byName, ([name, schema]) => ({
            key: encodeUtf8(name),
            name,
            schema: encodeSchema(schema),
        }));
        entries.sort((a, b) => compareBytes(a.key, b.key));

        const writer = new BufferWriter();
        writer.writeUint32(entries.length);
        for (const entry of entries) {
            writer.writeString(entry.name);
            writer.writeBytes(entry.schema);
        }
        return writer.finish();
    }

    /** Canonical encoding, ready to send. */
    encode(): Uint8Array {
        return this.encoded.slice();
    }

    reference(): RegistryRef {
        return this.ref.slice();
    }

    get size(): number {
        return this.byName.size;
    }

    /** Registered names, sorted. */
    names(): string[] {
        return Array.from(this.byName.keys()).sort();
    }

    schemaByName(name: string): Schema {
        const schema = this.byName.get(name);
        if (schema === undefined) {
            throw new MissingSchemaError(name);
        }
        return schema;
    }

    schemaByReference(ref: SchemaRef): Schema {
        const key = toHex(ref);
        const schema = this.byRef.get(key);
        if (schema === undefined) {
            throw new MissingSchemaError(key);
        }
        return schema;
    }

    /** Reference of a registered schema. */
    schemaReference(name: string): SchemaRef {
        const ref = this.refOf.get(name);
        if (ref === undefined) {
            throw new MissingSchemaError(name);
        }
        return ref.slice();
    }

    /** True when built from local declarations rather than decoded. */
    get canBuild(): boolean {
        return this.declared !== undefined;
    }

    /**
     * Declaration maps; both are empty for a decoded registry.
     */
    types(): Types {
        return {
            direct: new Map<string, TypeDescriptor>(this.declared?.direct),
            inverse: new Map<TypeDescriptor, string>(this.declared?.inverse),
        };
    }

    /**
     * Schema of a locally declared descriptor. Decoded registries cannot answer this.
     */
    schemaOf(descriptor: TypeDescriptor): Schema {
        const name = this.declared?.inverse.get(descriptor);
        if (name === undefined) {
            throw new MissingSchemaError(typeof descriptor === 'string' ? descriptor : `<${descriptor.type} descriptor>`);
        }
        return this.schemaByName(name);
    }

    /** Encodes a JS value as an object of the named type. */
    pack(name: string, value: unknown): Uint8Array {
        return encodeValue(this.schemaByName(name), value);
    }

    /** Lazy view over an encoded object of the named type. */
    value(name: string, data: Uint8Array): Value {
        return new Value(this.schemaByName(name), data);
    }
}

/**
 * Creates a finalized registry from declarations.
 *
 * @example
 * ```ts
 * const registry = createRegistry(reg => {
 *     reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
 * });
 * ```
 */
export function createRegistry(declare: (reg: Registrar) => void): Registry {
    const registrar = new Registrar();
    declare(registrar);
    return Registry.fromRegistrar(registrar);
}

export function decodeRegistry(data: Uint8Array): Registry {
    return Registry.decode(data);
}
