/**
 * Type declarations and the Registrar that turns them into raw schemas.
 *
 * Types are declared with plain descriptors in the style of the vocabulary
 * files: a primitive keyword, the name of another registered type, or an
 * object for arrays, slices, structs and reference fields.
 *
 * @example
 * ```ts
 * const registry = createRegistry(reg => {
 *     reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
 *     reg.register('cxo.Group', struct({
 *         Name: 'string',
 *         Members: refs('cxo.User'),
 *         Leader: ref('cxo.User'),
 *         Extra: dynamic(),
 *     }));
 * });
 * ```
 */

import { RegistrationError } from '../errors';
import {
    Kind,
    ReferenceType,
    nestedSchema,
    placeholder,
    type Field,
    type Schema,
} from './Schema';

/**
 * Supported primitive types. `bytes` is a slice of uint8.
 */
export type PrimitiveType =
    | 'bool'
    | 'int8' | 'int16' | 'int32' | 'int64'
    | 'uint8' | 'uint16' | 'uint32' | 'uint64'
    | 'float32' | 'float64'
    | 'string'
    | 'bytes';

const PRIMITIVE_KINDS: Record<PrimitiveType, Kind> = {
    bool: Kind.Bool,
    int8: Kind.Int8,
    int16: Kind.Int16,
    int32: Kind.Int32,
    int64: Kind.Int64,
    uint8: Kind.Uint8,
    uint16: Kind.Uint16,
    uint32: Kind.Uint32,
    uint64: Kind.Uint64,
    float32: Kind.Float32,
    float64: Kind.Float64,
    string: Kind.String,
    bytes: Kind.Slice,
};

export interface ArrayDescriptor {
    type: 'array';
    length: number;
    items: TypeDescriptor;
    tag?: string;
}

export interface SliceDescriptor {
    type: 'slice';
    items: TypeDescriptor;
    tag?: string;
}

export interface StructDescriptor {
    type: 'struct';
    /** Fields in declaration order. */
    fields: Record<string, FieldDescriptor>;
    tag?: string;
}

/** Reference to one object of a registered type. */
export interface RefDescriptor {
    type: 'ref';
    schema?: string;
    tag?: string;
}

/** Ordered list of references to objects of a registered type. */
export interface RefsDescriptor {
    type: 'refs';
    schema?: string;
    tag?: string;
}

/** Reference whose target type travels with the value. */
export interface DynamicDescriptor {
    type: 'dynamic';
    tag?: string;
}

/**
 * A primitive keyword, the name of a registered type, or a composite descriptor.
 */
export type TypeDescriptor =
    | PrimitiveType
    | (string & {})
    | ArrayDescriptor
    | SliceDescriptor
    | StructDescriptor;

/**
 * Reference descriptors are only valid as a struct field's own type.
 */
export type FieldDescriptor = TypeDescriptor | RefDescriptor | RefsDescriptor | DynamicDescriptor;

export function isPrimitiveType(name: string): name is PrimitiveType {
    return Object.prototype.hasOwnProperty.call(PRIMITIVE_KINDS, name);
}

// ============================================================================
// Descriptor helpers
// ============================================================================

export function struct(fields: Record<string, FieldDescriptor>, tag?: string): StructDescriptor {
    return tag === undefined ? { type: 'struct', fields } : { type: 'struct', fields, tag };
}

export function array(length: number, items: TypeDescriptor): ArrayDescriptor {
    return { type: 'array', length, items };
}

export function slice(items: TypeDescriptor): SliceDescriptor {
    return { type: 'slice', items };
}

export function ref(schema: string): RefDescriptor {
    return { type: 'ref', schema };
}

export function refs(schema: string): RefsDescriptor {
    return { type: 'refs', schema };
}

export function dynamic(): DynamicDescriptor {
    return { type: 'dynamic' };
}

/**
 * Returns the schema name from a declaration tag, e.g. "cxo.User"
 * for `schema=cxo.User` or `json:name,schema=cxo.User`.
 */
export function tagSchemaName(tag: string): string {
    if (tag === '') {
        throw new RegistrationError('empty tag, expected "schema=XXX"');
    }
    for (const part of tag.split(',')) {
        if (!part.startsWith('schema=')) {
            continue;
        }
        const pieces = part.split('=');
        if (pieces.length !== 2) {
            throw new RegistrationError(`invalid schema tag: "${part}"`);
        }
        if (pieces[1] === '') {
            throw new RegistrationError(`empty tag schema name: "${part}"`);
        }
        return pieces[1];
    }
    throw new RegistrationError(`invalid tag: "${tag}"`);
}

function referenceTarget(desc: RefDescriptor | RefsDescriptor): string {
    if (desc.schema !== undefined) {
        if (desc.schema === '') {
            throw new RegistrationError(`empty target schema name in "${desc.type}" field`);
        }
        return desc.schema;
    }
    return tagSchemaName(desc.tag ?? '');
}

function isExcluded(name: string, desc: FieldDescriptor): boolean {
    return name === '_' || name.startsWith('#') || (typeof desc !== 'string' && desc.tag === '-');
}

const INTEGER_LIKE = /^(0|[1-9][0-9]*)$/;

type Position = 'top' | 'element' | 'field';

// ============================================================================
// Registrar
// ============================================================================

/**
 * Collects named type declarations. Every contract violation is thrown from
 * `register` itself and leaves the registrar as it was.
 */
export class Registrar {
    private readonly byName = new Map<string, TypeDescriptor>();
    private readonly byDescriptor = new Map<object, string>();

    register(name: string, descriptor: TypeDescriptor): this {
        if (name === '') {
            throw new RegistrationError('empty name');
        }
        if (isPrimitiveType(name)) {
            throw new RegistrationError(`"${name}" is a primitive type name`);
        }
        if (this.byName.has(name)) {
            throw new RegistrationError(`this name already registered: ${name}`);
        }
        if (typeof descriptor === 'object') {
            const other = this.byDescriptor.get(descriptor);
            if (other !== undefined) {
                throw new RegistrationError(`descriptor of "${name}" is already registered as "${other}"`);
            }
        }
        validate(descriptor, 'top', name);

        this.byName.set(name, descriptor);
        if (typeof descriptor === 'object') {
            this.byDescriptor.set(descriptor, name);
        }
        return this;
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    /** Registered names in registration order. */
    names(): string[] {
        return Array.from(this.byName.keys());
    }

    descriptor(name: string): TypeDescriptor | undefined {
        return this.byName.get(name);
    }

    nameOf(descriptor: TypeDescriptor): string | undefined {
        return typeof descriptor === 'object' ? this.byDescriptor.get(descriptor) : undefined;
    }

    /**
     * Raw schema of a registered type; nested named types are placeholders.
     */
    schemaOf(name: string): Schema {
        const descriptor = this.byName.get(name);
        if (descriptor === undefined) {
            throw new RegistrationError(`unknown type "${name}"`);
        }
        return this.getSchema(descriptor, name);
    }

    getSchema(descriptor: TypeDescriptor, name: string = ''): Schema {
        if (typeof descriptor === 'string') {
            if (descriptor === 'bytes') {
                return { type: 'slice', kind: Kind.Slice, name, elem: { type: 'scalar', kind: Kind.Uint8, name: '' } };
            }
            if (isPrimitiveType(descriptor)) {
                return { type: 'scalar', kind: PRIMITIVE_KINDS[descriptor], name };
            }
            return this.placeholderFor(descriptor);
        }

        switch (descriptor.type) {
            case 'array':
                return {
                    type: 'array',
                    kind: Kind.Array,
                    name,
                    length: descriptor.length,
                    elem: nestedSchema(this.getSchema(descriptor.items)),
                };
            case 'slice':
                return { type: 'slice', kind: Kind.Slice, name, elem: nestedSchema(this.getSchema(descriptor.items)) };
            case 'struct': {
                const fields: Field[] = [];
                for (const [fieldName, fieldDesc] of Object.entries(descriptor.fields)) {
                    if (!isExcluded(fieldName, fieldDesc)) {
                        fields.push(this.getField(fieldName, fieldDesc));
                    }
                }
                return { type: 'struct', kind: Kind.Struct, name, fields };
            }
        }
    }

    private getField(name: string, desc: FieldDescriptor): Field {
        if (typeof desc === 'string') {
            return { name, tag: '', schema: nestedSchema(this.getSchema(desc)) };
        }
        switch (desc.type) {
            case 'ref': {
                const target = referenceTarget(desc);
                return {
                    name,
                    tag: desc.tag ?? `schema=${target}`,
                    schema: {
                        type: 'reference',
                        kind: Kind.Ptr,
                        name: '',
                        referenceType: ReferenceType.Single,
                        elem: this.placeholderFor(target),
                    },
                };
            }
            case 'refs': {
                const target = referenceTarget(desc);
                return {
                    name,
                    tag: desc.tag ?? `schema=${target}`,
                    schema: {
                        type: 'reference',
                        kind: Kind.Slice,
                        name: '',
                        referenceType: ReferenceType.Slice,
                        elem: this.placeholderFor(target),
                    },
                };
            }
            case 'dynamic':
                return {
                    name,
                    tag: desc.tag ?? '',
                    schema: { type: 'reference', kind: Kind.Ptr, name: '', referenceType: ReferenceType.Dynamic },
                };
            default:
                return { name, tag: desc.tag ?? '', schema: nestedSchema(this.getSchema(desc)) };
        }
    }

    private placeholderFor(name: string): Schema {
        const target = this.byName.get(name);
        if (target === undefined) {
            throw new RegistrationError(`unknown type "${name}"`);
        }
        return placeholder(kindOf(target), name);
    }
}

function kindOf(descriptor: TypeDescriptor): Kind {
    if (typeof descriptor === 'string') {
        // registered descriptors are never aliases, so this is a primitive
        return isPrimitiveType(descriptor) ? PRIMITIVE_KINDS[descriptor] : Kind.Invalid;
    }
    switch (descriptor.type) {
        case 'array':
            return Kind.Array;
        case 'slice':
            return Kind.Slice;
        case 'struct':
            return Kind.Struct;
    }
}

function validate(desc: FieldDescriptor, position: Position, context: string): void {
    if (typeof desc === 'string') {
        if (desc === '') {
            throw new RegistrationError(`${context}: empty type name`);
        }
        if (position === 'top' && !isPrimitiveType(desc)) {
            throw new RegistrationError(`${context}: can't register an alias of "${desc}"`);
        }
        return;
    }

    switch (desc.type) {
        case 'ref':
        case 'refs':
        case 'dynamic':
            if (position === 'top') {
                throw new RegistrationError(`${context}: can't register reference type`);
            }
            if (position === 'element') {
                throw new RegistrationError(`${context}: references are not allowed in arrays and slices`);
            }
            if (desc.type !== 'dynamic') {
                referenceTarget(desc);
            }
            return;
        case 'array':
            if (!Number.isInteger(desc.length) || desc.length < 0 || desc.length > 0xFFFFFFFF) {
                throw new RegistrationError(`${context}: invalid array length ${desc.length}`);
            }
            validate(desc.items, 'element', `${context}[]`);
            return;
        case 'slice':
            validate(desc.items, 'element', `${context}[]`);
            return;
        case 'struct':
            for (const [name, fieldDesc] of Object.entries(desc.fields)) {
                if (name === '') {
                    throw new RegistrationError(`${context}: empty field name`);
                }
                if (INTEGER_LIKE.test(name)) {
                    throw new RegistrationError(`${context}: field name "${name}" would lose its declaration order`);
                }
                if (!isExcluded(name, fieldDesc)) {
                    validate(fieldDesc, 'field', `${context}.${name}`);
                }
            }
            return;
        default: {
            const unknown: never = desc;
            throw new RegistrationError(`${context}: unknown descriptor ${JSON.stringify(unknown)}`);
        }
    }
}
