/**
 * Schema model.
 *
 * A schema describes the shape of an encoded value. It is a discriminated
 * union on `type`; every variant carries a `kind` (the wire-level primitive or
 * structural tag) and a `name` that is non-empty only for registered types.
 *
 * Inside a registry, schemas form a closed graph that may be cyclic: struct A
 * can hold a field of struct B while B holds a field of A. Walk it with a
 * visited set, or stop at named schemas the way `schemaToString` does.
 */

/**
 * Wire values for kinds. They are part of the encoded schema format; never renumber.
 */
export enum Kind {
    Invalid = 0,
    Bool = 1,
    Int8 = 3,
    Int16 = 4,
    Int32 = 5,
    Int64 = 6,
    Uint8 = 8,
    Uint16 = 9,
    Uint32 = 10,
    Uint64 = 11,
    Float32 = 13,
    Float64 = 14,
    Array = 17,
    Ptr = 22,
    Slice = 23,
    String = 24,
    Struct = 25,
}

export enum ReferenceType {
    None = 0,
    /** One target object, encoded as a single digest. */
    Single = 1,
    /** Ordered list of target objects. */
    Slice = 2,
    /** Target type carried per value: a (schema digest, object digest) pair. */
    Dynamic = 3,
}

const SCALAR_KINDS: ReadonlySet<Kind> = new Set([
    Kind.Bool,
    Kind.Int8, Kind.Int16, Kind.Int32, Kind.Int64,
    Kind.Uint8, Kind.Uint16, Kind.Uint32, Kind.Uint64,
    Kind.Float32, Kind.Float64,
    Kind.String,
]);

export interface ScalarSchema {
    type: 'scalar';
    kind: Kind;
    name: string;
}

export interface ArraySchema {
    type: 'array';
    kind: Kind.Array;
    name: string;
    length: number;
    elem: Schema;
}

export interface SliceSchema {
    type: 'slice';
    kind: Kind.Slice;
    name: string;
    elem: Schema;
}

export interface Field {
    name: string;
    /** Declaration tag; carries `schema=<Name>` for reference fields. */
    tag: string;
    schema: Schema;
}

export interface StructSchema {
    type: 'struct';
    kind: Kind.Struct;
    name: string;
    fields: Field[];
}

export interface SingleReferenceSchema {
    type: 'reference';
    kind: Kind.Ptr;
    name: '';
    referenceType: ReferenceType.Single;
    elem: Schema;
}

export interface SliceReferenceSchema {
    type: 'reference';
    kind: Kind.Slice;
    name: '';
    referenceType: ReferenceType.Slice;
    elem: Schema;
}

export interface DynamicReferenceSchema {
    type: 'reference';
    kind: Kind.Ptr;
    name: '';
    referenceType: ReferenceType.Dynamic;
}

export type ReferenceSchema = SingleReferenceSchema | SliceReferenceSchema | DynamicReferenceSchema;

/**
 * Named stand-in for a registered schema, replaced when the registry is finalized.
 */
export interface PlaceholderSchema {
    type: 'placeholder';
    kind: Kind;
    name: string;
}

export type Schema =
    | ScalarSchema
    | ArraySchema
    | SliceSchema
    | StructSchema
    | ReferenceSchema
    | PlaceholderSchema;

export function isScalarKind(kind: Kind): boolean {
    return SCALAR_KINDS.has(kind);
}

/**
 * True for kinds a non-reference schema may carry on the wire.
 */
export function isValueKind(kind: Kind): boolean {
    return isScalarKind(kind) || kind === Kind.Array || kind === Kind.Slice || kind === Kind.Struct;
}

export function isRegistered(schema: Schema): boolean {
    return schema.name !== '';
}

export function isReference(schema: Schema): schema is ReferenceSchema {
    return schema.type === 'reference';
}

export function referenceTypeOf(schema: Schema): ReferenceType {
    return schema.type === 'reference' ? schema.referenceType : ReferenceType.None;
}

/**
 * Encoded size of a fixed-width kind, or -1 for variable-size kinds.
 */
export function fixedSize(kind: Kind): number {
    switch (kind) {
        case Kind.Bool:
        case Kind.Int8:
        case Kind.Uint8:
            return 1;
        case Kind.Int16:
        case Kind.Uint16:
            return 2;
        case Kind.Int32:
        case Kind.Uint32:
        case Kind.Float32:
            return 4;
        case Kind.Int64:
        case Kind.Uint64:
        case Kind.Float64:
            return 8;
        default:
            return -1;
    }
}

export function kindName(kind: Kind): string {
    return Kind[kind] === undefined ? `Kind<${kind}>` : Kind[kind].toLowerCase();
}

export function placeholder(kind: Kind, name: string): PlaceholderSchema {
    return { type: 'placeholder', kind, name };
}

/**
 * The stand-in to store for `schema` when it is nested inside another one.
 */
export function nestedSchema(schema: Schema): Schema {
    return isRegistered(schema) ? placeholder(schema.kind, schema.name) : schema;
}

/**
 * Human-readable form. Nested named schemas print by name, so cyclic graphs terminate.
 */
export function schemaToString(schema: Schema): string {
    return render(schema, true);
}

function render(schema: Schema, top: boolean): string {
    if (!top && isRegistered(schema)) {
        return schema.name;
    }
    switch (schema.type) {
        case 'scalar':
            return kindName(schema.kind);
        case 'placeholder':
            return schema.name;
        case 'array':
            return `[${schema.length}]${render(schema.elem, false)}`;
        case 'slice':
            return `[]${render(schema.elem, false)}`;
        case 'struct': {
            const fields = schema.fields.map(f => `${f.name} ${render(f.schema, false)}`).join('; ');
            return `${top && schema.name ? schema.name + ' ' : ''}struct{${fields}}`;
        }
        case 'reference':
            switch (schema.referenceType) {
                case ReferenceType.Single:
                    return `*${render(schema.elem, false)}`;
                case ReferenceType.Slice:
                    return `[]*${render(schema.elem, false)}`;
                case ReferenceType.Dynamic:
                    return '*dynamic';
            }
    }
}

/**
 * Value of a dynamic reference: the target's schema and the target object.
 * Both halves blank means "no target".
 */
export interface DynamicReference {
    schema: Uint8Array;
    object: Uint8Array;
}
