/**
 * objgraph - typed, content-addressed object graphs
 *
 * Declare a vocabulary of named types, pack values into bytes, and read them
 * back lazily. Registries, schemas and objects are all identified by the
 * SHA-256 digest of their canonical encoding.
 *
 * @example
 * ```typescript
 * import { createRegistry, struct, refs } from 'objgraph';
 *
 * const registry = createRegistry(reg => {
 *     reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
 *     reg.register('cxo.Group', struct({ Name: 'string', Members: refs('cxo.User') }));
 * });
 *
 * const alice = registry.pack('cxo.User', { Name: 'Alice', Age: 21 });
 * registry.value('cxo.User', alice).fieldByName('Name').string(); // 'Alice'
 * ```
 *
 * @packageDocumentation
 */

// Errors
export {
    GraphError,
    ConfigurationError,
    RegistrationError,
    EmptyMessageError,
    UnknownMessageTypeError,
    IncompleteDecodingError,
    MissingSchemaError,
    InvalidEncodedSchemaError,
    InvalidSchemaError,
    MalformedDataError,
    IndexOutOfRangeError,
    NoSuchFieldError,
    InvalidDynamicReferenceError,
    MissingObjectError,
    ValueError,
} from './errors';

// Primitive codec and digests
export { BufferWriter, BufferReader } from './codec';
export type { Digest, SchemaRef, RegistryRef } from './digest';
export {
    DIGEST_SIZE,
    PUBKEY_SIZE,
    SIGNATURE_SIZE,
    sha256,
    blankDigest,
    isBlank,
    digestEquals,
    toHex,
    fromHex,
    digestFromHex,
} from './digest';

// Schemas
export type {
    Schema,
    ScalarSchema,
    ArraySchema,
    SliceSchema,
    StructSchema,
    Field,
    ReferenceSchema,
    SingleReferenceSchema,
    SliceReferenceSchema,
    DynamicReferenceSchema,
    PlaceholderSchema,
    DynamicReference,
} from './schema/Schema';
export { Kind, ReferenceType, isRegistered, isReference, kindName, schemaToString } from './schema/Schema';
export type {
    PrimitiveType,
    TypeDescriptor,
    FieldDescriptor,
    ArrayDescriptor,
    SliceDescriptor,
    StructDescriptor,
    RefDescriptor,
    RefsDescriptor,
    DynamicDescriptor,
} from './schema/SchemaBuilder';
export { Registrar, struct, array, slice, ref, refs, dynamic, tagSchemaName } from './schema/SchemaBuilder';
export type { Types } from './schema/Registry';
export { Registry, createRegistry, decodeRegistry } from './schema/Registry';
export { encodeSchema, decodeSchema, schemaReference } from './schema/SchemaCodec';
export { schemaSize, LENGTH_PREFIX_SIZE } from './schema/size';
export { Value } from './schema/Value';
export { encodeValue } from './schema/ValueEncoder';

// Storage
export type { Pack } from './storage/Pack';
export { Flags } from './storage/Pack';
export { InMemoryPack } from './adapters/InMemoryPack';

// Protocol
export type {
    Message,
    RootPack,
    SafeDecodeResult,
    PingMessage,
    PongMessage,
    JoinFeedMessage,
    LeaveFeedMessage,
    RootMessage,
    RequestDataMessage,
    DataMessage,
    RequestRegistryMessage,
    RegistryMessage,
} from './protocol';
export { MsgType, msgTypeName, encodeMessage, decodeMessage, safeDecodeMessage } from './protocol';

// Vocabulary files and configuration
export type { Vocabulary } from './vocabulary';
export { loadVocabulary, registryFromVocabulary } from './vocabulary';
export type { GraphConfig, Env } from './config';
export { loadConfig, applyConfig } from './config';

// Logging and debug utilities
export { Logger, LogLevel, logger } from './utils/Logger';
export { describeMessage, hexDump, formatBytes } from './debug';
