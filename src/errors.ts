/**
 * Error types for objgraph.
 *
 * Every data-dependent failure is a typed error carrying a stable `code`,
 * so callers can branch on the failure mode with `instanceof` or on the code.
 * `RegistrationError` is the exception: it marks a mistake in the type
 * declarations themselves and is raised while a vocabulary is being built.
 */

/**
 * Base class for all objgraph errors.
 */
export class GraphError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'GraphError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, GraphError);
        }
    }
}

/**
 * Thrown when configuration or a vocabulary file is invalid.
 */
export class ConfigurationError extends GraphError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when type declarations break the registration contract
 * (empty or duplicate names, misplaced references, unknown type names).
 */
export class RegistrationError extends GraphError {
    constructor(message: string) {
        super(message, 'REGISTRATION_ERROR');
        this.name = 'RegistrationError';
    }
}

/**
 * Thrown when decoding an empty message frame.
 */
export class EmptyMessageError extends GraphError {
    constructor() {
        super('empty message', 'EMPTY_MESSAGE');
        this.name = 'EmptyMessageError';
    }
}

export class UnknownMessageTypeError extends GraphError {
    constructor(public readonly msgType: number, typeName: string) {
        super(`invalid message type: ${typeName}`, 'UNKNOWN_MESSAGE_TYPE');
        this.name = 'UnknownMessageTypeError';
    }
}

/**
 * Thrown when a message decodes correctly but leaves bytes unread.
 */
export class IncompleteDecodingError extends GraphError {
    constructor(public readonly consumed: number, public readonly total: number) {
        super(`incomplete decoding: used ${consumed} of ${total} bytes`, 'INCOMPLETE_DECODING');
        this.name = 'IncompleteDecodingError';
    }
}

/**
 * Thrown when a schema is looked up by a name or reference the registry does not hold.
 * Expected when a peer mentions a schema we have not received yet.
 */
export class MissingSchemaError extends GraphError {
    constructor(public readonly key: string) {
        super(`missing schema "${key}"`, 'MISSING_SCHEMA');
        this.name = 'MissingSchemaError';
    }
}

export class InvalidEncodedSchemaError extends GraphError {
    constructor(detail: string, public readonly cause?: Error) {
        super(`invalid encoded schema: ${detail}`, 'INVALID_ENCODED_SCHEMA');
        this.name = 'InvalidEncodedSchemaError';
    }
}

export class InvalidSchemaError extends GraphError {
    constructor(detail: string) {
        super(`invalid schema: ${detail}`, 'INVALID_SCHEMA');
        this.name = 'InvalidSchemaError';
    }
}

/**
 * Thrown when encoded data does not fit its schema: a length prefix cannot be
 * read or a computed size runs past the end of the buffer.
 */
export class MalformedDataError extends GraphError {
    constructor(detail: string) {
        super(`invalid schema or data: ${detail}`, 'INVALID_SCHEMA_OR_DATA');
        this.name = 'MalformedDataError';
    }
}

export class IndexOutOfRangeError extends GraphError {
    constructor(public readonly index: number, public readonly length: number) {
        super(`index out of range: ${index} (length ${length})`, 'INDEX_OUT_OF_RANGE');
        this.name = 'IndexOutOfRangeError';
    }
}

export class NoSuchFieldError extends GraphError {
    constructor(public readonly field: string) {
        super(`no such field: "${field}"`, 'NO_SUCH_FIELD');
        this.name = 'NoSuchFieldError';
    }
}

export class InvalidDynamicReferenceError extends GraphError {
    constructor() {
        super('invalid dynamic reference', 'INVALID_DYNAMIC_REFERENCE');
        this.name = 'InvalidDynamicReferenceError';
    }
}

/**
 * Thrown when a referenced object is absent from the storage pack.
 */
export class MissingObjectError extends GraphError {
    constructor(public readonly key: string) {
        super(`missing object ${key}`, 'MISSING_OBJECT');
        this.name = 'MissingObjectError';
    }
}

/**
 * Thrown when a JS value cannot be encoded with the given schema.
 */
export class ValueError extends GraphError {
    constructor(message: string) {
        super(message, 'INVALID_VALUE');
        this.name = 'ValueError';
    }
}
