/**
 * Protocol Layer
 *
 * Closed set of messages exchanged between peers. A frame is one type byte
 * followed by the payload:
 *
 * ```
 * [uint8] MsgType
 * [...]   payload, per type:
 *   Ping, Pong               (empty)
 *   JoinFeed, LeaveFeed      feed public key (33 raw bytes)
 *   Root                     feed (33), [bytes] root, [uint64] seq, hash (32), sig (65)
 *   RequestData              object digest (32)
 *   Data                     [bytes] data
 *   RequestRegistry          registry reference (32)
 *   Registry                 [bytes] encoded registry
 * ```
 */

import { BufferReader, BufferWriter } from './codec';
import { DIGEST_SIZE, PUBKEY_SIZE, SIGNATURE_SIZE, type Digest, type RegistryRef } from './digest';
import {
    EmptyMessageError,
    GraphError,
    IncompleteDecodingError,
    UnknownMessageTypeError,
    ValueError,
} from './errors';

// =============================================================================
// Message Types
// =============================================================================

export enum MsgType {
    Ping = 1,
    Pong = 2,
    JoinFeed = 3,
    LeaveFeed = 4,
    Root = 5,
    RequestData = 6,
    Data = 7,
    RequestRegistry = 8,
    Registry = 9,
}

const MSG_TYPE_NAMES: Record<MsgType, string> = {
    [MsgType.Ping]: 'PING',
    [MsgType.Pong]: 'PONG',
    [MsgType.JoinFeed]: 'ADD',
    [MsgType.LeaveFeed]: 'DEL',
    [MsgType.Root]: 'ROOT',
    [MsgType.RequestData]: 'RQDT',
    [MsgType.Data]: 'DATA',
    [MsgType.RequestRegistry]: 'RQREG',
    [MsgType.Registry]: 'REG',
};

/** Short wire name of a message type, `MsgType<n>` for unknown values. */
export function msgTypeName(type: number): string {
    return isMsgType(type) ? MSG_TYPE_NAMES[type] : `MsgType<${type}>`;
}

function isMsgType(type: number): type is MsgType {
    return Number.isInteger(type) && type >= MsgType.Ping && type <= MsgType.Registry;
}

// =============================================================================
// Messages
// =============================================================================

/** Signed snapshot of a feed's root object. The signature is carried, not checked. */
export interface RootPack {
    root: Uint8Array;
    seq: bigint;
    hash: Digest;
    sig: Uint8Array;
}

export interface PingMessage { type: MsgType.Ping }
export interface PongMessage { type: MsgType.Pong }
export interface JoinFeedMessage { type: MsgType.JoinFeed; feed: Uint8Array }
export interface LeaveFeedMessage { type: MsgType.LeaveFeed; feed: Uint8Array }
export interface RootMessage { type: MsgType.Root; feed: Uint8Array; root: RootPack }
export interface RequestDataMessage { type: MsgType.RequestData; ref: Digest }
export interface DataMessage { type: MsgType.Data; data: Uint8Array }
export interface RequestRegistryMessage { type: MsgType.RequestRegistry; ref: RegistryRef }
export interface RegistryMessage { type: MsgType.Registry; reg: Uint8Array }

export type Message =
    | PingMessage
    | PongMessage
    | JoinFeedMessage
    | LeaveFeedMessage
    | RootMessage
    | RequestDataMessage
    | DataMessage
    | RequestRegistryMessage
    | RegistryMessage;

export type SafeDecodeResult =
    | { success: true; message: Message }
    | { success: false; error: GraphError };

// =============================================================================
// Encoder
// =============================================================================

/** Encode a message into a frame. Fixed-width fields must have their exact width. */
export function encodeMessage(msg: Message): Uint8Array {
    const writer = new BufferWriter(64);
    writer.writeUint8(msg.type);

    switch (msg.type) {
        case MsgType.Ping:
        case MsgType.Pong:
            break;
        case MsgType.JoinFeed:
        case MsgType.LeaveFeed:
            writeFixed(writer, msg.feed, PUBKEY_SIZE, 'feed');
            break;
        case MsgType.Root:
            writeFixed(writer, msg.feed, PUBKEY_SIZE, 'feed');
            writer.writeBytes(msg.root.root);
            writer.writeUint64(msg.root.seq);
            writeFixed(writer, msg.root.hash, DIGEST_SIZE, 'hash');
            writeFixed(writer, msg.root.sig, SIGNATURE_SIZE, 'sig');
            break;
        case MsgType.RequestData:
        case MsgType.RequestRegistry:
            writeFixed(writer, msg.ref, DIGEST_SIZE, 'ref');
            break;
        case MsgType.Data:
            writer.writeBytes(msg.data);
            break;
        case MsgType.Registry:
            writer.writeBytes(msg.reg);
            break;
    }

    return writer.finish();
}

function writeFixed(writer: BufferWriter, bytes: Uint8Array, size: number, what: string): void {
    if (bytes.length !== size) {
        throw new ValueError(`${what} must be ${size} bytes, got ${bytes.length}`);
    }
    writer.writeRaw(bytes);
}

// =============================================================================
// Decoder
// =============================================================================

type PayloadDecoder = (reader: BufferReader) => Message;

// Indexed by discriminator; slot 0 is never a valid type.
const DECODERS: ReadonlyArray<PayloadDecoder | undefined> = [
    undefined,
    () => ({ type: MsgType.Ping }),
    () => ({ type: MsgType.Pong }),
    r => ({ type: MsgType.JoinFeed, feed: r.readRaw(PUBKEY_SIZE) }),
    r => ({ type: MsgType.LeaveFeed, feed: r.readRaw(PUBKEY_SIZE) }),
    r => ({
        type: MsgType.Root,
        feed: r.readRaw(PUBKEY_SIZE),
        root: {
            root: r.readBytes(),
            seq: r.readUint64(),
            hash: r.readRaw(DIGEST_SIZE),
            sig: r.readRaw(SIGNATURE_SIZE),
        },
    }),
    r => ({ type: MsgType.RequestData, ref: r.readRaw(DIGEST_SIZE) }),
    r => ({ type: MsgType.Data, data: r.readBytes() }),
    r => ({ type: MsgType.RequestRegistry, ref: r.readRaw(DIGEST_SIZE) }),
    r => ({ type: MsgType.Registry, reg: r.readBytes() }),
];

/**
 * Decode a frame. Throws EmptyMessageError, UnknownMessageTypeError,
 * MalformedDataError (truncated payload) or IncompleteDecodingError
 * (trailing bytes).
 */
export function decodeMessage(data: Uint8Array): Message {
    if (data.length === 0) {
        throw new EmptyMessageError();
    }

    const type = data[0];
    const decoder = DECODERS[type];
    if (decoder === undefined) {
        throw new UnknownMessageTypeError(type, msgTypeName(type));
    }

    const reader = new BufferReader(data.subarray(1));
    const message = decoder(reader);

    const consumed = 1 + reader.getOffset();
    if (consumed !== data.length) {
        throw new IncompleteDecodingError(consumed, data.length);
    }
    return message;
}

/**
 * Decode a frame without throwing for bad input, in the manner of zod's `safeParse`.
 */
export function safeDecodeMessage(data: Uint8Array): SafeDecodeResult {
    try {
        return { success: true, message: decodeMessage(data) };
    } catch (error) {
        if (error instanceof GraphError) {
            return { success: false, error };
        }
        throw error;
    }
}
