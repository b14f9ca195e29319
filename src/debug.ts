/**
 * @file debug.ts
 * @brief Debug utilities for objgraph.
 *
 * Human-readable views of frames and encoded objects, used by the CLI.
 *
 * @example
 * ```typescript
 * import { describeMessage, hexDump } from 'objgraph';
 *
 * console.log(describeMessage(frame)); // "RQDT 5f70bf18…"
 * console.log(hexDump(frame));
 * ```
 */

import { toHex } from './digest';
import { MsgType, msgTypeName, safeDecodeMessage, type Message } from './protocol';

/**
 * One-line summary of a message frame, or of why it does not decode.
 */
export function describeMessage(data: Uint8Array): string {
    const result = safeDecodeMessage(data);
    if (!result.success) {
        return `invalid message (${result.error.code}): ${result.error.message}`;
    }
    return summarize(result.message);
}

function summarize(msg: Message): string {
    const name = msgTypeName(msg.type);
    switch (msg.type) {
        case MsgType.Ping:
        case MsgType.Pong:
            return name;
        case MsgType.JoinFeed:
        case MsgType.LeaveFeed:
            return `${name} feed=${toHex(msg.feed)}`;
        case MsgType.Root:
            return `${name} feed=${toHex(msg.feed)} seq=${msg.root.seq} hash=${toHex(msg.root.hash)} root=${formatBytes(msg.root.root.length)}`;
        case MsgType.RequestData:
        case MsgType.RequestRegistry:
            return `${name} ${toHex(msg.ref)}`;
        case MsgType.Data:
            return `${name} ${formatBytes(msg.data.length)}`;
        case MsgType.Registry:
            return `${name} ${formatBytes(msg.reg.length)}`;
    }
}

/**
 * Creates a hex dump of binary data (like xxd/hexdump).
 *
 * @param bytesPerLine - Bytes per line (default: 16)
 */
export function hexDump(data: Uint8Array, bytesPerLine: number = 16): string {
    if (data.length === 0) return '(empty)';

    const lines: string[] = [];
    for (let i = 0; i < data.length; i += bytesPerLine) {
        const slice = data.subarray(i, Math.min(i + bytesPerLine, data.length));
        const hex = Array.from(slice).map(b => b.toString(16).padStart(2, '0')).join(' ');
        const ascii = bytesToAscii(slice);
        const offset = i.toString(16).padStart(8, '0');
        lines.push(`${offset}  ${hex.padEnd(bytesPerLine * 3 - 1)}  |${ascii}|`);
    }

    return lines.join('\n');
}

/**
 * Converts bytes to ASCII, replacing non-printable characters with dots.
 */
function bytesToAscii(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map(b => (b >= 32 && b <= 126) ? String.fromCharCode(b) : '.')
        .join('');
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
