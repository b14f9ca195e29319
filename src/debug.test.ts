/**
 * @file debug.test.ts
 * @brief Tests for debug utilities.
 */

import { describe, it, expect } from 'vitest';
import { describeMessage, formatBytes, hexDump } from './debug';
import { toHex } from './digest';
import { MsgType, encodeMessage } from './protocol';

describe('describeMessage', () => {
    it('names messages without payload', () => {
        expect(describeMessage(new Uint8Array([1]))).toBe('PING');
    });

    it('summarizes payloads', () => {
        const ref = new Uint8Array(32).fill(0xab);
        expect(describeMessage(encodeMessage({ type: MsgType.RequestData, ref }))).toBe(`RQDT ${toHex(ref)}`);
        expect(describeMessage(encodeMessage({ type: MsgType.Data, data: new Uint8Array(12) }))).toBe('DATA 12 B');
        expect(describeMessage(encodeMessage({ type: MsgType.JoinFeed, feed: new Uint8Array(33) }))).toBe(
            `ADD feed=${'00'.repeat(33)}`
        );
    });

    it('summarizes root packs', () => {
        const frame = encodeMessage({
            type: MsgType.Root,
            feed: new Uint8Array(33).fill(1),
            root: { root: new Uint8Array(3), seq: 12n, hash: new Uint8Array(32).fill(2), sig: new Uint8Array(65) },
        });
        expect(describeMessage(frame)).toBe(`ROOT feed=${'01'.repeat(33)} seq=12 hash=${'02'.repeat(32)} root=3 B`);
    });

    it('describes frames that do not decode', () => {
        expect(describeMessage(new Uint8Array(0))).toBe('invalid message (EMPTY_MESSAGE): empty message');
        expect(describeMessage(new Uint8Array([42]))).toBe(
            'invalid message (UNKNOWN_MESSAGE_TYPE): invalid message type: MsgType<42>'
        );
    });
});

describe('hexDump', () => {
    it('returns "(empty)" for empty data', () => {
        expect(hexDump(new Uint8Array(0))).toBe('(empty)');
    });

    it('formats bytes with offset, hex and ASCII', () => {
        const data = new Uint8Array([0x48, 0x65, 0x6c, 0x6c, 0x6f]); // "Hello"
        expect(hexDump(data, 8)).toBe('00000000  48 65 6c 6c 6f           |Hello|');
    });

    it('replaces non-printable chars with dots', () => {
        const data = new Uint8Array([0x00, 0x01, 0x02, 0x41]);
        expect(hexDump(data)).toContain('|...A|');
    });

    it('breaks lines every bytesPerLine bytes', () => {
        const lines = hexDump(new Uint8Array(20)).split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[1].startsWith('00000010  00 00 00 00')).toBe(true);
    });
});

describe('formatBytes', () => {
    it('formats bytes', () => {
        expect(formatBytes(500)).toBe('500 B');
        expect(formatBytes(1024)).toBe('1.00 KB');
        expect(formatBytes(1024 * 1024 * 2.5)).toBe('2.50 MB');
    });
});
