import {describe, expect, it} from 'vitest';

import {
    decodeHtsBody,
    decodeHtsMessage,
    encodeHtsBody,
    encodeHtsMessage,
    extractHtsMessages,
    HtsFieldType,
} from '../src';

describe('HTSMSG codec', () => {
    it('encodes a length-prefixed message with string and integer fields', () => {
        const bytes = encodeHtsMessage({method: 'hello', seq: 0});

        expect(bytes).toEqual(Buffer.concat([
            Buffer.from([0, 0, 0, 26]),
            Buffer.from([HtsFieldType.Str, 6, 0, 0, 0, 5]),
            Buffer.from('methodhello'),
            Buffer.from([HtsFieldType.S64, 3, 0, 0, 0, 0]),
            Buffer.from('seq'),
        ]));
    });

    it('writes integers little-endian with minimal length', () => {
        expect(encodeHtsBody({n: 0x1234})).toEqual(Buffer.from([2, 1, 0, 0, 0, 2, 0x6e, 0x34, 0x12]));
        expect(encodeHtsBody({n: 255})).toEqual(Buffer.from([2, 1, 0, 0, 0, 1, 0x6e, 0xff]));
    });

    it('writes negative integers as 8-byte two\'s complement', () => {
        const body = encodeHtsBody({n: -1});

        expect(body.readUInt32BE(2)).toBe(8);
        expect(body.subarray(7)).toEqual(Buffer.alloc(8, 0xff));
        expect(decodeHtsBody(body)).toEqual({n: -1});
    });

    it('decodes integers beyond the safe range as bigint', () => {
        const decoded = decodeHtsBody(encodeHtsBody({big: 2n ** 60n, small: 2n}));

        expect(decoded.big).toBe(2n ** 60n);
        expect(decoded.small).toBe(2);
    });

    it('round-trips nested maps, lists and binary fields', () => {
        const message = {
            method: 'channelAdd',
            tags: [1, 2],
            services: [{name: 'DVB-T/474MHz/BBC One', type: 'SDTV'}],
            challenge: Buffer.from([1, 2, 3]),
        };

        expect(decodeHtsMessage(encodeHtsMessage(message))).toEqual(message);
    });

    it('skips undefined fields', () => {
        expect(encodeHtsBody({title: undefined, retention: 0})).toEqual(encodeHtsBody({retention: 0}));
    });

    it('rejects non-integer numbers', () => {
        expect(() => encodeHtsBody({n: 1.5})).toThrow(RangeError);
    });

    it('rejects unsupported field types', () => {
        const body = Buffer.concat([Buffer.from([9, 1, 0, 0, 0, 0]), Buffer.from('x')]);

        expect(() => decodeHtsBody(body)).toThrow(/Unsupported HTSMSG field type 9/);
    });

    it('rejects fields running past the message end', () => {
        const body = Buffer.concat([Buffer.from([HtsFieldType.Str, 1, 0, 0, 0, 10]), Buffer.from('xab')]);

        expect(() => decodeHtsBody(body)).toThrow(RangeError);
    });

    it('rejects truncated and oversized single messages', () => {
        const bytes = encodeHtsMessage({method: 'hello'});

        expect(() => decodeHtsMessage(bytes.subarray(0, bytes.length - 1))).toThrow(/truncated/);
        expect(() => decodeHtsMessage(Buffer.concat([bytes, Buffer.from([0])]))).toThrow(/trailing bytes/);
        expect(() => decodeHtsMessage(Buffer.from([0, 0]))).toThrow(/too short/);
    });
});

describe('extractHtsMessages', () => {
    it('returns complete messages and keeps the incomplete tail', () => {
        const first = encodeHtsMessage({method: 'tagAdd', tagId: 1});
        const second = encodeHtsMessage({method: 'initialSyncCompleted'});
        const third = encodeHtsMessage({seq: 4});
        const stream = Buffer.concat([first, second, third.subarray(0, 3)]);

        const {messages, remainder} = extractHtsMessages(stream);

        expect(messages).toEqual([{method: 'tagAdd', tagId: 1}, {method: 'initialSyncCompleted'}]);
        expect(remainder).toEqual(third.subarray(0, 3));
    });

    it('throws when a length prefix exceeds the limit', () => {
        const stream = Buffer.from([0, 0, 0x10, 0, 0]);

        expect(() => extractHtsMessages(stream, 1024)).toThrow(/exceeds limit of 1024/);
    });
});
