/**
 * HTSMSG binary codec and stream framing.
 * @module htsmsg/codec
 *
 * A message is a 32-bit big-endian length followed by a sequence of fields.
 * Each field is `type (u8) | nameLength (u8) | dataLength (u32 BE) | name | data`.
 * Lists are encoded like maps whose field names are empty.
 */
import {
    HTSMSG_DEFAULT_MAX_MESSAGE_BYTES,
    HTSMSG_FIELD_HEADER_BYTES,
    HTSMSG_LENGTH_PREFIX_BYTES,
    HTSMSG_MAX_NAME_BYTES,
    HtsFieldType,
} from './constants';

/** Any value an HTSMSG field can carry. */
export type HtsValue = number | bigint | string | Buffer | HtsList | HtsMap;
export type HtsList = HtsValue[];
export interface HtsMap {
    [field: string]: HtsValue;
}

/**
 * Field set accepted by the encoder. `undefined` entries are skipped, which
 * keeps optional request arguments out of the wire message.
 */
export type HtsMapInput = {readonly [field: string]: HtsValue | undefined};

const MAX_U64 = (1n << 64n) - 1n;
const MIN_S64 = -(1n << 63n);

const toS64Bytes = (value: number | bigint): Buffer => {
    if (typeof value === 'number' && !Number.isInteger(value)) {
        throw new RangeError(`HTSMSG integers must be whole numbers, got ${value}`);
    }
    const big = BigInt(value);
    if (big > MAX_U64 || big < MIN_S64) {
        throw new RangeError(`HTSMSG integer out of 64-bit range: ${big}`);
    }
    let unsigned = BigInt.asUintN(64, big);
    const bytes: number[] = [];
    while (unsigned !== 0n) {
        bytes.push(Number(unsigned & 0xffn));
        unsigned >>= 8n;
    }
    return Buffer.from(bytes);
};

const fromS64Bytes = (data: Buffer): number | bigint => {
    if (data.length > 8) {
        throw new RangeError(`HTSMSG integer field too long: ${data.length} bytes`);
    }
    let unsigned = 0n;
    for (let i = data.length - 1; i >= 0; i--) {
        unsigned = (unsigned << 8n) | BigInt(data[i] ?? 0);
    }
    const value = data.length === 8 ? BigInt.asIntN(64, unsigned) : unsigned;
    if (value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)) {
        return Number(value);
    }
    return value;
};

/** Narrow a value to a nested field map. */
export const isHtsMap = (value: HtsValue): value is HtsMap =>
    typeof value === 'object' && !Array.isArray(value) && !Buffer.isBuffer(value);

const encodeField = (name: string, value: HtsValue): Buffer => {
    const nameBytes = Buffer.from(name, 'utf8');
    if (nameBytes.length > HTSMSG_MAX_NAME_BYTES) {
        throw new RangeError(`HTSMSG field name "${name}" exceeds ${HTSMSG_MAX_NAME_BYTES} bytes`);
    }

    let type: HtsFieldType;
    let data: Buffer;
    if (typeof value === 'string') {
        type = HtsFieldType.Str;
        data = Buffer.from(value, 'utf8');
    } else if (typeof value === 'number' || typeof value === 'bigint') {
        type = HtsFieldType.S64;
        data = toS64Bytes(value);
    } else if (Buffer.isBuffer(value)) {
        type = HtsFieldType.Bin;
        data = value;
    } else if (Array.isArray(value)) {
        type = HtsFieldType.List;
        data = Buffer.concat(value.map((item) => encodeField('', item)));
    } else {
        type = HtsFieldType.Map;
        data = encodeHtsBody(value);
    }

    const header = Buffer.alloc(HTSMSG_FIELD_HEADER_BYTES);
    header.writeUInt8(type, 0);
    header.writeUInt8(nameBytes.length, 1);
    header.writeUInt32BE(data.length, 2);
    return Buffer.concat([header, nameBytes, data]);
};

/** Encode a field map without the length prefix. */
export const encodeHtsBody = (fields: HtsMapInput): Buffer => {
    const chunks: Buffer[] = [];
    for (const [name, value] of Object.entries(fields)) {
        if (value === undefined) continue;
        chunks.push(encodeField(name, value));
    }
    return Buffer.concat(chunks);
};

/** Encode a complete, length-prefixed HTSMSG message. */
export const encodeHtsMessage = (fields: HtsMapInput): Buffer => {
    const body = encodeHtsBody(fields);
    const prefix = Buffer.alloc(HTSMSG_LENGTH_PREFIX_BYTES);
    prefix.writeUInt32BE(body.length, 0);
    return Buffer.concat([prefix, body]);
};

type DecodedField = {name: string; value: HtsValue};

const decodeFields = (buffer: Buffer, start: number, end: number): DecodedField[] => {
    const fields: DecodedField[] = [];
    let offset = start;
    while (offset < end) {
        if (offset + HTSMSG_FIELD_HEADER_BYTES > end) {
            throw new RangeError(`HTSMSG field header truncated at offset ${offset}`);
        }
        const type = buffer.readUInt8(offset);
        const nameLength = buffer.readUInt8(offset + 1);
        const dataLength = buffer.readUInt32BE(offset + 2);
        const nameStart = offset + HTSMSG_FIELD_HEADER_BYTES;
        const dataStart = nameStart + nameLength;
        const dataEnd = dataStart + dataLength;
        if (dataEnd > end) {
            throw new RangeError(`HTSMSG field at offset ${offset} exceeds enclosing length`);
        }
        const name = buffer.toString('utf8', nameStart, dataStart);

        let value: HtsValue;
        switch (type) {
            case HtsFieldType.Str:
                value = buffer.toString('utf8', dataStart, dataEnd);
                break;
            case HtsFieldType.S64:
                value = fromS64Bytes(buffer.subarray(dataStart, dataEnd));
                break;
            case HtsFieldType.Bin:
                value = Buffer.from(buffer.subarray(dataStart, dataEnd));
                break;
            case HtsFieldType.Map:
                value = toMap(decodeFields(buffer, dataStart, dataEnd));
                break;
            case HtsFieldType.List:
                value = decodeFields(buffer, dataStart, dataEnd).map((field) => field.value);
                break;
            default:
                throw new RangeError(`Unsupported HTSMSG field type ${type} for "${name}"`);
        }
        fields.push({name, value});
        offset = dataEnd;
    }
    return fields;
};

const toMap = (fields: DecodedField[]): HtsMap => {
    const map: HtsMap = {};
    for (const field of fields) {
        map[field.name] = field.value;
    }
    return map;
};

/** Decode a field map body (no length prefix). */
export const decodeHtsBody = (buffer: Buffer): HtsMap => toMap(decodeFields(buffer, 0, buffer.length));

/** Decode exactly one length-prefixed message. */
export const decodeHtsMessage = (buffer: Buffer): HtsMap => {
    if (buffer.length < HTSMSG_LENGTH_PREFIX_BYTES) {
        throw new RangeError(`HTSMSG message too short: ${buffer.length} bytes`);
    }
    const total = HTSMSG_LENGTH_PREFIX_BYTES + buffer.readUInt32BE(0);
    if (buffer.length < total) {
        throw new RangeError(`HTSMSG message truncated: expected ${total} bytes, got ${buffer.length}`);
    }
    if (buffer.length > total) {
        throw new RangeError(`HTSMSG message has trailing bytes: expected ${total} bytes, got ${buffer.length}`);
    }
    return decodeHtsBody(buffer.subarray(HTSMSG_LENGTH_PREFIX_BYTES));
};

/**
 * Extract all complete messages from a TCP stream buffer.
 * Returns decoded messages and any remaining incomplete bytes.
 */
export const extractHtsMessages = (
    streamBuffer: Buffer,
    maxMessageBytes = HTSMSG_DEFAULT_MAX_MESSAGE_BYTES,
): {messages: HtsMap[]; remainder: Buffer} => {
    const messages: HtsMap[] = [];
    let offset = 0;

    while (offset + HTSMSG_LENGTH_PREFIX_BYTES <= streamBuffer.length) {
        const bodyLength = streamBuffer.readUInt32BE(offset);
        if (bodyLength > maxMessageBytes) {
            throw new RangeError(`HTSMSG message of ${bodyLength} bytes exceeds limit of ${maxMessageBytes}`);
        }
        const total = HTSMSG_LENGTH_PREFIX_BYTES + bodyLength;
        if (offset + total > streamBuffer.length) break;

        messages.push(decodeHtsBody(streamBuffer.subarray(offset + HTSMSG_LENGTH_PREFIX_BYTES, offset + total)));
        offset += total;
    }

    return {
        messages,
        remainder: Buffer.from(streamBuffer.subarray(offset)),
    };
};
