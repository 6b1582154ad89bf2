/**
 * HTSMSG binary serialization constants.
 * @module htsmsg/constants
 */

/** Field type tags used by the HTSMSG binary format. */
export enum HtsFieldType {
    Map = 1,
    S64 = 2,
    Str = 3,
    Bin = 4,
    List = 5,
}

/** Size of the big-endian length prefix in front of every message. */
export const HTSMSG_LENGTH_PREFIX_BYTES = 4;
/** Fixed per-field header: type (1), name length (1), data length (4). */
export const HTSMSG_FIELD_HEADER_BYTES = 6;
export const HTSMSG_MAX_NAME_BYTES = 0xff;
export const HTSMSG_DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024 * 1024;
