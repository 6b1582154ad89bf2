/**
 * HTSP protocol constants.
 * @module htsp/constants
 */
export const HTSP_DEFAULT_HOST = '127.0.0.1';
export const HTSP_DEFAULT_PORT = 9982;
/** Protocol version announced in `hello`. */
export const HTSP_CLIENT_PROTOCOL_VERSION = 17;
export const HTSP_DEFAULT_CLIENT_NAME = 'node-htsp';
/** First sequence number issued by a new correlator. */
export const HTSP_INITIAL_SEQUENCE = 0;

/** Minimum server protocol versions for gated operations and fields. */
export const HtspVersion = {
    DiskSpace: 3,
    SystemTime: 3,
    GetEvents: 4,
    Services: 5,
    DvrEntryByChannel: 5,
    ServerCapabilities: 6,
    Summary: 6,
    SeriesLinkage: 6,
    DvrEntryTitle: 6,
    Webroot: 8,
    MinorChannelNumber: 13,
    DvrEntryExtended: 13,
    GetChannel: 14,
} as const;

/** States of the session engine. */
export enum SessionState {
    Disconnected = 'disconnected',
    Connected = 'connected',
    Authenticated = 'authenticated',
    Synchronized = 'synchronized',
    Monitoring = 'monitoring',
}
