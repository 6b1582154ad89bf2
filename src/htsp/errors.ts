/**
 * Structured HTSP error taxonomy.
 * @module htsp/errors
 */

export type HtspErrorCode =
    | 'CONNECTION_FAILED'
    | 'CONNECTION_CLOSED'
    | 'NOT_CONNECTED'
    | 'STREAM_FRAMING_ERROR'
    | 'RESPONSE_TIMEOUT'
    | 'PROTOCOL_VERSION'
    | 'OUT_OF_SEQUENCE'
    | 'REQUEST_FAILED'
    | 'ACCESS_DENIED'
    | 'ENTITY_NOT_FOUND'
    | 'BUSY';

type HtspErrorParams<C extends HtspErrorCode = HtspErrorCode> = {
    message: string;
    code: C;
    details?: Record<string, unknown>;
    cause?: unknown;
};

export class HtspError extends Error {
    public readonly code: HtspErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: HtspErrorParams) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'HtspError';
        this.code = params.code;
        this.details = params.details;
    }
}

/** Connection refused, reset or closed. Fatal to the session. */
export class TransportError extends HtspError {
    declare readonly code:
        | 'CONNECTION_FAILED'
        | 'CONNECTION_CLOSED'
        | 'NOT_CONNECTED'
        | 'STREAM_FRAMING_ERROR'
        | 'RESPONSE_TIMEOUT';

    constructor(params: HtspErrorParams<TransportError['code']>) {
        super(params);
        this.name = 'TransportError';
    }
}

/** Raised before sending when the server's protocol version is too old. */
export class ProtocolVersionError extends HtspError {
    public readonly requiredVersion: number;
    public readonly serverVersion: number;

    constructor(requiredVersion: number, serverVersion: number, feature?: string) {
        super({
            message: `HTSP version ${requiredVersion} required${feature ? ` for ${feature}` : ''}, `
                + `but the server only supports version ${serverVersion}`,
            code: 'PROTOCOL_VERSION',
            details: {requiredVersion, serverVersion, feature},
        });
        this.name = 'ProtocolVersionError';
        this.requiredVersion = requiredVersion;
        this.serverVersion = serverVersion;
    }
}

/** A reply carried a sequence number other than the outstanding one. */
export class OutOfSequenceError extends HtspError {
    public readonly expected: number;
    public readonly received: number;

    constructor(expected: number, received: number, method: string) {
        super({
            message: `HTSP reply out of sequence for "${method}": expected ${expected}, got ${received}`,
            code: 'OUT_OF_SEQUENCE',
            details: {expected, received, method},
        });
        this.name = 'OutOfSequenceError';
        this.expected = expected;
        this.received = received;
    }
}

/** The server reported failure for a request. */
export class RequestError extends HtspError {
    declare readonly code: 'REQUEST_FAILED' | 'ACCESS_DENIED';
    public readonly method: string;

    constructor(method: string, message: string, code: RequestError['code'] = 'REQUEST_FAILED') {
        super({message, code, details: {method}});
        this.name = 'RequestError';
        this.method = method;
    }
}

/** An update referenced an identifier the mirror does not hold. */
export class EntityLookupError extends HtspError {
    public readonly kind: string;
    public readonly id: number | string;

    constructor(kind: string, id: number | string, verb: string) {
        super({
            message: `${verb} references unknown ${kind} ${JSON.stringify(id)}`,
            code: 'ENTITY_NOT_FOUND',
            details: {kind, id, verb},
        });
        this.name = 'EntityLookupError';
        this.kind = kind;
        this.id = id;
    }
}

/** A request was issued while another exchange held the connection. */
export class BusyError extends HtspError {
    constructor(method: string, pending: string) {
        super({
            message: `Cannot send "${method}": "${pending}" is still pending`,
            code: 'BUSY',
            details: {method, pending},
        });
        this.name = 'BusyError';
    }
}

/** Wrap an unknown failure as a {@link TransportError}, keeping HTSP errors as they are. */
export const toTransportError = (
    err: unknown,
    code: TransportError['code'],
    details?: Record<string, unknown>,
): HtspError => {
    if (err instanceof HtspError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError({message, code, details, cause: err});
};
