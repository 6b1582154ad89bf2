/**
 * Request/response correlation over a connection that also carries push traffic.
 * @module htsp/correlator
 */
import type {Logger} from 'pino';

import type {HtsMap, HtsMapInput} from '../htsmsg';
import {getDefaultLogger} from '../core/logger';
import type {Authenticator} from './auth';
import {HTSP_INITIAL_SEQUENCE} from './constants';
import type {NotificationDispatcher} from './dispatcher';
import {BusyError, HtspError, OutOfSequenceError, RequestError, TransportError} from './errors';
import type {HtspTransport} from './transport';

export type RequestCorrelatorOptions = {
    /** First sequence number. Defaults to {@link HTSP_INITIAL_SEQUENCE}. */
    initialSequence?: number;
    /** Upper bound on the wait for a reply. Unbounded when omitted. */
    requestTimeoutMs?: number;
    logger?: Logger;
};

/** Releases a slot taken with {@link RequestCorrelator.occupy}. Idempotent. */
export type ReleaseSlot = () => void;

/**
 * Single-slot request gate. One exchange (or one receive-only loop) owns the
 * connection at a time; messages without a `seq` that arrive while waiting
 * for a reply are held and dispatched, in arrival order, before the reply
 * is handed back.
 */
export class RequestCorrelator {
    private sequence: number;
    private pending: string | null = null;
    private fatal: HtspError | null = null;
    private readonly requestTimeoutMs?: number;
    private readonly logger: Logger;

    constructor(
        private readonly transport: HtspTransport,
        private readonly authenticator: Authenticator,
        private readonly dispatcher: NotificationDispatcher,
        options: RequestCorrelatorOptions = {},
    ) {
        this.sequence = options.initialSequence ?? HTSP_INITIAL_SEQUENCE;
        this.requestTimeoutMs = options.requestTimeoutMs;
        this.logger = (options.logger ?? getDefaultLogger()).child({component: 'correlator'});
    }

    /** Sequence number the next request will carry. */
    public get nextSequence(): number {
        return this.sequence;
    }

    /** Label of the exchange or loop holding the slot, if any. */
    public get pendingLabel(): string | null {
        return this.pending;
    }

    /** Error that made the correlation stream unusable, if any. */
    public get failure(): HtspError | null {
        return this.fatal;
    }

    /**
     * Send `method` with `args` and resolve with its reply.
     * @throws {BusyError} while another exchange or loop holds the slot.
     * @throws {OutOfSequenceError} when the reply carries a foreign `seq`; the transport is closed.
     * @throws {RequestError} when the server reports failure, after held messages were dispatched.
     */
    public async invoke(method: string, args: HtsMapInput = {}): Promise<HtsMap> {
        this.acquire(method);
        try {
            return await this.exchange(method, args);
        } finally {
            this.pending = null;
        }
    }

    /**
     * Like {@link invoke}, but the slot stays taken after the reply so a
     * receive-only loop can follow without another request slipping in.
     */
    public async invokeAndOccupy(method: string, args: HtsMapInput = {}): Promise<[HtsMap, ReleaseSlot]> {
        this.acquire(method);
        const release = this.releaser();
        try {
            return [await this.exchange(method, args), release];
        } catch (err) {
            release();
            throw err;
        }
    }

    /** Hold the slot for a receive-only loop labelled `label`. */
    public occupy(label: string): ReleaseSlot {
        this.acquire(label);
        return this.releaser();
    }

    private acquire(label: string): void {
        if (this.fatal) throw this.fatal;
        if (this.pending !== null) throw new BusyError(label, this.pending);
        this.pending = label;
    }

    private releaser(): ReleaseSlot {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.pending = null;
        };
    }

    private async exchange(method: string, args: HtsMapInput): Promise<HtsMap> {
        const seq = this.sequence;
        this.logger.debug({method, seq}, 'request');
        await this.transport.send(this.authenticator.decorate({...args, method, seq}));

        const held: HtsMap[] = [];
        const reply = await this.awaitReply(method, seq, held);
        this.sequence = seq + 1;
        this.logger.debug({method, seq, held: held.length}, 'reply');

        // Every held push is applied even when an earlier one fails; the first failure wins.
        let failure: unknown;
        let failed = false;
        for (const message of held) {
            try {
                this.dispatcher.dispatch(message);
            } catch (err) {
                if (!failed) {
                    failed = true;
                    failure = err;
                }
                this.logger.warn({method, seq, err}, 'held push failed');
            }
        }
        if (failed) throw failure;
        checkReply(method, reply);
        return reply;
    }

    private async awaitReply(method: string, seq: number, held: HtsMap[]): Promise<HtsMap> {
        const controller = this.requestTimeoutMs === undefined ? undefined : new AbortController();
        const timeoutMs = this.requestTimeoutMs;
        const timer = controller && timeoutMs !== undefined
            ? setTimeout(() => {
                controller.abort(new TransportError({
                    message: `HTSP reply to "${method}" timed out after ${timeoutMs}ms`,
                    code: 'RESPONSE_TIMEOUT',
                    details: {method, seq},
                }));
            }, timeoutMs)
            : undefined;

        try {
            while (true) {
                const message = await this.transport.receive(controller?.signal);
                const replySeq = message.seq;
                if (replySeq === undefined) {
                    held.push(message);
                    continue;
                }
                if (replySeq !== seq) {
                    throw this.poison(new OutOfSequenceError(seq, typeof replySeq === 'number' ? replySeq : Number.NaN, method));
                }
                return message;
            }
        } catch (err) {
            if (err instanceof TransportError && err.code === 'RESPONSE_TIMEOUT') throw this.poison(err);
            throw err;
        } finally {
            if (timer) clearTimeout(timer);
        }
    }

    /** Mark the stream unusable and tear the connection down. */
    private poison(error: HtspError): HtspError {
        if (!this.fatal) {
            this.fatal = error;
            this.logger.error({err: error}, 'correlation lost, closing connection');
            this.transport.close();
        }
        return error;
    }
}

/** Raise the server-reported failure carried by `reply`, if any. */
export function checkReply(method: string, reply: HtsMap): void {
    if (reply.noaccess === 1) {
        throw new RequestError(method, `Access denied for "${method}"`, 'ACCESS_DENIED');
    }
    const error = reply.error;
    if (typeof error === 'string') {
        throw new RequestError(method, error);
    }
}
