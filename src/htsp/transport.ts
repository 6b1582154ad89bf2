/**
 * Byte-stream transport delivering one decoded HTSMSG message at a time.
 * @module htsp/transport
 */
import * as net from 'net';
import type {Socket} from 'net';
import {EventEmitter} from 'events';
import type {Logger} from 'pino';

import {encodeHtsMessage, extractHtsMessages, HTSMSG_DEFAULT_MAX_MESSAGE_BYTES} from '../htsmsg';
import type {HtsMap, HtsMapInput} from '../htsmsg';
import {getDefaultLogger} from '../core/logger';
import {HTSP_DEFAULT_PORT} from './constants';
import {HtspError, toTransportError, TransportError} from './errors';

/**
 * Connection used by the session engine. Reception is strictly sequential:
 * at most one `receive()` may be waiting at a time.
 */
export interface HtspTransport {
    connect(): Promise<void>;
    isConnected(): boolean;
    send(message: HtsMapInput): Promise<void>;
    /** Resolves with the next message in arrival order. */
    receive(signal?: AbortSignal): Promise<HtsMap>;
    close(): void;
    on(event: 'disconnect', listener: (error: HtspError) => void): unknown;
}

export type TcpTransportOptions = {
    host: string;
    /** Defaults to {@link HTSP_DEFAULT_PORT}. */
    port?: number;
    /** Optional local interface address to bind for the outbound connection. */
    localAddress?: string;
    /** Largest accepted message body before the stream is treated as corrupt. */
    maxMessageBytes?: number;
    logger?: Logger;
};

export interface TransportEvents {
    /** Emitted once when the connection becomes unusable. */
    disconnect: [error: HtspError];
}

type Receiver = {
    resolve: (message: HtsMap) => void;
    reject: (error: unknown) => void;
    detach: () => void;
};

/** HTSP transport over a plain TCP socket. */
export class TcpTransport extends EventEmitter<TransportEvents> implements HtspTransport {
    private readonly port: number;
    private readonly maxMessageBytes: number;
    private readonly logger: Logger;

    private socket: Socket | null = null;
    private streamBuffer: Buffer = Buffer.alloc(0);
    private inbox: HtsMap[] = [];
    private receiver: Receiver | null = null;
    private failure: HtspError | null = null;

    constructor(private readonly options: TcpTransportOptions) {
        super();
        this.port = options.port ?? HTSP_DEFAULT_PORT;
        this.maxMessageBytes = options.maxMessageBytes ?? HTSMSG_DEFAULT_MAX_MESSAGE_BYTES;
        this.logger = (options.logger ?? getDefaultLogger()).child({component: 'transport'});
    }

    public isConnected(): boolean {
        return !!this.socket && !this.socket.destroyed && !this.failure;
    }

    public async connect(): Promise<void> {
        if (this.isConnected()) return;
        if (this.failure) throw this.failure;

        const socket = net.createConnection({
            host: this.options.host,
            port: this.port,
            localAddress: this.options.localAddress,
        });
        this.socket = socket;
        this.streamBuffer = Buffer.alloc(0);

        socket.on('data', (chunk: Buffer) => this.onData(chunk));
        socket.on('error', (err) => {
            this.fail(toTransportError(err, 'CONNECTION_FAILED', {host: this.options.host, port: this.port}));
        });
        socket.on('close', () => {
            this.fail(new TransportError({message: 'HTSP connection closed', code: 'CONNECTION_CLOSED'}));
        });

        await new Promise<void>((resolve, reject) => {
            const onConnect = (): void => {
                socket.off('error', onError);
                resolve();
            };
            const onError = (err: Error): void => {
                socket.off('connect', onConnect);
                reject(toTransportError(err, 'CONNECTION_FAILED', {host: this.options.host, port: this.port}));
            };
            socket.once('connect', onConnect);
            socket.once('error', onError);
        });
        this.logger.debug({host: this.options.host, port: this.port}, 'connected');
    }

    public async send(message: HtsMapInput): Promise<void> {
        const socket = this.socket;
        if (this.failure) throw this.failure;
        if (!socket || socket.destroyed) {
            throw new TransportError({message: 'HTSP socket is not connected', code: 'NOT_CONNECTED'});
        }
        const payload = encodeHtsMessage(message);
        await new Promise<void>((resolve, reject) => {
            socket.write(payload, (err) => {
                if (err) reject(toTransportError(err, 'CONNECTION_FAILED'));
                else resolve();
            });
        });
    }

    public receive(signal?: AbortSignal): Promise<HtsMap> {
        const queued = this.inbox.shift();
        if (queued) return Promise.resolve(queued);
        if (this.failure) return Promise.reject(this.failure);
        if (this.receiver) {
            return Promise.reject(new Error('Concurrent receive on HTSP transport'));
        }
        if (signal?.aborted) return Promise.reject(signal.reason);

        return new Promise<HtsMap>((resolve, reject) => {
            const onAbort = (): void => {
                this.receiver = null;
                reject(signal?.reason);
            };
            signal?.addEventListener('abort', onAbort, {once: true});
            this.receiver = {
                resolve,
                reject,
                detach: () => signal?.removeEventListener('abort', onAbort),
            };
        });
    }

    /** Closes the socket. Pending and later receives fail with `CONNECTION_CLOSED`. */
    public close(): void {
        this.fail(new TransportError({message: 'HTSP connection closed by client', code: 'CONNECTION_CLOSED'}));
    }

    private onData(chunk: Buffer): void {
        try {
            this.streamBuffer = Buffer.concat([this.streamBuffer, chunk]);
            const {messages, remainder} = extractHtsMessages(this.streamBuffer, this.maxMessageBytes);
            this.streamBuffer = remainder;
            for (const message of messages) {
                this.deliver(message);
            }
        } catch (err) {
            this.fail(toTransportError(err, 'STREAM_FRAMING_ERROR'));
        }
    }

    private deliver(message: HtsMap): void {
        const receiver = this.receiver;
        if (!receiver) {
            this.inbox.push(message);
            return;
        }
        this.receiver = null;
        receiver.detach();
        receiver.resolve(message);
    }

    private fail(error: HtspError): void {
        if (this.failure) return;
        this.failure = error;
        this.logger.debug({code: error.code}, error.message);

        const socket = this.socket;
        this.socket = null;
        if (socket && !socket.destroyed) socket.destroy();

        const receiver = this.receiver;
        this.receiver = null;
        if (receiver) {
            receiver.detach();
            receiver.reject(error);
        }
        this.emit('disconnect', error);
    }
}
