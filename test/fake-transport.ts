import {EventEmitter} from 'events';

import {
    decodeHtsMessage,
    encodeHtsMessage,
    TransportError,
    type HtsMap,
    type HtsMapInput,
    type HtspError,
    type HtspTransport,
} from '../src';

/** Messages the scripted server sends back for one request, in order. */
export type RequestHandler = (request: HtsMap) => HtsMapInput[];

type Waiter = {
    resolve: (message: HtsMap) => void;
    reject: (error: unknown) => void;
    detach: () => void;
};

/** Pass a message through the codec so tests see exactly what goes over the wire. */
export const wire = (message: HtsMapInput): HtsMap => decodeHtsMessage(encodeHtsMessage(message));

export const replyTo = (request: HtsMap, fields: HtsMapInput = {}): HtsMapInput => ({...fields, seq: request.seq});

/**
 * In-process transport driven by per-method handlers, standing in for a
 * server connection.
 */
export class FakeTransport extends EventEmitter<{disconnect: [error: HtspError]}> implements HtspTransport {
    public readonly sent: HtsMap[] = [];
    public connects = 0;

    private readonly handlers = new Map<string, RequestHandler>();
    private inbox: HtsMap[] = [];
    private waiter: Waiter | null = null;
    private connected = false;
    private failure: HtspError | null = null;

    public handle(method: string, handler: RequestHandler): this {
        this.handlers.set(method, handler);
        return this;
    }

    public async connect(): Promise<void> {
        this.connects++;
        this.connected = true;
    }

    public isConnected(): boolean {
        return this.connected && !this.failure;
    }

    public async send(message: HtsMapInput): Promise<void> {
        if (this.failure) throw this.failure;
        const request = wire(message);
        this.sent.push(request);
        const method = request.method;
        const handler = typeof method === 'string' ? this.handlers.get(method) : undefined;
        if (handler) this.push(...handler(request));
    }

    /** Deliver server messages as if they had arrived on the socket. */
    public push(...messages: HtsMapInput[]): void {
        for (const message of messages) {
            const decoded = wire(message);
            const waiter = this.waiter;
            if (waiter) {
                this.waiter = null;
                waiter.detach();
                waiter.resolve(decoded);
            } else {
                this.inbox.push(decoded);
            }
        }
    }

    public receive(signal?: AbortSignal): Promise<HtsMap> {
        const queued = this.inbox.shift();
        if (queued) return Promise.resolve(queued);
        if (this.failure) return Promise.reject(this.failure);
        if (signal?.aborted) return Promise.reject(signal.reason);
        return new Promise<HtsMap>((resolve, reject) => {
            const onAbort = (): void => {
                this.waiter = null;
                reject(signal?.reason);
            };
            signal?.addEventListener('abort', onAbort, {once: true});
            this.waiter = {resolve, reject, detach: () => signal?.removeEventListener('abort', onAbort)};
        });
    }

    public close(): void {
        this.fail(new TransportError({message: 'HTSP connection closed by client', code: 'CONNECTION_CLOSED'}));
    }

    public fail(error: HtspError): void {
        if (this.failure) return;
        this.failure = error;
        const waiter = this.waiter;
        this.waiter = null;
        if (waiter) {
            waiter.detach();
            waiter.reject(error);
        }
        this.emit('disconnect', error);
    }

    /** Methods of all requests sent so far. */
    public methods(): string[] {
        return this.sent.map((request) => (typeof request.method === 'string' ? request.method : ''));
    }

    public lastRequest(method: string): HtsMap | undefined {
        return this.sent.filter((request) => request.method === method).pop();
    }
}
