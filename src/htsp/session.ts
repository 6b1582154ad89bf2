/**
 * HTSP session engine: handshake, authentication, bulk synchronization,
 * commands and the monitor loop over one connection.
 * @module htsp/session
 */
import {EventEmitter} from 'events';
import type {Logger} from 'pino';

import type {HtsMap, HtsValue} from '../htsmsg';
import {isHtsMap} from '../htsmsg';
import {getDefaultLogger} from '../core/logger';
import {Authenticator} from './auth';
import {EntityCache, toEntityRecord, type EntityRecord} from './cache';
import {
    HTSP_CLIENT_PROTOCOL_VERSION,
    HTSP_DEFAULT_CLIENT_NAME,
    HTSP_DEFAULT_HOST,
    HtspVersion,
    SessionState,
} from './constants';
import {RequestCorrelator} from './correlator';
import {NotificationDispatcher, type NotificationObserver, type ObserverErrorPolicy} from './dispatcher';
import {
    AutorecEntry,
    Channel,
    DiskSpace,
    DvrEntry,
    EpgEvent,
    ServerInfo,
    SystemTime,
    Tag,
    type EntityContext,
} from './entities';
import {EntityLookupError, HtspError, ProtocolVersionError, RequestError} from './errors';
import type {EntityKey, EntityKind} from './notifications';
import {TcpTransport, type HtspTransport} from './transport';

export type HtspSessionOptions = {
    /** Server address. Defaults to {@link HTSP_DEFAULT_HOST}. */
    host?: string;
    port?: number;
    /** Name announced in `hello`. Defaults to {@link HTSP_DEFAULT_CLIENT_NAME}. */
    clientName?: string;
    /** Mirror EPG events during synchronization. Defaults to `false`. */
    epg?: boolean;
    initialSequence?: number;
    requestTimeoutMs?: number;
    maxMessageBytes?: number;
    observerErrors?: ObserverErrorPolicy;
    logger?: Logger;
    /** Replaces the TCP transport built from `host`/`port`. */
    transport?: HtspTransport;
};

export type SynchronizeOptions = {
    /** Overrides {@link HtspSessionOptions.epg} for the first synchronization. */
    epg?: boolean;
};

export interface HtspSessionEvents {
    state: [state: SessionState, previous: SessionState];
    /** The connection became unusable; the session cannot be reused. */
    disconnect: [error: HtspError];
}

/** Fields of an `addDvrEntry` request. Times are absolute. */
export type DvrEntryRequest = {
    /** Record this EPG event. When set, `channelId`/`start`/`stop` are ignored by the server. */
    eventId?: number;
    channelId?: number;
    start?: Date;
    stop?: Date;
    /** Defaults to the event's title when `eventId` is given. */
    title?: string;
    description?: string;
    /** Days. */
    retention?: number;
    priority?: number;
    /** Minutes. */
    startExtra?: number;
    /** Minutes. */
    stopExtra?: number;
    configName?: string;
};

export type MonitorOptions = {
    signal?: AbortSignal;
};

export type MonitorResult = {reason: 'aborted'} | {reason: 'error'; error: Error};

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Client session against one HTSP server.
 *
 * Operations connect and say `hello` lazily. Bulk accessors call
 * {@link ensureSynchronized} so the mirror is complete before it is read.
 */
export class HtspSession extends EventEmitter<HtspSessionEvents> implements EntityContext {
    private readonly transport: HtspTransport;
    private readonly cache: EntityCache;
    private readonly authenticator = new Authenticator();
    private readonly dispatcher: NotificationDispatcher;
    private readonly correlator: RequestCorrelator;
    private readonly clientName: string;
    private readonly logger: Logger;
    private epg: boolean;

    private state: SessionState = SessionState.Disconnected;
    private serverInfo: ServerInfo | null = null;
    private synchronized = false;
    private closing = false;
    private helloPromise: Promise<ServerInfo> | null = null;
    private syncPromise: Promise<void> | null = null;

    constructor(options: HtspSessionOptions = {}) {
        super();
        const logger = options.logger ?? getDefaultLogger();
        this.logger = logger.child({component: 'session'});
        this.clientName = options.clientName ?? HTSP_DEFAULT_CLIENT_NAME;
        this.epg = options.epg ?? false;

        this.transport = options.transport ?? new TcpTransport({
            host: options.host ?? HTSP_DEFAULT_HOST,
            port: options.port,
            maxMessageBytes: options.maxMessageBytes,
            logger,
        });
        this.cache = new EntityCache({logger});
        this.dispatcher = new NotificationDispatcher(this.cache, this, {
            observerErrors: options.observerErrors,
            logger,
        });
        this.correlator = new RequestCorrelator(this.transport, this.authenticator, this.dispatcher, {
            initialSequence: options.initialSequence,
            requestTimeoutMs: options.requestTimeoutMs,
            logger,
        });

        this.transport.on('disconnect', (error) => {
            if (this.closing) this.logger.debug('connection closed');
            else this.logger.warn({err: error}, 'disconnected');
            this.setState(SessionState.Disconnected);
            this.emit('disconnect', error);
        });
    }

    /** Negotiated protocol version, or 0 before `hello`. */
    public get protocolVersion(): number {
        if (!this.serverInfo) return 0;
        return Math.min(this.serverInfo.protocolVersion, HTSP_CLIENT_PROTOCOL_VERSION);
    }

    public lookup(kind: EntityKind, id: EntityKey): EntityRecord | undefined {
        return this.cache.get(kind, id);
    }

    public getState(): SessionState {
        return this.state;
    }

    /** `hello` reply, once the handshake completed. */
    public getServerInfo(): ServerInfo | undefined {
        return this.serverInfo ?? undefined;
    }

    public isSynchronized(): boolean {
        return this.synchronized;
    }

    /** Connect if needed and perform the handshake once. */
    public async hello(): Promise<ServerInfo> {
        if (this.serverInfo) return this.serverInfo;
        if (this.helloPromise) return this.helloPromise;

        this.helloPromise = this.helloInternal();
        try {
            return await this.helloPromise;
        } finally {
            this.helloPromise = null;
        }
    }

    /**
     * Authenticate as `username`. Credentials are attached to every later
     * request; they are dropped again when the server denies access.
     */
    public async authenticate(username: string, password?: string): Promise<void> {
        const info = await this.hello();
        this.authenticator.setCredentials(username, password, info.challenge);
        try {
            await this.correlator.invoke('authenticate');
        } catch (err) {
            this.authenticator.clear();
            throw err;
        }
        this.logger.info({username}, 'authenticated');
        if (this.state === SessionState.Connected) this.setState(SessionState.Authenticated);
    }

    /** Enable live updates and consume the initial burst up to `initialSyncCompleted`. */
    public async synchronize(options: SynchronizeOptions = {}): Promise<void> {
        if (!this.synchronized && !this.syncPromise && options.epg !== undefined) {
            this.epg = options.epg;
        }
        await this.ensureSynchronized();
    }

    /** Synchronize once; later calls resolve immediately. */
    public async ensureSynchronized(): Promise<void> {
        if (this.synchronized) return;
        if (this.syncPromise) return this.syncPromise;

        this.syncPromise = this.synchronizeInternal();
        try {
            await this.syncPromise;
        } finally {
            this.syncPromise = null;
        }
    }

    public async getDiskSpace(): Promise<DiskSpace> {
        await this.requireVersion(HtspVersion.DiskSpace, 'getDiskSpace');
        return new DiskSpace(this, await this.correlator.invoke('getDiskSpace'));
    }

    public async getSystemTime(): Promise<SystemTime> {
        await this.requireVersion(HtspVersion.SystemTime, 'getSysTime');
        return new SystemTime(this, await this.correlator.invoke('getSysTime'));
    }

    /** Mirrored channel if present, otherwise fetched with `getChannel`. */
    public async getChannel(id: number): Promise<Channel> {
        const cached = this.cache.get('channel', id);
        if (cached) return new Channel(this, cached);

        await this.requireVersion(HtspVersion.GetChannel, 'getChannel');
        const reply = await this.correlator.invoke('getChannel', {channelId: id});
        return new Channel(this, toEntityRecord(reply));
    }

    /** Events of one channel, from the mirror when EPG data is synchronized. */
    public async getEvents(channelId: number): Promise<EpgEvent[]> {
        await this.requireVersion(HtspVersion.GetEvents, 'getEvents');
        if (this.hasEventMirror()) {
            return this.cache.list('event')
                .filter((record) => record.channelId === channelId)
                .map((record) => new EpgEvent(this, record));
        }

        const reply = await this.correlator.invoke('getEvents', {channelId});
        const events = reply.events;
        if (!Array.isArray(events)) return [];
        return events.filter(isHtsMap).map((fields) => new EpgEvent(this, toEntityRecord(fields)));
    }

    /** One event, from the mirror when EPG data is synchronized. */
    public async getEvent(id: number): Promise<EpgEvent> {
        if (this.hasEventMirror()) {
            const record = this.cache.get('event', id);
            if (!record) throw new EntityLookupError('event', id, 'getEvent');
            return new EpgEvent(this, record);
        }

        await this.hello();
        const reply = await this.correlator.invoke('getEvent', {eventId: id});
        return new EpgEvent(this, toEntityRecord(reply));
    }

    /**
     * Schedule a recording and return the entry the server pushed for it.
     * @throws {RangeError} when neither `eventId` nor `channelId`/`start`/`stop` is given.
     */
    public async addDvrEntry(request: DvrEntryRequest): Promise<DvrEntry> {
        if (request.eventId === undefined && (request.channelId === undefined || !request.start || !request.stop)) {
            throw new RangeError('addDvrEntry needs an eventId or a channelId with start and stop');
        }
        await this.hello();
        this.checkDvrEntryVersion(request);
        await this.ensureSynchronized();

        const args: {[field: string]: HtsValue | undefined} = {
            retention: request.retention,
            priority: request.priority,
            startExtra: request.startExtra,
            stopExtra: request.stopExtra,
            description: request.description,
            configName: request.configName,
        };
        let title = request.title;
        if (request.eventId !== undefined) {
            if (title === undefined) title = (await this.getEvent(request.eventId)).title;
            args.eventId = request.eventId;
        } else {
            args.channelId = request.channelId;
            args.start = request.start ? toSeconds(request.start) : undefined;
            args.stop = request.stop ? toSeconds(request.stop) : undefined;
        }
        args.title = title;

        const reply = await this.correlator.invoke('addDvrEntry', args);
        checkSuccess('addDvrEntry', reply);

        const id = reply.id;
        if (typeof id !== 'number') {
            throw new RequestError('addDvrEntry', 'Server reply carries no entry id');
        }
        const record = this.cache.get('dvrEntry', id);
        if (!record) throw new EntityLookupError('dvrEntry', id, 'addDvrEntry');
        return new DvrEntry(this, record);
    }

    public async cancelDvrEntry(entry: number | DvrEntry): Promise<void> {
        const id = typeof entry === 'number' ? entry : entry.id;
        await this.hello();
        const reply = await this.correlator.invoke('cancelDvrEntry', {id});
        checkSuccess('cancelDvrEntry', reply);
    }

    public async listTags(): Promise<Tag[]> {
        await this.ensureSynchronized();
        return this.cache.list('tag').map((record) => new Tag(this, record));
    }

    public async getTag(id: number): Promise<Tag | undefined> {
        await this.ensureSynchronized();
        const record = this.cache.get('tag', id);
        return record ? new Tag(this, record) : undefined;
    }

    public async listChannels(): Promise<Channel[]> {
        await this.ensureSynchronized();
        return this.cache.list('channel').map((record) => new Channel(this, record));
    }

    public async listDvrEntries(): Promise<DvrEntry[]> {
        await this.ensureSynchronized();
        return this.cache.list('dvrEntry').map((record) => new DvrEntry(this, record));
    }

    /** Completed recordings. */
    public async listRecorded(): Promise<DvrEntry[]> {
        return (await this.listDvrEntries()).filter((entry) => entry.status === 'completed');
    }

    /** Entries waiting to record or recording now. */
    public async listScheduled(): Promise<DvrEntry[]> {
        return (await this.listDvrEntries()).filter((entry) => entry.status === 'scheduled' || entry.status === 'recording');
    }

    /** Missed recordings and recordings that ended in an error state. */
    public async listFailed(): Promise<DvrEntry[]> {
        return (await this.listDvrEntries()).filter((entry) => entry.status === 'missed' || entry.status === 'error');
    }

    public async listAutorecEntries(): Promise<AutorecEntry[]> {
        await this.ensureSynchronized();
        return this.cache.list('autorecEntry').map((record) => new AutorecEntry(this, record));
    }

    public addObserver(observer: NotificationObserver): void {
        this.dispatcher.addObserver(observer);
    }

    public removeObserver(observer: NotificationObserver): boolean {
        return this.dispatcher.removeObserver(observer);
    }

    /**
     * Receive and dispatch push messages until `signal` aborts or the
     * connection fails. `observer` is registered for the duration of the loop.
     * Failures are logged and reported in the result, never thrown.
     */
    public async monitor(observer: NotificationObserver, options: MonitorOptions = {}): Promise<MonitorResult> {
        const {signal} = options;
        try {
            await this.ensureSynchronized();
        } catch (err) {
            return this.monitorFailed(err);
        }
        if (signal?.aborted) return {reason: 'aborted'};

        let release: (() => void) | undefined;
        this.dispatcher.addObserver(observer);
        try {
            release = this.correlator.occupy('monitor');
            this.setState(SessionState.Monitoring);
            while (true) {
                this.dispatcher.dispatch(await this.receive(signal));
            }
        } catch (err) {
            if (signal?.aborted) {
                this.logger.info('monitor aborted');
                return {reason: 'aborted'};
            }
            if (this.closing) {
                this.logger.info('monitor stopped by close');
                return {reason: 'aborted'};
            }
            return this.monitorFailed(err);
        } finally {
            this.dispatcher.removeObserver(observer);
            release?.();
            if (this.state === SessionState.Monitoring) this.setState(SessionState.Synchronized);
        }
    }

    /** Close the connection and drop mirrored state. */
    public close(): void {
        this.closing = true;
        this.transport.close();
        this.cache.clear();
        this.authenticator.clear();
        this.synchronized = false;
        this.setState(SessionState.Disconnected);
    }

    private async helloInternal(): Promise<ServerInfo> {
        if (!this.transport.isConnected()) {
            this.closing = false;
            await this.transport.connect();
        }
        const reply = await this.correlator.invoke('hello', {
            htspversion: HTSP_CLIENT_PROTOCOL_VERSION,
            clientname: this.clientName,
        });
        const info = new ServerInfo(reply);
        this.serverInfo = info;
        this.logger.info(
            {serverName: info.serverName, serverVersion: info.serverVersion, htspversion: info.protocolVersion},
            'connected',
        );
        this.setState(SessionState.Connected);
        return info;
    }

    private async synchronizeInternal(): Promise<void> {
        await this.hello();
        const epg = this.epg;
        this.cache.track('event', epg);
        this.dispatcher.resetSync();

        const [, release] = await this.correlator.invokeAndOccupy('enableAsyncMetadata', {epg: epg ? 1 : 0});
        try {
            while (!this.dispatcher.initialSyncCompleted) {
                this.dispatcher.dispatch(await this.receive());
            }
        } finally {
            release();
        }

        this.synchronized = true;
        this.logger.info({
            tags: this.cache.size('tag'),
            channels: this.cache.size('channel'),
            dvrEntries: this.cache.size('dvrEntry'),
            events: this.cache.size('event'),
        }, 'initial sync completed');
        this.setState(SessionState.Synchronized);
    }

    private receive(signal?: AbortSignal): Promise<HtsMap> {
        const failure = this.correlator.failure;
        if (failure) return Promise.reject(failure);
        return this.transport.receive(signal);
    }

    /** Handshake if needed, then fail before sending when the server is too old. */
    private async requireVersion(version: number, feature: string): Promise<void> {
        await this.hello();
        if (this.protocolVersion < version) {
            throw new ProtocolVersionError(version, this.protocolVersion, feature);
        }
    }

    private checkDvrEntryVersion(request: DvrEntryRequest): void {
        const gate = (present: boolean, version: number, field: string): void => {
            if (present && this.protocolVersion < version) {
                throw new ProtocolVersionError(version, this.protocolVersion, `addDvrEntry.${field}`);
            }
        };

        if (request.eventId === undefined) {
            gate(true, HtspVersion.DvrEntryByChannel, 'channelId');
            gate(request.title !== undefined, HtspVersion.DvrEntryTitle, 'title');
        }
        gate(request.retention !== undefined, HtspVersion.DvrEntryExtended, 'retention');
        gate(request.priority !== undefined, HtspVersion.DvrEntryByChannel, 'priority');
        gate(request.startExtra !== undefined, HtspVersion.DvrEntryByChannel, 'startExtra');
        gate(request.stopExtra !== undefined, HtspVersion.DvrEntryByChannel, 'stopExtra');
    }

    private hasEventMirror(): boolean {
        return this.synchronized && this.cache.isTracked('event');
    }

    private monitorFailed(err: unknown): MonitorResult {
        const error = err instanceof Error ? err : new Error(String(err));
        this.logger.error({err: error}, 'monitor terminated');
        return {reason: 'error', error};
    }

    private setState(next: SessionState): void {
        if (next === this.state) return;
        const previous = this.state;
        this.state = next;
        this.emit('state', next, previous);
    }
}

function checkSuccess(method: string, reply: HtsMap): void {
    if (reply.success === 0) {
        throw new RequestError(method, `Server rejected "${method}"`);
    }
}
