/**
 * Read-only typed views over mirrored entity records and command replies.
 * @module htsp/entities
 */
import type {HtsMap, HtsValue} from '../htsmsg';
import {isHtsMap} from '../htsmsg';
import type {EntityRecord} from './cache';
import {HtspVersion} from './constants';
import {ProtocolVersionError} from './errors';
import type {EntityKey, EntityKind} from './notifications';

/** What a view needs from the session: the negotiated version and cross-entity lookups. */
export interface EntityContext {
    readonly protocolVersion: number;
    lookup(kind: EntityKind, id: EntityKey): EntityRecord | undefined;
}

const toNumber = (value: HtsValue | undefined): number | undefined => {
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    return undefined;
};

const toDate = (seconds: number): Date => new Date(seconds * 1000);

abstract class HtspView {
    protected abstract readonly label: string;

    constructor(
        protected readonly context: Pick<EntityContext, 'protocolVersion'>,
        /** Raw field set backing this view. */
        public readonly fields: Readonly<HtsMap>,
    ) {}

    protected requireVersion(version: number, field: string): void {
        if (this.context.protocolVersion < version) {
            throw new ProtocolVersionError(version, this.context.protocolVersion, `${this.label}.${field}`);
        }
    }

    protected optionalNumber(field: string): number | undefined {
        return toNumber(this.fields[field]);
    }

    protected requiredNumber(field: string): number {
        const value = this.optionalNumber(field);
        if (value === undefined) {
            throw new RangeError(`${this.label} is missing numeric field "${field}"`);
        }
        return value;
    }

    protected optionalString(field: string): string | undefined {
        const value = this.fields[field];
        return typeof value === 'string' ? value : undefined;
    }

    protected requiredString(field: string): string {
        const value = this.optionalString(field);
        if (value === undefined) {
            throw new RangeError(`${this.label} is missing string field "${field}"`);
        }
        return value;
    }

    protected numberList(field: string): number[] {
        const value = this.fields[field];
        if (!Array.isArray(value)) return [];
        const result: number[] = [];
        for (const item of value) {
            const n = toNumber(item);
            if (n !== undefined) result.push(n);
        }
        return result;
    }

    protected stringList(field: string): string[] {
        const value = this.fields[field];
        if (!Array.isArray(value)) return [];
        return value.filter((item): item is string => typeof item === 'string');
    }
}

abstract class EntityView extends HtspView {
    constructor(protected readonly entities: EntityContext, fields: EntityRecord) {
        super(entities, fields);
    }

    protected resolve<T>(kind: EntityKind, id: EntityKey | undefined, build: (record: EntityRecord) => T): T | undefined {
        if (id === undefined) return undefined;
        const record = this.entities.lookup(kind, id);
        return record ? build(record) : undefined;
    }
}

/** Reply to `hello`: server identity, negotiated version and auth challenge. */
export class ServerInfo extends HtspView {
    protected readonly label = 'ServerInfo';

    constructor(fields: Readonly<HtsMap>) {
        super({protocolVersion: toNumber(fields.htspversion) ?? 0}, fields);
    }

    /** Highest protocol version the server supports. */
    get protocolVersion(): number {
        return this.requiredNumber('htspversion');
    }

    get serverName(): string {
        return this.requiredString('servername');
    }

    get serverVersion(): string {
        return this.requiredString('serverversion');
    }

    get capabilities(): string[] {
        this.requireVersion(HtspVersion.ServerCapabilities, 'capabilities');
        return this.stringList('servercapability');
    }

    /** 32 random bytes used to compute the authentication digest. */
    get challenge(): Buffer {
        const value = this.fields.challenge;
        return Buffer.isBuffer(value) ? Buffer.from(value) : Buffer.alloc(0);
    }

    /** Prefix for any URL path on the server's web interface. */
    get webroot(): string | undefined {
        this.requireVersion(HtspVersion.Webroot, 'webroot');
        return this.optionalString('webroot');
    }
}

export class DiskSpace extends HtspView {
    protected readonly label = 'DiskSpace';

    get free(): number {
        return this.requiredNumber('freediskspace');
    }

    get total(): number {
        return this.requiredNumber('totaldiskspace');
    }

    get used(): number {
        return this.total - this.free;
    }
}

export class SystemTime extends HtspView {
    protected readonly label = 'SystemTime';

    /** Server clock as UNIX seconds. */
    get time(): number {
        return this.requiredNumber('time');
    }

    /** Minutes west of GMT. */
    get timezone(): number {
        return this.requiredNumber('timezone');
    }

    get date(): Date {
        return toDate(this.time);
    }
}

/**
 * One service of a channel. The server only exposes a display name, so
 * `network`, `mux` and `resource` are guessed from `network/mux/service`
 * names and are `undefined` when the name does not follow that shape.
 */
export class Service extends HtspView {
    protected readonly label = 'Service';

    get name(): string {
        return this.optionalString('name') ?? '';
    }

    /** e.g. `SDTV`. */
    get type(): string | undefined {
        return this.optionalString('type');
    }

    get network(): string | undefined {
        return this.nameParts()?.[0];
    }

    get mux(): string | undefined {
        return this.nameParts()?.[1];
    }

    get resource(): string | undefined {
        const parts = this.nameParts();
        return parts ? `${parts[0]}/${parts[1]}` : undefined;
    }

    private nameParts(): [string, string] | undefined {
        const [network, mux] = this.name.split('/');
        if (!network || mux === undefined) return undefined;
        return [network, mux];
    }
}

export class Tag extends EntityView {
    protected readonly label = 'Tag';

    get id(): number {
        return this.requiredNumber('tagId');
    }

    get name(): string {
        return this.requiredString('tagName');
    }

    get icon(): string | undefined {
        return this.optionalString('tagIcon');
    }

    /** Member channel identifiers in server order. */
    get memberIds(): number[] {
        return this.numberList('members');
    }

    /** Member channels currently mirrored. */
    get channels(): Channel[] {
        const result: Channel[] = [];
        for (const id of this.memberIds) {
            const channel = this.resolve('channel', id, (record) => new Channel(this.entities, record));
            if (channel) result.push(channel);
        }
        return result;
    }
}

export class Channel extends EntityView {
    protected readonly label = 'Channel';

    get id(): number {
        return this.requiredNumber('channelId');
    }

    /** Major channel number; 0 means unconfigured. */
    get number(): number {
        return this.requiredNumber('channelNumber');
    }

    get minorNumber(): number {
        this.requireVersion(HtspVersion.MinorChannelNumber, 'minorNumber');
        return this.optionalNumber('channelNumberMinor') ?? 0;
    }

    get name(): string {
        return this.requiredString('channelName');
    }

    get icon(): string | undefined {
        return this.optionalString('channelIcon');
    }

    get tagIds(): number[] {
        return this.numberList('tags');
    }

    /** Tags this channel is mapped to; identifiers not mirrored are skipped. */
    get tags(): Tag[] {
        const result: Tag[] = [];
        for (const id of this.tagIds) {
            const tag = this.resolve('tag', id, (record) => new Tag(this.entities, record));
            if (tag) result.push(tag);
        }
        return result;
    }

    get currentEventId(): number | undefined {
        return this.optionalNumber('eventId');
    }

    get nextEventId(): number | undefined {
        return this.optionalNumber('nextEventId');
    }

    /** Event on air now, when EPG data is mirrored. */
    get currentEvent(): EpgEvent | undefined {
        return this.resolve('event', this.currentEventId, (record) => new EpgEvent(this.entities, record));
    }

    get nextEvent(): EpgEvent | undefined {
        return this.resolve('event', this.nextEventId, (record) => new EpgEvent(this.entities, record));
    }

    get services(): Service[] {
        this.requireVersion(HtspVersion.Services, 'services');
        const value = this.fields.services;
        if (!Array.isArray(value)) return [];
        return value.filter(isHtsMap).map((service) => new Service(this.entities, service));
    }
}

export class EpgEvent extends EntityView {
    protected readonly label = 'EpgEvent';

    get id(): number {
        return this.requiredNumber('eventId');
    }

    get channelId(): number {
        return this.requiredNumber('channelId');
    }

    get channel(): Channel | undefined {
        return this.resolve('channel', this.channelId, (record) => new Channel(this.entities, record));
    }

    get start(): Date {
        return toDate(this.requiredNumber('start'));
    }

    get stop(): Date {
        return toDate(this.requiredNumber('stop'));
    }

    get durationMs(): number {
        return this.stop.getTime() - this.start.getTime();
    }

    get title(): string | undefined {
        return this.optionalString('title');
    }

    get summary(): string | undefined {
        this.requireVersion(HtspVersion.Summary, 'summary');
        return this.optionalString('summary');
    }

    get description(): string | undefined {
        return this.optionalString('description');
    }

    get seriesLinkId(): number | undefined {
        this.requireVersion(HtspVersion.SeriesLinkage, 'seriesLinkId');
        return this.optionalNumber('serieslinkId');
    }

    get episodeId(): number | undefined {
        this.requireVersion(HtspVersion.SeriesLinkage, 'episodeId');
        return this.optionalNumber('episodeId');
    }

    get seasonId(): number | undefined {
        this.requireVersion(HtspVersion.SeriesLinkage, 'seasonId');
        return this.optionalNumber('seasonId');
    }

    get brandId(): number | undefined {
        this.requireVersion(HtspVersion.SeriesLinkage, 'brandId');
        return this.optionalNumber('brandId');
    }

    /** Recording associated with this event. */
    get dvrId(): number | undefined {
        return this.optionalNumber('dvrId');
    }

    get nextEventId(): number | undefined {
        return this.optionalNumber('nextEventId');
    }

    // Undocumented but sent by current servers.
    get episodeUri(): string | undefined {
        return this.optionalString('episodeUri');
    }

    get seriesLinkUri(): string | undefined {
        return this.optionalString('serieslinkUri');
    }
}

export type RecordingStatus = 'scheduled' | 'recording' | 'completed' | 'missed' | 'error';

export class DvrEntry extends EntityView {
    protected readonly label = 'DvrEntry';

    get id(): number {
        return this.requiredNumber('id');
    }

    get channelId(): number {
        return this.requiredNumber('channel');
    }

    get channel(): Channel | undefined {
        return this.resolve('channel', this.channelId, (record) => new Channel(this.entities, record));
    }

    get start(): Date {
        return toDate(this.requiredNumber('start'));
    }

    get stop(): Date {
        return toDate(this.requiredNumber('stop'));
    }

    get durationMs(): number {
        return this.stop.getTime() - this.start.getTime();
    }

    /** Pre-recording padding in minutes. */
    get startExtra(): number {
        this.requireVersion(HtspVersion.DvrEntryExtended, 'startExtra');
        return this.optionalNumber('startExtra') ?? 0;
    }

    /** Post-recording padding in minutes. */
    get stopExtra(): number {
        this.requireVersion(HtspVersion.DvrEntryExtended, 'stopExtra');
        return this.optionalNumber('stopExtra') ?? 0;
    }

    /** Retention in days. */
    get retention(): number {
        return this.optionalNumber('retention') ?? 0;
    }

    /** 0 = important ... 4 = unimportant, 5 = not set. */
    get priority(): number | undefined {
        this.requireVersion(HtspVersion.DvrEntryExtended, 'priority');
        return this.optionalNumber('priority');
    }

    get eventId(): number | undefined {
        this.requireVersion(HtspVersion.DvrEntryExtended, 'eventId');
        return this.optionalNumber('eventId');
    }

    /** Linked EPG event, when EPG data is mirrored. */
    get event(): EpgEvent | undefined {
        return this.resolve('event', this.eventId, (record) => new EpgEvent(this.entities, record));
    }

    /** Own title, falling back to the linked event's title. */
    get title(): string | undefined {
        return this.optionalString('title') ?? this.linkedEvent()?.title;
    }

    get summary(): string | undefined {
        this.requireVersion(HtspVersion.Summary, 'summary');
        return this.optionalString('summary') ?? this.linkedEvent()?.summary;
    }

    get description(): string | undefined {
        return this.optionalString('description') ?? this.linkedEvent()?.description;
    }

    /** State string exactly as sent by the server. */
    get state(): string | undefined {
        return this.optionalString('state');
    }

    get status(): RecordingStatus {
        const state = this.state;
        switch (state) {
            case 'scheduled':
            case 'recording':
            case 'completed':
            case 'missed':
                return state;
            default:
                return 'error';
        }
    }

    /** Plain-text diagnostics, e.g. `Aborted by user`. */
    get error(): string | undefined {
        return this.optionalString('error');
    }

    private linkedEvent(): EpgEvent | undefined {
        if (this.entities.protocolVersion < HtspVersion.DvrEntryExtended) return undefined;
        return this.event;
    }
}

export class AutorecEntry extends EntityView {
    protected readonly label = 'AutorecEntry';

    get id(): string {
        return this.requiredString('id');
    }

    get enabled(): boolean {
        return (this.optionalNumber('enabled') ?? 0) !== 0;
    }

    get title(): string | undefined {
        return this.optionalString('title');
    }

    get channelId(): number | undefined {
        return this.optionalNumber('channel');
    }

    get channel(): Channel | undefined {
        return this.resolve('channel', this.channelId, (record) => new Channel(this.entities, record));
    }

    get priority(): number {
        return this.optionalNumber('priority') ?? 0;
    }

    get retention(): number {
        return this.optionalNumber('retention') ?? 0;
    }
}

export type Entity = Tag | Channel | EpgEvent | DvrEntry | AutorecEntry;

/** Wrap a record in the view class of its kind. */
export const createEntityView = (kind: EntityKind, context: EntityContext, record: EntityRecord): Entity => {
    switch (kind) {
        case 'tag':
            return new Tag(context, record);
        case 'channel':
            return new Channel(context, record);
        case 'event':
            return new EpgEvent(context, record);
        case 'dvrEntry':
            return new DvrEntry(context, record);
        case 'autorecEntry':
            return new AutorecEntry(context, record);
    }
};
