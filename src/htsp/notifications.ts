/**
 * Push notification model: a closed set of verbs decoded into tagged variants.
 * @module htsp/notifications
 */
import type {HtsMap} from '../htsmsg';

export type EntityKind = 'tag' | 'channel' | 'event' | 'dvrEntry' | 'autorecEntry';
export type EntityKey = number | string;
export type CacheOperation = 'add' | 'update' | 'delete';

/** Push verb for one entity kind and cache operation, e.g. `dvrEntryUpdate`. */
export type EntityVerb<K extends EntityKind = EntityKind, O extends CacheOperation = CacheOperation> =
    `${K}${Capitalize<O>}`;

export type SyncVerb = 'initialSyncCompleted';
export type PushVerb = EntityVerb | SyncVerb;

type KindDescriptor = {
    /** Field carrying the server-assigned identifier. */
    idField: string;
    idType: 'number' | 'string';
    /** Fields for which a zero or empty value in an update means "unset". */
    clearable: readonly string[];
};

export const ENTITY_KINDS: {readonly [K in EntityKind]: KindDescriptor} = {
    tag: {idField: 'tagId', idType: 'number', clearable: []},
    channel: {idField: 'channelId', idType: 'number', clearable: ['eventId', 'nextEventId']},
    event: {idField: 'eventId', idType: 'number', clearable: ['dvrId']},
    dvrEntry: {idField: 'id', idType: 'number', clearable: ['eventId', 'error']},
    autorecEntry: {idField: 'id', idType: 'string', clearable: []},
};

export type EntityNotification = {
    [K in EntityKind]: {
        [O in CacheOperation]: {
            type: 'entity';
            verb: EntityVerb<K, O>;
            kind: K;
            operation: O;
            id: EntityKey;
            fields: HtsMap;
        };
    }[CacheOperation];
}[EntityKind];

export type SyncCompletedNotification = {
    type: 'initialSyncCompleted';
    verb: SyncVerb;
};

/** A message whose verb is not in the closed set, or whose identifier is malformed. */
export type UnrecognizedNotification = {
    type: 'unrecognized';
    verb: string | null;
    message: HtsMap;
    reason: 'unknown_verb' | 'missing_verb' | 'invalid_id';
};

export type Notification = EntityNotification | SyncCompletedNotification | UnrecognizedNotification;

export const ENTITY_KIND_NAMES: readonly EntityKind[] = ['tag', 'channel', 'event', 'dvrEntry', 'autorecEntry'];

const OPERATION_SUFFIX: {readonly [O in CacheOperation]: Capitalize<O>} = {
    add: 'Add',
    update: 'Update',
    delete: 'Delete',
};

const ENTITY_VERBS = new Map<string, {kind: EntityKind; operation: CacheOperation}>();
for (const kind of ENTITY_KIND_NAMES) {
    for (const operation of ['add', 'update', 'delete'] as const) {
        ENTITY_VERBS.set(`${kind}${OPERATION_SUFFIX[operation]}`, {kind, operation});
    }
}

/** All verbs the dispatcher recognizes. */
export const PUSH_VERBS: readonly string[] = [...ENTITY_VERBS.keys(), 'initialSyncCompleted'];

/** Read the identifier of `kind` from a message, or `undefined` when absent or of the wrong type. */
export const readEntityId = (kind: EntityKind, fields: HtsMap): EntityKey | undefined => {
    const {idField, idType} = ENTITY_KINDS[kind];
    const value = fields[idField];
    if (idType === 'string') return typeof value === 'string' ? value : undefined;
    if (typeof value === 'number') return value;
    return undefined;
};

/**
 * Decode a pushed message into its notification variant. Never throws:
 * anything outside the closed verb set becomes an `unrecognized` variant.
 */
export const decodeNotification = (message: HtsMap): Notification => {
    const verb = message.method;
    if (typeof verb !== 'string') {
        return {type: 'unrecognized', verb: null, message, reason: 'missing_verb'};
    }
    if (verb === 'initialSyncCompleted') {
        return {type: 'initialSyncCompleted', verb};
    }
    const route = ENTITY_VERBS.get(verb);
    if (!route) {
        return {type: 'unrecognized', verb, message, reason: 'unknown_verb'};
    }
    const id = readEntityId(route.kind, message);
    if (id === undefined) {
        return {type: 'unrecognized', verb, message, reason: 'invalid_id'};
    }
    return toEntityNotification(route.kind, route.operation, id, message);
};

const toEntityNotification = (
    kind: EntityKind,
    operation: CacheOperation,
    id: EntityKey,
    fields: HtsMap,
): EntityNotification => {
    // Spelled out so every variant keeps its literal verb type.
    switch (kind) {
        case 'tag':
            if (operation === 'add') return {type: 'entity', verb: 'tagAdd', kind, operation, id, fields};
            if (operation === 'update') return {type: 'entity', verb: 'tagUpdate', kind, operation, id, fields};
            return {type: 'entity', verb: 'tagDelete', kind, operation, id, fields};
        case 'channel':
            if (operation === 'add') return {type: 'entity', verb: 'channelAdd', kind, operation, id, fields};
            if (operation === 'update') return {type: 'entity', verb: 'channelUpdate', kind, operation, id, fields};
            return {type: 'entity', verb: 'channelDelete', kind, operation, id, fields};
        case 'event':
            if (operation === 'add') return {type: 'entity', verb: 'eventAdd', kind, operation, id, fields};
            if (operation === 'update') return {type: 'entity', verb: 'eventUpdate', kind, operation, id, fields};
            return {type: 'entity', verb: 'eventDelete', kind, operation, id, fields};
        case 'dvrEntry':
            if (operation === 'add') return {type: 'entity', verb: 'dvrEntryAdd', kind, operation, id, fields};
            if (operation === 'update') return {type: 'entity', verb: 'dvrEntryUpdate', kind, operation, id, fields};
            return {type: 'entity', verb: 'dvrEntryDelete', kind, operation, id, fields};
        case 'autorecEntry':
            if (operation === 'add') return {type: 'entity', verb: 'autorecEntryAdd', kind, operation, id, fields};
            if (operation === 'update') {
                return {type: 'entity', verb: 'autorecEntryUpdate', kind, operation, id, fields};
            }
            return {type: 'entity', verb: 'autorecEntryDelete', kind, operation, id, fields};
    }
};
