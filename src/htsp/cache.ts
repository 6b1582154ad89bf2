/**
 * In-memory mirror of server entities.
 * @module htsp/cache
 */
import type {Logger} from 'pino';

import {isHtsMap, type HtsMap, type HtsValue} from '../htsmsg';
import {getDefaultLogger} from '../core/logger';
import {EntityLookupError} from './errors';
import {
    ENTITY_KIND_NAMES,
    ENTITY_KINDS,
    type CacheOperation,
    type EntityKey,
    type EntityKind,
} from './notifications';

/** Frozen field set of one mirrored entity. */
export type EntityRecord = Readonly<HtsMap>;

/** Message fields used for routing, never stored on a record. */
const ROUTING_FIELDS = new Set(['method', 'seq']);

const isUnsetValue = (value: HtsValue): boolean => value === 0 || value === '';

/** Frozen copy of `value`; nested lists and maps are copied and frozen too. */
const freezeValue = (value: HtsValue): HtsValue => {
    if (Array.isArray(value)) {
        const list = value.map(freezeValue);
        Object.freeze(list);
        return list;
    }
    if (isHtsMap(value)) {
        const copy: HtsMap = {};
        for (const [key, item] of Object.entries(value)) copy[key] = freezeValue(item);
        Object.freeze(copy);
        return copy;
    }
    return value;
};

/** Frozen record built from message `fields`, without routing metadata. */
export const toEntityRecord = (fields: HtsMap): EntityRecord => {
    const record: HtsMap = {};
    for (const [key, value] of Object.entries(fields)) {
        if (!ROUTING_FIELDS.has(key)) record[key] = freezeValue(value);
    }
    return Object.freeze(record);
};

/**
 * Merge a partial update into an existing record.
 *
 * Fields missing from `incoming` are kept. Empty strings are not carried
 * values and are ignored. For the kind's clearable fields a zero or empty
 * value removes the field. Everything else, zero and empty lists included,
 * overwrites.
 */
export const mergeEntityFields = (kind: EntityKind, existing: EntityRecord, incoming: HtsMap): EntityRecord => {
    const clearable = ENTITY_KINDS[kind].clearable;
    const next: HtsMap = {...existing};
    for (const [key, value] of Object.entries(incoming)) {
        if (ROUTING_FIELDS.has(key)) continue;
        if (clearable.includes(key) && isUnsetValue(value)) {
            delete next[key];
            continue;
        }
        if (value === '') continue;
        next[key] = freezeValue(value);
    }
    return Object.freeze(next);
};

export type EntityCacheOptions = {
    logger?: Logger;
};

/**
 * Per-kind map from identifier to the latest known record. Records are
 * replaced, never mutated, so previously returned snapshots stay stable.
 */
export class EntityCache {
    private readonly stores = new Map<EntityKind, Map<EntityKey, EntityRecord>>();
    private readonly untracked = new Set<EntityKind>();
    private readonly logger: Logger;

    constructor(options: EntityCacheOptions = {}) {
        this.logger = (options.logger ?? getDefaultLogger()).child({component: 'cache'});
        for (const kind of ENTITY_KIND_NAMES) {
            this.stores.set(kind, new Map());
        }
    }

    /**
     * Enable or disable mirroring of one kind. Disabling drops its records;
     * adds and updates for an untracked kind yield detached records.
     */
    public track(kind: EntityKind, enabled: boolean): void {
        if (enabled) {
            this.untracked.delete(kind);
        } else {
            this.untracked.add(kind);
            this.store(kind).clear();
        }
    }

    public isTracked(kind: EntityKind): boolean {
        return !this.untracked.has(kind);
    }

    /**
     * Apply one notification.
     * Returns the stored record for add/update, the removed one for delete,
     * and `undefined` when a delete found nothing.
     * @throws {EntityLookupError} on an update for an identifier that was never added.
     */
    public apply(kind: EntityKind, operation: CacheOperation, id: EntityKey, fields: HtsMap): EntityRecord | undefined {
        const store = this.store(kind);
        const tracked = this.isTracked(kind);

        if (operation === 'add') {
            const record = toEntityRecord(fields);
            if (tracked) store.set(id, record);
            return record;
        }

        if (operation === 'update') {
            if (!tracked) return toEntityRecord(fields);
            const existing = store.get(id);
            if (!existing) {
                this.logger.warn({kind, id}, 'update for unknown entity');
                throw new EntityLookupError(kind, id, `${kind}Update`);
            }
            const merged = mergeEntityFields(kind, existing, fields);
            store.set(id, merged);
            return merged;
        }

        if (!tracked) {
            this.logger.warn({kind, id}, 'delete received but kind is not mirrored');
            return undefined;
        }
        const removed = store.get(id);
        if (!removed) {
            this.logger.warn({kind, id}, 'delete for unknown entity');
            return undefined;
        }
        store.delete(id);
        return removed;
    }

    public get(kind: EntityKind, id: EntityKey): EntityRecord | undefined {
        return this.store(kind).get(id);
    }

    /** Snapshot of all committed records of one kind, in insertion order. */
    public list(kind: EntityKind): EntityRecord[] {
        return Array.from(this.store(kind).values());
    }

    public size(kind: EntityKind): number {
        return this.store(kind).size;
    }

    public clear(): void {
        for (const store of this.stores.values()) {
            store.clear();
        }
    }

    private store(kind: EntityKind): Map<EntityKey, EntityRecord> {
        let store = this.stores.get(kind);
        if (!store) {
            store = new Map();
            this.stores.set(kind, store);
        }
        return store;
    }
}
