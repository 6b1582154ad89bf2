/**
 * Routes pushed messages into the entity cache and fans them out to observers.
 * @module htsp/dispatcher
 */
import type {Logger} from 'pino';

import type {HtsMap} from '../htsmsg';
import {getDefaultLogger} from '../core/logger';
import type {EntityCache} from './cache';
import {createEntityView, type Entity, type EntityContext} from './entities';
import {decodeNotification, type Notification, type PushVerb} from './notifications';

/**
 * Callback receiving every applied notification.
 * `entity` is the resulting entity for add/update, the removed one for delete,
 * and `undefined` for sync markers or deletes of unknown identifiers.
 */
export type NotificationObserver = (verb: PushVerb, entity: Entity | undefined, notification: Notification) => void;

export type ObserverErrorPolicy = 'isolate' | 'propagate';

export type DispatchResult = {
    notification: Notification;
    entity: Entity | undefined;
};

export type NotificationDispatcherOptions = {
    /**
     * `'isolate'` (default) logs a throwing observer and keeps notifying the
     * others; `'propagate'` rethrows from {@link NotificationDispatcher.dispatch}.
     */
    observerErrors?: ObserverErrorPolicy;
    logger?: Logger;
};

export class NotificationDispatcher {
    private observers: NotificationObserver[] = [];
    private syncCompleted = false;
    private readonly observerErrors: ObserverErrorPolicy;
    private readonly logger: Logger;

    constructor(
        private readonly cache: EntityCache,
        private readonly context: EntityContext,
        options: NotificationDispatcherOptions = {},
    ) {
        this.observerErrors = options.observerErrors ?? 'isolate';
        this.logger = (options.logger ?? getDefaultLogger()).child({component: 'dispatcher'});
    }

    /** `true` once an `initialSyncCompleted` marker has been dispatched. */
    public get initialSyncCompleted(): boolean {
        return this.syncCompleted;
    }

    public resetSync(): void {
        this.syncCompleted = false;
    }

    public addObserver(observer: NotificationObserver): void {
        this.observers.push(observer);
    }

    /** Removes the first registration of `observer`. Safe to call from inside a callback. */
    public removeObserver(observer: NotificationObserver): boolean {
        const index = this.observers.indexOf(observer);
        if (index < 0) return false;
        this.observers = [...this.observers.slice(0, index), ...this.observers.slice(index + 1)];
        return true;
    }

    public get observerCount(): number {
        return this.observers.length;
    }

    /**
     * Apply one pushed message to the cache, then notify observers in
     * registration order. Unrecognized verbs are logged and dropped.
     */
    public dispatch(message: HtsMap): DispatchResult {
        const notification = decodeNotification(message);

        if (notification.type === 'unrecognized') {
            this.logger.debug({verb: notification.verb, reason: notification.reason}, 'ignoring push message');
            return {notification, entity: undefined};
        }

        let entity: Entity | undefined;
        if (notification.type === 'initialSyncCompleted') {
            this.syncCompleted = true;
        } else {
            const record = this.cache.apply(notification.kind, notification.operation, notification.id, notification.fields);
            entity = record ? createEntityView(notification.kind, this.context, record) : undefined;
        }

        this.notify(notification, entity);
        return {notification, entity};
    }

    private notify(notification: EntityOrSync, entity: Entity | undefined): void {
        const snapshot = this.observers;
        for (const observer of snapshot) {
            // Skip observers removed by an earlier callback of this same dispatch.
            if (!this.observers.includes(observer)) continue;
            try {
                observer(notification.verb, entity, notification);
            } catch (err) {
                if (this.observerErrors === 'propagate') throw err;
                this.logger.warn({err, verb: notification.verb}, 'notification observer failed');
            }
        }
    }
}

type EntityOrSync = Exclude<Notification, {type: 'unrecognized'}>;
