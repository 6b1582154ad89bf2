import {describe, expect, it} from 'vitest';

import {
    Authenticator,
    BusyError,
    createLogger,
    EntityCache,
    EntityLookupError,
    NotificationDispatcher,
    OutOfSequenceError,
    RequestCorrelator,
    RequestError,
    TransportError,
    type EntityContext,
    type RequestCorrelatorOptions,
} from '../src';
import {FakeTransport, replyTo} from './fake-transport';

const logger = createLogger({level: 'silent'});

const setup = (options: RequestCorrelatorOptions = {}) => {
    const transport = new FakeTransport();
    const cache = new EntityCache({logger});
    const context: EntityContext = {protocolVersion: 17, lookup: (kind, id) => cache.get(kind, id)};
    const dispatcher = new NotificationDispatcher(cache, context, {logger});
    const authenticator = new Authenticator();
    const correlator = new RequestCorrelator(transport, authenticator, dispatcher, {logger, ...options});
    return {transport, cache, dispatcher, authenticator, correlator};
};

describe('RequestCorrelator', () => {
    it('tags requests with a sequence that grows by one per exchange', async () => {
        const {transport, correlator} = setup();
        let pushes = 0;
        transport.handle('getSysTime', (request) => {
            pushes++;
            const interleaved = Array.from({length: pushes}, (_, i) => ({
                method: 'tagAdd',
                tagId: pushes * 10 + i,
                tagName: 'Tag',
            }));
            return [...interleaved, replyTo(request, {time: 1_700_000_000, timezone: 0})];
        });

        await correlator.invoke('getSysTime');
        await correlator.invoke('getSysTime');
        await correlator.invoke('getSysTime');

        expect(transport.sent.map((request) => request.seq)).toEqual([0, 1, 2]);
        expect(correlator.nextSequence).toBe(3);
    });

    it('starts from the configured initial sequence', async () => {
        const {transport, correlator} = setup({initialSequence: 40});
        transport.handle('getDiskSpace', (request) => [replyTo(request)]);

        await correlator.invoke('getDiskSpace');

        expect(transport.sent[0]?.seq).toBe(40);
        expect(correlator.nextSequence).toBe(41);
    });

    it('applies held pushes in arrival order before returning the reply', async () => {
        const {transport, cache, dispatcher, correlator} = setup();
        const order: string[] = [];
        dispatcher.addObserver((verb) => order.push(verb));
        transport.handle('addDvrEntry', (request) => [
            {method: 'channelAdd', channelId: 10, channelNumber: 101, channelName: 'BBC'},
            {method: 'dvrEntryAdd', id: 77, channel: 10, state: 'scheduled'},
            replyTo(request, {success: 1, id: 77}),
        ]);

        const reply = await correlator.invoke('addDvrEntry', {channelId: 10});
        order.push('reply');

        expect(order).toEqual(['channelAdd', 'dvrEntryAdd', 'reply']);
        expect(reply).toEqual({success: 1, id: 77, seq: 0});
        expect(cache.get('dvrEntry', 77)).toEqual({id: 77, channel: 10, state: 'scheduled'});
    });

    it('applies every held push when one of them fails, then raises the first failure', async () => {
        const {transport, cache, correlator} = setup();
        transport.handle('cancelDvrEntry', (request) => [
            {method: 'dvrEntryUpdate', id: 5, state: 'recording'},
            {method: 'tagAdd', tagId: 2, tagName: 'Films'},
            replyTo(request, {success: 1}),
        ]);

        await expect(correlator.invoke('cancelDvrEntry', {id: 5})).rejects.toBeInstanceOf(EntityLookupError);

        expect(cache.get('tag', 2)).toEqual({tagId: 2, tagName: 'Films'});
        expect(correlator.nextSequence).toBe(1);
        expect(correlator.pendingLabel).toBeNull();
    });

    it('rejects a second request with Busy and keeps the counter intact', async () => {
        const {transport, correlator} = setup();

        const first = correlator.invoke('getDiskSpace');
        await expect(correlator.invoke('getSysTime')).rejects.toBeInstanceOf(BusyError);
        expect(transport.methods()).toEqual(['getDiskSpace']);

        transport.push({seq: 0, freediskspace: 1, totaldiskspace: 2});
        await first;
        transport.handle('getSysTime', (request) => [replyTo(request)]);
        await correlator.invoke('getSysTime');

        expect(transport.sent.map((request) => request.seq)).toEqual([0, 1]);
    });

    it('fails out of sequence replies and refuses every later call', async () => {
        const {transport, correlator} = setup();
        transport.handle('getDiskSpace', () => [{seq: 5}]);

        const error = await correlator.invoke('getDiskSpace').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(OutOfSequenceError);
        expect(error).toMatchObject({expected: 0, received: 5, code: 'OUT_OF_SEQUENCE'});
        expect(transport.isConnected()).toBe(false);
        await expect(correlator.invoke('getSysTime')).rejects.toBe(error);
        expect(transport.methods()).toEqual(['getDiskSpace']);
    });

    it('raises server errors after draining held pushes', async () => {
        const {transport, cache, correlator} = setup();
        transport.handle('getEvent', (request) => [
            {method: 'tagAdd', tagId: 1, tagName: 'News'},
            replyTo(request, {error: 'Event does not exist'}),
        ]);

        const error = await correlator.invoke('getEvent', {eventId: 9}).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RequestError);
        expect(error).toMatchObject({message: 'Event does not exist', code: 'REQUEST_FAILED', method: 'getEvent'});
        expect(cache.size('tag')).toBe(1);
        expect(correlator.nextSequence).toBe(1);
    });

    it('maps noaccess replies to ACCESS_DENIED', async () => {
        const {transport, correlator} = setup();
        transport.handle('authenticate', (request) => [replyTo(request, {noaccess: 1})]);

        await expect(correlator.invoke('authenticate')).rejects.toMatchObject({code: 'ACCESS_DENIED'});
    });

    it('times out a silent server and closes the transport', async () => {
        const {transport, correlator} = setup({requestTimeoutMs: 10});

        const error = await correlator.invoke('getDiskSpace').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({code: 'RESPONSE_TIMEOUT'});
        expect(transport.isConnected()).toBe(false);
        expect(correlator.failure).toBe(error);
    });

    it('keeps the slot after invokeAndOccupy until released', async () => {
        const {transport, correlator} = setup();
        transport.handle('enableAsyncMetadata', (request) => [replyTo(request)]);
        transport.handle('getDiskSpace', (request) => [replyTo(request)]);

        const [, release] = await correlator.invokeAndOccupy('enableAsyncMetadata');
        await expect(correlator.invoke('getDiskSpace')).rejects.toBeInstanceOf(BusyError);
        expect(correlator.pendingLabel).toBe('enableAsyncMetadata');

        release();
        release();
        await correlator.invoke('getDiskSpace');
        expect(transport.methods()).toEqual(['enableAsyncMetadata', 'getDiskSpace']);
    });

    it('blocks requests while a loop occupies the slot', async () => {
        const {correlator} = setup();
        const release = correlator.occupy('monitor');

        await expect(correlator.invoke('getDiskSpace')).rejects.toMatchObject({
            code: 'BUSY',
            details: {method: 'getDiskSpace', pending: 'monitor'},
        });
        release();
        expect(correlator.pendingLabel).toBeNull();
    });

    it('attaches credentials to requests once set', async () => {
        const {transport, authenticator, correlator} = setup();
        transport.handle('getDiskSpace', (request) => [replyTo(request)]);
        authenticator.setCredentials('tester', 'test-secret', Buffer.alloc(32, 7));

        await correlator.invoke('getDiskSpace');

        expect(transport.sent[0]).toMatchObject({method: 'getDiskSpace', username: 'tester'});
        expect(Buffer.isBuffer(transport.sent[0]?.digest)).toBe(true);
    });
});
