import {describe, expect, it} from 'vitest';

import {Authenticator, computeDigest} from '../src';

describe('computeDigest', () => {
    it('hashes the password followed by the challenge with SHA-1', () => {
        expect(computeDigest('ab', Buffer.from('c')).toString('hex')).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
    });

    it('depends on the challenge', () => {
        const first = computeDigest('test-secret', Buffer.alloc(32, 1));
        const second = computeDigest('test-secret', Buffer.alloc(32, 2));

        expect(first).toHaveLength(20);
        expect(first.equals(second)).toBe(false);
    });
});

describe('Authenticator', () => {
    it('leaves messages untouched without credentials', () => {
        const auth = new Authenticator();
        const message = {method: 'getDiskSpace', seq: 1};

        expect(auth.decorate(message)).toBe(message);
        expect(auth.hasCredentials()).toBe(false);
    });

    it('adds username and digest once credentials are set', () => {
        const auth = new Authenticator();
        const challenge = Buffer.alloc(32, 7);
        auth.setCredentials('tester', 'test-secret', challenge);

        expect(auth.decorate({method: 'authenticate', seq: 1})).toEqual({
            method: 'authenticate',
            seq: 1,
            username: 'tester',
            digest: computeDigest('test-secret', challenge),
        });
    });

    it('sends only the username without a password', () => {
        const auth = new Authenticator();
        auth.setCredentials('guest', undefined, Buffer.alloc(32, 7));

        const decorated = auth.decorate({method: 'authenticate'});

        expect(decorated.username).toBe('guest');
        expect(decorated.digest).toBeUndefined();
    });

    it('treats an empty password as no password', () => {
        const auth = new Authenticator();
        auth.setCredentials('guest', '', Buffer.alloc(32, 7));

        expect(auth.decorate({method: 'authenticate'})).toEqual({method: 'authenticate', username: 'guest', digest: undefined});
    });

    it('forgets credentials on clear', () => {
        const auth = new Authenticator();
        auth.setCredentials('tester', 'test-secret', Buffer.alloc(32, 7));
        auth.clear();

        expect(auth.username).toBeUndefined();
        expect(auth.decorate({method: 'hello'})).toEqual({method: 'hello'});
    });
});
