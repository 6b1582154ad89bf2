/**
 * Challenge/response credentials attached to outgoing requests.
 * @module htsp/auth
 */
import {createHash} from 'crypto';

import type {HtsMapInput} from '../htsmsg';

/** SHA-1 over the UTF-8 password followed by the raw server challenge. */
export function computeDigest(password: string, challenge: Buffer): Buffer {
    return createHash('sha1').update(Buffer.from(password, 'utf8')).update(challenge).digest();
}

export type Credentials = {
    username: string;
    /** Absent when the user authenticates without a password or with an empty one. */
    digest?: Buffer;
};

export class Authenticator {
    private credentials: Credentials | null = null;

    /** Keep `username` and, when a non-empty password is given, its digest against `challenge`. */
    public setCredentials(username: string, password: string | undefined, challenge: Buffer): Credentials {
        this.credentials = {
            username,
            digest: password ? computeDigest(password, challenge) : undefined,
        };
        return this.credentials;
    }

    public clear(): void {
        this.credentials = null;
    }

    public get username(): string | undefined {
        return this.credentials?.username;
    }

    public hasCredentials(): boolean {
        return this.credentials !== null;
    }

    /** Returns `message` with `username` and `digest` added once credentials exist. */
    public decorate(message: HtsMapInput): HtsMapInput {
        const credentials = this.credentials;
        if (!credentials) return message;
        return {
            ...message,
            username: credentials.username,
            digest: credentials.digest ? Buffer.from(credentials.digest) : undefined,
        };
    }
}
