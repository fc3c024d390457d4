import { describe, test, expect } from 'vitest';
import { authenticate, credentialsFromHeaders, type Credentials } from '../auth/authenticate';
import type { AuthSecrets } from '../config';

const SECRETS: AuthSecrets = {
    basicUser: 'operator',
    basicPass: 'test-pass',
    apiKey: 'test-api-key',
    bearerToken: 'test-bearer',
};

const basicHeader = (user: string, pass: string) => `Basic ${Buffer.from(`${user}:${pass}`).toString('base64')}`;

describe('authenticate', () => {
    describe('no credentials', () => {
        test('accepted when the endpoint allows none', () => {
            expect(authenticate({}, ['none'], SECRETS)).toBe(true);
        });

        test('rejected otherwise', () => {
            expect(authenticate({}, ['basic', 'apikey', 'bearer'], SECRETS)).toBe(false);
        });
    });

    describe('api key', () => {
        test('matching key on an apikey endpoint is accepted', () => {
            expect(authenticate({ apiKey: 'test-api-key' }, ['apikey'], SECRETS)).toBe(true);
        });

        test('wrong key is rejected even with a valid bearer token the endpoint does not take', () => {
            const creds: Credentials = { apiKey: 'wrong-key', authorization: 'Bearer test-bearer' };
            expect(authenticate(creds, ['apikey'], SECRETS)).toBe(false);
        });

        test('wrong key is final even when the endpoint also takes bearer', () => {
            const creds: Credentials = { apiKey: 'wrong-key', authorization: 'Bearer test-bearer' };
            expect(authenticate(creds, ['apikey', 'bearer'], SECRETS)).toBe(false);
        });

        test('key is ignored where apikey is not allowed, header schemes still apply', () => {
            const creds: Credentials = { apiKey: 'wrong-key', authorization: basicHeader('operator', 'test-pass') };
            expect(authenticate(creds, ['basic'], SECRETS)).toBe(true);
        });
    });

    describe('basic', () => {
        test('matching pair is accepted', () => {
            expect(authenticate({ authorization: basicHeader('operator', 'test-pass') }, ['basic'], SECRETS)).toBe(true);
        });

        test('wrong password is rejected', () => {
            expect(authenticate({ authorization: basicHeader('operator', 'nope') }, ['basic'], SECRETS)).toBe(false);
        });

        test('payload without a colon is rejected', () => {
            const authorization = `Basic ${Buffer.from('operator').toString('base64')}`;
            expect(authenticate({ authorization }, ['basic'], SECRETS)).toBe(false);
        });

        test('rejected where basic is not allowed', () => {
            expect(authenticate({ authorization: basicHeader('operator', 'test-pass') }, ['apikey', 'bearer'], SECRETS)).toBe(
                false,
            );
        });
    });

    describe('bearer', () => {
        test('literal token match is accepted', () => {
            expect(authenticate({ authorization: 'Bearer test-bearer' }, ['bearer'], SECRETS)).toBe(true);
        });

        test('wrong token is rejected', () => {
            expect(authenticate({ authorization: 'Bearer other' }, ['bearer'], SECRETS)).toBe(false);
        });

        test('rejected where bearer is not allowed', () => {
            expect(authenticate({ authorization: 'Bearer test-bearer' }, ['basic', 'apikey'], SECRETS)).toBe(false);
        });
    });

    test('unknown authorization scheme is rejected', () => {
        expect(authenticate({ authorization: 'Digest abc' }, ['basic', 'bearer'], SECRETS)).toBe(false);
    });
});

describe('credentialsFromHeaders', () => {
    test('reads authorization and x-api-key', () => {
        expect(credentialsFromHeaders({ authorization: 'Bearer t', 'x-api-key': 'k' })).toEqual({
            authorization: 'Bearer t',
            apiKey: 'k',
        });
    });

    test('takes the first of repeated headers and drops empty values', () => {
        expect(credentialsFromHeaders({ 'x-api-key': ['first', 'second'], authorization: '' })).toEqual({
            authorization: undefined,
            apiKey: 'first',
        });
    });
});
