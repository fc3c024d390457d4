import { timingSafeEqual } from 'crypto';
import type { AuthScheme } from '@facility-pulse/contracts';
import type { AuthSecrets } from '../config';

/**
 * Credential material pulled from a request, before any scheme is checked.
 */
export interface Credentials {
    authorization?: string;
    apiKey?: string;
}

type HeaderValue = string | string[] | undefined;

function firstHeader(value: HeaderValue): string | undefined {
    const single = Array.isArray(value) ? value[0] : value;
    return single && single.length > 0 ? single : undefined;
}

export function credentialsFromHeaders(headers: Record<string, HeaderValue>): Credentials {
    return {
        authorization: firstHeader(headers['authorization']),
        apiKey: firstHeader(headers['x-api-key']),
    };
}

export function secretsMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

function decodeBasic(payload: string): { user: string; pass: string } | null {
    const decoded = Buffer.from(payload, 'base64').toString('utf8');
    const separator = decoded.indexOf(':');
    if (separator < 0) return null;
    return { user: decoded.slice(0, separator), pass: decoded.slice(separator + 1) };
}

type Decision = 'accept' | 'reject' | 'skip';

interface AuthCheck {
    (credentials: Credentials, allowed: ReadonlySet<AuthScheme>, secrets: AuthSecrets): Decision;
}

const noCredentials: AuthCheck = (c, allowed) => {
    if (c.authorization || c.apiKey) return 'skip';
    return allowed.has('none') ? 'accept' : 'reject';
};

// A present key is final for endpoints that take keys; it never falls through to header schemes.
const apiKey: AuthCheck = (c, allowed, secrets) => {
    if (!c.apiKey || !allowed.has('apikey')) return 'skip';
    return secretsMatch(c.apiKey, secrets.apiKey) ? 'accept' : 'reject';
};

const basic: AuthCheck = (c, allowed, secrets) => {
    if (!c.authorization?.startsWith('Basic ') || !allowed.has('basic')) return 'skip';
    const pair = decodeBasic(c.authorization.slice('Basic '.length).trim());
    if (!pair) return 'skip';
    const userOk = secretsMatch(pair.user, secrets.basicUser);
    const passOk = secretsMatch(pair.pass, secrets.basicPass);
    return userOk && passOk ? 'accept' : 'skip';
};

const bearer: AuthCheck = (c, allowed, secrets) => {
    if (!c.authorization?.startsWith('Bearer ') || !allowed.has('bearer')) return 'skip';
    const token = c.authorization.slice('Bearer '.length).trim();
    return secretsMatch(token, secrets.bearerToken) ? 'accept' : 'skip';
};

const CHECKS: readonly AuthCheck[] = [noCredentials, apiKey, basic, bearer];

/**
 * Runs the checks in order and stops at the first accept or reject.
 * Anything left undecided is rejected.
 */
export function authenticate(
    credentials: Credentials,
    allowed: readonly AuthScheme[],
    secrets: AuthSecrets,
): boolean {
    const allowedSet = new Set(allowed);
    for (const check of CHECKS) {
        const decision = check(credentials, allowedSet, secrets);
        if (decision !== 'skip') return decision === 'accept';
    }
    return false;
}
