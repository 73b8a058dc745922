import { randomBytes } from 'node:crypto';
import { InvalidSecretError } from './errors';

/**
 * One shareable secret and its access policy.
 * Immutable once built; the stores own the consumed transition.
 */
export interface Secret {
    readonly id: string;
    readonly text: string;
    readonly prompt: string | null;
    readonly answer: string | null;
    readonly createdAt: number;
    readonly expiresAt: number;
}

export interface NewSecret {
    text: string;
    prompt?: string;
    answer?: string;
    /** Time to live, already resolved and clamped */
    ttlMs: number;
}

/** 128 random bits, base64url encoded */
const ID_BYTES = 16;
const ID_PATTERN = /^[A-Za-z0-9_-]{22}$/;

export function generateSecretId(): string {
    return randomBytes(ID_BYTES).toString('base64url');
}

/** Cheap shape check so obviously bogus ids never reach the store */
export function isSecretId(value: string): boolean {
    return ID_PATTERN.test(value);
}

export function isExpired(expiresAt: number, now: number): boolean {
    return expiresAt <= now;
}

/**
 * @throws {InvalidSecretError} listing every broken invariant
 */
export function assertSecretInvariants(secret: Secret): void {
    const issues: string[] = [];
    if (!isSecretId(secret.id)) issues.push('id is malformed');
    if (secret.text.length === 0) issues.push('text must not be empty');
    if ((secret.prompt === null) !== (secret.answer === null)) {
        issues.push('prompt and answer must be given together');
    }
    if (secret.expiresAt < secret.createdAt) issues.push('expiresAt precedes createdAt');
    if (issues.length > 0) {
        throw new InvalidSecretError(issues);
    }
}

export function createSecret(input: NewSecret, now: number = Date.now()): Secret {
    const secret: Secret = Object.freeze({
        id: generateSecretId(),
        text: input.text,
        prompt: input.prompt ?? null,
        answer: input.answer ?? null,
        createdAt: now,
        expiresAt: now + input.ttlMs,
    });
    assertSecretInvariants(secret);
    return secret;
}
