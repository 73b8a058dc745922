import type { ChallengeOptions } from './challenge';
import type { Secret } from './secret';

export type ConsumeOutcome =
    | { kind: 'revealed'; text: string }
    | { kind: 'challenge'; prompt: string }
    | { kind: 'missing' };

export type ValidateOutcome =
    | { kind: 'revealed'; text: string }
    | { kind: 'mismatch' }
    | { kind: 'missing' };

export interface ValidateOptions extends ChallengeOptions {
    /** Wrong answers after which the secret is destroyed; 0 disables the limit */
    maxAttempts: number;
}

/**
 * Capabilities every secret backend provides.
 *
 * Implementations own their concurrency control: each consuming call must
 * check and delete in one indivisible step, so that of any number of
 * concurrent readers at most one is ever handed the text. Expired entries
 * answer `missing` whether or not `sweepExpired` has removed them yet.
 *
 * Backend failures are thrown as-is; translating them is the service's job.
 */
export interface SecretStore {
    /**
     * Persists a new secret.
     * @throws {InvalidSecretError} when the secret breaks a model invariant
     */
    create(secret: Secret): Promise<string>;

    /**
     * Reveals and deletes an unchallenged secret. A challenged one only
     * yields its prompt and stays pending; nothing is consumed.
     */
    consumeIfValid(id: string, now?: number): Promise<ConsumeOutcome>;

    /**
     * Checks `answer` and, on a match, reveals and deletes the secret.
     * An unchallenged secret is revealed regardless of the answer.
     */
    validateAndConsume(id: string, answer: string, options: ValidateOptions, now?: number): Promise<ValidateOutcome>;

    /** Physically removes expired secrets, returning how many went */
    sweepExpired(now?: number): Promise<number>;
}

export const MISSING = { kind: 'missing' } as const;
