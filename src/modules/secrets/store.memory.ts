import { matchesChallenge } from './challenge';
import { assertSecretInvariants, isExpired, type Secret } from './secret';
import { MISSING, type ConsumeOutcome, type SecretStore, type ValidateOptions, type ValidateOutcome } from './store';

interface StoredSecret {
    secret: Secret;
    failedAttempts: number;
}

/**
 * In-process secret store.
 *
 * Every method does its check and its delete synchronously, with no await
 * in between, so the event loop cannot interleave two consumers of the
 * same id. Nothing here is durable; a restart loses every secret.
 */
export class MemorySecretStore implements SecretStore {
    private readonly secrets = new Map<string, StoredSecret>();

    async create(secret: Secret): Promise<string> {
        assertSecretInvariants(secret);
        this.secrets.set(secret.id, { secret: { ...secret }, failedAttempts: 0 });
        return secret.id;
    }

    async consumeIfValid(id: string, now: number = Date.now()): Promise<ConsumeOutcome> {
        const entry = this.live(id, now);
        if (!entry) return MISSING;

        if (entry.secret.prompt !== null) {
            return { kind: 'challenge', prompt: entry.secret.prompt };
        }

        this.secrets.delete(id);
        return { kind: 'revealed', text: entry.secret.text };
    }

    async validateAndConsume(
        id: string,
        answer: string,
        options: ValidateOptions,
        now: number = Date.now(),
    ): Promise<ValidateOutcome> {
        const entry = this.live(id, now);
        if (!entry) return MISSING;

        const stored = entry.secret.answer;
        if (stored === null || matchesChallenge(stored, answer, options)) {
            this.secrets.delete(id);
            return { kind: 'revealed', text: entry.secret.text };
        }

        entry.failedAttempts += 1;
        if (options.maxAttempts > 0 && entry.failedAttempts >= options.maxAttempts) {
            this.secrets.delete(id);
        }
        return { kind: 'mismatch' };
    }

    async sweepExpired(now: number = Date.now()): Promise<number> {
        let removed = 0;
        for (const [id, entry] of this.secrets) {
            if (isExpired(entry.secret.expiresAt, now)) {
                this.secrets.delete(id);
                removed++;
            }
        }
        return removed;
    }

    /** Number of secrets held, expired ones included until swept */
    get size(): number {
        return this.secrets.size;
    }

    private live(id: string, now: number): StoredSecret | null {
        const entry = this.secrets.get(id);
        if (!entry || isExpired(entry.secret.expiresAt, now)) {
            return null;
        }
        return entry;
    }
}
