import { and, eq, gt, isNotNull, isNull, lte } from 'drizzle-orm';
import type { BaseLogger } from 'pino';
import type { AppDatabase } from '../../db';
import { secrets } from '../../db/schema';
import { DecryptionError, type FieldCipher } from '../../db/encryption';
import { matchesChallenge } from './challenge';
import { assertSecretInvariants, type Secret } from './secret';
import { MISSING, type ConsumeOutcome, type SecretStore, type ValidateOptions, type ValidateOutcome } from './store';

/**
 * Durable secret store on SQLite.
 *
 * The unchallenged reveal is one `DELETE … RETURNING` statement, so it
 * cannot race with another reader, even in another process sharing the
 * file. Answer checks need the decrypted answer in hand and therefore run
 * inside a `BEGIN IMMEDIATE` transaction, which holds the write lock from
 * the first read to the delete.
 */
export class SqliteSecretStore implements SecretStore {
    constructor(
        private readonly db: AppDatabase,
        private readonly cipher: FieldCipher,
        private readonly log: BaseLogger,
    ) {}

    async create(secret: Secret): Promise<string> {
        assertSecretInvariants(secret);

        this.db.insert(secrets).values({
            id: secret.id,
            text: this.cipher.encrypt(secret.text),
            prompt: secret.prompt === null ? null : this.cipher.encrypt(secret.prompt),
            answer: secret.answer === null ? null : this.cipher.encrypt(secret.answer),
            createdAt: secret.createdAt,
            expiresAt: secret.expiresAt,
        }).run();

        return secret.id;
    }

    async consumeIfValid(id: string, now: number = Date.now()): Promise<ConsumeOutcome> {
        const [revealed] = this.db.delete(secrets)
            .where(and(eq(secrets.id, id), isNull(secrets.answer), gt(secrets.expiresAt, now)))
            .returning({ text: secrets.text })
            .all();
        if (revealed) {
            const text = this.open(revealed.text);
            return text === null ? MISSING : { kind: 'revealed', text };
        }

        // Left in place: a challenged secret stays pending until answered
        const challenged = this.db.select({ prompt: secrets.prompt }).from(secrets)
            .where(and(eq(secrets.id, id), isNotNull(secrets.answer), gt(secrets.expiresAt, now)))
            .get();
        if (!challenged || challenged.prompt === null) {
            return MISSING;
        }

        const prompt = this.open(challenged.prompt);
        return prompt === null ? MISSING : { kind: 'challenge', prompt };
    }

    async validateAndConsume(
        id: string,
        answer: string,
        options: ValidateOptions,
        now: number = Date.now(),
    ): Promise<ValidateOutcome> {
        return this.db.transaction((tx): ValidateOutcome => {
            const row = tx.select().from(secrets)
                .where(and(eq(secrets.id, id), gt(secrets.expiresAt, now)))
                .get();
            if (!row) return MISSING;

            const text = this.open(row.text);
            const stored = row.answer === null ? null : this.open(row.answer);
            if (text === null || (row.answer !== null && stored === null)) {
                return MISSING;
            }

            if (stored === null || matchesChallenge(stored, answer, options)) {
                tx.delete(secrets).where(eq(secrets.id, id)).run();
                return { kind: 'revealed', text };
            }

            const failedAttempts = row.failedAttempts + 1;
            if (options.maxAttempts > 0 && failedAttempts >= options.maxAttempts) {
                tx.delete(secrets).where(eq(secrets.id, id)).run();
                this.log.info({ failedAttempts }, '[SecretStore] Secret destroyed after too many wrong answers');
            } else {
                tx.update(secrets)
                    .set({ failedAttempts })
                    .where(eq(secrets.id, id))
                    .run();
            }
            return { kind: 'mismatch' };
        }, { behavior: 'immediate' });
    }

    async sweepExpired(now: number = Date.now()): Promise<number> {
        const result = this.db.delete(secrets).where(lte(secrets.expiresAt, now)).run();
        return result.changes;
    }

    /**
     * Decrypts a column value. A row that cannot be decrypted is never
     * revealed; callers treat it as missing.
     */
    private open(value: string): string | null {
        try {
            return this.cipher.decrypt(value);
        } catch (error) {
            if (error instanceof DecryptionError) {
                // The id is a credential, so only the failure is logged
                this.log.error({ err: error.message }, '[SecretStore] Failed to decrypt secret');
                return null;
            }
            throw error;
        }
    }
}
