import type { BaseLogger } from 'pino';
import { config } from '../../config';
import { requireDuration } from './duration';
import { fail, InvalidSecretError, type Failed } from './errors';
import { createSecret, isSecretId } from './secret';
import type { SecretStore, ValidateOptions } from './store';
import { buildSubmitSchema, type SubmitLimits, type SubmitSecretInput } from './types';

export type SubmitResult = { id: string; expiresAt: number } | Failed;

export type AccessResult =
    | { text: string }
    | { challengeRequired: true; prompt: string }
    | Failed;

export interface SecretServiceOptions {
    store: SecretStore;
    logger: BaseLogger;
    limits?: Partial<SubmitLimits>;
    challenge?: Partial<ValidateOptions>;
    now?: () => number;
}

/**
 * Limits from configuration. TTL settings are parsed here so a bad value
 * fails at start-up rather than on the first request.
 */
export function defaultSubmitLimits(): SubmitLimits {
    return {
        textMaxLength: config.limits.textMaxLength,
        promptMaxLength: config.limits.promptMaxLength,
        answerMaxLength: config.limits.answerMaxLength,
        defaultTtlMs: requireDuration('SECRET_DEFAULT_TTL', config.limits.defaultTtl),
        maxTtlMs: requireDuration('SECRET_MAX_TTL', config.limits.maxTtl),
    };
}

/**
 * Builds the link a reader follows to reveal a secret.
 * Without a base URL the link is relative to the serving host.
 */
export function buildRetrieveUrl(baseUrl: string | undefined, id: string): string {
    const base = baseUrl ? baseUrl.replace(/\/$/, '') : '';
    return `${base}/api/v1/secrets/${encodeURIComponent(id)}`;
}

/**
 * Secret lifecycle: the public contract transports call into.
 *
 * Stateless apart from its collaborators. This is the only place where
 * store outcomes and thrown backend errors become the `SecretErrorCode`
 * vocabulary; storage errors are reported, never retried.
 */
export class SecretService {
    private readonly store: SecretStore;
    private readonly log: BaseLogger;
    private readonly limits: SubmitLimits;
    private readonly challenge: ValidateOptions;
    private readonly now: () => number;
    private readonly submitSchema: ReturnType<typeof buildSubmitSchema>;

    constructor(options: SecretServiceOptions) {
        this.store = options.store;
        this.log = options.logger;
        this.limits = { ...defaultSubmitLimits(), ...options.limits };
        this.challenge = {
            caseSensitive: config.challenge.caseSensitive,
            maxAttempts: config.challenge.maxAttempts,
            ...options.challenge,
        };
        this.now = options.now ?? Date.now;
        this.submitSchema = buildSubmitSchema(this.limits);
    }

    /**
     * Validates and stores a new secret.
     *
     * Safe to call again for the same logical request: every call creates an
     * independent secret with a fresh id, so a redelivered queue message
     * yields a harmless duplicate.
     */
    async submit(input: SubmitSecretInput): Promise<SubmitResult> {
        const parsed = this.submitSchema.safeParse(input);
        if (!parsed.success) {
            return fail('VALIDATION_FAILED', parsed.error.flatten());
        }

        const { text, prompt, answer, expireInMs } = parsed.data;
        const ttlMs = Math.min(expireInMs ?? this.limits.defaultTtlMs, this.limits.maxTtlMs);

        try {
            const secret = createSecret({ text, prompt, answer, ttlMs }, this.now());
            const id = await this.store.create(secret);
            this.log.info({ challenged: prompt !== undefined, ttlMs }, '[Secrets] Secret created');
            return { id, expiresAt: secret.expiresAt };
        } catch (error) {
            if (error instanceof InvalidSecretError) {
                return fail('VALIDATION_FAILED', { formErrors: error.issues, fieldErrors: {} });
            }
            this.log.error({ err: error }, '[Secrets] Failed to store secret');
            return fail('STORAGE_FAILURE');
        }
    }

    /**
     * Reveals a secret at most once.
     *
     * - challenged, no answer: returns the prompt and consumes nothing
     * - answer given: reveals on a match, `CHALLENGE_FAILED` otherwise
     * - unknown, expired or already revealed: always plain `NOT_FOUND`
     */
    async access(id: string, answer?: string): Promise<AccessResult> {
        if (!isSecretId(id)) {
            return fail('NOT_FOUND');
        }

        try {
            return answer === undefined
                ? await this.reveal(id)
                : await this.validate(id, answer);
        } catch (error) {
            this.log.error({ err: error }, '[Secrets] Failed to access secret');
            return fail('STORAGE_FAILURE');
        }
    }

    private async reveal(id: string): Promise<AccessResult> {
        const outcome = await this.store.consumeIfValid(id, this.now());
        switch (outcome.kind) {
            case 'revealed':
                this.log.info('[Secrets] Secret revealed');
                return { text: outcome.text };
            case 'challenge':
                return { challengeRequired: true, prompt: outcome.prompt };
            case 'missing':
                return fail('NOT_FOUND');
        }
    }

    private async validate(id: string, answer: string): Promise<AccessResult> {
        const outcome = await this.store.validateAndConsume(id, answer, this.challenge, this.now());
        switch (outcome.kind) {
            case 'revealed':
                this.log.info('[Secrets] Secret revealed after challenge');
                return { text: outcome.text };
            case 'mismatch':
                return fail('CHALLENGE_FAILED');
            case 'missing':
                return fail('NOT_FOUND');
        }
    }
}
