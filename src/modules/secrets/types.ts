import { z } from 'zod';

/**
 * Input to `SecretService.submit`.
 * `expireInMs` is the caller's TTL; omitted means the configured default.
 */
export interface SubmitSecretInput {
    text: string;
    prompt?: string;
    answer?: string;
    expireInMs?: number;
}

export interface SubmitLimits {
    textMaxLength: number;
    promptMaxLength: number;
    answerMaxLength: number;
    defaultTtlMs: number;
    maxTtlMs: number;
}

/**
 * Builds the submit validation schema for the given limits.
 * `prompt` and `answer` must be given together or not at all.
 */
export function buildSubmitSchema(limits: SubmitLimits) {
    return z.object({
        text: z.string().min(1).max(limits.textMaxLength),
        prompt: z.string().min(1).max(limits.promptMaxLength).optional(),
        answer: z.string().min(1).max(limits.answerMaxLength).optional(),
        expireInMs: z.number().int().min(0).optional(),
    }).refine((input) => (input.prompt === undefined) === (input.answer === undefined), {
        message: 'prompt and answer must be given together',
        path: ['answer'],
    });
}

/** Accepted TTL notations on the wire: seconds, or a duration string */
export const ExpireInSchema = z.union([z.number().min(0), z.string().min(1).max(32)]);

/**
 * Request body schema for creating a secret over HTTP.
 * Lengths are checked by the service, so every transport gets the same answer.
 */
export const BodySchema = z.object({
    text: z.string(),
    prompt: z.string().optional(),
    answer: z.string().optional(),
    expireIn: ExpireInSchema.optional(),
});

export type CreateSecretBody = z.infer<typeof BodySchema>;

export const AccessQuerySchema = z.object({
    // An empty `?answer=` counts as no answer
    answer: z.string().optional().transform((value) => (value === '' ? undefined : value)),
});

/**
 * Response schema for secret creation.
 */
export const ResponseSchema = z.object({
    id: z.string(),
    expiresAt: z.number(),
    urls: z.object({
        retrieve: z.string(),
    }),
});

export type CreateSecretResponse = z.infer<typeof ResponseSchema>;
