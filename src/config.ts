import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const numberFromEnv = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

/**
 * Environment variable schema validation.
 * Durations (`SECRET_DEFAULT_TTL`, `SECRET_MAX_TTL`) accept the same formats as `expireIn`.
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default('0.0.0.0'),
    DB_PATH: z.string().default('./data/secrets.db'),
    DB_ENCRYPTION_KEY: z.string().min(8),
    // Not BASE_URL: bundlers and test runners set that to a path such as '/'
    PUBLIC_BASE_URL: z.string().url().optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    SECRET_TEXT_MAX_LENGTH: z.coerce.number().int().min(1).default(10_000),
    SECRET_DEFAULT_TTL: z.string().default('24h'),
    SECRET_MAX_TTL: z.string().default('30d'),
    CHALLENGE_MAX_ATTEMPTS: numberFromEnv(0),
    CHALLENGE_CASE_INSENSITIVE: z.enum(['true', 'false']).default('false').transform((v) => v === 'true'),
    SWEEP_INTERVAL_MS: numberFromEnv(60_000),
    QUEUE_POLL_INTERVAL_MS: numberFromEnv(1_000),
    QUEUE_VISIBILITY_TIMEOUT_MS: numberFromEnv(30_000),
    QUEUE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    QUEUE_BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(10),
    QUEUE_INLINE_WORKER: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    process.exit(1);
}

const env = parsed.data;

/**
 * Application configuration object.
 * Contains validated environment variables and application limits.
 */
export const config = {
    port: env.PORT,
    host: env.HOST,
    dbPath: env.DB_PATH,
    dbEncryptionKey: env.DB_ENCRYPTION_KEY,
    baseUrl: env.PUBLIC_BASE_URL,
    logLevel: env.LOG_LEVEL,
    limits: {
        bodyBytes: 64 * 1024,
        textMaxLength: env.SECRET_TEXT_MAX_LENGTH,
        promptMaxLength: 500,
        answerMaxLength: 500,
        defaultTtl: env.SECRET_DEFAULT_TTL,
        maxTtl: env.SECRET_MAX_TTL,
    },
    challenge: {
        maxAttempts: env.CHALLENGE_MAX_ATTEMPTS,
        caseSensitive: !env.CHALLENGE_CASE_INSENSITIVE,
    },
    sweepIntervalMs: env.SWEEP_INTERVAL_MS,
    queue: {
        pollIntervalMs: env.QUEUE_POLL_INTERVAL_MS,
        visibilityTimeoutMs: env.QUEUE_VISIBILITY_TIMEOUT_MS,
        maxAttempts: env.QUEUE_MAX_ATTEMPTS,
        batchSize: env.QUEUE_BATCH_SIZE,
        inlineWorker: env.QUEUE_INLINE_WORKER,
    },
};

export type AppConfig = typeof config;
