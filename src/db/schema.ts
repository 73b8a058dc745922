import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * One-time secrets.
 *
 * `text`, `prompt` and `answer` are encrypted at the application level
 * (AES-256-GCM, see `encryption.ts`) before they reach this table.
 * A row is deleted the moment it is revealed; there is no consumed flag.
 */
export const secrets = sqliteTable('secrets', {
    /** 128-bit random identifier, the only credential for an unchallenged secret */
    id: text('id').primaryKey(),
    text: text('text').notNull(),
    prompt: text('prompt'),
    answer: text('answer'),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
    expiresAt: integer('expiresAt', { mode: 'number' }).notNull(),
    failedAttempts: integer('failedAttempts').notNull().default(0),
}, (table) => ({
    expiresAtIdx: index('idx_secrets_expiresAt').on(table.expiresAt),
}));

/**
 * Durable ingestion queue for asynchronous producers.
 */
export const ingestionJobs = sqliteTable('ingestion_jobs', {
    /** ULID, so lexical order is enqueue order */
    id: text('id').primaryKey(),
    payload: text('payload').notNull(),
    state: text('state', { enum: ['ready', 'dead'] }).notNull().default('ready'),
    attempts: integer('attempts').notNull().default(0),
    visibleAt: integer('visibleAt', { mode: 'number' }).notNull(),
    lastError: text('lastError'),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
}, (table) => ({
    stateVisibleIdx: index('idx_ingestion_jobs_state_visibleAt').on(table.state, table.visibleAt),
}));

export type SecretRow = typeof secrets.$inferSelect;
export type IngestionJobRow = typeof ingestionJobs.$inferSelect;
