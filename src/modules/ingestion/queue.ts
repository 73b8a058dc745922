import { and, asc, eq, lte } from 'drizzle-orm';
import { monotonicFactory } from 'ulid';
import type { AppDatabase } from '../../db';
import { ingestionJobs } from '../../db/schema';
import type { IngestionRequest } from './types';

const nextJobId = monotonicFactory();

export interface IngestionJob {
    id: string;
    /** Raw JSON as enqueued; the worker validates it */
    payload: string;
    /** Deliveries so far, this one included */
    attempts: number;
}

export interface DeadLetter {
    id: string;
    attempts: number;
    lastError: string | null;
}

export type ReleaseOutcome = 'retry' | 'dead';

/**
 * At-least-once queue feeding the ingestion worker.
 *
 * A claimed job is leased, invisible to other claimers, until it is
 * acked, released, or its lease runs out; in the last case it is handed
 * out again. Consumers must therefore tolerate duplicates.
 */
export interface IngestionQueue {
    enqueue(request: IngestionRequest, now?: number): Promise<string>;
    claim(limit: number, now?: number): Promise<IngestionJob[]>;
    ack(jobId: string): Promise<void>;
    /** Gives a failed job back for retry, or dead-letters it when out of attempts */
    release(jobId: string, reason: string, now?: number): Promise<ReleaseOutcome>;
    deadLetters(): Promise<DeadLetter[]>;
}

export interface QueueOptions {
    visibilityTimeoutMs: number;
    maxAttempts: number;
    /** First retry delay; doubles per attempt up to `maxRetryDelayMs` */
    retryDelayMs?: number;
    maxRetryDelayMs?: number;
}

/**
 * SQLite-backed ingestion queue, stored beside the secrets.
 *
 * Claims run in a `BEGIN IMMEDIATE` transaction so two workers never
 * lease the same job at once. Job ids are ULIDs, which makes claim order
 * the enqueue order.
 */
export class SqliteIngestionQueue implements IngestionQueue {
    private readonly retryDelayMs: number;
    private readonly maxRetryDelayMs: number;

    constructor(private readonly db: AppDatabase, private readonly options: QueueOptions) {
        this.retryDelayMs = options.retryDelayMs ?? 1_000;
        this.maxRetryDelayMs = options.maxRetryDelayMs ?? 60_000;
    }

    async enqueue(request: IngestionRequest, now: number = Date.now()): Promise<string> {
        const id = nextJobId(now);
        this.db.insert(ingestionJobs).values({
            id,
            payload: JSON.stringify(request),
            visibleAt: now,
            createdAt: now,
        }).run();
        return id;
    }

    async claim(limit: number, now: number = Date.now()): Promise<IngestionJob[]> {
        return this.db.transaction((tx) => {
            const due = tx.select().from(ingestionJobs)
                .where(and(eq(ingestionJobs.state, 'ready'), lte(ingestionJobs.visibleAt, now)))
                .orderBy(asc(ingestionJobs.id))
                .limit(limit)
                .all();

            const claimed: IngestionJob[] = [];
            for (const job of due) {
                // A lease that ran out on the final attempt is not handed out again
                if (job.attempts >= this.options.maxAttempts) {
                    tx.update(ingestionJobs)
                        .set({ state: 'dead', lastError: job.lastError ?? 'Lease expired on final attempt' })
                        .where(eq(ingestionJobs.id, job.id))
                        .run();
                    continue;
                }

                const attempts = job.attempts + 1;
                tx.update(ingestionJobs)
                    .set({ attempts, visibleAt: now + this.options.visibilityTimeoutMs })
                    .where(eq(ingestionJobs.id, job.id))
                    .run();
                claimed.push({ id: job.id, payload: job.payload, attempts });
            }
            return claimed;
        }, { behavior: 'immediate' });
    }

    async ack(jobId: string): Promise<void> {
        this.db.delete(ingestionJobs).where(eq(ingestionJobs.id, jobId)).run();
    }

    async release(jobId: string, reason: string, now: number = Date.now()): Promise<ReleaseOutcome> {
        return this.db.transaction((tx): ReleaseOutcome => {
            const job = tx.select().from(ingestionJobs).where(eq(ingestionJobs.id, jobId)).get();
            if (!job || job.attempts >= this.options.maxAttempts) {
                tx.update(ingestionJobs)
                    .set({ state: 'dead', lastError: reason })
                    .where(eq(ingestionJobs.id, jobId))
                    .run();
                return 'dead';
            }

            const delay = Math.min(this.retryDelayMs * 2 ** (job.attempts - 1), this.maxRetryDelayMs);
            tx.update(ingestionJobs)
                .set({ visibleAt: now + delay, lastError: reason })
                .where(eq(ingestionJobs.id, jobId))
                .run();
            return 'retry';
        }, { behavior: 'immediate' });
    }

    async deadLetters(): Promise<DeadLetter[]> {
        return this.db.select({
            id: ingestionJobs.id,
            attempts: ingestionJobs.attempts,
            lastError: ingestionJobs.lastError,
        }).from(ingestionJobs)
            .where(eq(ingestionJobs.state, 'dead'))
            .orderBy(asc(ingestionJobs.id))
            .all();
    }
}
