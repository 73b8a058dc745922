import type { BaseLogger } from 'pino';
import { z } from 'zod';
import { parseDuration } from '../secrets/duration';
import { isFailed } from '../secrets/errors';
import { buildRetrieveUrl, type SecretService } from '../secrets/service';
import type { ReplyNotifier } from './notifier';
import type { IngestionJob, IngestionQueue } from './queue';
import { IngestionRequestSchema, type ReplyTarget } from './types';

export interface IngestionWorkerOptions {
    queue: IngestionQueue;
    service: SecretService;
    logger: BaseLogger;
    notifier?: ReplyNotifier;
    /** Used for links when the request carries no base URL of its own */
    baseUrl?: string;
    pollIntervalMs: number;
    batchSize: number;
}

export type JobResult = 'created' | 'rejected' | 'retry' | 'dead';

export const REJECTED_MESSAGE = 'Your secret could not be created.';
export const UNAVAILABLE_MESSAGE = 'Your secret could not be created because storage is unavailable. Please try again later.';

const issuesSchema = z.object({
    formErrors: z.array(z.string()),
    fieldErrors: z.record(z.array(z.string()).optional()),
});

/** Flattens validation details into one sentence for the producer */
function describeIssues(details: unknown): string {
    const parsed = issuesSchema.safeParse(details);
    if (!parsed.success) return 'The request was invalid.';
    const { formErrors, fieldErrors } = parsed.data;
    const issues = [
        ...formErrors,
        ...Object.entries(fieldErrors).flatMap(([field, messages]) => (messages ?? []).map((m) => `${field}: ${m}`)),
    ];
    return issues.length > 0 ? `${issues.join('; ')}.` : 'The request was invalid.';
}

function parsePayload(payload: string): unknown {
    try {
        return JSON.parse(payload);
    } catch {
        return null;
    }
}

/**
 * Drains the ingestion queue into `SecretService.submit`.
 *
 * Delivery is at-least-once, and a redelivered job simply creates another
 * independent secret. Malformed and invalid requests are acked and dropped;
 * storage failures go back to the queue. The producer hears about every
 * terminal outcome: the link, a rejection, or a dead-lettered job.
 */
export class IngestionWorker {
    private readonly log: BaseLogger;
    private running = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<unknown> | null = null;

    constructor(private readonly options: IngestionWorkerOptions) {
        this.log = options.logger;
    }

    /**
     * Claims one batch and processes it sequentially.
     * @returns number of jobs claimed
     */
    async processBatch(now: number = Date.now()): Promise<number> {
        const jobs = await this.options.queue.claim(this.options.batchSize, now);
        for (const job of jobs) {
            await this.processJob(job);
        }
        return jobs.length;
    }

    async processJob(job: IngestionJob): Promise<JobResult> {
        const { queue, service } = this.options;

        const request = IngestionRequestSchema.safeParse(parsePayload(job.payload));
        if (!request.success) {
            this.log.warn({ jobId: job.id, issues: request.error.flatten().fieldErrors }, '[Ingestion] Dropping malformed job');
            await queue.ack(job.id);
            return 'rejected';
        }

        const { expireIn, baseUrl, replyTo, ...secret } = request.data;
        const expireInMs = expireIn === undefined ? undefined : parseDuration(expireIn);
        if (expireInMs === null) {
            this.log.warn({ jobId: job.id }, '[Ingestion] Dropping job with invalid expireIn');
            return this.reject(job, replyTo, `${REJECTED_MESSAGE} The expiry is not a valid duration.`);
        }

        try {
            const result = await service.submit({ ...secret, expireInMs });
            if (isFailed(result)) {
                if (result.error.code === 'VALIDATION_FAILED') {
                    this.log.warn({ jobId: job.id, details: result.error.details }, '[Ingestion] Dropping invalid secret request');
                    return await this.reject(job, replyTo, `${REJECTED_MESSAGE} ${describeIssues(result.error.details)}`);
                }
                return await this.retry(job, replyTo, result.error.message);
            }

            await this.reply(job, replyTo, buildRetrieveUrl(baseUrl ?? this.options.baseUrl, result.id));
            await queue.ack(job.id);
            this.log.info({ jobId: job.id, attempts: job.attempts }, '[Ingestion] Secret created from queue');
            return 'created';
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            return await this.retry(job, replyTo, reason);
        }
    }

    /**
     * Starts polling. A full batch is followed straight away by the next
     * claim; an empty or failed one waits `pollIntervalMs`.
     */
    start(): void {
        if (this.running) return;
        this.running = true;
        this.log.info({ pollIntervalMs: this.options.pollIntervalMs }, '[Ingestion] Worker started');
        this.schedule(0);
    }

    /** Stops polling and waits for the batch in progress, if any */
    async stop(): Promise<void> {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
        this.log.info('[Ingestion] Worker stopped');
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.processBatch()
                .then((claimed) => this.schedule(claimed >= this.options.batchSize ? 0 : this.options.pollIntervalMs))
                .catch((err: unknown) => {
                    this.log.error({ err }, '[Ingestion] Failed to poll queue');
                    this.schedule(this.options.pollIntervalMs);
                })
                .finally(() => {
                    this.inFlight = null;
                });
        }, delayMs);
    }

    private async reject(job: IngestionJob, replyTo: ReplyTarget | undefined, message: string): Promise<JobResult> {
        await this.reply(job, replyTo, message);
        await this.options.queue.ack(job.id);
        return 'rejected';
    }

    private async retry(job: IngestionJob, replyTo: ReplyTarget | undefined, reason: string): Promise<JobResult> {
        const outcome = await this.options.queue.release(job.id, reason);
        if (outcome === 'dead') {
            this.log.error({ jobId: job.id, attempts: job.attempts, reason }, '[Ingestion] Job dead-lettered');
            await this.reply(job, replyTo, UNAVAILABLE_MESSAGE);
        } else {
            this.log.warn({ jobId: job.id, attempts: job.attempts, reason }, '[Ingestion] Job released for retry');
        }
        return outcome;
    }

    /** Best effort: a failed reply is logged and never fails the job */
    private async reply(job: IngestionJob, replyTo: ReplyTarget | undefined, message: string): Promise<void> {
        const { notifier } = this.options;
        if (!replyTo || !notifier) return;
        try {
            await notifier.notify(replyTo, message);
        } catch (err) {
            this.log.warn({ jobId: job.id, err }, '[Ingestion] Reply failed');
        }
    }
}
