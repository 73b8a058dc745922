import { describe, expect, it, vi } from 'vitest';
import { openDb } from '../../../db';
import { buildServer } from '../../../server';
import type { ReplyNotifier } from '../notifier';
import { SqliteIngestionQueue } from '../queue';

const form = (fields: Record<string, string>) => new URLSearchParams(fields).toString();
const formHeaders = { 'content-type': 'application/x-www-form-urlencoded' };

describe('POST /api/v1/secrets-slack', () => {
    it('acknowledges at once and queues the command', async () => {
        const queue = new SqliteIngestionQueue(openDb(':memory:'), { visibilityTimeoutMs: 30_000, maxAttempts: 5 });
        const app = await buildServer({ queue });

        try {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/secrets-slack',
                headers: formHeaders,
                payload: form({
                    text: 'hunter2',
                    channel_id: 'C1',
                    team_id: 'T1',
                    response_url: 'https://hooks.example.test/commands/1',
                }),
            });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toEqual({
                replace_original: true,
                text: "We received your request and we're working on it...",
            });

            const [job] = await queue.claim(10);
            expect(JSON.parse(job.payload)).toMatchObject({
                text: 'hunter2',
                replyTo: { responseUrl: 'https://hooks.example.test/commands/1', channelId: 'C1', teamId: 'T1' },
            });
            expect(JSON.parse(job.payload).baseUrl).toMatch(/^http:\/\/localhost/);
        } finally {
            await app.close();
        }
    });

    it('rejects a malformed response_url', async () => {
        const queue = new SqliteIngestionQueue(openDb(':memory:'), { visibilityTimeoutMs: 30_000, maxAttempts: 5 });
        const app = await buildServer({ queue });

        try {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/secrets-slack',
                headers: formHeaders,
                payload: form({ text: 'hunter2', response_url: 'not a url' }),
            });

            expect(response.statusCode).toBe(400);
            expect(response.json()).toMatchObject({ error: 'VALIDATION_FAILED' });
            expect(await queue.claim(10)).toEqual([]);
        } finally {
            await app.close();
        }
    });

    it('rejects a command without text instead of queueing it', async () => {
        const queue = new SqliteIngestionQueue(openDb(':memory:'), { visibilityTimeoutMs: 30_000, maxAttempts: 5 });
        const app = await buildServer({ queue });

        try {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/secrets-slack',
                headers: formHeaders,
                payload: form({ text: '   ', response_url: 'https://hooks.example.test/commands/1' }),
            });

            expect(response.statusCode).toBe(400);
            expect(response.json()).toMatchObject({
                error: 'VALIDATION_FAILED',
                details: { fieldErrors: { text: ['Secret text is required'] } },
            });
            expect(await queue.claim(10)).toEqual([]);
        } finally {
            await app.close();
        }
    });

    it('delivers a revealable link through the inline worker', async () => {
        const notify = vi.fn<ReplyNotifier['notify']>(async () => undefined);
        const app = await buildServer({ inlineWorker: true, notifier: { notify } });

        try {
            await app.ready();
            await app.inject({
                method: 'POST',
                url: '/api/v1/secrets-slack',
                headers: formHeaders,
                payload: form({ text: 'hunter2', response_url: 'https://hooks.example.test/commands/1' }),
            });

            await vi.waitFor(() => expect(notify).toHaveBeenCalledTimes(1), { timeout: 2_000 });

            const link = notify.mock.calls[0][1];
            const revealed = await app.inject({ method: 'GET', url: new URL(link).pathname });
            expect(revealed.json()).toEqual({ text: 'hunter2' });
        } finally {
            await app.close();
        }
    });
});
