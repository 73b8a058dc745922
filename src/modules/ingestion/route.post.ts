import type { FastifyInstance } from 'fastify';
import { fail } from '../secrets/errors';
import { errorResponseSchema, sendFailure } from '../secrets/http';
import type { IngestionQueue } from './queue';
import { SlashCommandSchema, type IngestionRequest } from './types';

/**
 * Registers POST /api/v1/secrets-slack, the entry point for chat slash commands.
 *
 * Chat platforms give a command only a few seconds to answer, so the
 * request is queued and acknowledged at once; the ingestion worker creates
 * the secret and posts the link to `response_url`.
 *
 * @param app - Fastify server instance (with @fastify/formbody registered)
 */
export default async function registerSlashCommandRoute(
    app: FastifyInstance,
    { queue, baseUrl }: { queue: IngestionQueue; baseUrl?: string },
) {
    app.post('/api/v1/secrets-slack', {
        schema: {
            summary: 'Create one-time secret from a chat slash command',
            description: 'Queues the command text as a secret; the link is delivered to response_url',
            tags: ['Secrets'],
            body: {
                type: 'object',
                properties: {
                    text: { type: 'string' },
                    channel_id: { type: 'string' },
                    team_id: { type: 'string' },
                    response_url: { type: 'string' },
                },
            },
            response: {
                200: {
                    type: 'object',
                    properties: {
                        replace_original: { type: 'boolean' },
                        text: { type: 'string' },
                    },
                },
                400: { description: 'Validation error', ...errorResponseSchema },
            },
        },
        config: {
            rateLimit: { max: 20, timeWindow: '1 minute' },
        },
    }, async (req, reply) => {
        const parsed = SlashCommandSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return sendFailure(reply, fail('VALIDATION_FAILED', parsed.error.flatten()).error);
        }

        const command = parsed.data;
        const request: IngestionRequest = {
            text: command.text,
            baseUrl: baseUrl ?? `${req.protocol}://${req.host}`,
            replyTo: command.response_url
                ? { responseUrl: command.response_url, channelId: command.channel_id, teamId: command.team_id }
                : undefined,
        };

        const jobId = await queue.enqueue(request);
        req.log.info({ jobId, channelId: command.channel_id, teamId: command.team_id }, 'Slash command queued');

        return reply.send({
            replace_original: true,
            text: "We received your request and we're working on it...",
        });
    });
}
