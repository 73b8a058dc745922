import type { FastifyInstance } from 'fastify';
import { AccessQuerySchema } from './types';
import { isFailed } from './errors';
import { errorResponseSchema, sendFailure } from './http';
import type { SecretService } from './service';

/**
 * Registers the secret reveal route.
 *
 * Security notes:
 * - the `answer` query parameter is stripped from request logs (see server.ts)
 * - not found, expired and already revealed all answer the same 404
 *
 * @param app - Fastify server instance
 */
export default async function registerSecretsGetRoute(app: FastifyInstance, { service }: { service: SecretService }) {
    app.get<{ Params: { id: string }; Querystring: { answer?: string } }>('/api/v1/secrets/:id', {
        schema: {
            summary: 'Reveal one-time secret',
            description: 'Reveals a secret and destroys it. A challenged secret first answers with its prompt; repeat the call with ?answer= to reveal it.',
            tags: ['Secrets'],
            params: {
                type: 'object',
                required: ['id'],
                properties: {
                    id: { type: 'string', description: 'Secret identifier' },
                },
            },
            querystring: {
                type: 'object',
                properties: {
                    answer: { type: 'string', description: 'Answer to the secret\'s prompt' },
                },
            },
            response: {
                200: {
                    description: 'Secret revealed, or challenge required',
                    type: 'object',
                    properties: {
                        text: { type: 'string' },
                        challengeRequired: { type: 'boolean' },
                        prompt: { type: 'string' },
                    },
                },
                403: { description: 'Answer does not match', ...errorResponseSchema },
                404: { description: 'Secret not found', ...errorResponseSchema },
                503: { description: 'Storage unavailable', ...errorResponseSchema },
            },
        },
        config: {
            rateLimit: { max: 60, timeWindow: '1 minute' },
        },
    }, async (req, reply) => {
        const { answer } = AccessQuerySchema.parse(req.query);
        const result = await service.access(req.params.id, answer);
        if (isFailed(result)) {
            return sendFailure(reply, result.error);
        }

        // Revealed secrets must not linger in shared caches
        reply.header('Cache-Control', 'no-store');
        return reply.send(result);
    });
}
