import type { FastifyInstance } from 'fastify';
import { BodySchema, ResponseSchema } from './types';
import { parseDuration } from './duration';
import { fail, isFailed } from './errors';
import { errorResponseSchema, sendFailure } from './http';
import { buildRetrieveUrl, type SecretService } from './service';

export interface SecretsRouteOptions {
    service: SecretService;
    baseUrl?: string;
}

/**
 * Registers the POST /api/v1/secrets route for creating one-time secrets.
 *
 * @param app - Fastify server instance
 */
export default async function registerSecretsPostRoute(app: FastifyInstance, { service, baseUrl }: SecretsRouteOptions) {
    app.post('/api/v1/secrets', {
        schema: {
            summary: 'Create one-time secret',
            description: 'Store a secret that can be revealed exactly once, optionally behind a prompt/answer challenge',
            tags: ['Secrets'],
            body: {
                type: 'object',
                required: ['text'],
                properties: {
                    text: { type: 'string', description: 'The secret text' },
                    prompt: { type: 'string', description: 'Question shown to the reader; requires answer' },
                    answer: { type: 'string', description: 'Expected answer (case-sensitive); requires prompt' },
                    expireIn: {
                        anyOf: [{ type: 'number' }, { type: 'string' }],
                        description: 'Time to live: seconds, "1h", "7d", "PT24H" or "01:00:00"',
                    },
                },
            },
            response: {
                201: {
                    description: 'Secret created successfully',
                    type: 'object',
                    properties: {
                        id: { type: 'string', description: 'Secret identifier' },
                        expiresAt: { type: 'number', description: 'Expiration timestamp (epoch ms)' },
                        urls: {
                            type: 'object',
                            properties: {
                                retrieve: { type: 'string', description: 'URL that reveals the secret once' },
                            },
                        },
                    },
                },
                400: { description: 'Validation error', ...errorResponseSchema },
                503: { description: 'Storage unavailable', ...errorResponseSchema },
            },
        },
        config: {
            rateLimit: { max: 20, timeWindow: '1 minute' },
        },
    }, async (req, reply) => {
        const parsed = BodySchema.safeParse(req.body);
        if (!parsed.success) {
            return sendFailure(reply, fail('VALIDATION_FAILED', parsed.error.flatten()).error);
        }

        const { expireIn, ...rest } = parsed.data;
        const expireInMs = expireIn === undefined ? undefined : parseDuration(expireIn);
        if (expireInMs === null) {
            const invalid = fail('VALIDATION_FAILED', { formErrors: [], fieldErrors: { expireIn: ['Invalid duration'] } });
            return sendFailure(reply, invalid.error);
        }

        const result = await service.submit({ ...rest, expireInMs });
        if (isFailed(result)) {
            return sendFailure(reply, result.error);
        }

        return reply.status(201).send(ResponseSchema.parse({
            id: result.id,
            expiresAt: result.expiresAt,
            urls: { retrieve: buildRetrieveUrl(baseUrl, result.id) },
        }));
    });
}
