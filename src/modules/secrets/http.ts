import type { FastifyReply } from 'fastify';
import { toHttpStatus, type SecretFailure } from './errors';

/** JSON schema of every error body, for route `response` maps */
export const errorResponseSchema = {
    type: 'object',
    properties: {
        error: { type: 'string' },
        message: { type: 'string' },
        details: { type: 'object', additionalProperties: true },
    },
} as const;

/**
 * Sends a service failure with the status its code maps to.
 * Body: `{ error: code, message, details? }`.
 */
export function sendFailure(reply: FastifyReply, failure: SecretFailure) {
    return reply.status(toHttpStatus(failure.code)).send({
        error: failure.code,
        message: failure.message,
        details: failure.details,
    });
}
