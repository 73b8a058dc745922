import pino from 'pino';
import { config } from './config';

/**
 * Standalone logger for processes that run without Fastify (the ingestion worker).
 * The HTTP server uses Fastify's own pino instance instead.
 */
export const logger = pino({
    name: 'burnbox',
    level: config.logLevel,
});
