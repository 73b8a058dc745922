import Fastify from 'fastify';
import formbody from '@fastify/formbody';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from './config';
import { closeDb, createDb } from './db';
import { FieldCipher } from './db/encryption';
import { fail } from './modules/secrets/errors';
import { sendFailure } from './modules/secrets/http';
import { SecretService } from './modules/secrets/service';
import type { SecretStore } from './modules/secrets/store';
import { SqliteSecretStore } from './modules/secrets/store.sqlite';
import { startExpirySweep } from './modules/secrets/sweeper';
import registerSecretsPostRoute from './modules/secrets/route.post';
import registerSecretsGetRoute from './modules/secrets/route.get';
import { createResponseUrlNotifier, type ReplyNotifier } from './modules/ingestion/notifier';
import { SqliteIngestionQueue, type IngestionQueue } from './modules/ingestion/queue';
import { IngestionWorker } from './modules/ingestion/worker';
import registerSlashCommandRoute from './modules/ingestion/route.post';

export interface ServerOverrides {
    store?: SecretStore;
    queue?: IngestionQueue;
    notifier?: ReplyNotifier;
    /** Runs the ingestion worker inside the HTTP process */
    inlineWorker?: boolean;
    /** Log destination and level in place of stdout at LOG_LEVEL */
    log?: { level: string; stream: { write(msg: string): void } };
}

/**
 * Builds and configures the Fastify server instance.
 *
 * Sets up:
 * - Logger that records route patterns only, so neither secret ids nor answers reach the logs
 * - SQLite store and ingestion queue (unless overridden)
 * - Rate limiting
 * - Swagger/OpenAPI documentation
 * - Secret API routes and the slash-command entry point
 * - Expiry sweep, and optionally the ingestion worker
 * - Health check endpoint
 */
export async function buildServer(overrides: ServerOverrides = {}) {
    const app = Fastify({
        logger: {
            level: overrides.log?.level ?? config.logLevel,
            ...(overrides.log ? { stream: overrides.log.stream } : {}),
            serializers: {
                req: (req) => ({
                    method: req.method,
                    // The pattern, not the path: `/api/v1/secrets/:id` rather than the id itself
                    url: req.routeOptions.url ?? 'unmatched',
                    remoteAddress: req.socket.remoteAddress,
                }),
            },
        },
        bodyLimit: config.limits.bodyBytes,
    });

    const ownsDb = !overrides.store || !overrides.queue;
    const store = overrides.store
        ?? new SqliteSecretStore(createDb(config.dbPath), new FieldCipher(config.dbEncryptionKey), app.log);
    const queue = overrides.queue ?? new SqliteIngestionQueue(createDb(config.dbPath), {
        visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
        maxAttempts: config.queue.maxAttempts,
    });
    const service = new SecretService({ store, logger: app.log });

    const stopSweep = startExpirySweep(store, config.sweepIntervalMs, app.log);
    const worker = (overrides.inlineWorker ?? config.queue.inlineWorker)
        ? new IngestionWorker({
            queue,
            service,
            logger: app.log,
            notifier: overrides.notifier ?? createResponseUrlNotifier(),
            baseUrl: config.baseUrl,
            pollIntervalMs: config.queue.pollIntervalMs,
            batchSize: config.queue.batchSize,
        })
        : null;

    app.addHook('onReady', async () => {
        worker?.start();
    });
    app.addHook('onClose', async () => {
        stopSweep();
        await worker?.stop();
        if (ownsDb) closeDb();
    });

    app.setErrorHandler((error, req, reply) => {
        if (error.validation) {
            return sendFailure(reply, fail('VALIDATION_FAILED', { formErrors: [error.message], fieldErrors: {} }).error);
        }
        if (error.statusCode && error.statusCode < 500) {
            return reply.send(error);
        }
        req.log.error({ err: error }, 'Unhandled error');
        return reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
    });

    await app.register(formbody);
    await app.register(rateLimit);
    await app.register(swagger, {
        openapi: {
            openapi: '3.0.0',
            info: { title: 'Burnbox API', version: '0.1.0' },
            tags: [{ name: 'Secrets' }],
        },
    });
    await app.register(swaggerUI, { routePrefix: '/docs' });

    await registerSecretsPostRoute(app, { service, baseUrl: config.baseUrl });
    await registerSecretsGetRoute(app, { service });
    await registerSlashCommandRoute(app, { queue, baseUrl: config.baseUrl });

    // Health check endpoint for monitoring and container health checks
    app.get('/health', async () => ({ status: 'ok' }));

    return app;
}

const isEntryPoint = process.argv[1] !== undefined
    && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

// Only start the server if this file is run directly (not imported as a module)
if (isEntryPoint) {
    buildServer()
        .then((app) => app.listen({ port: config.port, host: config.host }))
        .catch((err) => {
            // eslint-disable-next-line no-console
            console.error(err);
            process.exit(1);
        });
}
