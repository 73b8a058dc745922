import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from './config';
import { logger } from './logger';
import { closeDb, createDb } from './db';
import { FieldCipher } from './db/encryption';
import { SecretService } from './modules/secrets/service';
import { SqliteSecretStore } from './modules/secrets/store.sqlite';
import { createResponseUrlNotifier } from './modules/ingestion/notifier';
import { SqliteIngestionQueue } from './modules/ingestion/queue';
import { IngestionWorker } from './modules/ingestion/worker';

/**
 * Builds an ingestion worker for running outside the HTTP process
 * (set QUEUE_INLINE_WORKER=false on the server when using it).
 */
export function buildWorker() {
    const db = createDb(config.dbPath);
    const store = new SqliteSecretStore(db, new FieldCipher(config.dbEncryptionKey), logger);
    const queue = new SqliteIngestionQueue(db, {
        visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
        maxAttempts: config.queue.maxAttempts,
    });

    return new IngestionWorker({
        queue,
        service: new SecretService({ store, logger }),
        logger,
        notifier: createResponseUrlNotifier(),
        baseUrl: config.baseUrl,
        pollIntervalMs: config.queue.pollIntervalMs,
        batchSize: config.queue.batchSize,
    });
}

const isEntryPoint = process.argv[1] !== undefined
    && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
    const worker = buildWorker();
    worker.start();

    const shutdown = (signal: string) => {
        logger.info({ signal }, 'Shutting down ingestion worker');
        worker.stop()
            .then(() => {
                closeDb();
                process.exit(0);
            })
            .catch((err: unknown) => {
                logger.error({ err }, 'Ingestion worker failed to stop cleanly');
                process.exit(1);
            });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}
