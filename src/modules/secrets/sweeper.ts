import type { BaseLogger } from 'pino';
import type { SecretStore } from './store';

/**
 * Periodically deletes expired secrets from the store.
 *
 * Reads already treat expired secrets as missing, so this only bounds how
 * long expired ciphertext stays on disk. Returns a function that stops
 * the sweep.
 */
export function startExpirySweep(store: SecretStore, intervalMs: number, log: BaseLogger): () => void {
    if (intervalMs <= 0) {
        return () => undefined;
    }

    let running = false;
    const timer = setInterval(() => {
        if (running) return;
        running = true;
        store.sweepExpired()
            .then((removed) => {
                if (removed > 0) log.info({ removed }, '[Sweeper] Removed expired secrets');
            })
            .catch((err: unknown) => {
                log.error({ err }, '[Sweeper] Expiry sweep failed');
            })
            .finally(() => {
                running = false;
            });
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
}
