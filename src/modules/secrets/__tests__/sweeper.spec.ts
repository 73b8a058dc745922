import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { createSecret } from '../secret';
import type { SecretStore } from '../store';
import { MemorySecretStore } from '../store.memory';
import { startExpirySweep } from '../sweeper';

const silent = pino({ level: 'silent' });

describe('startExpirySweep', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('removes expired secrets on every tick', async () => {
        const store = new MemorySecretStore();
        await store.create(createSecret({ text: 'gone', ttlMs: 500 }, Date.now()));
        await store.create(createSecret({ text: 'kept', ttlMs: 60_000 }, Date.now()));

        const stop = startExpirySweep(store, 1_000, silent);
        await vi.advanceTimersByTimeAsync(1_000);
        stop();

        expect(store.size).toBe(1);
    });

    it('stops sweeping once stopped', async () => {
        const store = new MemorySecretStore();
        const sweep = vi.spyOn(store, 'sweepExpired');

        const stop = startExpirySweep(store, 1_000, silent);
        await vi.advanceTimersByTimeAsync(1_000);
        stop();
        await vi.advanceTimersByTimeAsync(5_000);

        expect(sweep).toHaveBeenCalledTimes(1);
    });

    it('does nothing when the interval is zero', async () => {
        const store = new MemorySecretStore();
        const sweep = vi.spyOn(store, 'sweepExpired');

        startExpirySweep(store, 0, silent)();
        await vi.advanceTimersByTimeAsync(60_000);

        expect(sweep).not.toHaveBeenCalled();
    });

    it('keeps running after a failed sweep', async () => {
        const sweepExpired = vi.fn<() => Promise<number>>()
            .mockRejectedValueOnce(new Error('database is locked'))
            .mockResolvedValue(0);
        const store: SecretStore = {
            create: vi.fn(async () => 'AAAAAAAAAAAAAAAAAAAAAA'),
            consumeIfValid: vi.fn(async () => ({ kind: 'missing' as const })),
            validateAndConsume: vi.fn(async () => ({ kind: 'missing' as const })),
            sweepExpired,
        };

        const stop = startExpirySweep(store, 1_000, silent);
        await vi.advanceTimersByTimeAsync(3_000);
        stop();

        expect(sweepExpired).toHaveBeenCalledTimes(3);
    });
});
