import { beforeEach, describe, expect, it } from 'vitest';
import pino from 'pino';
import { eq } from 'drizzle-orm';
import { openDb, type AppDatabase } from '../../../db';
import { FieldCipher } from '../../../db/encryption';
import { secrets } from '../../../db/schema';
import { createSecret } from '../secret';
import { SqliteSecretStore } from '../store.sqlite';

const silent = pino({ level: 'silent' });
const cipher = new FieldCipher('test-secret-key');
const NOW = 1_700_000_000_000;

describe('SqliteSecretStore', () => {
    let db: AppDatabase;
    let store: SqliteSecretStore;

    beforeEach(() => {
        db = openDb(':memory:');
        store = new SqliteSecretStore(db, cipher, silent);
    });

    const rowFor = (id: string) => db.select().from(secrets).where(eq(secrets.id, id)).get();

    it('never writes plaintext to the table', async () => {
        const id = await store.create(createSecret({ text: 'hello', prompt: 'q', answer: 'a', ttlMs: 60_000 }, NOW));

        const row = rowFor(id);

        expect(row?.text.startsWith('DBENC:')).toBe(true);
        expect(row?.prompt?.startsWith('DBENC:')).toBe(true);
        expect(row?.answer?.startsWith('DBENC:')).toBe(true);
        expect(row?.text).not.toContain('hello');
    });

    it('leaves a challenged row untouched when its prompt is handed out', async () => {
        const id = await store.create(createSecret({ text: 'hello', prompt: 'q', answer: 'a', ttlMs: 60_000 }, NOW));
        const before = rowFor(id);

        await store.consumeIfValid(id, NOW);

        expect(rowFor(id)).toEqual(before);
    });

    it('counts wrong answers', async () => {
        const id = await store.create(createSecret({ text: 'hello', prompt: 'q', answer: 'a', ttlMs: 60_000 }, NOW));

        await store.validateAndConsume(id, 'b', { caseSensitive: true, maxAttempts: 0 }, NOW);
        await store.validateAndConsume(id, 'c', { caseSensitive: true, maxAttempts: 0 }, NOW);

        expect(rowFor(id)?.failedAttempts).toBe(2);
    });

    it('deletes the row when a secret is revealed', async () => {
        const id = await store.create(createSecret({ text: 'hello', ttlMs: 60_000 }, NOW));

        await store.consumeIfValid(id, NOW);

        expect(rowFor(id)).toBeUndefined();
    });

    it('treats a row sealed under another key as missing', async () => {
        const id = await store.create(createSecret({ text: 'hello', prompt: 'q', answer: 'a', ttlMs: 60_000 }, NOW));
        const rotated = new SqliteSecretStore(db, new FieldCipher('another-test-key'), silent);

        expect(await rotated.consumeIfValid(id, NOW)).toEqual({ kind: 'missing' });
        expect(await rotated.validateAndConsume(id, 'a', { caseSensitive: true, maxAttempts: 0 }, NOW)).toEqual({ kind: 'missing' });
        expect(rowFor(id)).toBeDefined();
    });
});
