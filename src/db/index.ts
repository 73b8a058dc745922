import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

const initSql = `
    CREATE TABLE IF NOT EXISTS secrets (
        id TEXT PRIMARY KEY,
        text TEXT NOT NULL,
        prompt TEXT,
        answer TEXT,
        createdAt INTEGER NOT NULL,
        expiresAt INTEGER NOT NULL,
        failedAttempts INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_secrets_expiresAt ON secrets(expiresAt);

    CREATE TABLE IF NOT EXISTS ingestion_jobs (
        id TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'ready',
        attempts INTEGER NOT NULL DEFAULT 0,
        visibleAt INTEGER NOT NULL,
        lastError TEXT,
        createdAt INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_ingestion_jobs_state_visibleAt ON ingestion_jobs(state, visibleAt);
`;

/**
 * Opens a database and creates the tables if they don't exist.
 *
 * WAL mode lets the HTTP process and the ingestion worker share one file;
 * `busy_timeout` makes a writer wait for the other process's lock instead of failing.
 *
 * @param path - File path, or `:memory:` for a private in-memory database
 */
export function openDb(path: string): AppDatabase {
    return drizzle(openSqlite(path), { schema });
}

function openSqlite(path: string): Database.Database {
    if (path !== ':memory:') {
        const dir = dirname(path);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }
    }

    const sqlite = new Database(path);
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('busy_timeout = 5000');
    sqlite.exec(initSql);
    return sqlite;
}

/** Singleton database instance, keyed by path */
let dbInstance: { path: string; sqlite: Database.Database; db: AppDatabase } | null = null;

/**
 * Returns the process-wide database for `path`, opening it on first use.
 */
export function createDb(path: string): AppDatabase {
    if (dbInstance && dbInstance.path === path) {
        return dbInstance.db;
    }
    closeDb();
    const sqlite = openSqlite(path);
    const db = drizzle(sqlite, { schema });
    dbInstance = { path, sqlite, db };
    return db;
}

/**
 * Closes the process-wide database, if one is open.
 */
export function closeDb(): void {
    if (dbInstance) {
        dbInstance.sqlite.close();
        dbInstance = null;
    }
}
