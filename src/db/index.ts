import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { config } from '../config';
import * as schema from './schema';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/** Singleton database instance */
let dbInstance: AppDatabase | null = null;

const initSql = `
    CREATE TABLE IF NOT EXISTS api_keys (
        id TEXT PRIMARY KEY,
        secret TEXT NOT NULL UNIQUE,
        name TEXT NOT NULL,
        recipientEmail TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        isActive INTEGER NOT NULL DEFAULT 1,
        usageCount INTEGER NOT NULL DEFAULT 0,
        lastUsedAt INTEGER,
        createdAt INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS submissions (
        id TEXT PRIMARY KEY,
        apiKeyId TEXT NOT NULL REFERENCES api_keys(id) ON DELETE CASCADE,
        fields TEXT NOT NULL,
        sourceIp TEXT,
        userAgent TEXT,
        createdAt INTEGER NOT NULL,
        emailSent INTEGER NOT NULL DEFAULT 0,
        emailError TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_submissions_apiKeyId ON submissions(apiKeyId);
    CREATE INDEX IF NOT EXISTS idx_submissions_createdAt ON submissions(createdAt);
    CREATE TABLE IF NOT EXISTS file_attachments (
        id TEXT PRIMARY KEY,
        submissionId TEXT NOT NULL REFERENCES submissions(id) ON DELETE CASCADE,
        originalFilename TEXT NOT NULL,
        storedPath TEXT NOT NULL UNIQUE,
        fileSize INTEGER NOT NULL,
        contentType TEXT NOT NULL,
        createdAt INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_file_attachments_submissionId ON file_attachments(submissionId);
`;

/**
 * Opens a database at `dbPath` and makes sure the schema exists.
 *
 * Enables WAL journaling and foreign key enforcement (the cascades from
 * key to submission to attachment depend on it). `:memory:` gives a
 * private database, which is what the tests use.
 */
export function openDb(dbPath: string): AppDatabase {
    if (dbPath !== ':memory:') {
        mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const sqlite = new Database(dbPath);

    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.exec(initSql);

    return drizzle(sqlite, { schema });
}

/**
 * Creates or returns the process-wide database opened at `config.dbPath`.
 */
export function createDb(): AppDatabase {
    if (dbInstance) {
        return dbInstance;
    }
    dbInstance = openDb(config.dbPath);
    return dbInstance;
}
