import { randomBytes } from 'node:crypto';
import { count, desc, eq, getTableColumns, sql } from 'drizzle-orm';
import type { AppDatabase } from '../../db';
import { apiKeys, fileAttachments, submissions, type ApiKeyRecord } from '../../db/schema';
import { newId } from '../../lib/ids';
import { removeStoredFiles } from '../uploads/storage';
import type { ApiKeySummary, CreateKeyInput, UpdateKeyInput } from './types';

/** Bytes of entropy in a key secret. */
export const SECRET_BYTES = 32;

/**
 * Generates a key secret: 32 random bytes, base64url encoded (43 chars),
 * safe to use as a URL path segment.
 */
export function generateSecret(): string {
    return randomBytes(SECRET_BYTES).toString('base64url');
}

/**
 * Looks up a key by its secret. Exact, case-sensitive match.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} secret - Secret taken from the request path
 * @returns {ApiKeyRecord | null} The key record, or null if no key has this secret
 */
export function resolveKey(db: AppDatabase, secret: string): ApiKeyRecord | null {
    return db.select().from(apiKeys).where(eq(apiKeys.secret, secret)).get() ?? null;
}

/** Whether a key may accept new submissions. */
export function isUsable(record: ApiKeyRecord): boolean {
    return record.isActive;
}

/**
 * Counts one accepted submission against a key.
 *
 * The increment happens inside a single UPDATE so concurrent submissions
 * to the same key never lose a count.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} id - Key id
 * @param {number} at - Time of use in epoch milliseconds
 */
export function recordUsage(db: AppDatabase, id: string, at: number = Date.now()): void {
    db.update(apiKeys)
        .set({ usageCount: sql`${apiKeys.usageCount} + 1`, lastUsedAt: at })
        .where(eq(apiKeys.id, id))
        .run();
}

/**
 * Registers a new, active key with a freshly generated secret.
 *
 * @param {AppDatabase} db - Database instance
 * @param {CreateKeyInput} input - Validated name, recipient and description
 * @returns {ApiKeyRecord} The stored key, secret included
 */
export function createKey(db: AppDatabase, input: CreateKeyInput): ApiKeyRecord {
    return db.insert(apiKeys).values({
        id: newId(),
        secret: generateSecret(),
        name: input.name,
        recipientEmail: input.recipientEmail,
        description: input.description,
        isActive: true,
        usageCount: 0,
        createdAt: Date.now(),
    }).returning().get();
}

/**
 * Retrieves a key by id.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} id - Key id
 * @returns {ApiKeyRecord | null} The key, or null if it does not exist
 */
export function findKeyById(db: AppDatabase, id: string): ApiKeyRecord | null {
    return db.select().from(apiKeys).where(eq(apiKeys.id, id)).get() ?? null;
}

/**
 * Lists all keys, newest first, with how many submissions each still owns.
 */
export function listKeys(db: AppDatabase): ApiKeySummary[] {
    return db
        .select({ ...getTableColumns(apiKeys), submissionCount: count(submissions.id) })
        .from(apiKeys)
        .leftJoin(submissions, eq(submissions.apiKeyId, apiKeys.id))
        .groupBy(apiKeys.id)
        .orderBy(desc(apiKeys.createdAt), desc(apiKeys.id))
        .all();
}

/**
 * Applies a dashboard edit. Returns the updated record, or null if the
 * key does not exist.
 */
export function updateKey(db: AppDatabase, id: string, input: UpdateKeyInput): ApiKeyRecord | null {
    if (Object.keys(input).length === 0) {
        return findKeyById(db, id);
    }
    return db.update(apiKeys).set(input).where(eq(apiKeys.id, id)).returning().get() ?? null;
}

/**
 * Deletes a key with everything it owns.
 *
 * The key is deactivated first, in the same synchronous step that
 * collects its stored paths, so no submission can commit against it
 * while the files are being removed. Rows are only deleted once the
 * files are gone; the submission and attachment rows follow through the
 * cascade. If file removal fails the key stays deactivated.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} uploadDir - Root of the attachment storage
 * @param {string} id - Key id
 * @returns {Promise<boolean>} false if the key does not exist
 */
export async function deleteKey(db: AppDatabase, uploadDir: string, id: string): Promise<boolean> {
    const deactivated = db.update(apiKeys).set({ isActive: false }).where(eq(apiKeys.id, id)).returning({ id: apiKeys.id }).get();
    if (!deactivated) {
        return false;
    }

    const stored = db
        .select({ storedPath: fileAttachments.storedPath })
        .from(fileAttachments)
        .innerJoin(submissions, eq(fileAttachments.submissionId, submissions.id))
        .where(eq(submissions.apiKeyId, id))
        .all();
    await removeStoredFiles(uploadDir, stored.map((row) => row.storedPath));

    db.delete(apiKeys).where(eq(apiKeys.id, id)).run();
    return true;
}
