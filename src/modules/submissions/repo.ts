import { asc, count, desc, eq, gte } from 'drizzle-orm';
import type { AppDatabase } from '../../db';
import { apiKeys, fileAttachments, submissions, type FileAttachmentRow } from '../../db/schema';
import { INVALID_KEY_MESSAGE, SubmissionError } from '../../lib/errors';
import { newId } from '../../lib/ids';
import { removeStoredFiles } from '../uploads/storage';
import type {
    DashboardStats,
    DeliveryOutcome,
    ListQuery,
    RecordSubmissionInput,
    SubmissionPage,
    SubmissionWithFiles,
} from './types';

const RECENT_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Persists a submission and links its staged files, in one transaction.
 *
 * Either the submission row and every attachment row are committed, or
 * none are. The owning key is read again inside the transaction, so a
 * key deactivated or deleted while the body was streaming gets nothing.
 * Staged files are not touched here; cleaning them up after a failure is
 * the caller's job.
 *
 * @param {AppDatabase} db - Database instance
 * @param {RecordSubmissionInput} input - Key id, ordered fields, request metadata and staged files
 * @returns {SubmissionWithFiles} The committed submission with its attachment rows
 * @throws {SubmissionError} `KeyNotFound` or `KeyInactive` if the key can no longer accept submissions
 */
export function recordSubmission(db: AppDatabase, input: RecordSubmissionInput): SubmissionWithFiles {
    const createdAt = Date.now();

    return db.transaction((tx) => {
        const owner = tx.select({ isActive: apiKeys.isActive }).from(apiKeys).where(eq(apiKeys.id, input.apiKeyId)).get();
        if (!owner || !owner.isActive) {
            throw new SubmissionError({
                code: owner ? 'KeyInactive' : 'KeyNotFound',
                message: INVALID_KEY_MESSAGE,
                details: { apiKeyId: input.apiKeyId },
            });
        }

        const submission = tx.insert(submissions).values({
            id: newId(),
            apiKeyId: input.apiKeyId,
            fields: input.fields,
            sourceIp: input.sourceIp,
            userAgent: input.userAgent,
            createdAt,
            emailSent: false,
            emailError: null,
        }).returning().get();

        const files: FileAttachmentRow[] = input.stagedFiles.map((staged) =>
            tx.insert(fileAttachments).values({
                id: staged.id,
                submissionId: submission.id,
                originalFilename: staged.originalFilename,
                storedPath: staged.storedPath,
                fileSize: staged.fileSize,
                contentType: staged.contentType,
                createdAt,
            }).returning().get());

        return { ...submission, files };
    });
}

/**
 * Records the result of the one delivery attempt for a submission.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} id - Submission id
 * @param {DeliveryOutcome} outcome - What the notifier reported
 */
export function markDelivery(db: AppDatabase, id: string, outcome: DeliveryOutcome): void {
    db.update(submissions)
        .set({ emailSent: outcome.delivered, emailError: outcome.delivered ? null : outcome.error })
        .where(eq(submissions.id, id))
        .run();
}

/**
 * One page of submissions, newest first, optionally for a single key.
 *
 * @param {AppDatabase} db - Database instance
 * @param {ListQuery} query - 1-based page, page size and optional key filter
 * @returns {SubmissionPage} The page with the total across all pages
 */
export function listSubmissions(db: AppDatabase, query: ListQuery): SubmissionPage {
    const filter = query.apiKeyId ? eq(submissions.apiKeyId, query.apiKeyId) : undefined;

    const total = db.select({ value: count() }).from(submissions).where(filter).get()?.value ?? 0;
    const rows = db.select()
        .from(submissions)
        .where(filter)
        .orderBy(desc(submissions.createdAt), desc(submissions.id))
        .limit(query.perPage)
        .offset((query.page - 1) * query.perPage)
        .all();

    return {
        submissions: rows,
        total,
        page: query.page,
        perPage: query.perPage,
        pages: Math.ceil(total / query.perPage),
    };
}

/**
 * Retrieves a submission with its attachments, in staging order.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} id - Submission id
 * @returns {SubmissionWithFiles | null} The submission, or null if it does not exist
 */
export function findSubmission(db: AppDatabase, id: string): SubmissionWithFiles | null {
    const submission = db.select().from(submissions).where(eq(submissions.id, id)).get();
    if (!submission) return null;

    const files = db.select()
        .from(fileAttachments)
        .where(eq(fileAttachments.submissionId, id))
        .orderBy(asc(fileAttachments.id))
        .all();
    return { ...submission, files };
}

/** Attachment metadata by id, for downloads. */
export function findAttachment(db: AppDatabase, id: string): FileAttachmentRow | null {
    return db.select().from(fileAttachments).where(eq(fileAttachments.id, id)).get() ?? null;
}

/**
 * Deletes a submission, its attachment rows and their stored bytes.
 * Files are removed before the rows.
 *
 * @param {AppDatabase} db - Database instance
 * @param {string} uploadDir - Root of the attachment storage
 * @param {string} id - Submission id
 * @returns {Promise<boolean>} false if the submission does not exist
 */
export async function deleteSubmission(db: AppDatabase, uploadDir: string, id: string): Promise<boolean> {
    const submission = findSubmission(db, id);
    if (!submission) {
        return false;
    }

    await removeStoredFiles(uploadDir, submission.files.map((f) => f.storedPath));
    db.delete(submissions).where(eq(submissions.id, id)).run();
    return true;
}

/** Dashboard counters. "Recent" means the last seven days. */
export function getStats(db: AppDatabase, now: number = Date.now()): DashboardStats {
    const countOf = (rows: { value: number } | undefined) => rows?.value ?? 0;

    return {
        totalApiKeys: countOf(db.select({ value: count() }).from(apiKeys).get()),
        activeApiKeys: countOf(db.select({ value: count() }).from(apiKeys).where(eq(apiKeys.isActive, true)).get()),
        totalSubmissions: countOf(db.select({ value: count() }).from(submissions).get()),
        recentSubmissions: countOf(
            db.select({ value: count() }).from(submissions).where(gte(submissions.createdAt, now - RECENT_WINDOW_MS)).get(),
        ),
        totalFiles: countOf(db.select({ value: count() }).from(fileAttachments).get()),
    };
}
