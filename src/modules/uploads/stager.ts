import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { newId } from '../../lib/ids';
import { formatFileSize } from '../../lib/format';
import { SubmissionError } from '../../lib/errors';
import { removeStoredFile, removeStoredFiles, resolveStoredPath } from './storage';
import type { AttachmentPolicy, IncomingFile, StagedFile } from './types';

/**
 * Extension of a client-supplied filename: the last dot segment,
 * lower-cased. `''` when the name has no dot.
 */
export function fileExtension(filename: string): string {
    const dot = filename.lastIndexOf('.');
    if (dot < 0) return '';
    return filename.slice(dot + 1).toLowerCase();
}

/**
 * Checks a file against the policy. Type enforcement is by extension
 * only; the content is never inspected.
 *
 * @throws {SubmissionError} `FileTooLarge` or `FileTypeNotAllowed`, naming the file
 */
export function validateAttachment(file: Pick<IncomingFile, 'filename'> & { size: number }, policy: AttachmentPolicy): void {
    if (file.size > policy.maxBytesPerFile) {
        throw fileTooLarge(file.filename, policy.maxBytesPerFile);
    }
    if (!policy.allowedExtensions.has(fileExtension(file.filename))) {
        throw new SubmissionError({
            code: 'FileTypeNotAllowed',
            message: `File type not allowed: ${file.filename}`,
            details: { filename: file.filename },
        });
    }
}

/**
 * Builds the `FileTooLarge` rejection for a file, with the limit in
 * human units.
 *
 * @param {string} filename - Client filename, as shown back to the client
 * @param {number} maxBytes - Per-file limit in bytes
 * @returns {SubmissionError} The error to reject the request with
 */
export function fileTooLarge(filename: string, maxBytes: number): SubmissionError {
    return new SubmissionError({
        code: 'FileTooLarge',
        message: `File too large: ${filename} (limit ${formatFileSize(maxBytes)})`,
        details: { filename, maxBytes },
    });
}

/**
 * Stages the files of one request.
 *
 * Each accepted file is written to `{uploadDir}/{apiKeyId}/{id}` where
 * `id` is a fresh ULID; the client filename is kept for display only.
 * The session remembers everything it wrote so a failed request can
 * take it all back with `discard()`.
 */
export class StagingSession {
    private readonly files: StagedFile[] = [];

    constructor(
        private readonly uploadDir: string,
        private readonly apiKeyId: string,
        private readonly policy: AttachmentPolicy,
    ) {}

    get staged(): readonly StagedFile[] {
        return this.files;
    }

    /**
     * Validates one file and writes it to storage.
     *
     * @param {IncomingFile} file - Client filename, declared type and buffered bytes
     * @returns {Promise<StagedFile>} The draft to link to the submission
     * @throws {SubmissionError} `FileTooLarge`, `FileTypeNotAllowed` or `StorageFailure`
     */
    async stage(file: IncomingFile): Promise<StagedFile> {
        validateAttachment({ filename: file.filename, size: file.content.length }, this.policy);

        const id = newId();
        const storedPath = `${this.apiKeyId}/${id}`;
        const target = resolveStoredPath(this.uploadDir, storedPath);

        try {
            await mkdir(path.dirname(target), { recursive: true });
            await writeFile(target, file.content, { flag: 'wx' });
        } catch (error) {
            await removeStoredFile(this.uploadDir, storedPath);
            throw new SubmissionError({
                code: 'StorageFailure',
                message: 'Failed to store uploaded file',
                cause: error,
                details: { storedPath },
            });
        }

        const draft: StagedFile = {
            id,
            originalFilename: file.filename,
            storedPath,
            fileSize: file.content.length,
            contentType: file.contentType || 'application/octet-stream',
        };
        this.files.push(draft);
        return draft;
    }

    /** Deletes every file this session staged. */
    async discard(): Promise<void> {
        const files = this.files.splice(0);
        await removeStoredFiles(this.uploadDir, files.map((f) => f.storedPath));
    }
}
