import { rm } from 'node:fs/promises';
import path from 'node:path';

/**
 * Maps a stored path (always `/`-separated, relative) to its location
 * under the upload directory.
 */
export function resolveStoredPath(uploadDir: string, storedPath: string): string {
    return path.join(path.resolve(uploadDir), ...storedPath.split('/'));
}

/** Deletes one stored file. Missing files count as deleted. */
export async function removeStoredFile(uploadDir: string, storedPath: string): Promise<void> {
    await rm(resolveStoredPath(uploadDir, storedPath), { force: true });
}

/**
 * Deletes several stored files, attempting all of them before reporting
 * the first failure.
 */
export async function removeStoredFiles(uploadDir: string, storedPaths: readonly string[]): Promise<void> {
    const results = await Promise.allSettled(storedPaths.map((p) => removeStoredFile(uploadDir, p)));
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failures.length > 0) {
        throw new AggregateError(
            failures.map((f) => f.reason),
            `Failed to delete ${failures.length} of ${storedPaths.length} stored files`,
        );
    }
}
