const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

/**
 * Formats a byte count for people, e.g. `1536` -> `1.5 KB`.
 */
export function formatFileSize(bytes: number): string {
    let size = bytes;
    for (const unit of SIZE_UNITS) {
        if (size < 1024) {
            return `${size.toFixed(1)} ${unit}`;
        }
        size /= 1024;
    }
    return `${size.toFixed(1)} TB`;
}
