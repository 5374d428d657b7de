/**
 * Failure codes of the ingestion pipeline.
 *
 * `KeyNotFound` and `KeyInactive` are kept apart for logs only; clients
 * see the same message for both.
 */
export type SubmissionErrorCode =
    | 'KeyNotFound'
    | 'KeyInactive'
    | 'EmptySubmission'
    | 'FieldTooLarge'
    | 'TooManyParts'
    | 'FileTooLarge'
    | 'FileTypeNotAllowed'
    | 'MalformedBody'
    | 'StorageFailure';

const statusByCode: Record<SubmissionErrorCode, number> = {
    KeyNotFound: 401,
    KeyInactive: 401,
    EmptySubmission: 400,
    FieldTooLarge: 413,
    TooManyParts: 413,
    FileTooLarge: 413,
    FileTypeNotAllowed: 400,
    MalformedBody: 400,
    StorageFailure: 500,
};

export const INVALID_KEY_MESSAGE = 'Invalid or inactive API key';
export const STORAGE_FAILURE_MESSAGE = 'Failed to process form submission';

export interface SubmissionErrorOptions {
    code: SubmissionErrorCode;
    message: string;
    cause?: unknown;
    details?: Record<string, unknown>;
}

/**
 * A rejected submission. `message` is safe to return to the submitting
 * client; `cause` and `details` are for logs.
 */
export class SubmissionError extends Error {
    public readonly code: SubmissionErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(options: SubmissionErrorOptions) {
        super(options.message, { cause: options.cause });
        this.name = 'SubmissionError';
        this.code = options.code;
        this.details = options.details;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SubmissionError);
        }
    }

    get statusCode(): number {
        return statusByCode[this.code];
    }

    static isSubmissionError(error: unknown): error is SubmissionError {
        return error instanceof SubmissionError;
    }
}

/** Reads a message off anything that was thrown. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Reads the `code` property node and library errors carry, if any. */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
