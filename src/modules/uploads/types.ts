/**
 * What a key's endpoint accepts as attachments. Extensions are stored
 * lower-case without the leading dot.
 */
export interface AttachmentPolicy {
    maxBytesPerFile: number;
    allowedExtensions: ReadonlySet<string>;
}

/** A file part as received from the client. Nothing here is trusted. */
export interface IncomingFile {
    filename: string;
    contentType: string;
    content: Buffer;
}

/**
 * A file written to storage but not yet linked to a submission row.
 * `id` becomes the attachment id once the submission is recorded.
 */
export interface StagedFile {
    id: string;
    originalFilename: string;
    /** Relative to the upload directory, built from server ids only */
    storedPath: string;
    fileSize: number;
    contentType: string;
}
