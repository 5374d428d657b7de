import type { FastifyBaseLogger } from 'fastify';
import type { AppDatabase } from '../../db';
import type { SubmissionError } from '../../lib/errors';
import type { Notifier } from '../notify/service';
import type { DeliveryOutcome, SubmissionWithFiles } from '../submissions/types';
import type { AttachmentPolicy } from '../uploads/types';

/**
 * One part of an inbound form body, in wire order. File bytes are only
 * pulled when `read()` is called.
 */
export type PayloadPart =
    | { kind: 'field'; name: string; value: string }
    | { kind: 'file'; filename: string; contentType: string; read(): Promise<Buffer> };

export interface IngestRequest {
    /** Key secret taken from the URL */
    secret: string;
    sourceIp: string | null;
    userAgent: string | null;
    parts: AsyncIterable<PayloadPart>;
}

export interface IngestionDeps {
    db: AppDatabase;
    uploadDir: string;
    policy: AttachmentPolicy;
    notifier: Notifier;
    log: FastifyBaseLogger;
}

export type IngestionOutcome =
    | { status: 'accepted'; submission: SubmissionWithFiles; delivery: DeliveryOutcome }
    | { status: 'rejected'; error: SubmissionError };
