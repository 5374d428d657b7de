import type { FastifyBaseLogger } from 'fastify';
import type { FieldEntry } from '../../db/schema';
import {
    INVALID_KEY_MESSAGE,
    STORAGE_FAILURE_MESSAGE,
    SubmissionError,
    errorMessage,
} from '../../lib/errors';
import { isUsable, recordUsage, resolveKey } from '../keys/repo';
import { markDelivery, recordSubmission } from '../submissions/repo';
import type { SubmissionWithFiles } from '../submissions/types';
import { StagingSession } from '../uploads/stager';
import type { IngestRequest, IngestionDeps, IngestionOutcome } from './types';

const USER_AGENT_MAX = 255;

function rejected(error: SubmissionError): IngestionOutcome {
    return { status: 'rejected', error };
}

/**
 * Errors raised while reading the body are already classified by the
 * payload adapter or the stager; anything else is an unreadable body.
 */
function classifyStagingError(error: unknown): SubmissionError {
    if (SubmissionError.isSubmissionError(error)) {
        return error;
    }
    return new SubmissionError({ code: 'MalformedBody', message: 'Malformed form data', cause: error });
}

async function discardStaged(session: StagingSession, log: FastifyBaseLogger, apiKeyId: string): Promise<void> {
    const count = session.staged.length;
    if (count === 0) return;
    try {
        await session.discard();
    } catch (error) {
        // The request still fails with its original error; the leftovers are orphans.
        log.error({ err: error, apiKeyId, count }, 'Failed to remove staged files');
    }
}

/**
 * Handles one inbound submission: resolve the key, stage attachments,
 * persist, notify, respond.
 *
 * Rejections leave nothing behind: resolution failures happen before the
 * body is read, and staging or persistence failures delete whatever this
 * request staged. The key is checked again when the submission is
 * recorded, so one deactivated mid-upload is rejected like an inactive
 * key. Once the submission is recorded the outcome is `accepted` no
 * matter how delivery or the follow-up bookkeeping goes.
 *
 * @param {IngestionDeps} deps - Database, upload directory, attachment policy, notifier and logger
 * @param {IngestRequest} request - Key secret, client metadata and the ordered body parts
 * @returns {Promise<IngestionOutcome>} `accepted` with the recorded submission, or `rejected` with the reason
 */
export async function ingestSubmission(deps: IngestionDeps, request: IngestRequest): Promise<IngestionOutcome> {
    const { db, log } = deps;

    const key = resolveKey(db, request.secret);
    if (!key) {
        return rejected(new SubmissionError({ code: 'KeyNotFound', message: INVALID_KEY_MESSAGE }));
    }
    if (!isUsable(key)) {
        return rejected(new SubmissionError({ code: 'KeyInactive', message: INVALID_KEY_MESSAGE, details: { apiKeyId: key.id } }));
    }

    const session = new StagingSession(deps.uploadDir, key.id, deps.policy);
    const fields: FieldEntry[] = [];
    try {
        for await (const part of request.parts) {
            if (part.kind === 'field') {
                fields.push({ name: part.name, value: part.value });
                continue;
            }
            const content = await part.read();
            await session.stage({ filename: part.filename, contentType: part.contentType, content });
        }
        if (fields.length === 0 && session.staged.length === 0) {
            throw new SubmissionError({ code: 'EmptySubmission', message: 'No form data provided' });
        }
    } catch (error) {
        await discardStaged(session, log, key.id);
        return rejected(classifyStagingError(error));
    }

    let submission: SubmissionWithFiles;
    try {
        submission = recordSubmission(db, {
            apiKeyId: key.id,
            fields,
            sourceIp: request.sourceIp,
            userAgent: request.userAgent ? request.userAgent.slice(0, USER_AGENT_MAX) : null,
            stagedFiles: session.staged,
        });
    } catch (error) {
        await discardStaged(session, log, key.id);
        if (SubmissionError.isSubmissionError(error)) {
            return rejected(error);
        }
        log.error({ err: error, apiKeyId: key.id }, 'Failed to record submission');
        return rejected(new SubmissionError({ code: 'StorageFailure', message: STORAGE_FAILURE_MESSAGE, cause: error }));
    }

    const delivery = await deps.notifier.deliver(submission, key, session.staged);

    try {
        markDelivery(db, submission.id, delivery);
    } catch (error) {
        log.error({ err: error, submissionId: submission.id }, `Failed to record delivery status: ${errorMessage(error)}`);
    }
    try {
        recordUsage(db, key.id);
    } catch (error) {
        log.error({ err: error, apiKeyId: key.id }, `Failed to record key usage: ${errorMessage(error)}`);
    }

    log.info({ submissionId: submission.id, apiKeyId: key.id, files: submission.files.length, emailSent: delivery.delivered }, 'Submission accepted');

    return {
        status: 'accepted',
        submission: { ...submission, emailSent: delivery.delivered, emailError: delivery.error },
        delivery,
    };
}
