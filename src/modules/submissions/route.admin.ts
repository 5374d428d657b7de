import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { FastifyInstance } from 'fastify';
import type { AppDatabase } from '../../db';
import { errorCode } from '../../lib/errors';
import { envelopeSchema, fail, ok } from '../../lib/response';
import { resolveStoredPath } from '../uploads/storage';
import { deleteSubmission, findAttachment, findSubmission, getStats, listSubmissions } from './repo';
import { ListQuerySchema } from './types';

export interface SubmissionRoutesOptions {
    db: AppDatabase;
    uploadDir: string;
}

const idParams = {
    type: 'object',
    properties: { id: { type: 'string' } },
    required: ['id'],
} as const;

/**
 * `attachment` disposition carrying the original name: an ASCII fallback
 * plus the RFC 5987 UTF-8 form.
 */
export function contentDisposition(filename: string): string {
    const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
    return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

/**
 * Registers the dashboard's read and delete routes for submissions:
 * - GET /api/submissions?page&perPage&apiKeyId - Newest first
 * - GET /api/submissions/:id - One submission with its files
 * - DELETE /api/submissions/:id - Delete it and its stored files
 * - GET /api/files/:id/download - Stream an attachment
 * - GET /api/stats - Dashboard counters
 */
export default async function registerSubmissionRoutes(app: FastifyInstance, opts: SubmissionRoutesOptions) {
    const { db, uploadDir } = opts;

    app.get('/api/submissions', {
        schema: { summary: 'List submissions', tags: ['Dashboard'], response: { 200: envelopeSchema, 400: envelopeSchema } },
    }, async (req, reply) => {
        const parsed = ListQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            return reply.status(400).send(fail('Invalid pagination parameters', parsed.error.flatten().fieldErrors));
        }
        return reply.send(ok('Submissions retrieved', listSubmissions(db, parsed.data)));
    });

    app.get<{ Params: { id: string } }>('/api/submissions/:id', {
        schema: { summary: 'Get submission', tags: ['Dashboard'], params: idParams, response: { 200: envelopeSchema, 404: envelopeSchema } },
    }, async (req, reply) => {
        const submission = findSubmission(db, req.params.id);
        if (!submission) {
            return reply.status(404).send(fail('Submission not found'));
        }
        return reply.send(ok('Submission retrieved', submission));
    });

    app.delete<{ Params: { id: string } }>('/api/submissions/:id', {
        schema: { summary: 'Delete submission', tags: ['Dashboard'], params: idParams, response: { 200: envelopeSchema, 404: envelopeSchema } },
    }, async (req, reply) => {
        const deleted = await deleteSubmission(db, uploadDir, req.params.id);
        if (!deleted) {
            return reply.status(404).send(fail('Submission not found'));
        }
        req.log.info({ submissionId: req.params.id }, 'Submission deleted');
        return reply.send(ok('Submission deleted successfully'));
    });

    app.get<{ Params: { id: string } }>('/api/files/:id/download', {
        schema: { summary: 'Download attachment', tags: ['Dashboard'], params: idParams },
    }, async (req, reply) => {
        const attachment = findAttachment(db, req.params.id);
        if (!attachment) {
            return reply.status(404).send(fail('File not found'));
        }

        const filePath = resolveStoredPath(uploadDir, attachment.storedPath);
        try {
            await stat(filePath);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                req.log.error({ attachmentId: attachment.id, storedPath: attachment.storedPath }, 'Attachment missing from storage');
                return reply.status(404).send(fail('File not found'));
            }
            throw error;
        }

        return reply
            .header('Content-Type', attachment.contentType)
            .header('Content-Length', attachment.fileSize)
            .header('Content-Disposition', contentDisposition(attachment.originalFilename))
            .send(createReadStream(filePath));
    });

    app.get('/api/stats', {
        schema: { summary: 'Dashboard statistics', tags: ['Dashboard'], response: { 200: envelopeSchema } },
    }, async () => ok('Statistics retrieved', getStats(db)));
}
