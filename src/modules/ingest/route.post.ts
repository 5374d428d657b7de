import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { SubmissionError, errorCode } from '../../lib/errors';
import { formatFileSize } from '../../lib/format';
import { envelopeSchema, fail, ok } from '../../lib/response';
import { fileTooLarge } from '../uploads/stager';
import { ingestSubmission } from './service';
import type { IngestionDeps, PayloadPart } from './types';

export interface SubmitRouteOptions extends Omit<IngestionDeps, 'log'> {
    limits: { maxFiles: number; maxFields: number; submitPerMinute: number };
}

function partLimitError(error: unknown, opts: SubmitRouteOptions): SubmissionError | null {
    const { limits } = opts;
    switch (errorCode(error)) {
        case 'FST_REQ_FILE_TOO_LARGE':
            return new SubmissionError({
                code: 'FileTooLarge',
                message: `File too large (limit ${formatFileSize(opts.policy.maxBytesPerFile)})`,
                cause: error,
            });
        case 'FST_FILES_LIMIT':
            return new SubmissionError({ code: 'TooManyParts', message: `Too many files (limit ${limits.maxFiles})`, cause: error });
        case 'FST_FIELDS_LIMIT':
            return new SubmissionError({ code: 'TooManyParts', message: `Too many fields (limit ${limits.maxFields})`, cause: error });
        case 'FST_PARTS_LIMIT':
            return new SubmissionError({ code: 'TooManyParts', message: 'Too many form parts', cause: error });
        case 'FST_INVALID_MULTIPART_CONTENT_TYPE':
            return new SubmissionError({ code: 'MalformedBody', message: 'Request must be multipart/form-data', cause: error });
        default:
            return null;
    }
}

function fileReader(part: MultipartFile, maxFileBytes: number): () => Promise<Buffer> {
    return async () => {
        try {
            return await part.toBuffer();
        } catch (error) {
            if (errorCode(error) === 'FST_REQ_FILE_TOO_LARGE') {
                throw fileTooLarge(part.filename, maxFileBytes);
            }
            throw error;
        }
    };
}

/**
 * Adapts the multipart body into ordered payload parts. File parts with
 * no filename (an empty file input) are drained and skipped.
 */
async function* payloadParts(req: FastifyRequest, opts: SubmitRouteOptions): AsyncGenerator<PayloadPart> {
    try {
        for await (const part of req.parts()) {
            if (part.type === 'file') {
                if (!part.filename) {
                    part.file.resume();
                    continue;
                }
                yield {
                    kind: 'file',
                    filename: part.filename,
                    contentType: part.mimetype,
                    read: fileReader(part, opts.policy.maxBytesPerFile),
                };
                continue;
            }

            if (part.valueTruncated) {
                throw new SubmissionError({ code: 'FieldTooLarge', message: `Field too large: ${part.fieldname}` });
            }
            yield {
                kind: 'field',
                name: part.fieldname,
                value: typeof part.value === 'string' ? part.value : String(part.value),
            };
        }
    } catch (error) {
        throw partLimitError(error, opts) ?? error;
    }
}

/**
 * Registers POST /api/v1/submit/:secret, the public form endpoint.
 *
 * The body is `multipart/form-data`: every text part becomes a field of
 * the submission and every file part an attachment. The JSON `success`
 * flag is the outcome; it is true whenever the submission was recorded,
 * even if the notification email could not be sent.
 */
export default async function registerSubmitRoute(app: FastifyInstance, opts: SubmitRouteOptions) {
    app.post<{ Params: { secret: string } }>('/api/v1/submit/:secret', {
        schema: {
            summary: 'Submit a form',
            description: 'Accepts a multipart/form-data body for the API key in the path, records it and emails it to the key recipient.',
            tags: ['Submit'],
            consumes: ['multipart/form-data'],
            params: {
                type: 'object',
                properties: {
                    secret: { type: 'string', description: 'API key secret' },
                },
                required: ['secret'],
            },
            response: {
                201: { description: 'Submission recorded', ...envelopeSchema },
                400: { description: 'Invalid form data or file type', ...envelopeSchema },
                401: { description: 'Invalid or inactive API key', ...envelopeSchema },
                413: { description: 'File, field or part count over the limit', ...envelopeSchema },
                500: { description: 'Submission could not be stored', ...envelopeSchema },
            },
        },
        config: {
            rateLimit: { max: opts.limits.submitPerMinute, timeWindow: '1 minute' },
        },
    }, async (req, reply) => {
        const { secret } = req.params;

        const outcome = await ingestSubmission({ ...opts, log: req.log }, {
            secret,
            sourceIp: req.ip || null,
            userAgent: req.headers['user-agent'] ?? null,
            parts: payloadParts(req, opts),
        });

        if (outcome.status === 'rejected') {
            const { error } = outcome;
            const logLevel = error.statusCode >= 500 ? 'error' : 'info';
            req.log[logLevel]({ code: error.code, details: error.details }, `Submission rejected: ${error.message}`);
            return reply.status(error.statusCode).send(fail(error.message));
        }

        return reply.status(201).send(ok('Form submitted successfully', { submissionId: outcome.submission.id }));
    });
}
