import type { FastifyBaseLogger } from 'fastify';
import type { ApiKeyRecord, SubmissionRow } from '../../db/schema';
import { errorMessage } from '../../lib/errors';
import type { MailTransport } from '../../lib/mailer';
import type { DeliveryOutcome } from '../submissions/types';
import { resolveStoredPath } from '../uploads/storage';
import type { StagedFile } from '../uploads/types';
import { renderNotification } from './render';

export interface NotifierOptions {
    transport: MailTransport;
    from: { email: string; name: string };
    uploadDir: string;
    dashboardUrl?: string;
    log: FastifyBaseLogger;
}

export interface Notifier {
    deliver(
        submission: SubmissionRow,
        apiKey: Pick<ApiKeyRecord, 'id' | 'name' | 'recipientEmail'>,
        files: readonly StagedFile[],
    ): Promise<DeliveryOutcome>;
}

function formatFrom(from: NotifierOptions['from']): string {
    const name = from.name.replace(/["\\\r\n]/g, '');
    return name ? `"${name}" <${from.email}>` : from.email;
}

/**
 * Creates the notifier for recorded submissions.
 *
 * `deliver` makes exactly one send attempt and never rejects: transport
 * failures of any kind come back as `{ delivered: false, error }`.
 *
 * @param {NotifierOptions} options - Transport, sender, upload directory, dashboard link and logger
 * @returns {Notifier} Notifier bound to those options
 */
export function createNotifier(options: NotifierOptions): Notifier {
    const { transport, uploadDir, log } = options;
    const from = formatFrom(options.from);

    return {
        async deliver(submission, apiKey, files) {
            try {
                const rendered = renderNotification({
                    keyName: apiKey.name,
                    fields: submission.fields,
                    files,
                    receivedAt: submission.createdAt,
                    sourceIp: submission.sourceIp,
                    dashboardUrl: options.dashboardUrl,
                });

                await transport.send({
                    from,
                    to: apiKey.recipientEmail,
                    ...rendered,
                    attachments: files.map((file) => ({
                        filename: file.originalFilename,
                        path: resolveStoredPath(uploadDir, file.storedPath),
                        contentType: file.contentType,
                    })),
                });

                log.info({ submissionId: submission.id, apiKeyId: apiKey.id, transport: transport.name }, 'Notification sent');
                return { delivered: true, error: null };
            } catch (error) {
                const message = errorMessage(error) || 'Unknown delivery error';
                log.warn({ submissionId: submission.id, apiKeyId: apiKey.id, transport: transport.name, err: error }, 'Notification failed');
                return { delivered: false, error: message };
            }
        },
    };
}
