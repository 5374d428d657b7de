import { readFile } from 'node:fs/promises';
import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { Resend } from 'resend';
import type { AppConfig } from '../config';

export interface MailAttachment {
    filename: string;
    /** Absolute path of the bytes to attach */
    path: string;
    contentType: string;
}

export interface OutgoingMail {
    from: string;
    to: string;
    subject: string;
    text: string;
    html: string;
    attachments: MailAttachment[];
}

/**
 * Something that can hand a message to a mail service. `send` resolves
 * once the service accepted the message and rejects on any failure.
 */
export interface MailTransport {
    readonly name: string;
    send(mail: OutgoingMail): Promise<void>;
}

/** The part of a nodemailer transporter the SMTP transport uses. */
export interface SmtpSender {
    sendMail(options: SendMailOptions): Promise<unknown>;
}

/**
 * Sends through SMTP. Attachments are streamed from storage by the
 * sender itself.
 *
 * @param {SmtpSender} sender - A nodemailer transporter
 * @returns {MailTransport} Transport named `smtp`
 */
export function createSmtpTransport(sender: SmtpSender): MailTransport {
    return {
        name: 'smtp',
        async send(mail) {
            await sender.sendMail({
                from: mail.from,
                to: mail.to,
                subject: mail.subject,
                text: mail.text,
                html: mail.html,
                attachments: mail.attachments.map((a) => ({
                    filename: a.filename,
                    path: a.path,
                    contentType: a.contentType,
                })),
            });
        },
    };
}

interface ResendPayload {
    from: string;
    to: string[];
    subject: string;
    text: string;
    html: string;
    attachments: { filename: string; content: Buffer }[];
}

/** The part of the Resend SDK the Resend transport uses. */
export interface ResendClient {
    emails: {
        send(payload: ResendPayload): Promise<{ error: { message: string } | null }>;
    };
}

/**
 * Sends through the Resend HTTP API. Attachments are read from storage
 * and uploaded inline.
 */
export function createResendTransport(client: ResendClient): MailTransport {
    return {
        name: 'resend',
        async send(mail) {
            const attachments = await Promise.all(mail.attachments.map(async (a) => ({
                filename: a.filename,
                content: await readFile(a.path),
            })));

            const { error } = await client.emails.send({
                from: mail.from,
                to: [mail.to],
                subject: mail.subject,
                text: mail.text,
                html: mail.html,
                attachments,
            });
            if (error) {
                throw new Error(`Resend rejected the message: ${error.message}`);
            }
        },
    };
}

/** Stands in when no provider is configured; every send fails. */
export function createUnconfiguredTransport(reason: string): MailTransport {
    return {
        name: 'unconfigured',
        async send() {
            throw new Error(`Mail transport not configured: ${reason}`);
        },
    };
}

const SMTP_TIMEOUT_MS = 15_000;

/**
 * Builds the transport selected by `MAIL_PROVIDER`.
 *
 * Missing credentials do not stop the server from starting; submissions
 * are still recorded and the delivery failure lands on each of them.
 */
export function createMailTransport(mail: AppConfig['mail']): MailTransport {
    if (mail.provider === 'resend') {
        if (!mail.resendApiKey) {
            return createUnconfiguredTransport('RESEND_API_KEY is not set');
        }
        return createResendTransport(new Resend(mail.resendApiKey));
    }

    const { smtp } = mail;
    if (!smtp.host) {
        return createUnconfiguredTransport('SMTP_HOST is not set');
    }
    return createSmtpTransport(nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: smtp.secure,
        auth: smtp.username && smtp.password ? { user: smtp.username, pass: smtp.password } : undefined,
        connectionTimeout: SMTP_TIMEOUT_MS,
        greetingTimeout: SMTP_TIMEOUT_MS,
        socketTimeout: SMTP_TIMEOUT_MS,
    }));
}
