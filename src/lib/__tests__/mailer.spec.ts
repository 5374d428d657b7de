import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeUploadDir, removeDir } from '../../../tests/helpers';
import {
    createMailTransport,
    createResendTransport,
    createSmtpTransport,
    createUnconfiguredTransport,
    type OutgoingMail,
    type ResendClient,
} from '../mailer';

function message(attachments: OutgoingMail['attachments'] = []): OutgoingMail {
    return {
        from: '"Form Service" <forms@example.com>',
        to: 'owner@example.com',
        subject: 'New Form Submission - Contact',
        text: 'text body',
        html: '<p>html body</p>',
        attachments,
    };
}

describe('createSmtpTransport', () => {
    it('hands the message to the sender', async () => {
        const sendMail = vi.fn(async () => ({ messageId: 'id-1' }));
        const transport = createSmtpTransport({ sendMail });

        await transport.send(message([{ filename: 'cv.pdf', path: '/srv/uploads/k/f', contentType: 'application/pdf' }]));

        expect(transport.name).toBe('smtp');
        expect(sendMail).toHaveBeenCalledWith({
            from: '"Form Service" <forms@example.com>',
            to: 'owner@example.com',
            subject: 'New Form Submission - Contact',
            text: 'text body',
            html: '<p>html body</p>',
            attachments: [{ filename: 'cv.pdf', path: '/srv/uploads/k/f', contentType: 'application/pdf' }],
        });
    });

    it('propagates sender failures', async () => {
        const transport = createSmtpTransport({ sendMail: vi.fn(async () => { throw new Error('Invalid login'); }) });

        await expect(transport.send(message())).rejects.toThrow('Invalid login');
    });
});

describe('createResendTransport', () => {
    let uploadDir: string;

    beforeEach(async () => {
        uploadDir = await makeUploadDir();
    });

    afterEach(async () => {
        await removeDir(uploadDir);
    });

    it('uploads attachment bytes read from storage', async () => {
        const filePath = path.join(uploadDir, 'f1');
        await writeFile(filePath, 'file bytes');
        const send = vi.fn<ResendClient['emails']['send']>(async () => ({ error: null }));
        const transport = createResendTransport({ emails: { send } });

        await transport.send(message([{ filename: 'a.txt', path: filePath, contentType: 'text/plain' }]));

        expect(send).toHaveBeenCalledTimes(1);
        const payload = send.mock.calls[0][0];
        expect(payload.to).toEqual(['owner@example.com']);
        expect(payload.attachments).toHaveLength(1);
        expect(payload.attachments[0].filename).toBe('a.txt');
        expect(payload.attachments[0].content.toString('utf8')).toBe('file bytes');
    });

    it('throws when the API returns an error', async () => {
        const transport = createResendTransport({
            emails: { send: async () => ({ error: { message: 'API key is invalid' } }) },
        });

        await expect(transport.send(message())).rejects.toThrow('Resend rejected the message: API key is invalid');
    });
});

describe('createMailTransport', () => {
    const mail = {
        provider: 'smtp' as const,
        from: { email: 'forms@example.com', name: 'Form Service' },
        smtp: { host: undefined, port: 587, secure: false, username: undefined, password: undefined },
        resendApiKey: undefined,
    };

    it('falls back to an unconfigured transport without SMTP_HOST', async () => {
        const transport = createMailTransport(mail);

        expect(transport.name).toBe('unconfigured');
        await expect(transport.send(message())).rejects.toThrow('Mail transport not configured: SMTP_HOST is not set');
    });

    it('falls back to an unconfigured transport without RESEND_API_KEY', () => {
        expect(createMailTransport({ ...mail, provider: 'resend' }).name).toBe('unconfigured');
    });

    it('builds an SMTP transport when a host is set', () => {
        expect(createMailTransport({ ...mail, smtp: { ...mail.smtp, host: 'smtp.example.test' } }).name).toBe('smtp');
    });

    it('builds a Resend transport when an API key is set', () => {
        expect(createMailTransport({ ...mail, provider: 'resend', resendApiKey: 'test-secret' }).name).toBe('resend');
    });
});

describe('createUnconfiguredTransport', () => {
    it('rejects every send with the reason', async () => {
        await expect(createUnconfiguredTransport('no provider').send(message())).rejects.toThrow('Mail transport not configured: no provider');
    });
});
