import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import Fastify, { type FastifyBaseLogger } from 'fastify';
import { vi } from 'vitest';
import type { MailTransport, OutgoingMail } from '../src/lib/mailer';

export type FormPart =
    | { name: string; value: string }
    | { name: string; filename: string; contentType?: string; content: Buffer | string };

const BOUNDARY = '----formrelay-test-boundary';

/**
 * Encodes parts as a multipart/form-data body for `app.inject`.
 */
export function multipartBody(parts: FormPart[]): { payload: Buffer; headers: Record<string, string> } {
    const chunks: Buffer[] = [];
    for (const part of parts) {
        chunks.push(Buffer.from(`--${BOUNDARY}\r\n`));
        if ('value' in part) {
            chunks.push(Buffer.from(`Content-Disposition: form-data; name="${part.name}"\r\n\r\n`));
            chunks.push(Buffer.from(part.value, 'utf8'));
        } else {
            chunks.push(Buffer.from(
                `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\n`
                + `Content-Type: ${part.contentType ?? 'application/octet-stream'}\r\n\r\n`,
            ));
            chunks.push(typeof part.content === 'string' ? Buffer.from(part.content, 'utf8') : part.content);
        }
        chunks.push(Buffer.from('\r\n'));
    }
    chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

    return {
        payload: Buffer.concat(chunks),
        headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
    };
}

/** A mail transport that keeps every message it is given. */
export function recordingTransport() {
    const sent: OutgoingMail[] = [];
    const transport: MailTransport = {
        name: 'recording',
        send: vi.fn(async (mail: OutgoingMail) => {
            sent.push(mail);
        }),
    };
    return { transport, sent };
}

/** A mail transport whose server cannot be reached. */
export function unreachableTransport(): MailTransport {
    return {
        name: 'unreachable',
        send: vi.fn(async () => {
            throw new Error('connect ECONNREFUSED 127.0.0.1:587');
        }),
    };
}

export async function makeUploadDir(): Promise<string> {
    return mkdtemp(path.join(tmpdir(), 'formrelay-test-'));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/** Every file under `dir`, as `/`-separated paths relative to it. */
export async function listFiles(dir: string, prefix = ''): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
        const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            files.push(...await listFiles(path.join(dir, entry.name), relative));
        } else if (entry.isFile()) {
            files.push(relative);
        }
    }
    return files.sort();
}

/** A logger that writes nothing, for calling services outside a server. */
export function silentLogger(): FastifyBaseLogger {
    return Fastify({ logger: { level: 'silent' } }).log;
}
