import { rm } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDb, type AppDatabase } from '../../../db';
import { buildServer } from '../../../server';
import { findKeyById } from '../../keys/repo';
import { listFiles, makeUploadDir, multipartBody, recordingTransport, removeDir, type FormPart } from '../../../../tests/helpers';
import { contentDisposition } from '../../submissions/route.admin';
import { bearerToken, tokensMatch } from '../guard';

const TOKEN = 'test-admin-token';
const auth = { authorization: `Bearer ${TOKEN}` };

describe('bearerToken', () => {
    it('extracts the token from a bearer header', () => {
        expect(bearerToken('Bearer abc')).toBe('abc');
        expect(bearerToken('bearer  abc ')).toBe('abc');
    });

    it('ignores other schemes and empty headers', () => {
        expect(bearerToken('Basic abc')).toBeNull();
        expect(bearerToken('Bearer')).toBeNull();
        expect(bearerToken(undefined)).toBeNull();
    });
});

describe('tokensMatch', () => {
    it('compares tokens of any length', () => {
        expect(tokensMatch(TOKEN, TOKEN)).toBe(true);
        expect(tokensMatch('short', TOKEN)).toBe(false);
    });
});

describe('contentDisposition', () => {
    it('adds an ASCII fallback for non-ASCII names', () => {
        expect(contentDisposition('cv.pdf')).toBe(`attachment; filename="cv.pdf"; filename*=UTF-8''cv.pdf`);
        expect(contentDisposition('résumé "v2".pdf')).toBe(
            `attachment; filename="r_sum_ _v2_.pdf"; filename*=UTF-8''r%C3%A9sum%C3%A9%20%22v2%22.pdf`,
        );
    });
});

describe('dashboard API', () => {
    let db: AppDatabase;
    let uploadDir: string;
    let app: Awaited<ReturnType<typeof buildServer>>;

    beforeEach(async () => {
        db = openDb(':memory:');
        uploadDir = await makeUploadDir();
        app = await buildServer({ db, uploadDir, mailTransport: recordingTransport().transport, adminToken: TOKEN });
    });

    afterEach(async () => {
        await app.close();
        await removeDir(uploadDir);
    });

    async function createKeyViaApi(name = 'Contact Form') {
        const response = await app.inject({
            method: 'POST',
            url: '/api/keys',
            headers: auth,
            payload: { name, recipientEmail: 'ops@example.com' },
        });
        expect(response.statusCode).toBe(201);
        const body = response.json();
        return { id: String(body.data.id), secret: String(body.data.secret) };
    }

    async function submit(secret: string, parts: FormPart[]): Promise<string> {
        const { payload, headers } = multipartBody(parts);
        const response = await app.inject({ method: 'POST', url: `/api/v1/submit/${secret}`, payload, headers });
        expect(response.statusCode).toBe(201);
        return String(response.json().data.submissionId);
    }

    it('requires the admin token', async () => {
        const missing = await app.inject({ method: 'GET', url: '/api/keys' });
        const wrong = await app.inject({ method: 'GET', url: '/api/stats', headers: { authorization: 'Bearer wrong-token' } });

        expect(missing.statusCode).toBe(401);
        expect(missing.json()).toEqual({ success: false, message: 'Authentication required' });
        expect(wrong.statusCode).toBe(401);
    });

    it('does not guard the public endpoint', async () => {
        const key = await createKeyViaApi();

        await submit(key.secret, [{ name: 'name', value: 'Ada' }]);
    });

    it('creates keys with a generated secret', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/api/keys',
            headers: auth,
            payload: { name: '  Careers  ', recipientEmail: 'jobs@example.com', secret: 'chosen' },
        });

        expect(response.statusCode).toBe(201);
        const { data } = response.json();
        expect(data).toMatchObject({ name: 'Careers', recipientEmail: 'jobs@example.com', isActive: true, usageCount: 0 });
        expect(data.secret).toHaveLength(43);
        expect(data.secret).not.toBe('chosen');
    });

    it('rejects an invalid key with field errors', async () => {
        const response = await app.inject({ method: 'POST', url: '/api/keys', headers: auth, payload: { name: '', recipientEmail: 'nope' } });

        expect(response.statusCode).toBe(400);
        const body = response.json();
        expect(body.message).toBe('Name and a valid recipient email are required');
        expect(Object.keys(body.errors).sort()).toEqual(['name', 'recipientEmail']);
    });

    it('lists keys with submission counts', async () => {
        const key = await createKeyViaApi();
        await submit(key.secret, [{ name: 'a', value: '1' }]);
        await submit(key.secret, [{ name: 'a', value: '2' }]);

        const response = await app.inject({ method: 'GET', url: '/api/keys', headers: auth });

        expect(response.statusCode).toBe(200);
        expect(response.json().data).toMatchObject([{ id: key.id, submissionCount: 2, usageCount: 2 }]);
    });

    it('deactivates a key so it stops accepting submissions', async () => {
        const key = await createKeyViaApi();

        const update = await app.inject({ method: 'PUT', url: `/api/keys/${key.id}`, headers: auth, payload: { isActive: false } });
        const { payload, headers } = multipartBody([{ name: 'name', value: 'Ada' }]);
        const submitResponse = await app.inject({ method: 'POST', url: `/api/v1/submit/${key.secret}`, payload, headers });

        expect(update.statusCode).toBe(200);
        expect(update.json().data.isActive).toBe(false);
        expect(submitResponse.statusCode).toBe(401);
    });

    it('refuses to change the secret or usage count', async () => {
        const key = await createKeyViaApi();

        const response = await app.inject({ method: 'PUT', url: `/api/keys/${key.id}`, headers: auth, payload: { secret: 'other' } });

        expect(response.statusCode).toBe(400);
        expect(response.json().message).toBe('Invalid API key update');
        expect(findKeyById(db, key.id)?.secret).toBe(key.secret);
    });

    it('returns 404 for unknown keys', async () => {
        const update = await app.inject({ method: 'PUT', url: '/api/keys/missing', headers: auth, payload: { name: 'x' } });
        const remove = await app.inject({ method: 'DELETE', url: '/api/keys/missing', headers: auth });

        expect(update.statusCode).toBe(404);
        expect(remove.json()).toEqual({ success: false, message: 'API key not found' });
    });

    it('pages submissions newest first', async () => {
        const key = await createKeyViaApi();
        const ids: string[] = [];
        for (let i = 0; i < 3; i++) {
            ids.push(await submit(key.secret, [{ name: 'n', value: String(i) }]));
        }

        const response = await app.inject({ method: 'GET', url: `/api/submissions?page=1&perPage=2&apiKeyId=${key.id}`, headers: auth });

        expect(response.statusCode).toBe(200);
        const { data } = response.json();
        expect(data).toMatchObject({ total: 3, page: 1, perPage: 2, pages: 2 });
        expect(data.submissions.map((s: { id: string }) => s.id)).toEqual([ids[2], ids[1]]);
    });

    it('rejects out-of-range pagination', async () => {
        const response = await app.inject({ method: 'GET', url: '/api/submissions?perPage=500', headers: auth });

        expect(response.statusCode).toBe(400);
        expect(response.json().message).toBe('Invalid pagination parameters');
    });

    it('shows a submission and downloads its attachment', async () => {
        const key = await createKeyViaApi();
        const submissionId = await submit(key.secret, [
            { name: 'name', value: 'Ada' },
            { name: 'resume', filename: 'cv.pdf', contentType: 'application/pdf', content: '%PDF-1.4 test' },
        ]);

        const detail = await app.inject({ method: 'GET', url: `/api/submissions/${submissionId}`, headers: auth });
        const { data } = detail.json();
        expect(data.fields).toEqual([{ name: 'name', value: 'Ada' }]);
        expect(data.files).toHaveLength(1);

        const download = await app.inject({ method: 'GET', url: `/api/files/${data.files[0].id}/download`, headers: auth });

        expect(download.statusCode).toBe(200);
        expect(download.headers['content-type']).toBe('application/pdf');
        expect(download.headers['content-disposition']).toBe(`attachment; filename="cv.pdf"; filename*=UTF-8''cv.pdf`);
        expect(download.body).toBe('%PDF-1.4 test');
    });

    it('answers 404 when the attachment bytes are gone', async () => {
        const key = await createKeyViaApi();
        const submissionId = await submit(key.secret, [{ name: 'doc', filename: 'a.txt', content: 'hello' }]);
        const { data } = (await app.inject({ method: 'GET', url: `/api/submissions/${submissionId}`, headers: auth })).json();
        await rm(path.join(uploadDir, ...String(data.files[0].storedPath).split('/')));

        const download = await app.inject({ method: 'GET', url: `/api/files/${data.files[0].id}/download`, headers: auth });

        expect(download.statusCode).toBe(404);
        expect(download.json()).toEqual({ success: false, message: 'File not found' });
    });

    it('deletes a submission with its files', async () => {
        const key = await createKeyViaApi();
        const submissionId = await submit(key.secret, [{ name: 'doc', filename: 'a.txt', content: 'hello' }]);

        const remove = await app.inject({ method: 'DELETE', url: `/api/submissions/${submissionId}`, headers: auth });
        const detail = await app.inject({ method: 'GET', url: `/api/submissions/${submissionId}`, headers: auth });

        expect(remove.json()).toEqual({ success: true, message: 'Submission deleted successfully' });
        expect(detail.statusCode).toBe(404);
        expect(await listFiles(uploadDir)).toEqual([]);
    });

    it('deletes a key with everything it owns', async () => {
        const key = await createKeyViaApi();
        await submit(key.secret, [{ name: 'doc', filename: 'a.txt', content: 'hello' }]);

        const remove = await app.inject({ method: 'DELETE', url: `/api/keys/${key.id}`, headers: auth });
        const stats = await app.inject({ method: 'GET', url: '/api/stats', headers: auth });

        expect(remove.statusCode).toBe(200);
        expect(stats.json().data).toEqual({ totalApiKeys: 0, activeApiKeys: 0, totalSubmissions: 0, recentSubmissions: 0, totalFiles: 0 });
        expect(await listFiles(uploadDir)).toEqual([]);
    });

    it('reports dashboard statistics', async () => {
        const key = await createKeyViaApi();
        await createKeyViaApi('Second');
        await submit(key.secret, [{ name: 'doc', filename: 'a.txt', content: 'hello' }, { name: 'n', value: 'v' }]);

        const response = await app.inject({ method: 'GET', url: '/api/stats', headers: auth });

        expect(response.json()).toEqual({
            success: true,
            message: 'Statistics retrieved',
            data: { totalApiKeys: 2, activeApiKeys: 2, totalSubmissions: 1, recentSubmissions: 1, totalFiles: 1 },
        });
    });
});
