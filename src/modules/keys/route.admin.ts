import type { FastifyInstance } from 'fastify';
import type { AppDatabase } from '../../db';
import { envelopeSchema, fail, ok } from '../../lib/response';
import { createKey, deleteKey, listKeys, updateKey } from './repo';
import { CreateKeySchema, UpdateKeySchema } from './types';

export interface KeyRoutesOptions {
    db: AppDatabase;
    uploadDir: string;
}

const idParams = {
    type: 'object',
    properties: { id: { type: 'string', description: 'API key id' } },
    required: ['id'],
} as const;

/**
 * Registers the dashboard's API key routes:
 * - GET /api/keys - List keys with submission counts
 * - POST /api/keys - Create a key (the secret is generated here)
 * - PUT /api/keys/:id - Rename, change recipient, activate or deactivate
 * - DELETE /api/keys/:id - Delete a key with its submissions and files
 */
export default async function registerKeyRoutes(app: FastifyInstance, opts: KeyRoutesOptions) {
    const { db, uploadDir } = opts;

    app.get('/api/keys', {
        schema: { summary: 'List API keys', tags: ['Dashboard'], response: { 200: envelopeSchema } },
    }, async () => ok('API keys retrieved', listKeys(db)));

    app.post('/api/keys', {
        schema: { summary: 'Create API key', tags: ['Dashboard'], response: { 201: envelopeSchema, 400: envelopeSchema } },
    }, async (req, reply) => {
        const parsed = CreateKeySchema.safeParse(req.body);
        if (!parsed.success) {
            return reply.status(400).send(fail('Name and a valid recipient email are required', parsed.error.flatten().fieldErrors));
        }
        const key = createKey(db, parsed.data);
        req.log.info({ apiKeyId: key.id }, 'API key created');
        return reply.status(201).send(ok('API key created successfully', key));
    });

    app.put<{ Params: { id: string } }>('/api/keys/:id', {
        schema: {
            summary: 'Update API key',
            tags: ['Dashboard'],
            params: idParams,
            response: { 200: envelopeSchema, 400: envelopeSchema, 404: envelopeSchema },
        },
    }, async (req, reply) => {
        const parsed = UpdateKeySchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return reply.status(400).send(fail('Invalid API key update', parsed.error.flatten().fieldErrors));
        }
        const key = updateKey(db, req.params.id, parsed.data);
        if (!key) {
            return reply.status(404).send(fail('API key not found'));
        }
        req.log.info({ apiKeyId: key.id }, 'API key updated');
        return reply.send(ok('API key updated successfully', key));
    });

    app.delete<{ Params: { id: string } }>('/api/keys/:id', {
        schema: { summary: 'Delete API key', tags: ['Dashboard'], params: idParams, response: { 200: envelopeSchema, 404: envelopeSchema } },
    }, async (req, reply) => {
        const deleted = await deleteKey(db, uploadDir, req.params.id);
        if (!deleted) {
            return reply.status(404).send(fail('API key not found'));
        }
        req.log.info({ apiKeyId: req.params.id }, 'API key deleted');
        return reply.send(ok('API key deleted successfully'));
    });
}
