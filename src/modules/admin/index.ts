import type { FastifyInstance } from 'fastify';
import type { AppDatabase } from '../../db';
import registerKeyRoutes from '../keys/route.admin';
import registerSubmissionRoutes from '../submissions/route.admin';
import { requireAdminToken } from './guard';

export interface AdminRoutesOptions {
    db: AppDatabase;
    uploadDir: string;
    token: string;
}

/**
 * Registers the dashboard API in its own encapsulated context so the
 * token check applies to these routes only.
 */
export default async function registerAdminRoutes(app: FastifyInstance, opts: AdminRoutesOptions) {
    await app.register(async (admin) => {
        admin.addHook('onRequest', requireAdminToken(opts.token));
        await registerKeyRoutes(admin, opts);
        await registerSubmissionRoutes(admin, opts);
    });
}
