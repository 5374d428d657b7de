import Fastify from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from './config';
import { createDb, type AppDatabase } from './db';
import { createMailTransport, type MailTransport } from './lib/mailer';
import { fail } from './lib/response';
import registerAdminRoutes from './modules/admin';
import registerSubmitRoute from './modules/ingest/route.post';
import { createNotifier } from './modules/notify/service';
import type { AttachmentPolicy } from './modules/uploads/types';

const SUBMIT_PATH = /^(\/api\/v1\/submit\/)[^/?#]+/;

/**
 * Path of a request URL as it may appear in logs: no query string, and
 * no key secret in the ingestion path.
 */
export function loggablePath(rawUrl: string | undefined): string {
    const pathname = new URL(rawUrl ?? '/', 'http://localhost').pathname;
    return pathname.replace(SUBMIT_PATH, '$1[redacted]');
}

export interface BuildServerOptions {
    db?: AppDatabase;
    uploadDir?: string;
    mailTransport?: MailTransport;
    /** Enables the dashboard API; defaults to `ADMIN_TOKEN` */
    adminToken?: string;
    policy?: Partial<AttachmentPolicy>;
    /** Submissions accepted per client IP per minute; defaults to `RATE_LIMIT_PER_MINUTE` */
    submitPerMinute?: number;
}

/**
 * Builds and configures the Fastify server instance.
 *
 * Sets up:
 * - Logger that strips query strings and key secrets from request URLs
 * - Database and upload directory
 * - CORS for cross-origin form posts
 * - Multipart parsing with per-file and per-field limits
 * - Rate limiting on the public endpoint
 * - Swagger/OpenAPI documentation
 * - The public submit route, and the dashboard API when an admin token is configured
 * - Health check endpoint
 *
 * Every option falls back to the environment configuration; tests pass
 * their own database, upload directory and mail transport.
 */
export async function buildServer(options: BuildServerOptions = {}) {
    const app = Fastify({
        logger: {
            level: config.logLevel,
            serializers: {
                req: (req) => ({
                    method: req.method,
                    url: loggablePath(req.url),
                    remoteAddress: req.socket.remoteAddress,
                }),
            },
        },
        trustProxy: config.trustProxy,
        bodyLimit: config.limits.jsonBodyBytes,
    });

    const db = options.db ?? createDb();
    const uploadDir = path.resolve(options.uploadDir ?? config.uploadDir);
    mkdirSync(uploadDir, { recursive: true });

    const policy: AttachmentPolicy = {
        maxBytesPerFile: options.policy?.maxBytesPerFile ?? config.limits.maxFileBytes,
        allowedExtensions: options.policy?.allowedExtensions ?? config.limits.allowedExtensions,
    };
    const transport = options.mailTransport ?? createMailTransport(config.mail);
    if (transport.name === 'unconfigured') {
        app.log.warn('No mail transport configured; submissions will be recorded with emailSent=false');
    }
    const notifier = createNotifier({
        transport,
        from: config.mail.from,
        uploadDir,
        dashboardUrl: config.baseUrl,
        log: app.log,
    });

    app.setErrorHandler((error, req, reply) => {
        const statusCode = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
        if (statusCode >= 500) {
            req.log.error({ err: error }, 'Request failed');
            return reply.status(statusCode).send(fail('Internal server error'));
        }
        return reply.status(statusCode).send(fail(error.message));
    });
    app.setNotFoundHandler((req, reply) => reply.status(404).send(fail('Resource not found')));

    await app.register(cors, {
        origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    });
    await app.register(multipart, {
        limits: {
            fileSize: policy.maxBytesPerFile,
            files: config.limits.maxFiles,
            fieldSize: config.limits.maxFieldBytes,
            fields: config.limits.maxFields,
            parts: config.limits.maxFiles + config.limits.maxFields,
        },
    });
    await app.register(rateLimit, { global: false });
    await app.register(swagger, {
        openapi: {
            openapi: '3.0.0',
            info: { title: 'formrelay API', version: '0.1.0' },
            tags: [{ name: 'Submit' }, { name: 'Dashboard' }],
        },
    });
    await app.register(swaggerUI, { routePrefix: '/docs' });

    await registerSubmitRoute(app, {
        db,
        uploadDir,
        policy,
        notifier,
        limits: {
            maxFiles: config.limits.maxFiles,
            maxFields: config.limits.maxFields,
            submitPerMinute: options.submitPerMinute ?? config.limits.submitPerMinute,
        },
    });

    const adminToken = options.adminToken ?? config.adminToken;
    if (adminToken) {
        await registerAdminRoutes(app, { db, uploadDir, token: adminToken });
    } else {
        app.log.info('ADMIN_TOKEN not set; dashboard API disabled');
    }

    // Health check endpoint for monitoring and Docker health checks
    app.get('/health', async () => ({ status: 'ok' }));

    return app;
}

// Only start the server if this file is run directly (not imported as a module)
const entryPoint = process.argv[1];
if (entryPoint && path.resolve(entryPoint) === fileURLToPath(import.meta.url)) {
    buildServer()
        .then(async (app) => {
            for (const signal of ['SIGINT', 'SIGTERM'] as const) {
                process.once(signal, () => {
                    app.log.info({ signal }, 'Shutting down');
                    app.close().then(() => process.exit(0), (err: unknown) => {
                        app.log.error({ err }, 'Error during shutdown');
                        process.exit(1);
                    });
                });
            }
            await app.listen({ port: config.port, host: config.host });
        })
        .catch((err) => {
            // eslint-disable-next-line no-console
            console.error(err);
            process.exit(1);
        });
}
