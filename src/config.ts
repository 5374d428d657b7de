import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanFlag = z.enum(['true', 'false']).default('false').transform((v) => v === 'true');

const commaList = (fallback: string) =>
    z.string().default(fallback).transform((v) =>
        v.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

/**
 * Environment variable schema validation.
 * Ensures all required environment variables are present and valid.
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    DB_PATH: z.string().default('./data/formrelay.db'),
    UPLOAD_DIR: z.string().default('./data/uploads'),
    BASE_URL: z.string().url().optional(),

    MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    MAX_FILES: z.coerce.number().int().positive().default(10),
    MAX_FIELD_SIZE: z.coerce.number().int().positive().default(64 * 1024),
    MAX_FIELDS: z.coerce.number().int().positive().default(100),
    ALLOWED_EXTENSIONS: commaList('pdf,doc,docx,txt,png,jpg,jpeg,gif,zip'),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
    CORS_ORIGINS: commaList('*'),
    TRUST_PROXY: booleanFlag,

    MAIL_PROVIDER: z.enum(['smtp', 'resend']).default('smtp'),
    SMTP_HOST: z.string().optional(),
    SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
    SMTP_SECURE: booleanFlag,
    SMTP_USERNAME: z.string().optional(),
    SMTP_PASSWORD: z.string().optional(),
    RESEND_API_KEY: z.string().optional(),
    MAIL_FROM_EMAIL: z.string().email().default('forms@localhost.localdomain'),
    MAIL_FROM_NAME: z.string().default('Form Service'),

    ADMIN_TOKEN: z.string().min(16).optional(),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    process.exit(1);
}

const env = parsed.data;

/**
 * Application configuration object.
 * Contains validated environment variables and application limits.
 */
export const config = {
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    dbPath: env.DB_PATH,
    uploadDir: env.UPLOAD_DIR,
    baseUrl: env.BASE_URL,
    trustProxy: env.TRUST_PROXY,
    corsOrigins: env.CORS_ORIGINS,
    adminToken: env.ADMIN_TOKEN,
    mail: {
        provider: env.MAIL_PROVIDER,
        from: { email: env.MAIL_FROM_EMAIL, name: env.MAIL_FROM_NAME },
        smtp: {
            host: env.SMTP_HOST,
            port: env.SMTP_PORT,
            secure: env.SMTP_SECURE,
            username: env.SMTP_USERNAME,
            password: env.SMTP_PASSWORD,
        },
        resendApiKey: env.RESEND_API_KEY,
    },
    limits: {
        jsonBodyBytes: 64 * 1024,
        maxFileBytes: env.MAX_FILE_SIZE,
        maxFiles: env.MAX_FILES,
        maxFieldBytes: env.MAX_FIELD_SIZE,
        maxFields: env.MAX_FIELDS,
        allowedExtensions: new Set(env.ALLOWED_EXTENSIONS.map((ext) => ext.toLowerCase().replace(/^\./, ''))),
        submitPerMinute: env.RATE_LIMIT_PER_MINUTE,
    },
};

export type AppConfig = typeof config;
