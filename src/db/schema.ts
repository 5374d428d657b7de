import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** One ordered entry of a submitted form. Names may repeat. */
export interface FieldEntry {
    name: string;
    value: string;
}

/**
 * Tenant endpoints.
 *
 * `secret` is the public URL segment of the ingestion endpoint. It is
 * generated server-side, unique, and never changed after creation.
 */
export const apiKeys = sqliteTable('api_keys', {
    /** Server-generated ULID */
    id: text('id').primaryKey(),
    secret: text('secret').notNull().unique(),
    name: text('name').notNull(),
    recipientEmail: text('recipientEmail').notNull(),
    description: text('description').notNull().default(''),
    isActive: integer('isActive', { mode: 'boolean' }).notNull().default(true),
    usageCount: integer('usageCount').notNull().default(0),
    lastUsedAt: integer('lastUsedAt', { mode: 'number' }),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
});

/**
 * Accepted form posts. `fields` keeps the wire order of the multipart body.
 * Deleted with the owning key.
 */
export const submissions = sqliteTable('submissions', {
    id: text('id').primaryKey(),
    apiKeyId: text('apiKeyId').notNull().references(() => apiKeys.id, { onDelete: 'cascade' }),
    fields: text('fields', { mode: 'json' }).$type<FieldEntry[]>().notNull(),
    sourceIp: text('sourceIp'),
    userAgent: text('userAgent'),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
    emailSent: integer('emailSent', { mode: 'boolean' }).notNull().default(false),
    emailError: text('emailError'),
});

/**
 * Uploaded files. `storedPath` is relative to the upload directory and is
 * built from server ids only.
 */
export const fileAttachments = sqliteTable('file_attachments', {
    /** Same ULID the file was staged under */
    id: text('id').primaryKey(),
    submissionId: text('submissionId').notNull().references(() => submissions.id, { onDelete: 'cascade' }),
    originalFilename: text('originalFilename').notNull(),
    storedPath: text('storedPath').notNull().unique(),
    fileSize: integer('fileSize').notNull(),
    contentType: text('contentType').notNull(),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
});

export type ApiKeyRecord = typeof apiKeys.$inferSelect;
export type SubmissionRow = typeof submissions.$inferSelect;
export type FileAttachmentRow = typeof fileAttachments.$inferSelect;
