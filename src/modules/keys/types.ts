import { z } from 'zod';
import type { ApiKeyRecord } from '../../db/schema';

/**
 * Request body for registering a new key. The secret is always
 * generated server-side and cannot be supplied.
 */
export const CreateKeySchema = z.object({
    name: z.string().trim().min(1).max(100),
    recipientEmail: z.string().trim().email().max(120),
    description: z.string().max(2000).default(''),
});

export type CreateKeyInput = z.infer<typeof CreateKeySchema>;

/** Partial update; `secret` and `usageCount` are not writable here. */
export const UpdateKeySchema = z.object({
    name: z.string().trim().min(1).max(100).optional(),
    recipientEmail: z.string().trim().email().max(120).optional(),
    description: z.string().max(2000).optional(),
    isActive: z.boolean().optional(),
}).strict();

export type UpdateKeyInput = z.infer<typeof UpdateKeySchema>;

export interface ApiKeySummary extends ApiKeyRecord {
    submissionCount: number;
}
