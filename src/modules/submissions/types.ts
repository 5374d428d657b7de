import { z } from 'zod';
import type { FieldEntry, FileAttachmentRow, SubmissionRow } from '../../db/schema';
import type { StagedFile } from '../uploads/types';

export interface RecordSubmissionInput {
    apiKeyId: string;
    fields: FieldEntry[];
    sourceIp: string | null;
    userAgent: string | null;
    stagedFiles: readonly StagedFile[];
}

export interface SubmissionWithFiles extends SubmissionRow {
    files: FileAttachmentRow[];
}

export interface DeliveryOutcome {
    delivered: boolean;
    error: string | null;
}

/** Dashboard listing query. */
export const ListQuerySchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    perPage: z.coerce.number().int().min(1).max(100).default(20),
    apiKeyId: z.string().min(1).optional(),
});

export type ListQuery = z.infer<typeof ListQuerySchema>;

export interface SubmissionPage {
    submissions: SubmissionRow[];
    total: number;
    page: number;
    perPage: number;
    pages: number;
}

export interface DashboardStats {
    totalApiKeys: number;
    activeApiKeys: number;
    totalSubmissions: number;
    recentSubmissions: number;
    totalFiles: number;
}
