/**
 * JSON envelope shared by every API response. `success` is the outcome
 * integrations rely on; the HTTP status only mirrors it.
 */
export interface Envelope<T = unknown> {
    success: boolean;
    message: string;
    data?: T;
    /** Field-level validation errors, on 400 responses only */
    errors?: Record<string, string[] | undefined>;
}

/** Successful envelope; `data` is left out when undefined. */
export function ok<T>(message: string, data?: T): Envelope<T> {
    return data === undefined ? { success: true, message } : { success: true, message, data };
}

/** Failed envelope, with field errors for validation failures. */
export function fail(message: string, errors?: Envelope['errors']): Envelope<never> {
    return errors === undefined ? { success: false, message } : { success: false, message, errors };
}

/** Fastify response schema for the envelope; `data` is passed through as-is. */
export const envelopeSchema = {
    type: 'object',
    properties: {
        success: { type: 'boolean' },
        message: { type: 'string' },
        data: {},
        errors: { type: 'object', additionalProperties: { type: 'array', items: { type: 'string' } } },
    },
    required: ['success', 'message'],
} as const;
