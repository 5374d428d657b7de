import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { fail } from '../../lib/response';

/** Extracts the token from an `Authorization: Bearer <token>` header. */
export function bearerToken(header: string | undefined): string | null {
    if (!header) return null;
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    return match ? match[1] : null;
}

/** Compares two tokens in constant time, whatever their lengths. */
export function tokensMatch(provided: string, expected: string): boolean {
    const a = createHash('sha256').update(provided).digest();
    const b = createHash('sha256').update(expected).digest();
    return timingSafeEqual(a, b);
}

/**
 * onRequest hook that only lets requests carrying the admin token through.
 */
export function requireAdminToken(token: string) {
    return async (req: FastifyRequest, reply: FastifyReply) => {
        const provided = bearerToken(req.headers.authorization);
        if (!provided || !tokensMatch(provided, token)) {
            return reply.status(401).send(fail('Authentication required'));
        }
    };
}
