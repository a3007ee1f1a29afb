import { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthUser, RequestMeta } from '../types/auth';
import { AuthError, InfrastructureError, isAppError } from './errors';
import { logger } from './logger';

/**
 * Answer a failed route with `{ error, code }`. Known client-facing errors keep
 * their status; anything else (including store failures) is logged and
 * reported as a plain 500.
 */
export function sendError(reply: FastifyReply, err: unknown, context: string): void {
    if (isAppError(err) && !(err instanceof InfrastructureError)) {
        reply.code(err.statusCode).send({ error: err.message, code: err.code });
        return;
    }
    logger.error({ err }, `${context} error`);
    reply.code(500).send({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}

/** Identity set by `authenticate`; throws when the route was reached without it. */
export function currentUser(request: FastifyRequest): AuthUser {
    if (!request.authUser) {
        throw new AuthError('Authentication required', 'AUTH_REQUIRED');
    }
    return request.authUser;
}

export function requestMeta(request: FastifyRequest): RequestMeta {
    return {
        userAgent: request.headers['user-agent'],
        ip: request.ip,
    };
}
