import { FastifyReply, FastifyRequest } from 'fastify';
import { PermissionSet } from '../services/auth/permissions';
import { extractBearer, TokenError, type TokenService } from '../services/auth/token.service';
import type { AccessTokenPayload, AuthUser } from '../types/auth';
import { INVALID_CREDENTIAL_MESSAGE } from '../utils/errors';
import { logger } from '../utils/logger';

// Extend Fastify request with auth user
declare module 'fastify' {
    interface FastifyRequest {
        authUser?: AuthUser;
    }
}

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface AuthMiddleware {
    /** Rejects with 401 unless a valid access token is presented. */
    authenticate: AuthHook;
    /** Never rejects; sets `request.authUser` only for a valid token. */
    optionalAuth: AuthHook;
}

export function toAuthUser(payload: AccessTokenPayload): AuthUser {
    return {
        id: payload.sub,
        username: payload.username,
        role: payload.role,
        permissions: new PermissionSet(payload.permissions),
    };
}

/**
 * Build the Fastify preHandler hooks that verify the access token in the
 * Authorization header. Access tokens are self-contained, so neither hook
 * touches the refresh token store.
 *
 * @example
 *   const { authenticate } = createAuthMiddleware(tokens);
 *   fastify.get('/api/auth/me', { preHandler: [authenticate] }, handler);
 */
export function createAuthMiddleware(tokens: TokenService): AuthMiddleware {
    async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        let token: string;
        try {
            token = extractBearer(request.headers.authorization);
        } catch (err) {
            if (!(err instanceof TokenError)) throw err;
            logger.debug({ reason: err.message }, 'Missing or malformed Authorization header');
            reply.code(401).send({ error: 'Authentication required', code: 'AUTH_REQUIRED' });
            return;
        }

        try {
            request.authUser = toAuthUser(tokens.verifyAccess(token));
        } catch (err) {
            if (!(err instanceof TokenError)) throw err;
            logger.debug({ kind: err.kind, reason: err.message }, 'JWT verification failed');
            reply.code(401).send({ error: INVALID_CREDENTIAL_MESSAGE, code: 'INVALID_TOKEN' });
        }
    }

    async function optionalAuth(request: FastifyRequest): Promise<void> {
        const header = request.headers.authorization;
        if (!header) return;

        try {
            request.authUser = toAuthUser(tokens.verifyAccess(extractBearer(header)));
        } catch (err) {
            if (!(err instanceof TokenError)) throw err;
            // Treated as anonymous
            logger.debug({ kind: err.kind }, 'Optional auth ignored an unusable token');
        }
    }

    return { authenticate, optionalAuth };
}
