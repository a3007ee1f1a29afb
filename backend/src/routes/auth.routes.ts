import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import { toSafeUser, type UserRepository } from '../repositories/user.repository';
import type { SessionService } from '../services/auth/session.service';
import { isAppError } from '../utils/errors';
import { currentUser, requestMeta, sendError } from '../utils/http';

// ─── Validation Schemas ───

const loginSchema = z.object({
    username: z.string().min(1).max(50),
    password: z.string().min(1).max(72),
});

const refreshBodySchema = z
    .object({ refreshToken: z.string().min(1) })
    .partial()
    .nullish();

export const REFRESH_COOKIE = 'opsdesk_refresh_token';
const REFRESH_COOKIE_PATH = '/api/auth';

export interface AuthRoutesOptions {
    sessions: SessionService;
    users: UserRepository;
    auth: AuthMiddleware;
    cookieSecure: boolean;
    /** seconds */
    refreshTokenTtl: number;
}

export async function authRoutes(fastify: FastifyInstance, opts: AuthRoutesOptions) {
    const { sessions, users, auth } = opts;

    const setRefreshCookie = (reply: FastifyReply, token: string) => {
        reply.setCookie(REFRESH_COOKIE, token, {
            httpOnly: true,
            secure: opts.cookieSecure,
            sameSite: 'strict',
            path: REFRESH_COOKIE_PATH,
            maxAge: opts.refreshTokenTtl,
        });
    };

    // Body wins over the cookie so non-browser clients can send it explicitly
    const presentedRefreshToken = (request: FastifyRequest): string | undefined => {
        const parsed = refreshBodySchema.safeParse(request.body);
        const fromBody = parsed.success ? parsed.data?.refreshToken : undefined;
        return fromBody ?? request.cookies[REFRESH_COOKIE];
    };

    // ─── POST /api/auth/login ───
    fastify.post('/api/auth/login', async (request, reply) => {
        const parsed = loginSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', code: 'VALIDATION_ERROR', details: parsed.error.flatten() });
            return;
        }

        try {
            const result = await sessions.login(parsed.data.username, parsed.data.password, requestMeta(request));
            setRefreshCookie(reply, result.refreshToken);
            return result;
        } catch (err) {
            sendError(reply, err, 'Login');
        }
    });

    // ─── POST /api/auth/refresh ───
    fastify.post('/api/auth/refresh', async (request, reply) => {
        const refreshToken = presentedRefreshToken(request);
        if (!refreshToken) {
            reply.code(401).send({ error: 'No refresh token provided', code: 'AUTH_REQUIRED' });
            return;
        }

        try {
            const result = await sessions.refresh(refreshToken, requestMeta(request));
            setRefreshCookie(reply, result.refreshToken);
            return result;
        } catch (err) {
            if (isAppError(err) && err.statusCode < 500) {
                // Clear the bad cookie
                reply.clearCookie(REFRESH_COOKIE, { path: REFRESH_COOKIE_PATH });
            }
            sendError(reply, err, 'Refresh');
        }
    });

    // ─── POST /api/auth/logout ───
    fastify.post('/api/auth/logout', async (request, reply) => {
        const refreshToken = presentedRefreshToken(request);
        try {
            if (refreshToken) {
                await sessions.logout(refreshToken, requestMeta(request));
            }
            reply.clearCookie(REFRESH_COOKIE, { path: REFRESH_COOKIE_PATH });
            return { message: 'Logged out' };
        } catch (err) {
            sendError(reply, err, 'Logout');
        }
    });

    // ─── POST /api/auth/logout-all ───
    fastify.post('/api/auth/logout-all', { preHandler: [auth.authenticate] }, async (request, reply) => {
        try {
            const revokedSessions = await sessions.logoutAll(currentUser(request).id, requestMeta(request));
            reply.clearCookie(REFRESH_COOKIE, { path: REFRESH_COOKIE_PATH });
            return { message: 'All sessions logged out', revokedSessions };
        } catch (err) {
            sendError(reply, err, 'Logout-all');
        }
    });

    // ─── GET /api/auth/me ───
    fastify.get('/api/auth/me', { preHandler: [auth.authenticate] }, async (request, reply) => {
        try {
            const identity = currentUser(request);
            const user = await users.findUserById(identity.id);
            if (!user) {
                reply.code(404).send({ error: 'User not found' });
                return;
            }
            return { user: toSafeUser(user), permissions: identity.permissions.toArray() };
        } catch (err) {
            sendError(reply, err, 'Profile');
        }
    });

    // ─── GET /api/auth/sessions ───
    fastify.get('/api/auth/sessions', { preHandler: [auth.authenticate] }, async (request, reply) => {
        try {
            const records = await sessions.listSessions(currentUser(request).id);
            return {
                sessions: records.map((r) => ({
                    id: r.token_id,
                    createdAt: r.created_at,
                    expiresAt: r.expires_at,
                    userAgent: r.user_agent,
                    ipAddress: r.ip_address,
                })),
            };
        } catch (err) {
            sendError(reply, err, 'Session list');
        }
    });

    // ─── GET /api/auth/status ─── (anonymous callers allowed)
    fastify.get('/api/auth/status', { preHandler: [auth.optionalAuth] }, async (request) => {
        const identity = request.authUser;
        if (!identity) return { authenticated: false };
        return {
            authenticated: true,
            user: { id: identity.id, username: identity.username, role: identity.role },
        };
    });
}
