import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import { createAuthMiddleware } from './middleware/auth.middleware';
import type { UserRepository } from './repositories/user.repository';
import { authRoutes } from './routes/auth.routes';
import { roleRoutes } from './routes/role.routes';
import type { RoleCapabilityMap } from './services/auth/permissions';
import type { SessionService } from './services/auth/session.service';
import type { TokenService } from './services/auth/token.service';

export interface AppDependencies {
    sessions: SessionService;
    tokens: TokenService;
    users: UserRepository;
    roles: RoleCapabilityMap;
    cookieSecure: boolean;
    frontendUrl?: string;
}

/**
 * Assemble the HTTP surface from already-built services. `index.ts` passes
 * PostgreSQL-backed services; tests pass in-memory ones and use `inject`.
 */
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
    const app = Fastify({
        logger: false, // We use pino directly
    });

    // ─── Plugins ───
    await app.register(cors, {
        origin: deps.frontendUrl
            ? [deps.frontendUrl, 'http://localhost:5173'] // production whitelist + local dev
            : true, // dev: allow all origins
        credentials: true,
    });
    await app.register(cookie);

    // ─── Routes ───
    const auth = createAuthMiddleware(deps.tokens);
    await app.register(authRoutes, {
        sessions: deps.sessions,
        users: deps.users,
        auth,
        cookieSecure: deps.cookieSecure,
        refreshTokenTtl: deps.tokens.refreshTokenTtl,
    });
    await app.register(roleRoutes, { roles: deps.roles, auth });

    // ─── Health Check ───
    app.get('/health', async () => {
        return { status: 'ok', timestamp: new Date().toISOString() };
    });

    return app;
}
