import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app';
import { REFRESH_COOKIE } from '../routes/auth.routes';
import { createHarness, makeUser, testRoles, TEST_PASSWORD, type Harness } from './helpers';

const ADMIN_ID = '11111111-1111-4111-8111-111111111111';
const MANAGER_ID = '66666666-6666-4666-8666-666666666666';
const CLIENT = { 'user-agent': 'vitest-client' };

interface LoginBody {
    accessToken: string;
    refreshToken: string;
    user: { id: string; username: string; role: string; password_hash?: string };
}

describe('HTTP API', () => {
    let h: Harness;
    let app: FastifyInstance;

    beforeEach(async () => {
        h = createHarness({
            users: [
                await makeUser(ADMIN_ID, 'root', 'admin'),
                await makeUser(MANAGER_ID, 'morgan', 'manager'),
            ],
        });
        app = await buildApp({
            sessions: h.sessions,
            tokens: h.tokens,
            users: h.users,
            roles: testRoles,
            cookieSecure: false,
        });
    });

    afterEach(async () => {
        await app.close();
    });

    const login = async (username: string): Promise<LoginBody> => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/auth/login',
            headers: CLIENT,
            payload: { username, password: TEST_PASSWORD },
        });
        expect(res.statusCode).toBe(200);
        return res.json<LoginBody>();
    };

    const bearer = (token: string) => ({ ...CLIENT, authorization: `Bearer ${token}` });

    // ─── Login ───

    describe('POST /api/auth/login', () => {
        it('should return a token pair and set the refresh cookie', async () => {
            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/login',
                payload: { username: 'morgan', password: TEST_PASSWORD },
            });

            expect(res.statusCode).toBe(200);
            const body = res.json<LoginBody>();
            expect(body.user).toMatchObject({ id: MANAGER_ID, username: 'morgan', role: 'manager' });
            expect(body.user.password_hash).toBeUndefined();

            const cookie = res.cookies.find((c) => c.name === REFRESH_COOKIE);
            expect(cookie).toMatchObject({
                value: body.refreshToken,
                httpOnly: true,
                sameSite: 'Strict',
                path: '/api/auth',
                maxAge: 3600,
            });
        });

        it('should reject an invalid body', async () => {
            const res = await app.inject({ method: 'POST', url: '/api/auth/login', payload: { username: '' } });

            expect(res.statusCode).toBe(400);
            expect(res.json()).toMatchObject({ error: 'Invalid input', code: 'VALIDATION_ERROR' });
        });

        it('should reject wrong credentials', async () => {
            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/login',
                payload: { username: 'morgan', password: 'wrong-password' },
            });

            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'Invalid credentials', code: 'INVALID_CREDENTIALS' });
        });

        it('should hide store failures behind a generic 500', async () => {
            vi.spyOn(h.store, 'create').mockRejectedValue(new Error('disk full'));

            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/login',
                payload: { username: 'morgan', password: TEST_PASSWORD },
            });

            expect(res.statusCode).toBe(500);
            expect(res.json()).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
        });
    });

    // ─── Refresh ───

    describe('POST /api/auth/refresh', () => {
        it('should rotate a refresh token sent in the body', async () => {
            const session = await login('morgan');

            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/refresh',
                payload: { refreshToken: session.refreshToken },
            });

            expect(res.statusCode).toBe(200);
            const pair = res.json<{ accessToken: string; refreshToken: string }>();
            expect(pair.refreshToken).not.toBe(session.refreshToken);
            expect(res.cookies.find((c) => c.name === REFRESH_COOKIE)?.value).toBe(pair.refreshToken);
        });

        it('should accept the refresh token from the cookie', async () => {
            const session = await login('morgan');

            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/refresh',
                cookies: { [REFRESH_COOKIE]: session.refreshToken },
            });

            expect(res.statusCode).toBe(200);
            expect(h.tokens.verifyAccess(res.json<{ accessToken: string }>().accessToken).sub).toBe(MANAGER_ID);
        });

        it('should ask for a token when none is presented', async () => {
            const res = await app.inject({ method: 'POST', url: '/api/auth/refresh' });

            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'No refresh token provided', code: 'AUTH_REQUIRED' });
        });

        it('should reject a bad token and clear the cookie', async () => {
            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/refresh',
                cookies: { [REFRESH_COOKIE]: 'not-a-jwt' },
            });

            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'Invalid or expired credential', code: 'INVALID_TOKEN' });
            expect(res.cookies.find((c) => c.name === REFRESH_COOKIE)?.value).toBe('');
        });
    });

    // ─── Logout ───

    describe('logout', () => {
        it('should revoke the presented refresh token', async () => {
            const session = await login('morgan');

            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/logout',
                payload: { refreshToken: session.refreshToken },
            });

            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'Logged out' });
            expect(await h.sessions.listSessions(MANAGER_ID)).toEqual([]);
        });

        it('should succeed without any token', async () => {
            const res = await app.inject({ method: 'POST', url: '/api/auth/logout' });

            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'Logged out' });
        });

        it('should revoke every session on logout-all', async () => {
            await login('morgan');
            const session = await login('morgan');

            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/logout-all',
                headers: bearer(session.accessToken),
            });

            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'All sessions logged out', revokedSessions: 2 });
        });

        it('should require an access token for logout-all', async () => {
            const res = await app.inject({ method: 'POST', url: '/api/auth/logout-all' });
            expect(res.statusCode).toBe(401);
        });
    });

    // ─── Identity ───

    describe('identity endpoints', () => {
        it('should return the profile and permissions of the caller', async () => {
            const session = await login('morgan');

            const res = await app.inject({ method: 'GET', url: '/api/auth/me', headers: bearer(session.accessToken) });

            expect(res.statusCode).toBe(200);
            const body = res.json<{ user: LoginBody['user']; permissions: string[] }>();
            expect(body.user).toMatchObject({ id: MANAGER_ID, username: 'morgan' });
            expect(body.user.password_hash).toBeUndefined();
            expect(body.permissions).toEqual(['tasks:read', 'tasks:write']);
        });

        it('should list active sessions with client details', async () => {
            const session = await login('morgan');

            const res = await app.inject({
                method: 'GET',
                url: '/api/auth/sessions',
                headers: bearer(session.accessToken),
            });

            expect(res.statusCode).toBe(200);
            const { sessions } = res.json<{ sessions: Array<Record<string, unknown>> }>();
            expect(sessions).toHaveLength(1);
            expect(sessions[0]).toMatchObject({
                id: h.tokens.verifyRefresh(session.refreshToken).tokenId,
                userAgent: 'vitest-client',
                ipAddress: '127.0.0.1',
            });
        });

        it('should report anonymous and authenticated status', async () => {
            const session = await login('root');

            const anonymous = await app.inject({ method: 'GET', url: '/api/auth/status' });
            const known = await app.inject({
                method: 'GET',
                url: '/api/auth/status',
                headers: bearer(session.accessToken),
            });

            expect(anonymous.json()).toEqual({ authenticated: false });
            expect(known.json()).toEqual({
                authenticated: true,
                user: { id: ADMIN_ID, username: 'root', role: 'admin' },
            });
        });

        it('should answer the health check', async () => {
            const res = await app.inject({ method: 'GET', url: '/health' });
            expect(res.statusCode).toBe(200);
            expect(res.json()).toMatchObject({ status: 'ok' });
        });
    });

    // ─── Roles ───

    describe('role endpoints', () => {
        it('should show the role map to a caller with directory access', async () => {
            const session = await login('root');

            const res = await app.inject({ method: 'GET', url: '/api/roles', headers: bearer(session.accessToken) });

            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ roles: testRoles.toJSON() });
        });

        it('should forbid the role map to a manager', async () => {
            const session = await login('morgan');

            const res = await app.inject({ method: 'GET', url: '/api/roles', headers: bearer(session.accessToken) });

            expect(res.statusCode).toBe(403);
        });

        it('should describe a single role to an admin', async () => {
            const session = await login('root');

            const found = await app.inject({
                method: 'GET',
                url: '/api/roles/manager',
                headers: bearer(session.accessToken),
            });
            const missing = await app.inject({
                method: 'GET',
                url: '/api/roles/ghost',
                headers: bearer(session.accessToken),
            });

            expect(found.json()).toEqual({ role: 'manager', permissions: ['tasks:read', 'tasks:write'] });
            expect(missing.statusCode).toBe(404);
            expect(missing.json()).toEqual({ error: 'Role not found' });
        });
    });

    // ─── Full lifecycle ───

    it('should carry a manager through login, rotation and theft detection', async () => {
        const session = await login('morgan');
        expect(h.tokens.verifyAccess(session.accessToken).permissions).toEqual(['tasks:read', 'tasks:write']);

        const rotated = await app.inject({
            method: 'POST',
            url: '/api/auth/refresh',
            payload: { refreshToken: session.refreshToken },
        });
        expect(rotated.statusCode).toBe(200);
        const successor = rotated.json<{ refreshToken: string }>().refreshToken;

        // Replayed well after the reuse window
        h.clock.advance(60);
        const replay = await app.inject({
            method: 'POST',
            url: '/api/auth/refresh',
            payload: { refreshToken: session.refreshToken },
        });
        expect(replay.statusCode).toBe(401);
        expect(replay.json()).toEqual({ error: 'Invalid or expired credential', code: 'INVALID_TOKEN' });

        const afterTheft = await app.inject({
            method: 'POST',
            url: '/api/auth/refresh',
            payload: { refreshToken: successor },
        });
        expect(afterTheft.statusCode).toBe(401);
        expect(h.audit.actions()).toContain('refresh_reuse_detected');
    });
});
