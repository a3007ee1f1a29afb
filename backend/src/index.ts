import { buildApp } from './app';
import { config } from './config';
import { closePool } from './db';
import { PgRefreshTokenStore } from './repositories/refresh-token.repository';
import { PgUserRepository } from './repositories/user.repository';
import { PgAuditSink } from './services/audit/audit.service';
import { BcryptPasswordVerifier } from './services/auth/password';
import { loadRoleCapabilityMap } from './services/auth/permissions';
import { SessionService } from './services/auth/session.service';
import { TokenService } from './services/auth/token.service';
import { logger } from './utils/logger';

async function main() {
    // ─── Initialize Services ───
    logger.info('Initializing services...');

    const roles = loadRoleCapabilityMap(config.rolePermissionsFile);
    const tokens = new TokenService({
        secret: config.jwtSecret,
        issuer: config.jwtIssuer,
        accessTokenTtl: config.accessTokenTtl,
        refreshTokenTtl: config.refreshTokenTtl,
        roles,
    });
    const users = new PgUserRepository();
    const sessions = new SessionService({
        users,
        store: new PgRefreshTokenStore(),
        tokens,
        passwords: new BcryptPasswordVerifier(),
        audit: new PgAuditSink(),
        rotation: config.refreshTokenRotation,
        reuseWindowSeconds: config.refreshTokenReuseWindow,
        reusePolicy: config.refreshTokenReusePolicy,
    });

    logger.info({
        roles: roles.roleNames(),
        rotation: config.refreshTokenRotation,
        reuseWindow: config.refreshTokenReuseWindow,
        reusePolicy: config.refreshTokenReusePolicy,
    }, 'Session services initialized');

    const app = await buildApp({
        sessions,
        tokens,
        users,
        roles,
        cookieSecure: config.cookieSecure,
        frontendUrl: config.frontendUrl,
    });

    // ─── Expired refresh token cleanup ───
    let cleanupTimer: NodeJS.Timeout | null = null;
    if (config.refreshTokenCleanupInterval > 0) {
        cleanupTimer = setInterval(() => {
            void sessions.purgeExpired().catch((err: unknown) => {
                logger.error({ err }, 'Expired refresh token cleanup failed');
            });
        }, config.refreshTokenCleanupInterval * 1000);
        cleanupTimer.unref();
    }

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: config.host });
        logger.info({ port: config.port, env: config.nodeEnv }, 'OpsDesk server started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        if (cleanupTimer) clearInterval(cleanupTimer);
        await app.close();
        await closePool();
        process.exit(0);
    };
    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
