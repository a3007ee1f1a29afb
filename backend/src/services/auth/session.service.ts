import { v4 as uuid } from 'uuid';
import type { AuditEvent, AuditSink } from '../audit/audit.service';
import type { NewRefreshToken, RefreshTokenStore } from '../../repositories/refresh-token.repository';
import { toSafeUser, type UserRepository } from '../../repositories/user.repository';
import type {
    RefreshTokenPayload,
    RefreshTokenRecord,
    RequestMeta,
    SafeUser,
    TokenPair,
    User,
} from '../../types/auth';
import { AppError, AuthError, ForbiddenError, InfrastructureError } from '../../utils/errors';
import { createChildLogger } from '../../utils/logger';
import type { PasswordVerifier } from './password';
import { TokenError, type TokenService } from './token.service';

const log = createChildLogger({ module: 'session' });

/**
 * What to do with a rotated refresh token presented again inside the reuse window.
 * - `successor`: answer with a pair bound to the token that replaced it
 * - `reject`: refuse without treating it as theft
 */
export type ReusePolicy = 'successor' | 'reject';

export interface SessionServiceOptions {
    users: UserRepository;
    store: RefreshTokenStore;
    tokens: TokenService;
    passwords: PasswordVerifier;
    audit: AuditSink;
    rotation: boolean;
    reuseWindowSeconds: number;
    reusePolicy: ReusePolicy;
    now?: () => Date;
}

export interface LoginResult extends TokenPair {
    user: SafeUser;
}

/**
 * Login, refresh rotation with reuse detection, and logout.
 *
 * Every token or record problem leaves this service as the same
 * `AuthError('Invalid or expired credential')`; the specific reason only
 * goes to the log. Store failures become `InfrastructureError`.
 */
export class SessionService {
    private readonly users: UserRepository;
    private readonly store: RefreshTokenStore;
    private readonly tokens: TokenService;
    private readonly passwords: PasswordVerifier;
    private readonly audit: AuditSink;
    private readonly rotation: boolean;
    private readonly reuseWindowMs: number;
    private readonly reusePolicy: ReusePolicy;
    private readonly now: () => Date;

    constructor(options: SessionServiceOptions) {
        this.users = options.users;
        this.store = options.store;
        this.tokens = options.tokens;
        this.passwords = options.passwords;
        this.audit = options.audit;
        this.rotation = options.rotation;
        this.reuseWindowMs = options.reuseWindowSeconds * 1000;
        this.reusePolicy = options.reusePolicy;
        this.now = options.now ?? (() => new Date());
    }

    // ─── Login ───

    async login(username: string, password: string, meta: RequestMeta = {}): Promise<LoginResult> {
        const user = await this.guard('find user', () => this.users.findUserByUsername(username));
        const valid = user !== null
            && await this.guard('verify password', () => this.passwords.verify(password, user.password_hash));

        if (!user || !valid) {
            // Same answer for unknown user and wrong password
            log.warn({ username, userFound: user !== null }, 'Login failed: invalid credentials');
            this.emit({
                action: 'login_failure',
                userId: user?.id ?? null,
                username,
                ipAddress: meta.ip,
                userAgent: meta.userAgent,
                details: { reason: 'invalid_credentials' },
            });
            throw new AuthError('Invalid credentials', 'INVALID_CREDENTIALS');
        }

        if (user.status !== 'active') {
            log.warn({ userId: user.id, status: user.status }, 'Login failed: account not active');
            this.emit({
                action: 'login_failure',
                userId: user.id,
                username,
                ipAddress: meta.ip,
                userAgent: meta.userAgent,
                details: { reason: 'account_disabled', status: user.status },
            });
            throw new ForbiddenError('Account is disabled', 'ACCOUNT_DISABLED');
        }

        const now = this.now();
        const accessToken = this.mintAccessFor(user);
        const refreshToken = await this.issueRefresh(user.id, uuid(), now, meta);

        try {
            await this.users.recordLogin(user.id, now);
        } catch (err) {
            // Not fatal: the session is already issued
            log.warn({ err, userId: user.id }, 'Failed to update last login time');
        }

        this.emit({
            action: 'login_success',
            userId: user.id,
            username: user.username,
            ipAddress: meta.ip,
            userAgent: meta.userAgent,
        });
        log.info({ userId: user.id, role: user.role }, 'User logged in');

        return {
            user: { ...toSafeUser(user), last_login_at: now },
            accessToken,
            refreshToken,
        };
    }

    // ─── Refresh ───

    async refresh(refreshToken: string, meta: RequestMeta = {}): Promise<TokenPair> {
        const claims = this.verifyRefreshOrReject(refreshToken);

        const record = await this.guard('find refresh token', () => this.store.findByIdentity(claims.tokenId));
        if (!record) {
            log.warn({ tokenId: claims.tokenId }, 'Refresh rejected: unknown token identity');
            throw new AuthError();
        }
        if (record.user_id !== claims.sub) {
            log.warn({ tokenId: claims.tokenId, subject: claims.sub }, 'Refresh rejected: subject does not own token');
            throw new AuthError();
        }

        const now = this.now();
        if (record.revoked) {
            return this.handleRevokedPresentation(record, now, meta);
        }
        if (record.expires_at.getTime() <= now.getTime()) {
            log.warn({ tokenId: record.token_id, userId: record.user_id }, 'Refresh rejected: token record expired');
            throw new AuthError();
        }

        const user = await this.loadActiveOwner(record.user_id);

        if (!this.rotation) {
            log.debug({ userId: user.id }, 'Access token refreshed (rotation disabled)');
            return { accessToken: this.mintAccessFor(user), refreshToken };
        }

        // Revoke and successor insert commit together; the conditional revoke
        // decides which of several concurrent refreshes rotates this token
        const successor = this.newRecord(user.id, uuid(), now, meta);
        const rotated = await this.guard('rotate refresh token', () =>
            this.store.rotate(record.token_id, successor, now)
        );
        if (!rotated) {
            log.warn({ tokenId: record.token_id, userId: user.id }, 'Refresh rejected: token was rotated by a concurrent request');
            throw new AuthError();
        }
        log.info({ userId: user.id, tokenId: record.token_id, successorId: successor.token_id }, 'Refresh token rotated');

        return {
            accessToken: this.mintAccessFor(user),
            refreshToken: this.tokens.mintRefresh(user.id, successor.token_id),
        };
    }

    // ─── Logout ───

    /** Idempotent: unknown, invalid and already-revoked tokens all count as logged out. */
    async logout(refreshToken: string, meta: RequestMeta = {}): Promise<void> {
        let claims: RefreshTokenPayload;
        try {
            claims = this.tokens.verifyRefresh(refreshToken);
        } catch (err) {
            if (err instanceof TokenError) {
                log.debug({ kind: err.kind }, 'Logout with unverifiable refresh token; nothing to revoke');
                return;
            }
            throw err;
        }

        const revoked = await this.guard('revoke refresh token', () =>
            this.store.revoke(claims.tokenId, { reason: 'logout', at: this.now() })
        );
        if (!revoked) {
            log.debug({ tokenId: claims.tokenId }, 'Logout for unknown or already revoked token');
            return;
        }

        this.emit({
            action: 'logout',
            userId: claims.sub,
            ipAddress: meta.ip,
            userAgent: meta.userAgent,
        });
        log.info({ userId: claims.sub, tokenId: claims.tokenId }, 'User logged out');
    }

    async logoutAll(userId: string, meta: RequestMeta = {}): Promise<number> {
        const count = await this.guard('revoke all refresh tokens', () =>
            this.store.revokeAllForUser(userId, 'logout_all', this.now())
        );
        this.emit({
            action: 'logout_all',
            userId,
            ipAddress: meta.ip,
            userAgent: meta.userAgent,
            details: { revokedSessions: count },
        });
        log.info({ userId, revokedSessions: count }, 'All sessions logged out');
        return count;
    }

    // ─── Housekeeping ───

    async listSessions(userId: string): Promise<RefreshTokenRecord[]> {
        return this.guard('list refresh tokens', () => this.store.findActiveByUser(userId, this.now()));
    }

    async purgeExpired(): Promise<number> {
        const deleted = await this.guard('delete expired refresh tokens', () => this.store.deleteExpired(this.now()));
        log.info({ deleted }, 'Expired refresh tokens purged');
        return deleted;
    }

    // ─── Internals ───

    private verifyRefreshOrReject(refreshToken: string): RefreshTokenPayload {
        try {
            return this.tokens.verifyRefresh(refreshToken);
        } catch (err) {
            if (err instanceof TokenError) {
                log.warn({ kind: err.kind, reason: err.message }, 'Refresh rejected: token failed verification');
                throw new AuthError();
            }
            throw err;
        }
    }

    /**
     * A revoked record was presented. Inside the reuse window a rotated token is
     * most likely a duplicate client retry; anywhere else it is treated as a
     * stolen token and the user's whole token family is revoked.
     */
    private async handleRevokedPresentation(
        record: RefreshTokenRecord,
        now: Date,
        meta: RequestMeta
    ): Promise<TokenPair> {
        const sinceRevocation = record.revoked_at ? now.getTime() - record.revoked_at.getTime() : Infinity;
        const insideWindow = this.rotation
            && record.revoked_reason === 'rotated'
            && sinceRevocation < this.reuseWindowMs;

        if (insideWindow) {
            if (this.reusePolicy === 'successor' && record.replaced_by) {
                const pair = await this.reissueForSuccessor(record.replaced_by, now);
                if (pair) {
                    log.info({ tokenId: record.token_id, successorId: record.replaced_by }, 'Rotated token replayed inside reuse window; returned successor');
                    return pair;
                }
            }
            log.warn({ tokenId: record.token_id, userId: record.user_id, policy: this.reusePolicy }, 'Refresh rejected: rotated token replayed inside reuse window');
            throw new AuthError();
        }

        const revokedSessions = await this.guard('revoke token family', () =>
            this.store.revokeAllForUser(record.user_id, 'reuse_detected', now)
        );
        log.warn({
            userId: record.user_id,
            tokenId: record.token_id,
            revokedReason: record.revoked_reason,
            revokedSessions,
        }, 'Refresh token reuse detected; revoked all sessions for user');
        this.emit({
            action: 'refresh_reuse_detected',
            userId: record.user_id,
            ipAddress: meta.ip,
            userAgent: meta.userAgent,
            details: { tokenId: record.token_id, revokedReason: record.revoked_reason, revokedSessions },
        });
        throw new AuthError();
    }

    private async reissueForSuccessor(successorId: string, now: Date): Promise<TokenPair | null> {
        const successor = await this.guard('find refresh token', () => this.store.findByIdentity(successorId));
        if (!successor || successor.revoked || successor.expires_at.getTime() <= now.getTime()) {
            return null;
        }
        const user = await this.loadActiveOwner(successor.user_id);
        return {
            accessToken: this.mintAccessFor(user),
            refreshToken: this.tokens.mintRefresh(user.id, successor.token_id),
        };
    }

    private async loadActiveOwner(userId: string): Promise<User> {
        const user = await this.guard('find user', () => this.users.findUserById(userId));
        if (!user) {
            log.warn({ userId }, 'Refresh rejected: token owner no longer exists');
            throw new AuthError();
        }
        if (user.status !== 'active') {
            log.warn({ userId, status: user.status }, 'Refresh rejected: account not active');
            throw new ForbiddenError('Account is disabled', 'ACCOUNT_DISABLED');
        }
        return user;
    }

    private mintAccessFor(user: User): string {
        const permissions = this.tokens.capabilitiesForRole(user.role);
        return this.tokens.mintAccess(user.id, user.username, user.role, permissions);
    }

    private newRecord(userId: string, tokenId: string, now: Date, meta: RequestMeta): NewRefreshToken {
        return {
            token_id: tokenId,
            user_id: userId,
            expires_at: new Date(now.getTime() + this.tokens.refreshTokenTtl * 1000),
            created_at: now,
            user_agent: meta.userAgent ?? null,
            ip_address: meta.ip ?? null,
        };
    }

    private async issueRefresh(userId: string, tokenId: string, now: Date, meta: RequestMeta): Promise<string> {
        await this.guard('store refresh token', () => this.store.create(this.newRecord(userId, tokenId, now, meta)));
        return this.tokens.mintRefresh(userId, tokenId);
    }

    private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            if (err instanceof AppError) throw err;
            log.error({ err, operation }, 'Session store operation failed');
            throw new InfrastructureError(operation, err);
        }
    }

    private emit(event: AuditEvent): void {
        try {
            this.audit.record(event);
        } catch (err) {
            log.error({ err, action: event.action }, 'Audit sink threw; session outcome unaffected');
        }
    }
}
