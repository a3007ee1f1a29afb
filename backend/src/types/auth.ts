// ─── Auth & RBAC Types ───

import type { PermissionSet } from '../services/auth/permissions';

export type UserRole = 'admin' | 'manager' | 'user' | 'viewer';

export type UserStatus = 'active' | 'inactive' | 'suspended';

/** A capability string of the form `resource:action`, e.g. `tasks:read`. */
export type Permission = `${string}:${string}`;

export interface User {
    id: string;
    username: string;
    email: string;
    full_name: string | null;
    department: string | null;
    password_hash: string;
    role: UserRole;
    status: UserStatus;
    last_login_at: Date | null;
    created_at: Date;
    updated_at: Date;
}

/** Safe user object — never expose password_hash */
export type SafeUser = Omit<User, 'password_hash'>;

export type RevocationReason = 'rotated' | 'logout' | 'logout_all' | 'reuse_detected';

export interface RefreshTokenRecord {
    token_id: string;  // identity embedded in the refresh JWT
    user_id: string;
    expires_at: Date;
    revoked: boolean;
    revoked_at: Date | null;
    revoked_reason: RevocationReason | null;
    replaced_by: string | null;  // successor token_id when rotated
    user_agent: string | null;
    ip_address: string | null;
    created_at: Date;
}

/** JWT access token payload */
export interface AccessTokenPayload {
    sub: string;       // user.id
    username: string;
    role: string;
    permissions: Permission[];
    type: 'access';
    iat: number;
    nbf: number;
    exp: number;
    iss: string;
}

/** JWT refresh token payload */
export interface RefreshTokenPayload {
    sub: string;       // user.id
    tokenId: string;   // refresh_tokens.token_id
    type: 'refresh';
    iat: number;
    nbf: number;
    exp: number;
    iss: string;
}

/** What gets attached to the Fastify request after auth middleware */
export interface AuthUser {
    id: string;
    username: string;
    role: string;
    permissions: PermissionSet;
}

/** Client details recorded with sessions and audit events */
export interface RequestMeta {
    userAgent?: string;
    ip?: string;
}

export interface TokenPair {
    accessToken: string;
    refreshToken: string;
}
