import jwt, {
    JsonWebTokenError,
    NotBeforeError,
    TokenExpiredError,
    type Algorithm,
    type JwtPayload,
} from 'jsonwebtoken';
import { z } from 'zod';
import type { AccessTokenPayload, Permission, RefreshTokenPayload } from '../../types/auth';
import { isPermission, permissionSchema, type PermissionSet, type RoleCapabilityMap } from './permissions';

// Only the HMAC family is accepted; a token asserting RS*/ES*/none is rejected
// before its signature is considered.
const SIGNING_ALGORITHM = 'HS256';
const ACCEPTED_ALGORITHMS: Algorithm[] = ['HS256', 'HS384', 'HS512'];

const BEARER_PREFIX = 'Bearer ';

export type TokenErrorKind = 'malformed' | 'signature' | 'expired' | 'not_active';

export class TokenError extends Error {
    public readonly kind: TokenErrorKind;

    constructor(kind: TokenErrorKind, message: string) {
        super(message);
        this.name = 'TokenError';
        this.kind = kind;
    }
}

const registeredClaims = {
    sub: z.string().min(1),
    iat: z.number(),
    nbf: z.number(),
    exp: z.number(),
    iss: z.string(),
};

const accessPayloadSchema = z.object({
    ...registeredClaims,
    username: z.string(),
    role: z.string(),
    permissions: z.array(permissionSchema),
    type: z.literal('access'),
});

const refreshPayloadSchema = z.object({
    ...registeredClaims,
    tokenId: z.string().uuid(),
    type: z.literal('refresh'),
});

export interface TokenServiceOptions {
    secret: string;
    issuer: string;
    /** seconds */
    accessTokenTtl: number;
    /** seconds */
    refreshTokenTtl: number;
    roles: RoleCapabilityMap;
}

/**
 * Stateless signer/verifier for access and refresh JWTs.
 * Holds configuration only; nothing is remembered between calls.
 */
export class TokenService {
    private readonly secret: string;
    private readonly issuer: string;
    private readonly roles: RoleCapabilityMap;

    readonly accessTokenTtl: number;
    readonly refreshTokenTtl: number;

    constructor(options: TokenServiceOptions) {
        if (!options.secret) {
            throw new Error('Token signing secret is not configured');
        }
        this.secret = options.secret;
        this.issuer = options.issuer;
        this.roles = options.roles;
        this.accessTokenTtl = options.accessTokenTtl;
        this.refreshTokenTtl = options.refreshTokenTtl;
    }

    mintAccess(
        userId: string,
        username: string,
        role: string,
        permissions: PermissionSet | readonly Permission[]
    ): string {
        const list = [...permissions].sort();
        const invalid = list.filter((p) => !isPermission(p));
        if (invalid.length > 0) {
            // Would mint a token that verifyAccess rejects
            throw new Error(`Invalid permission name: ${invalid.join(', ')}`);
        }
        return this.sign(
            { sub: userId, username, role, permissions: list, type: 'access' },
            this.accessTokenTtl
        );
    }

    mintRefresh(userId: string, tokenId: string): string {
        return this.sign({ sub: userId, tokenId, type: 'refresh' }, this.refreshTokenTtl);
    }

    verifyAccess(token: string): AccessTokenPayload {
        const result = accessPayloadSchema.safeParse(this.verify(token));
        if (!result.success) {
            throw new TokenError('malformed', 'Access token claims have an unexpected shape');
        }
        return result.data;
    }

    verifyRefresh(token: string): RefreshTokenPayload {
        const result = refreshPayloadSchema.safeParse(this.verify(token));
        if (!result.success) {
            throw new TokenError('malformed', 'Refresh token claims have an unexpected shape');
        }
        return result.data;
    }

    capabilitiesForRole(role: string): PermissionSet {
        return this.roles.capabilitiesForRole(role);
    }

    private sign(payload: Record<string, unknown>, ttlSeconds: number): string {
        return jwt.sign(payload, this.secret, {
            algorithm: SIGNING_ALGORITHM,
            expiresIn: ttlSeconds,
            notBefore: 0,
            issuer: this.issuer,
        });
    }

    private verify(token: string): JwtPayload {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.secret, {
                algorithms: ACCEPTED_ALGORITHMS,
                issuer: this.issuer,
            });
        } catch (err) {
            throw classifyJwtError(err);
        }
        if (typeof decoded === 'string') {
            throw new TokenError('malformed', 'Token payload is not a claims object');
        }
        return decoded;
    }
}

const SIGNATURE_FAILURES = new Set(['invalid signature', 'invalid algorithm', 'jwt signature is required']);

function classifyJwtError(err: unknown): TokenError {
    if (err instanceof TokenExpiredError) {
        return new TokenError('expired', err.message);
    }
    if (err instanceof NotBeforeError) {
        return new TokenError('not_active', err.message);
    }
    if (err instanceof JsonWebTokenError) {
        const kind = SIGNATURE_FAILURES.has(err.message) ? 'signature' : 'malformed';
        return new TokenError(kind, err.message);
    }
    return new TokenError('malformed', err instanceof Error ? err.message : 'Token could not be verified');
}

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 * The scheme match is case-sensitive. An empty token after a well-formed
 * prefix is returned as-is and left for verification to reject.
 */
export function extractBearer(header: string | undefined): string {
    if (!header) {
        throw new TokenError('malformed', 'Authorization header is required');
    }
    if (!header.startsWith(BEARER_PREFIX)) {
        throw new TokenError('malformed', "Authorization header must start with 'Bearer '");
    }
    return header.slice(BEARER_PREFIX.length);
}
