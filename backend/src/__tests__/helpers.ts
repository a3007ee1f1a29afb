import { MemoryAuditSink } from '../services/audit/audit.service';
import { InMemoryRefreshTokenStore, InMemoryUserRepository } from '../repositories/memory';
import { BcryptPasswordVerifier, hashPassword } from '../services/auth/password';
import { RoleCapabilityMap } from '../services/auth/permissions';
import { SessionService, type ReusePolicy } from '../services/auth/session.service';
import { TokenService, type TokenServiceOptions } from '../services/auth/token.service';
import type { User, UserRole, UserStatus } from '../types/auth';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'correct-horse-battery';

// Low bcrypt cost keeps the suite fast
const passwordHash = hashPassword(TEST_PASSWORD, 4);

export const testRoles = new RoleCapabilityMap({
    admin: ['users:read', 'users:write', 'tasks:read', 'tasks:write', 'tasks:delete', 'settings:read'],
    manager: ['tasks:read', 'tasks:write'],
    viewer: ['tasks:read'],
});

export function createTokenService(overrides: Partial<TokenServiceOptions> = {}): TokenService {
    return new TokenService({
        secret: TEST_SECRET,
        issuer: 'opsdesk-test',
        accessTokenTtl: 900,
        refreshTokenTtl: 3600,
        roles: testRoles,
        ...overrides,
    });
}

export async function makeUser(
    id: string,
    username: string,
    role: UserRole,
    status: UserStatus = 'active'
): Promise<User> {
    const created = new Date('2026-01-01T00:00:00Z');
    return {
        id,
        username,
        email: `${username}@example.test`,
        full_name: null,
        department: null,
        password_hash: await passwordHash,
        role,
        status,
        last_login_at: null,
        created_at: created,
        updated_at: created,
    };
}

export interface Harness {
    sessions: SessionService;
    tokens: TokenService;
    store: InMemoryRefreshTokenStore;
    users: InMemoryUserRepository;
    audit: MemoryAuditSink;
    clock: { now: Date; advance(seconds: number): void };
}

export interface HarnessOptions {
    rotation?: boolean;
    reuseWindowSeconds?: number;
    reusePolicy?: ReusePolicy;
    users?: User[];
}

export function createHarness(options: HarnessOptions = {}): Harness {
    const clock = {
        now: new Date('2026-03-01T12:00:00Z'),
        advance(seconds: number) {
            this.now = new Date(this.now.getTime() + seconds * 1000);
        },
    };
    const tokens = createTokenService();
    const store = new InMemoryRefreshTokenStore();
    const users = new InMemoryUserRepository(options.users ?? []);
    const audit = new MemoryAuditSink();
    const sessions = new SessionService({
        users,
        store,
        tokens,
        passwords: new BcryptPasswordVerifier(),
        audit,
        rotation: options.rotation ?? true,
        reuseWindowSeconds: options.reuseWindowSeconds ?? 10,
        reusePolicy: options.reusePolicy ?? 'successor',
        now: () => clock.now,
    });
    return { sessions, tokens, store, users, audit, clock };
}
