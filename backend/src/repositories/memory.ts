import type { RefreshTokenRecord, RevocationReason, User } from '../types/auth';
import type { NewRefreshToken, RefreshTokenStore, RevokeOptions } from './refresh-token.repository';
import type { UserRepository } from './user.repository';

/**
 * In-process refresh token store for tests and local runs without PostgreSQL.
 * Each method checks and mutates within a single tick, which gives `revoke`
 * the same compare-and-set behaviour as the conditional UPDATE and `rotate`
 * the all-or-nothing behaviour of its transaction.
 */
export class InMemoryRefreshTokenStore implements RefreshTokenStore {
    private readonly records = new Map<string, RefreshTokenRecord>();

    async create(record: NewRefreshToken): Promise<RefreshTokenRecord> {
        return { ...this.insert(record) };
    }

    async findByIdentity(tokenId: string): Promise<RefreshTokenRecord | null> {
        const record = this.records.get(tokenId);
        return record ? { ...record } : null;
    }

    async findActiveByUser(userId: string, now: Date): Promise<RefreshTokenRecord[]> {
        return [...this.records.values()]
            .filter((r) => r.user_id === userId && !r.revoked && r.expires_at.getTime() > now.getTime())
            .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
            .map((r) => ({ ...r }));
    }

    async revoke(tokenId: string, options: RevokeOptions): Promise<boolean> {
        const record = this.records.get(tokenId);
        if (!record || record.revoked) return false;
        record.revoked = true;
        record.revoked_at = options.at;
        record.revoked_reason = options.reason;
        record.replaced_by = options.replacedBy ?? null;
        return true;
    }

    async rotate(tokenId: string, successor: NewRefreshToken, at: Date): Promise<boolean> {
        const record = this.records.get(tokenId);
        if (!record || record.revoked) return false;
        // A failed insert leaves the predecessor untouched
        this.insert(successor);
        record.revoked = true;
        record.revoked_at = at;
        record.revoked_reason = 'rotated';
        record.replaced_by = successor.token_id;
        return true;
    }

    async revokeAllForUser(userId: string, reason: RevocationReason, at: Date): Promise<number> {
        let count = 0;
        for (const record of this.records.values()) {
            if (record.user_id !== userId || record.revoked) continue;
            record.revoked = true;
            record.revoked_at = at;
            record.revoked_reason = reason;
            count++;
        }
        return count;
    }

    async deleteExpired(now: Date): Promise<number> {
        let count = 0;
        for (const [tokenId, record] of this.records) {
            if (record.expires_at.getTime() < now.getTime()) {
                this.records.delete(tokenId);
                count++;
            }
        }
        return count;
    }

    get size(): number {
        return this.records.size;
    }

    private insert(record: NewRefreshToken): RefreshTokenRecord {
        if (this.records.has(record.token_id)) {
            throw new Error(`Duplicate refresh token identity: ${record.token_id}`);
        }
        const stored: RefreshTokenRecord = {
            ...record,
            revoked: false,
            revoked_at: null,
            revoked_reason: null,
            replaced_by: null,
        };
        this.records.set(record.token_id, stored);
        return stored;
    }
}

export class InMemoryUserRepository implements UserRepository {
    private readonly users = new Map<string, User>();

    constructor(users: User[] = []) {
        for (const user of users) this.users.set(user.id, { ...user });
    }

    add(user: User): void {
        this.users.set(user.id, { ...user });
    }

    update(id: string, changes: Partial<Omit<User, 'id'>>): void {
        const user = this.users.get(id);
        if (user) this.users.set(id, { ...user, ...changes });
    }

    async findUserByUsername(username: string): Promise<User | null> {
        for (const user of this.users.values()) {
            if (user.username === username) return { ...user };
        }
        return null;
    }

    async findUserById(id: string): Promise<User | null> {
        const user = this.users.get(id);
        return user ? { ...user } : null;
    }

    async recordLogin(id: string, at: Date): Promise<void> {
        const user = this.users.get(id);
        if (user) user.last_login_at = at;
    }
}
