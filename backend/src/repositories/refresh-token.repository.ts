import { execute, query, queryOne, transaction } from '../db';
import type { RefreshTokenRecord, RevocationReason } from '../types/auth';

export interface NewRefreshToken {
    token_id: string;
    user_id: string;
    expires_at: Date;
    created_at: Date;
    user_agent: string | null;
    ip_address: string | null;
}

export interface RevokeOptions {
    reason: RevocationReason;
    at: Date;
    /** Successor identity, set when the record is revoked by rotation */
    replacedBy?: string;
}

/**
 * Persisted refresh-token identities and their revocation state.
 *
 * `revoke` and `rotate` are the concurrency primitives the session protocol
 * relies on: each must flip `revoked` atomically and report whether this call
 * was the one that flipped it. `rotate` also stores the successor, and either
 * both changes land or neither does.
 */
export interface RefreshTokenStore {
    create(record: NewRefreshToken): Promise<RefreshTokenRecord>;
    findByIdentity(tokenId: string): Promise<RefreshTokenRecord | null>;
    findActiveByUser(userId: string, now: Date): Promise<RefreshTokenRecord[]>;
    revoke(tokenId: string, options: RevokeOptions): Promise<boolean>;
    rotate(tokenId: string, successor: NewRefreshToken, at: Date): Promise<boolean>;
    revokeAllForUser(userId: string, reason: RevocationReason, at: Date): Promise<number>;
    deleteExpired(now: Date): Promise<number>;
}

const COLUMNS = `token_id, user_id, expires_at, revoked, revoked_at, revoked_reason,
    replaced_by, user_agent, ip_address::text AS ip_address, created_at`;

const INSERT_SQL = `INSERT INTO refresh_tokens (token_id, user_id, expires_at, created_at, user_agent, ip_address)
    VALUES ($1, $2, $3, $4, $5, $6::inet)`;

const REVOKE_SQL = `UPDATE refresh_tokens
    SET revoked = TRUE, revoked_at = $2, revoked_reason = $3, replaced_by = $4
    WHERE token_id = $1 AND revoked = FALSE`;

function insertParams(record: NewRefreshToken): unknown[] {
    return [
        record.token_id,
        record.user_id,
        record.expires_at,
        record.created_at,
        record.user_agent,
        record.ip_address,
    ];
}

export class PgRefreshTokenStore implements RefreshTokenStore {
    async create(record: NewRefreshToken): Promise<RefreshTokenRecord> {
        const rows = await query<RefreshTokenRecord>(`${INSERT_SQL} RETURNING ${COLUMNS}`, insertParams(record));
        return rows[0];
    }

    async findByIdentity(tokenId: string): Promise<RefreshTokenRecord | null> {
        return queryOne<RefreshTokenRecord>(
            `SELECT ${COLUMNS} FROM refresh_tokens WHERE token_id = $1`,
            [tokenId]
        );
    }

    async findActiveByUser(userId: string, now: Date): Promise<RefreshTokenRecord[]> {
        return query<RefreshTokenRecord>(
            `SELECT ${COLUMNS} FROM refresh_tokens
             WHERE user_id = $1 AND revoked = FALSE AND expires_at > $2
             ORDER BY created_at DESC`,
            [userId, now]
        );
    }

    async revoke(tokenId: string, options: RevokeOptions): Promise<boolean> {
        const affected = await execute(REVOKE_SQL, [tokenId, options.at, options.reason, options.replacedBy ?? null]);
        return affected === 1;
    }

    async rotate(tokenId: string, successor: NewRefreshToken, at: Date): Promise<boolean> {
        // The UPDATE keeps the row locked until COMMIT; a concurrent rotation
        // waits, re-checks `revoked = FALSE` and matches nothing.
        return transaction(async (tx) => {
            const affected = await tx.execute(REVOKE_SQL, [tokenId, at, 'rotated', successor.token_id]);
            if (affected !== 1) return false;
            await tx.execute(INSERT_SQL, insertParams(successor));
            return true;
        });
    }

    async revokeAllForUser(userId: string, reason: RevocationReason, at: Date): Promise<number> {
        // Already-revoked rows keep their original reason and time
        return execute(
            `UPDATE refresh_tokens
             SET revoked = TRUE, revoked_at = $2, revoked_reason = $3
             WHERE user_id = $1 AND revoked = FALSE`,
            [userId, at, reason]
        );
    }

    async deleteExpired(now: Date): Promise<number> {
        return execute('DELETE FROM refresh_tokens WHERE expires_at < $1', [now]);
    }
}
