import { execute, queryOne } from '../db';
import type { SafeUser, User } from '../types/auth';

/** Read-side contract the session core needs from the user store. */
export interface UserRepository {
    findUserByUsername(username: string): Promise<User | null>;
    findUserById(id: string): Promise<User | null>;
    recordLogin(id: string, at: Date): Promise<void>;
}

const USER_COLUMNS = `id, username, email, full_name, department, password_hash, role, status,
    last_login_at, created_at, updated_at`;

export class PgUserRepository implements UserRepository {
    async findUserByUsername(username: string): Promise<User | null> {
        return queryOne<User>(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [username]);
    }

    async findUserById(id: string): Promise<User | null> {
        return queryOne<User>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    }

    async recordLogin(id: string, at: Date): Promise<void> {
        await execute('UPDATE users SET last_login_at = $2 WHERE id = $1', [id, at]);
    }
}

export function toSafeUser(user: User): SafeUser {
    const { password_hash: _hash, ...safe } = user;
    return safe;
}
