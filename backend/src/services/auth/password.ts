import bcrypt from 'bcryptjs';

const BCRYPT_ROUNDS = 10;

/** Opaque plaintext-vs-hash comparison used by login. */
export interface PasswordVerifier {
    verify(password: string, hash: string): Promise<boolean>;
}

export async function hashPassword(password: string, rounds = BCRYPT_ROUNDS): Promise<string> {
    return bcrypt.hash(password, rounds);
}

export class BcryptPasswordVerifier implements PasswordVerifier {
    async verify(password: string, hash: string): Promise<boolean> {
        return bcrypt.compare(password, hash);
    }
}
