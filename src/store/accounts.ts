import { randomBytes, scrypt, timingSafeEqual } from 'crypto';
import { eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { AppDatabase } from '../db/connection.js';
import { sessions, users } from '../db/schema.js';
import { AuthenticationError, ConflictError } from '../errors.js';

const KEY_LENGTH = 32;

function deriveKey(password: string, salt: Buffer, keylen: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        scrypt(password, salt, keylen, (err, key) => (err ? reject(err) : resolve(key)));
    });
}

export interface Account {
    id: number;
    email: string;
}

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

export async function hashPassword(password: string): Promise<string> {
    const salt = randomBytes(16);
    const key = await deriveKey(password, salt, KEY_LENGTH);
    return `scrypt$${salt.toString('hex')}$${key.toString('hex')}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
    const [scheme, saltHex, keyHex] = stored.split('$');
    if (scheme !== 'scrypt' || !saltHex || !keyHex) {
        return false;
    }

    const expected = Buffer.from(keyHex, 'hex');
    if (expected.length !== KEY_LENGTH) {
        return false;
    }

    const actual = await deriveKey(password, Buffer.from(saltHex, 'hex'), KEY_LENGTH);
    return timingSafeEqual(actual, expected);
}

/**
 * Demo-grade accounts: email + password, opaque bearer tokens stored in the database.
 */
export class AccountStore {
    constructor(private db: AppDatabase) { }

    async register(email: string, password: string): Promise<Account> {
        const normalized = normalizeEmail(email);
        const [row] = this.db
            .insert(users)
            .values({
                email: normalized,
                passwordHash: await hashPassword(password),
                createdAt: new Date().toISOString(),
            })
            .onConflictDoNothing()
            .returning({ id: users.id, email: users.email })
            .all();

        if (!row) {
            throw new ConflictError('This email is already registered');
        }

        return row;
    }

    /**
     * Check credentials and open a session.
     *
     * @returns the session token
     */
    async login(email: string, password: string): Promise<string> {
        const user = this.db
            .select()
            .from(users)
            .where(eq(users.email, normalizeEmail(email)))
            .get();

        if (!user || !(await verifyPassword(password, user.passwordHash))) {
            throw new AuthenticationError('Invalid email or password');
        }

        const token = uuidv4();
        this.db
            .insert(sessions)
            .values({ token, userId: user.id, createdAt: new Date().toISOString() })
            .run();

        return token;
    }

    async resolveSession(token: string): Promise<number | null> {
        const session = this.db
            .select({ userId: sessions.userId })
            .from(sessions)
            .where(eq(sessions.token, token))
            .get();

        return session ? session.userId : null;
    }

    async logout(token: string): Promise<void> {
        this.db.delete(sessions).where(eq(sessions.token, token)).run();
    }
}
