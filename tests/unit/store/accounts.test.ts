import { AccountStore, hashPassword, verifyPassword } from '../../../src/store/accounts.js';
import { AuthenticationError, ConflictError } from '../../../src/errors.js';
import type { DatabaseClient } from '../../../src/db/connection.js';
import { openTestDatabase } from '../../helpers/db.js';

describe('password hashing', () => {
    it('verifies the original password only', async () => {
        const hash = await hashPassword('test-secret');

        expect(hash.startsWith('scrypt$')).toBe(true);
        expect(await verifyPassword('test-secret', hash)).toBe(true);
        expect(await verifyPassword('wrong-secret', hash)).toBe(false);
    });

    it('rejects malformed stored hashes', async () => {
        expect(await verifyPassword('test-secret', 'plain-text')).toBe(false);
        expect(await verifyPassword('test-secret', 'scrypt$00$abcd')).toBe(false);
    });
});

describe('AccountStore', () => {
    let client: DatabaseClient;
    let accounts: AccountStore;

    beforeEach(() => {
        client = openTestDatabase();
        accounts = new AccountStore(client.getDatabase());
    });

    afterEach(() => {
        client.close();
    });

    it('registers with a normalized email', async () => {
        const account = await accounts.register('  Person@Example.COM ', 'test-secret');

        expect(account).toEqual({ id: expect.any(Number), email: 'person@example.com' });
    });

    it('refuses a second registration for the same email', async () => {
        await accounts.register('person@example.com', 'test-secret');

        await expect(accounts.register('PERSON@example.com', 'other-secret')).rejects.toBeInstanceOf(ConflictError);
    });

    it('issues a session token that resolves to the account', async () => {
        const account = await accounts.register('person@example.com', 'test-secret');
        const token = await accounts.login('Person@example.com', 'test-secret');

        expect(await accounts.resolveSession(token)).toBe(account.id);

        await accounts.logout(token);
        expect(await accounts.resolveSession(token)).toBeNull();
    });

    it('rejects bad credentials', async () => {
        await accounts.register('person@example.com', 'test-secret');

        await expect(accounts.login('person@example.com', 'wrong-secret')).rejects.toBeInstanceOf(AuthenticationError);
        await expect(accounts.login('nobody@example.com', 'test-secret')).rejects.toBeInstanceOf(AuthenticationError);
    });
});
