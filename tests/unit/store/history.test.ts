import { SqliteHistoryStore } from '../../../src/store/history.js';
import type { DatabaseClient } from '../../../src/db/connection.js';
import { createUser, openTestDatabase } from '../../helpers/db.js';

describe('SqliteHistoryStore', () => {
    let client: DatabaseClient;
    let store: SqliteHistoryStore;
    let userId: number;
    let otherUserId: number;

    beforeEach(() => {
        client = openTestDatabase();
        store = new SqliteHistoryStore(client.getDatabase());
        userId = createUser(client.getDatabase(), 'a@example.com');
        otherUserId = createUser(client.getDatabase(), 'b@example.com');
    });

    afterEach(() => {
        client.close();
    });

    it('appends a reading and returns it with its tag', async () => {
        const stored = await store.append(
            userId,
            { userId, timestamp: new Date('2024-01-01T00:00:00Z'), bpm: 72, label: 'normal' },
            'normal',
        );

        expect(stored).toMatchObject({
            userId,
            bpm: 72,
            label: 'normal',
            tag: 'normal',
            timestamp: new Date('2024-01-01T00:00:00Z'),
        });
        expect(stored?.id).toBeGreaterThan(0);
    });

    it('finds a stored reading by timestamp and bpm for its owner only', async () => {
        const timestamp = new Date('2024-01-01T00:00:00Z');
        const stored = await store.append(userId, { userId, timestamp, bpm: 190 }, 'critical');

        expect(await store.find(userId, timestamp, 190)).toEqual(stored);
        expect(await store.find(userId, timestamp, 191)).toBeNull();
        expect(await store.find(otherUserId, timestamp, 190)).toBeNull();
    });

    it('returns null for a duplicate (user, timestamp, bpm)', async () => {
        const reading = { userId, timestamp: new Date('2024-01-01T00:00:00Z'), bpm: 72 };

        expect(await store.append(userId, reading, 'normal')).not.toBeNull();
        expect(await store.append(userId, reading, 'abnormal')).toBeNull();
        expect(await store.append(userId, { ...reading, bpm: 73 }, 'normal')).not.toBeNull();
        expect(await store.append(otherUserId, { ...reading, userId: otherUserId }, 'normal')).not.toBeNull();
    });

    it('queries an inclusive range in time order for one user', async () => {
        await store.append(userId, { userId, timestamp: new Date('2024-01-03T00:00:00Z'), bpm: 90 }, 'normal');
        await store.append(userId, { userId, timestamp: new Date('2024-01-01T00:00:00Z'), bpm: 70 }, 'normal');
        await store.append(userId, { userId, timestamp: new Date('2024-01-02T00:00:00Z'), bpm: 200 }, 'critical');
        await store.append(
            otherUserId,
            { userId: otherUserId, timestamp: new Date('2024-01-02T00:00:00Z'), bpm: 80 },
            'normal',
        );

        const rows = await store.queryRange(userId, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-02T00:00:00Z'));

        expect(rows.map((r) => [r.bpm, r.tag])).toEqual([
            [70, 'normal'],
            [200, 'critical'],
        ]);
        expect(rows[0]).not.toHaveProperty('label');
    });

    it('returns the latest readings newest first', async () => {
        for (const [day, bpm] of [[1, 70], [2, 71], [3, 72]]) {
            await store.append(userId, { userId, timestamp: new Date(Date.UTC(2024, 0, day)), bpm }, 'normal');
        }

        const latest = await store.latest(userId, 2);

        expect(latest.map((r) => r.bpm)).toEqual([72, 71]);
    });

    it('runs exclusive sections for the same user one at a time', async () => {
        const events: string[] = [];
        const section = (name: string, delayMs: number) => async () => {
            events.push(`${name}:start`);
            await new Promise((resolve) => setTimeout(resolve, delayMs));
            events.push(`${name}:end`);
            return name;
        };

        const results = await Promise.all([
            store.runExclusive(userId, section('first', 20)),
            store.runExclusive(userId, section('second', 0)),
        ]);

        expect(results).toEqual(['first', 'second']);
        expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    });

    it('keeps serving after a failed exclusive section', async () => {
        const failed = store.runExclusive(userId, () => Promise.reject(new Error('boom')));
        const next = store.runExclusive(userId, () => Promise.resolve('ok'));

        await expect(failed).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });
});
