import { and, asc, desc, eq, gte, lte } from 'drizzle-orm';
import type { AppDatabase } from '../db/connection.js';
import { readings, type ReadingRow } from '../db/schema.js';
import type { Reading, StoredReading, Tag } from '../ingest/types.js';
import type { HistoryStore } from './types.js';

export function toStoredReading(row: ReadingRow): StoredReading {
    const stored: StoredReading = {
        id: row.id,
        userId: row.userId,
        timestamp: new Date(row.ts),
        bpm: row.bpm,
        tag: row.status,
        createdAt: new Date(row.createdAt),
    };
    if (row.label !== null) {
        stored.label = row.label;
    }
    return stored;
}

export class SqliteHistoryStore implements HistoryStore {
    private tails = new Map<number, Promise<void>>();

    constructor(private db: AppDatabase) { }

    async append(userId: number, reading: Reading, tag: Tag): Promise<StoredReading | null> {
        const [row] = this.db
            .insert(readings)
            .values({
                userId,
                ts: reading.timestamp.toISOString(),
                bpm: reading.bpm,
                label: reading.label ?? null,
                status: tag,
                createdAt: new Date().toISOString(),
            })
            .onConflictDoNothing()
            .returning()
            .all();

        return row ? toStoredReading(row) : null;
    }

    async find(userId: number, timestamp: Date, bpm: number): Promise<StoredReading | null> {
        const [row] = this.db
            .select()
            .from(readings)
            .where(
                and(eq(readings.userId, userId), eq(readings.ts, timestamp.toISOString()), eq(readings.bpm, bpm)),
            )
            .limit(1)
            .all();

        return row ? toStoredReading(row) : null;
    }

    async queryRange(userId: number, from: Date, to: Date): Promise<StoredReading[]> {
        const rows = this.db
            .select()
            .from(readings)
            .where(
                and(
                    eq(readings.userId, userId),
                    gte(readings.ts, from.toISOString()),
                    lte(readings.ts, to.toISOString()),
                ),
            )
            .orderBy(asc(readings.ts), asc(readings.id))
            .all();

        return rows.map(toStoredReading);
    }

    async latest(userId: number, limit: number): Promise<StoredReading[]> {
        const rows = this.db
            .select()
            .from(readings)
            .where(eq(readings.userId, userId))
            .orderBy(desc(readings.ts), desc(readings.id))
            .limit(limit)
            .all();

        return rows.map(toStoredReading);
    }

    async runExclusive<T>(userId: number, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(userId) ?? Promise.resolve();
        const run = previous.then(fn);
        const tail = run.then(
            () => undefined,
            () => undefined,
        );
        this.tails.set(userId, tail);

        try {
            return await run;
        } finally {
            if (this.tails.get(userId) === tail) {
                this.tails.delete(userId);
            }
        }
    }
}
