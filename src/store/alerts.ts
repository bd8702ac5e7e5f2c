import { and, desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db/connection.js';
import { alerts, type AlertRow } from '../db/schema.js';
import type { StoredReading } from '../ingest/types.js';
import type { AlertRecipient, AlertRecord, AlertRecorder } from './types.js';

function toAlertRecord(row: AlertRow): AlertRecord {
    return {
        id: row.id,
        userId: row.userId,
        readingId: row.readingId,
        bpm: row.bpm,
        readingTimestamp: new Date(row.ts),
        location: row.location,
        recipients: row.recipients,
        createdAt: new Date(row.createdAt),
    };
}

/**
 * Simulated emergency alerts. Records are only ever inserted; nothing is sent anywhere.
 */
export class SqliteAlertRecorder implements AlertRecorder {
    constructor(private db: AppDatabase) { }

    async record(
        userId: number,
        reading: StoredReading,
        recipients: AlertRecipient[],
        location?: string,
    ): Promise<AlertRecord> {
        const [row] = this.db
            .insert(alerts)
            .values({
                userId,
                readingId: reading.id,
                ts: reading.timestamp.toISOString(),
                bpm: reading.bpm,
                location: location ?? null,
                recipients,
                createdAt: new Date().toISOString(),
            })
            .returning()
            .all();

        return toAlertRecord(row);
    }

    async list(userId: number, limit: number): Promise<AlertRecord[]> {
        const rows = this.db
            .select()
            .from(alerts)
            .where(eq(alerts.userId, userId))
            .orderBy(desc(alerts.createdAt), desc(alerts.id))
            .limit(limit)
            .all();

        return rows.map(toAlertRecord);
    }

    async hasAlertFor(userId: number, readingId: number): Promise<boolean> {
        const [row] = this.db
            .select({ id: alerts.id })
            .from(alerts)
            .where(and(eq(alerts.userId, userId), eq(alerts.readingId, readingId)))
            .limit(1)
            .all();

        return row !== undefined;
    }
}
