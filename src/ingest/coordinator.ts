import type { Thresholds } from '../config/env.js';
import { logger } from '../config/logger.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { Metrics } from '../metrics/counter.js';
import { toRecipient } from '../store/contacts.js';
import type { AlertRecipient, AlertRecord, AlertRecorder, ContactDirectory, HistoryStore } from '../store/types.js';
import { classify, escalate } from './classifier.js';
import { decodeUpload, parseReadings } from './parser.js';
import { simulateSample, type RandomSource, type SimulationMode } from './simulator.js';
import type { Reading, StoredReading, Tag, UploadSummary } from './types.js';

export interface CoordinatorOptions {
    thresholds: Thresholds;
    bpmMax: number;
    /** Preceding out-of-band readings needed to escalate abnormal to critical; 0 disables. */
    escalationWindow: number;
    defaultLocation: string;
    random?: RandomSource;
}

export interface SimulationResult {
    reading: StoredReading;
    alert: AlertRecord | null;
}

function emptySummary(): UploadSummary {
    return {
        totalRows: 0,
        accepted: 0,
        rejected: 0,
        duplicates: 0,
        countsByTag: { normal: 0, abnormal: 0, critical: 0 },
        alertCount: 0,
        errors: [],
    };
}

export class IngestionCoordinator {
    constructor(
        private history: HistoryStore,
        private alerts: AlertRecorder,
        private contacts: ContactDirectory,
        private metrics: Metrics,
        private options: CoordinatorOptions,
    ) { }

    /**
     * Parse, classify and store one uploaded file. Bad rows are counted and skipped;
     * only an unreadable file (FormatError) fails the call, and it does so before
     * anything is written. Retrying a failed upload records any alert the failure
     * left missing.
     */
    async ingest(userId: number, raw: Uint8Array | string): Promise<UploadSummary> {
        const outcomes = parseReadings(decodeUpload(raw), { bpmMax: this.options.bpmMax });

        const summary = await this.history.runExclusive(userId, async () => {
            const summary = emptySummary();
            const recent = await this.recentBpms(userId);
            let recipients: AlertRecipient[] | undefined;

            for (const outcome of outcomes) {
                summary.totalRows++;

                if (!outcome.ok) {
                    summary.rejected++;
                    summary.errors.push(outcome.error);
                    logger.debug({ userId, ...outcome.error }, 'Upload row rejected');
                    continue;
                }

                const reading: Reading = { userId, ...outcome.reading };
                const tag = this.tagFor(reading, recent);
                const stored = await this.history.append(userId, reading, tag);

                if (!stored) {
                    summary.duplicates++;
                    // a failed earlier upload may have stored a critical reading without its alert
                    const existing = await this.history.find(userId, reading.timestamp, reading.bpm);
                    if (existing?.tag === 'critical' && !(await this.alerts.hasAlertFor(userId, existing.id))) {
                        if (!recipients) {
                            recipients = await this.recipientsFor(userId);
                        }
                        await this.recordAlert(userId, existing, recipients, this.options.defaultLocation);
                        summary.alertCount++;
                    }
                    continue;
                }

                this.remember(recent, stored.bpm);
                summary.accepted++;
                summary.countsByTag[tag]++;

                if (tag === 'critical') {
                    if (!recipients) {
                        recipients = await this.recipientsFor(userId);
                    }
                    await this.recordAlert(userId, stored, recipients, this.options.defaultLocation);
                    summary.alertCount++;
                }
            }

            return summary;
        });

        this.metrics.recordUpload(summary.accepted, summary.rejected, summary.duplicates);
        logger.info(
            {
                userId,
                totalRows: summary.totalRows,
                accepted: summary.accepted,
                rejected: summary.rejected,
                duplicates: summary.duplicates,
                alerts: summary.alertCount,
            },
            'Upload ingested',
        );

        return summary;
    }

    /**
     * Generate one demo reading stamped `now` and run it through the same
     * classify, store and alert steps as an upload row.
     */
    async simulate(userId: number, mode: SimulationMode, now: Date = new Date()): Promise<SimulationResult> {
        const sample = simulateSample(mode, this.options.random);

        const result = await this.history.runExclusive(userId, async () => {
            const reading: Reading = { userId, timestamp: now, ...sample };
            const tag = this.tagFor(reading, await this.recentBpms(userId));
            const stored = await this.history.append(userId, reading, tag);

            if (!stored) {
                throw new ConflictError('An identical reading is already recorded');
            }

            const alert =
                tag === 'critical'
                    ? await this.recordAlert(userId, stored, await this.recipientsFor(userId), this.options.defaultLocation)
                    : null;

            return { reading: stored, alert };
        });

        this.metrics.incrementSimulations();
        logger.info({ userId, mode, bpm: result.reading.bpm, tag: result.reading.tag }, 'Simulated reading saved');

        return result;
    }

    /**
     * Record an alert for the user's latest reading, whatever its tag.
     */
    async raiseManualAlert(userId: number, location?: string): Promise<AlertRecord> {
        const [latest] = await this.history.latest(userId, 1);
        if (!latest) {
            throw new NotFoundError('No reading available. Simulate or upload first.');
        }

        const where = location?.trim() || this.options.defaultLocation;
        return this.recordAlert(userId, latest, await this.recipientsFor(userId), where);
    }

    private tagFor(reading: Reading, recentBpms: readonly number[]): Tag {
        const tag = classify(reading.bpm, reading.label, this.options.thresholds);
        if (reading.label !== undefined) {
            return tag;
        }
        return escalate(tag, recentBpms, this.options.thresholds, this.options.escalationWindow);
    }

    private async recentBpms(userId: number): Promise<number[]> {
        const window = this.options.escalationWindow;
        if (window <= 0) {
            return [];
        }
        const latest = await this.history.latest(userId, window);
        return latest.map((reading) => reading.bpm).reverse();
    }

    private remember(recent: number[], bpm: number): void {
        if (this.options.escalationWindow <= 0) return;
        recent.push(bpm);
        if (recent.length > this.options.escalationWindow) {
            recent.shift();
        }
    }

    private async recipientsFor(userId: number): Promise<AlertRecipient[]> {
        const contacts = await this.contacts.listContacts(userId);
        return contacts.map(toRecipient);
    }

    private async recordAlert(
        userId: number,
        reading: StoredReading,
        recipients: AlertRecipient[],
        location: string,
    ): Promise<AlertRecord> {
        const alert = await this.alerts.record(userId, reading, recipients, location);
        this.metrics.incrementAlertsRecorded();

        logger.warn(
            {
                userId,
                alertId: alert.id,
                readingId: reading.id,
                bpm: reading.bpm,
                recipients: recipients.length,
            },
            'Emergency alert recorded (simulated)',
        );

        return alert;
    }
}
