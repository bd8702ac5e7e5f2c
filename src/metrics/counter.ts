export interface Counters {
    uploads: number;
    rows_accepted: number;
    rows_rejected: number;
    rows_duplicate: number;
    alerts_recorded: number;
    simulations: number;
    requests_failed: number;
}

function emptyCounters(): Counters {
    return {
        uploads: 0,
        rows_accepted: 0,
        rows_rejected: 0,
        rows_duplicate: 0,
        alerts_recorded: 0,
        simulations: 0,
        requests_failed: 0,
    };
}

export class Metrics {
    private counters = emptyCounters();

    recordUpload(accepted: number, rejected: number, duplicates: number): void {
        this.counters.uploads++;
        this.counters.rows_accepted += accepted;
        this.counters.rows_rejected += rejected;
        this.counters.rows_duplicate += duplicates;
    }

    incrementAlertsRecorded(): void {
        this.counters.alerts_recorded++;
    }

    incrementSimulations(): void {
        this.counters.simulations++;
    }

    incrementRequestsFailed(): void {
        this.counters.requests_failed++;
    }

    getCounters(): Counters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
