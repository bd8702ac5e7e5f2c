export type Tag = 'normal' | 'abnormal' | 'critical';

export const TAGS: readonly Tag[] = ['normal', 'abnormal', 'critical'];

export type ReadingLabel = 'normal' | 'abnormal' | 'simulated_spike';

/**
 * Numeric label codes as they appear in uploaded files.
 */
export const LABEL_CODES: Record<number, ReadingLabel> = {
    0: 'normal',
    1: 'abnormal',
    2: 'simulated_spike',
};

export interface Reading {
    userId: number;
    timestamp: Date;
    bpm: number;
    label?: ReadingLabel;
}

export interface StoredReading extends Reading {
    id: number;
    tag: Tag;
    createdAt: Date;
}

export interface ClassificationResult {
    reading: Reading;
    tag: Tag;
}

export interface RowError {
    rowIndex: number;
    reason: string;
}

export type RowOutcome =
    | { ok: true; rowIndex: number; reading: Omit<Reading, 'userId'> }
    | { ok: false; error: RowError };

export interface UploadSummary {
    totalRows: number;
    accepted: number;
    rejected: number;
    duplicates: number;
    countsByTag: Record<Tag, number>;
    alertCount: number;
    errors: RowError[];
}
