import { FormatError } from '../errors.js';

export type ColumnField = 'timestamp' | 'bpm' | 'label';

export interface ColumnSpec {
    field: ColumnField;
    aliases: readonly string[];
    required: boolean;
}

/**
 * Recognized upload columns. Header names are compared trimmed and lower-cased.
 */
export const READING_COLUMNS: readonly ColumnSpec[] = [
    { field: 'timestamp', aliases: ['timestamp', 'ts', 'time', 'datetime'], required: true },
    { field: 'bpm', aliases: ['bpm', 'hr', 'heart_rate', 'heartrate'], required: true },
    { field: 'label', aliases: ['label'], required: false },
];

export type ColumnMapping = Partial<Record<ColumnField, number>>;

/**
 * Resolve header cells to column positions. The first header matching any alias wins.
 */
export function mapHeader(header: string[], columns: readonly ColumnSpec[] = READING_COLUMNS): ColumnMapping {
    const normalized = header.map((name) => name.trim().toLowerCase());
    const mapping: ColumnMapping = {};
    const missing: string[] = [];

    for (const column of columns) {
        const index = normalized.findIndex((name) => column.aliases.includes(name));
        if (index >= 0) {
            mapping[column.field] = index;
        } else if (column.required) {
            missing.push(`${column.field} (${column.aliases.join('/')})`);
        }
    }

    if (missing.length > 0) {
        throw new FormatError(`Header is missing required columns: ${missing.join(', ')}`, {
            header,
        });
    }

    return mapping;
}
