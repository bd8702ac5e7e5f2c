import { TextDecoder } from 'node:util';
import { FormatError } from '../errors.js';
import { mapHeader, READING_COLUMNS, type ColumnField, type ColumnMapping, type ColumnSpec } from './columns.js';
import { LABEL_CODES, type ReadingLabel, type RowOutcome } from './types.js';

export interface ParserOptions {
    /** Exclusive upper bound for an accepted bpm value. */
    bpmMax: number;
    columns?: readonly ColumnSpec[];
}

interface RawRecord {
    cells: string[];
    unterminated: boolean;
    /** At least one cell was written in quotes, even if it is empty. */
    quoted: boolean;
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const TIMESTAMP =
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const LABEL_NAMES: readonly ReadingLabel[] = ['normal', 'abnormal', 'simulated_spike'];

/**
 * Decode uploaded bytes as UTF-8 text. A leading BOM is dropped.
 */
export function decodeUpload(raw: Uint8Array | string): string {
    let text: string;
    if (typeof raw === 'string') {
        text = raw.startsWith('\uFEFF') ? raw.slice(1) : raw;
    } else {
        try {
            text = new TextDecoder('utf-8', { fatal: true }).decode(raw);
        } catch (err) {
            throw new FormatError('Upload is not valid UTF-8 text', { cause: String(err) });
        }
    }

    if (text.includes('\u0000')) {
        throw new FormatError('Upload contains binary data');
    }

    return text;
}

/**
 * Split CSV text into records. Supports double-quoted cells with `""` escapes;
 * both LF and CRLF end a record.
 */
function* splitRecords(text: string): Generator<RawRecord> {
    let cells: string[] = [];
    let cell = '';
    let quoted = false;
    let sawQuote = false;
    let i = 0;

    while (i < text.length) {
        const ch = text[i];

        if (quoted) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    cell += '"';
                    i += 2;
                    continue;
                }
                quoted = false;
            } else {
                cell += ch;
            }
            i++;
            continue;
        }

        if (ch === '"' && cell === '') {
            quoted = true;
            sawQuote = true;
        } else if (ch === ',') {
            cells.push(cell);
            cell = '';
        } else if (ch === '\n' || ch === '\r') {
            cells.push(cell);
            yield { cells, unterminated: false, quoted: sawQuote };
            cells = [];
            cell = '';
            sawQuote = false;
            if (ch === '\r' && text[i + 1] === '\n') i++;
        } else {
            cell += ch;
        }
        i++;
    }

    if (sawQuote || cell !== '' || cells.length > 0) {
        cells.push(cell);
        yield { cells, unterminated: quoted, quoted: sawQuote };
    }
}

function isBlank(record: RawRecord): boolean {
    return record.cells.length === 1 && record.cells[0].trim() === '' && !record.quoted;
}

/**
 * Parse a timestamp as an instant. Values without an offset are taken as UTC.
 */
export function parseTimestamp(value: string): Date | null {
    const match = TIMESTAMP.exec(value.trim());
    if (!match) return null;

    const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', offset] = match;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const millis = Number(fraction.padEnd(3, '0').slice(0, 3));

    if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

    // setUTCFullYear keeps years 0-99 as written; Date.UTC would map them to 19xx
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, millis);
    // invalid days roll over (Feb 30 -> Mar 2)
    if (date.getUTCDate() !== day) return null;

    let offsetMinutes = 0;
    if (offset && offset.toUpperCase() !== 'Z') {
        const sign = offset.startsWith('-') ? -1 : 1;
        const digits = offset.slice(1).replace(':', '');
        const offsetHours = Number(digits.slice(0, 2));
        const offsetMins = Number(digits.slice(2));
        if (offsetHours > 23 || offsetMins > 59) return null;
        offsetMinutes = sign * (offsetHours * 60 + offsetMins);
    }

    return new Date(date.getTime() - offsetMinutes * 60_000);
}

export function parseLabel(value: string): ReadingLabel | undefined {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === '') return undefined;

    if (NUMERIC.test(trimmed)) {
        return LABEL_CODES[Math.trunc(Number(trimmed))];
    }

    return LABEL_NAMES.find((name) => name === trimmed);
}

function parseRow(record: RawRecord, rowIndex: number, mapping: ColumnMapping, options: ParserOptions): RowOutcome {
    const fail = (reason: string): RowOutcome => ({ ok: false, error: { rowIndex, reason } });

    if (record.unterminated) {
        return fail('unterminated quoted field');
    }

    const cell = (field: ColumnField): string => {
        const index = mapping[field];
        if (index === undefined || index >= record.cells.length) return '';
        return record.cells[index].trim();
    };

    const rawTimestamp = cell('timestamp');
    const rawBpm = cell('bpm');

    if (rawTimestamp === '') return fail('missing timestamp');
    if (rawBpm === '') return fail('missing bpm');

    if (!NUMERIC.test(rawBpm)) return fail('bpm is not numeric');
    const bpm = Math.trunc(Number(rawBpm));
    if (bpm <= 0 || bpm >= options.bpmMax) return fail('bpm out of range');

    const timestamp = parseTimestamp(rawTimestamp);
    if (!timestamp) return fail('invalid timestamp');

    const label = parseLabel(cell('label'));

    return {
        ok: true,
        rowIndex,
        reading: label === undefined ? { timestamp, bpm } : { timestamp, bpm, label },
    };
}

function* parseRows(
    records: Generator<RawRecord>,
    mapping: ColumnMapping,
    options: ParserOptions,
): Generator<RowOutcome> {
    let rowIndex = 0;
    for (const record of records) {
        if (isBlank(record)) continue;
        rowIndex++;
        yield parseRow(record, rowIndex, mapping, options);
    }
}

/**
 * Parse CSV text into per-row outcomes. The header is read eagerly, so a missing or
 * unusable header throws FormatError here; rows are produced lazily, one pass only.
 */
export function parseReadings(text: string, options: ParserOptions): Generator<RowOutcome> {
    const records = splitRecords(text);

    let next = records.next();
    while (!next.done && isBlank(next.value)) {
        next = records.next();
    }

    if (next.done) {
        throw new FormatError('Upload is empty');
    }

    const header = next.value;
    if (header.unterminated) {
        throw new FormatError('Header contains an unterminated quoted field');
    }

    const mapping = mapHeader(header.cells, options.columns ?? READING_COLUMNS);
    return parseRows(records, mapping, options);
}
