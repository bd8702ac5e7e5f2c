import { config } from 'dotenv';

// Load .env file if present
config();

export interface Thresholds {
    low: number;
    high: number;
    elevatedBand: {
        low: number;
        high: number;
    };
}

export interface AppConfig {
    http: {
        port: number;
        uploadMaxBytes: number;
    };
    database: {
        path: string;
        migrationsPath: string;
    };
    contracts: {
        path: string;
    };
    classification: {
        thresholds: Thresholds;
        bpmMax: number;
        escalationWindow: number;
    };
    alerts: {
        defaultLocation: string;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

/**
 * Parses a band written as `low-high`, e.g. `45-120`.
 */
export function parseBand(key: string, value: string): { low: number; high: number } {
    const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(value);
    if (!match) {
        throw new Error(`Invalid band for environment variable ${key}: ${value} (expected low-high)`);
    }
    return { low: parseInt(match[1], 10), high: parseInt(match[2], 10) };
}

export function validateThresholds(thresholds: Thresholds, bpmMax: number): void {
    const { low, high, elevatedBand } = thresholds;
    if (!(low <= elevatedBand.low && elevatedBand.low <= elevatedBand.high && elevatedBand.high <= high)) {
        throw new Error(
            `Inconsistent thresholds: expected LOW_THRESHOLD (${low}) <= ELEVATED_BAND (${elevatedBand.low}-${elevatedBand.high}) <= HIGH_THRESHOLD (${high})`,
        );
    }
    if (high >= bpmMax) {
        throw new Error(`HIGH_THRESHOLD (${high}) must be below BPM_MAX (${bpmMax})`);
    }
}

export function loadConfig(): AppConfig {
    const thresholds: Thresholds = {
        low: getEnvNumber('LOW_THRESHOLD', 40),
        high: getEnvNumber('HIGH_THRESHOLD', 150),
        elevatedBand: parseBand('ELEVATED_BAND', getEnv('ELEVATED_BAND', '45-120')),
    };
    const bpmMax = getEnvNumber('BPM_MAX', 300);
    validateThresholds(thresholds, bpmMax);

    const escalationWindow = getEnvNumber('ESCALATION_WINDOW', 2);
    if (escalationWindow < 0) {
        throw new Error(`ESCALATION_WINDOW must not be negative: ${escalationWindow}`);
    }

    return {
        http: {
            port: getEnvNumber('HTTP_PORT', 8092),
            uploadMaxBytes: getEnvNumber('UPLOAD_MAX_BYTES', 5 * 1024 * 1024),
        },
        database: {
            path: getEnv('DATABASE_PATH', './data/heartwatch.db'),
            migrationsPath: getEnv('MIGRATIONS_PATH', './migrations'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        classification: {
            thresholds,
            bpmMax,
            escalationWindow,
        },
        alerts: {
            defaultLocation: getEnv('ALERT_DEFAULT_LOCATION', 'GPS: 29.3759, 47.9774 (demo)'),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
