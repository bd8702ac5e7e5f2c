import type { Reading, StoredReading, Tag } from '../ingest/types.js';

export interface EmergencyContact {
    id: number;
    userId: number;
    name: string;
    phone: string | null;
    email: string | null;
    createdAt: Date;
}

export interface NewContact {
    name: string;
    phone?: string;
    email?: string;
}

export interface AlertRecipient {
    contactId: number;
    name: string;
    /** Phone, else email, else `no-contact`. */
    reach: string;
}

export interface AlertRecord {
    id: number;
    userId: number;
    readingId: number;
    bpm: number;
    readingTimestamp: Date;
    location: string | null;
    recipients: AlertRecipient[];
    createdAt: Date;
}

export interface HistoryStore {
    /**
     * Store a classified reading. Resolves to null when the same (user, timestamp, bpm)
     * is already stored.
     */
    append(userId: number, reading: Reading, tag: Tag): Promise<StoredReading | null>;
    /** The stored reading with this (user, timestamp, bpm), if any. */
    find(userId: number, timestamp: Date, bpm: number): Promise<StoredReading | null>;
    /** Readings with `from <= timestamp <= to`, oldest first. */
    queryRange(userId: number, from: Date, to: Date): Promise<StoredReading[]>;
    /** Most recent readings, newest first. */
    latest(userId: number, limit: number): Promise<StoredReading[]>;
    /** Run `fn` with no other exclusive section for the same user in progress. */
    runExclusive<T>(userId: number, fn: () => Promise<T>): Promise<T>;
}

export interface AlertRecorder {
    record(userId: number, reading: StoredReading, recipients: AlertRecipient[], location?: string): Promise<AlertRecord>;
    list(userId: number, limit: number): Promise<AlertRecord[]>;
    hasAlertFor(userId: number, readingId: number): Promise<boolean>;
}

export interface ContactDirectory {
    listContacts(userId: number): Promise<EmergencyContact[]>;
    addContact(userId: number, contact: NewContact): Promise<EmergencyContact>;
    deleteContact(userId: number, contactId: number): Promise<boolean>;
}
