import { and, asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db/connection.js';
import { contacts, type ContactRow } from '../db/schema.js';
import type { AlertRecipient, ContactDirectory, EmergencyContact, NewContact } from './types.js';

function toContact(row: ContactRow): EmergencyContact {
    return {
        id: row.id,
        userId: row.userId,
        name: row.name,
        phone: row.phone,
        email: row.email,
        createdAt: new Date(row.createdAt),
    };
}

function blankToNull(value: string | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

export function toRecipient(contact: EmergencyContact): AlertRecipient {
    return {
        contactId: contact.id,
        name: contact.name,
        reach: contact.phone || contact.email || 'no-contact',
    };
}

export class SqliteContactDirectory implements ContactDirectory {
    constructor(private db: AppDatabase) { }

    /**
     * Contacts in the order they were added.
     */
    async listContacts(userId: number): Promise<EmergencyContact[]> {
        const rows = this.db
            .select()
            .from(contacts)
            .where(eq(contacts.userId, userId))
            .orderBy(asc(contacts.id))
            .all();

        return rows.map(toContact);
    }

    async addContact(userId: number, contact: NewContact): Promise<EmergencyContact> {
        const [row] = this.db
            .insert(contacts)
            .values({
                userId,
                name: contact.name.trim(),
                phone: blankToNull(contact.phone),
                email: blankToNull(contact.email),
                createdAt: new Date().toISOString(),
            })
            .returning()
            .all();

        return toContact(row);
    }

    async deleteContact(userId: number, contactId: number): Promise<boolean> {
        const result = this.db
            .delete(contacts)
            .where(and(eq(contacts.id, contactId), eq(contacts.userId, userId)))
            .run();

        return result.changes > 0;
    }
}
