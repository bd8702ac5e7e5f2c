import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { AlertRecipient } from '../store/types.js';

// Tables are created by migrations/*.sql; these definitions must stay in step with them.

export const users = sqliteTable('users', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    email: text('email').notNull().unique(),
    passwordHash: text('password_hash').notNull(),
    createdAt: text('created_at').notNull(),
});

export const sessions = sqliteTable('sessions', {
    token: text('token').primaryKey(),
    userId: integer('user_id').notNull().references(() => users.id),
    createdAt: text('created_at').notNull(),
});

export const readings = sqliteTable('readings', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id').notNull().references(() => users.id),
    ts: text('ts').notNull(),
    bpm: integer('bpm').notNull(),
    label: text('label', { enum: ['normal', 'abnormal', 'simulated_spike'] }),
    status: text('status', { enum: ['normal', 'abnormal', 'critical'] }).notNull(),
    createdAt: text('created_at').notNull(),
});

export const contacts = sqliteTable('contacts', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id').notNull().references(() => users.id),
    name: text('name').notNull(),
    phone: text('phone'),
    email: text('email'),
    createdAt: text('created_at').notNull(),
});

export const alerts = sqliteTable('alerts', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id').notNull().references(() => users.id),
    readingId: integer('reading_id').notNull().references(() => readings.id),
    ts: text('ts').notNull(),
    bpm: integer('bpm').notNull(),
    location: text('location'),
    recipients: text('recipients', { mode: 'json' }).$type<AlertRecipient[]>().notNull(),
    createdAt: text('created_at').notNull(),
});

export type ReadingRow = typeof readings.$inferSelect;
export type ContactRow = typeof contacts.$inferSelect;
export type AlertRow = typeof alerts.$inferSelect;
