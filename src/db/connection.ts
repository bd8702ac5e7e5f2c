import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync, readdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { logger } from '../config/logger.js';

export type AppDatabase = BetterSQLite3Database;

export class DatabaseClient {
    private sqlite: Database.Database | null = null;
    private db: AppDatabase | null = null;

    constructor(
        private path: string,
        private migrationsPath: string,
    ) { }

    open(): void {
        if (this.db) {
            return;
        }

        if (this.path !== ':memory:') {
            mkdirSync(dirname(this.path), { recursive: true });
        }

        logger.info({ path: this.path }, 'Opening database');

        const sqlite = new Database(this.path);
        sqlite.pragma('foreign_keys = ON');
        sqlite.pragma('busy_timeout = 3000');

        try {
            this.applyMigrations(sqlite);
        } catch (err) {
            sqlite.close();
            throw err;
        }

        this.sqlite = sqlite;
        this.db = drizzle(sqlite);
    }

    /**
     * Apply every `.sql` file in the migrations directory, in file name order, that has
     * not been applied yet.
     */
    private applyMigrations(sqlite: Database.Database): void {
        if (!existsSync(this.migrationsPath)) {
            throw new Error(`Migrations directory not found: ${this.migrationsPath}`);
        }

        sqlite.exec(
            'CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TEXT NOT NULL)',
        );

        const applied = new Set(
            sqlite
                .prepare('SELECT name FROM schema_migrations')
                .pluck()
                .all()
                .map((name) => String(name)),
        );
        const files = readdirSync(this.migrationsPath)
            .filter((file) => file.endsWith('.sql'))
            .sort();

        const record = sqlite.prepare('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)');

        for (const file of files) {
            if (applied.has(file)) continue;

            const script = readFileSync(join(this.migrationsPath, file), 'utf-8');
            sqlite.transaction(() => {
                sqlite.exec(script);
                record.run(file, new Date().toISOString());
            })();

            logger.info({ migration: file }, 'Migration applied');
        }
    }

    getDatabase(): AppDatabase {
        if (!this.db) {
            throw new Error('Database not opened');
        }
        return this.db;
    }

    isOpen(): boolean {
        return this.sqlite !== null && this.sqlite.open;
    }

    close(): void {
        if (this.sqlite) {
            logger.info('Closing database');
            this.sqlite.close();
            this.sqlite = null;
            this.db = null;
        }
    }
}
