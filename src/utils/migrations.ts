import type Database from 'better-sqlite3';
import { DatabaseError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('migrations');

interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'content_store',
    up: db => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS documents (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          filename TEXT NOT NULL,
          filepath TEXT NOT NULL UNIQUE,
          file_hash TEXT NOT NULL UNIQUE,
          file_size INTEGER NOT NULL,
          file_type TEXT NOT NULL,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
          modified_at DATETIME,
          chunk_count INTEGER NOT NULL DEFAULT 0,
          status TEXT NOT NULL DEFAULT 'processed'
        );

        CREATE TABLE IF NOT EXISTS document_chunks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id INTEGER NOT NULL,
          chunk_index INTEGER NOT NULL,
          chunk_text TEXT NOT NULL,
          chunk_hash TEXT NOT NULL UNIQUE,
          vector_key TEXT NOT NULL,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS query_history (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          query_text TEXT NOT NULL,
          query_hash TEXT NOT NULL,
          results_count INTEGER NOT NULL,
          execution_time REAL NOT NULL,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP
        );

        CREATE INDEX IF NOT EXISTS idx_chunks_document ON document_chunks(document_id, chunk_index);
      `);
    },
  },
  {
    version: 2,
    name: 'vector_index',
    up: db => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS vector_index (
          key TEXT PRIMARY KEY,
          embedding BLOB NOT NULL,
          dimension INTEGER NOT NULL,
          document_id INTEGER NOT NULL,
          chunk_index INTEGER NOT NULL,
          filename TEXT NOT NULL,
          filepath TEXT NOT NULL,
          content TEXT NOT NULL,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP
        );

        CREATE INDEX IF NOT EXISTS idx_vector_document ON vector_index(document_id);
      `);
    },
  },
  {
    version: 3,
    name: 'scripture_index',
    up: db => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS scripture_index (
          reference TEXT NOT NULL,
          document_id INTEGER NOT NULL,
          context_snippets TEXT NOT NULL DEFAULT '[]',
          normalized_reference TEXT NOT NULL,
          PRIMARY KEY (reference, document_id),
          FOREIGN KEY (document_id) REFERENCES documents(id)
        );

        CREATE INDEX IF NOT EXISTS idx_scripture_normalized ON scripture_index(normalized_reference);
        CREATE INDEX IF NOT EXISTS idx_scripture_document ON scripture_index(document_id);
      `);
    },
  },
  {
    version: 4,
    name: 'theological_concept_index',
    up: db => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS theological_concept_index (
          concept TEXT NOT NULL,
          document_id INTEGER NOT NULL,
          frequency INTEGER NOT NULL,
          context_snippets TEXT NOT NULL DEFAULT '[]',
          PRIMARY KEY (concept, document_id),
          FOREIGN KEY (document_id) REFERENCES documents(id)
        );

        CREATE INDEX IF NOT EXISTS idx_concept_document ON theological_concept_index(document_id);
      `);
    },
  },
];

export class MigrationManager {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Get current schema version
   */
  getCurrentVersion(): number {
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
        )
      `);

      const row = this.db
        .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
        .get();
      return row?.version ?? 0;
    } catch (error) {
      throw new DatabaseError(`Failed to get current version: ${String(error)}`, error);
    }
  }

  /**
   * Run pending migrations in one transaction
   */
  migrate(): void {
    const currentVersion = this.getCurrentVersion();
    const pending = MIGRATIONS
      .filter(m => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      return;
    }

    try {
      const record = this.db.prepare<[number, string]>(
        'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
      );

      this.db.transaction(() => {
        for (const migration of pending) {
          logger.debug(`Running migration ${migration.version}: ${migration.name}`);
          migration.up(this.db);
          record.run(migration.version, migration.name);
        }
      })();

      logger.debug(`Database migrated to version ${this.getCurrentVersion()}`);
    } catch (error) {
      throw new DatabaseError(`Migration failed: ${String(error)}`, error);
    }
  }
}
