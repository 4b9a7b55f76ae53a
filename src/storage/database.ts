/**
 * SQLite Database Connection
 *
 * Provides the database holding the provenance log. Conversation history is
 * never persisted.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

let db: Database.Database | null = null;

/**
 * Open a database and make sure the schema exists. ":memory:" opens an
 * in-process database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    // Ensure directory exists
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const database = new Database(dbPath);

  if (dbPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
    database.pragma('synchronous = NORMAL');
  }

  initializeSchema(database);
  return database;
}

export function getDatabase(dbPath?: string): Database.Database {
  if (!db) {
    db = openDatabase(dbPath ?? process.env.DATABASE_PATH ?? path.join(process.cwd(), 'data', 'commerce-analyst.db'));
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS provenance (
      id TEXT PRIMARY KEY,
      timestamp TEXT NOT NULL,
      session_id TEXT NOT NULL,
      trace_id TEXT NOT NULL,
      event_type TEXT NOT NULL,
      engine TEXT,
      outcome TEXT,
      tool_name TEXT,
      call_id TEXT,
      args_hash TEXT,
      result_hash TEXT,
      status TEXT,
      duration_ms INTEGER,
      error_message TEXT,
      error_code TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_provenance_session_id ON provenance(session_id);
    CREATE INDEX IF NOT EXISTS idx_provenance_trace_id ON provenance(trace_id);
    CREATE INDEX IF NOT EXISTS idx_provenance_timestamp ON provenance(timestamp);
  `);
}
