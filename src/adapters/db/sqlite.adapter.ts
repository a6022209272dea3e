import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { getDataDir } from '../storage/paths.js';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

const MEMORY_DB = ':memory:';

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      -- Runs table (one row per apply)
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        service_name TEXT NOT NULL,
        platform TEXT NOT NULL,
        type TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        plan TEXT DEFAULT '{}',
        receipts TEXT DEFAULT '[]',
        error TEXT,
        started_at TEXT,
        completed_at TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      -- Audit events table (append-only log)
      CREATE TABLE IF NOT EXISTS audit_events (
        id TEXT PRIMARY KEY,
        timestamp TEXT NOT NULL DEFAULT (datetime('now')),
        actor TEXT NOT NULL DEFAULT 'system',
        action TEXT NOT NULL,
        resource_type TEXT NOT NULL,
        resource_id TEXT NOT NULL,
        details TEXT DEFAULT '{}',
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_runs_service ON runs(service_name);
      CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);
      CREATE INDEX IF NOT EXISTS idx_audit_events_resource ON audit_events(resource_type, resource_id);
      CREATE INDEX IF NOT EXISTS idx_audit_events_timestamp ON audit_events(timestamp);
    `,
  },
  {
    version: 2,
    name: 'local_platform_state',
    up: `
      -- Observed state kept by the local platform client
      CREATE TABLE IF NOT EXISTS platform_services (
        name TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `,
  },
];

export class SqliteAdapter {
  private db: Database.Database;
  private static instance: SqliteAdapter | null = null;

  private constructor(dbPath?: string) {
    const finalPath = dbPath ?? path.join(getDataDir(), 'deckhand.db');
    if (finalPath !== MEMORY_DB) {
      const dir = path.dirname(finalPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(finalPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  static getInstance(dbPath?: string): SqliteAdapter {
    if (!SqliteAdapter.instance) {
      SqliteAdapter.instance = new SqliteAdapter(dbPath);
    }
    return SqliteAdapter.instance;
  }

  static resetInstance(): void {
    if (SqliteAdapter.instance) {
      SqliteAdapter.instance.close();
      SqliteAdapter.instance = null;
    }
  }

  getDb(): Database.Database {
    return this.db;
  }

  migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const appliedVersions = new Set(
      this.db
        .prepare('SELECT version FROM schema_migrations')
        .all()
        .map((row: unknown) => (row as { version: number }).version)
    );

    for (const migration of migrations) {
      if (!appliedVersions.has(migration.version)) {
        this.db.transaction(() => {
          this.db.exec(migration.up);
          this.db
            .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
            .run(migration.version, migration.name);
        })();
      }
    }
  }

  close(): void {
    this.db.close();
  }
}

export function getDb(): Database.Database {
  return SqliteAdapter.getInstance().getDb();
}

export function initializeDatabase(dbPath?: string): SqliteAdapter {
  const adapter = SqliteAdapter.getInstance(dbPath);
  adapter.migrate();
  return adapter;
}

/** Fresh in-memory database, replacing any open one. */
export function initializeMemoryDatabase(): SqliteAdapter {
  SqliteAdapter.resetInstance();
  return initializeDatabase(MEMORY_DB);
}
