import type { Database } from "sqlite";

/**
 * Schema for reqdeck.db. Aliases use an empty `collection` for global aliases so the
 * (collection, name) pair stays a usable primary key.
 */
export class StoreMigrations {
  static async run(db: Database): Promise<void> {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS variables (
        name TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS aliases (
        collection TEXT NOT NULL DEFAULT '',
        name TEXT NOT NULL,
        method TEXT NOT NULL,
        url TEXT NOT NULL,
        headers_json TEXT NOT NULL DEFAULT '{}',
        body_json TEXT,
        auth TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (collection, name)
      );

      CREATE TABLE IF NOT EXISTS templates (
        name TEXT PRIMARY KEY,
        method TEXT NOT NULL,
        url TEXT NOT NULL,
        headers_json TEXT NOT NULL DEFAULT '{}',
        body_json TEXT,
        auth TEXT,
        options_json TEXT NOT NULL DEFAULT '{}',
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        method TEXT NOT NULL,
        url TEXT NOT NULL,
        headers_json TEXT NOT NULL,
        request_body_json TEXT,
        output_file TEXT,
        display_filter TEXT,
        status INTEGER NOT NULL,
        reason TEXT NOT NULL,
        elapsed_ms REAL NOT NULL,
        size INTEGER NOT NULL,
        timestamp TEXT NOT NULL,
        body TEXT NOT NULL,
        response_headers_json TEXT NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_aliases_collection ON aliases(collection);
    `);
  }
}
