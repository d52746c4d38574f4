/**
 * Database schema and typed wrapper for SQLite.
 *
 * Holds the unsigned DID documents this site serves. Uses better-sqlite3
 * (synchronous) with WAL mode.
 */

import BetterSqlite3 from "better-sqlite3";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** `root` is the agent's own `/fan.did`; `user` rows are keyed by identifier. */
export type DocumentKind = "root" | "user";

export interface DocumentRow {
  kind: DocumentKind;
  name: string;
  /** Wire document as JSON text. */
  document: string;
  /** ISO-8601 modification time. */
  modified_at: string;
}

/** Name of the single root row. */
export const ROOT_NAME = "";

// ---------------------------------------------------------------------------
// Schema initialization
// ---------------------------------------------------------------------------

export function initializeDatabase(dbPath: string): BetterSqlite3.Database {
  const db = new BetterSqlite3(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS documents (
      kind         TEXT NOT NULL CHECK (kind IN ('root', 'user')),
      name         TEXT NOT NULL,
      document     TEXT NOT NULL,
      modified_at  TEXT NOT NULL,
      PRIMARY KEY (kind, name)
    );

    CREATE INDEX IF NOT EXISTS idx_documents_modified ON documents(modified_at);
  `);

  return db;
}

// ---------------------------------------------------------------------------
// Database wrapper class with typed methods
// ---------------------------------------------------------------------------

export class Database {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = initializeDatabase(dbPath);
  }

  close(): void {
    this.db.close();
  }

  // -----------------------------------------------------------------------
  // Documents
  // -----------------------------------------------------------------------

  getDocument(kind: DocumentKind, name: string): DocumentRow | undefined {
    const stmt = this.db.prepare<[DocumentKind, string], DocumentRow>(
      "SELECT * FROM documents WHERE kind = ? AND name = ?",
    );
    return stmt.get(kind, name);
  }

  /** Insert or replace; returns the stored row. */
  putDocument(row: DocumentRow): DocumentRow {
    const stmt = this.db.prepare<DocumentRow>(`
      INSERT INTO documents (kind, name, document, modified_at)
      VALUES (@kind, @name, @document, @modified_at)
      ON CONFLICT (kind, name) DO UPDATE SET
        document = excluded.document,
        modified_at = excluded.modified_at
    `);
    stmt.run(row);
    return row;
  }

  deleteDocument(kind: DocumentKind, name: string): boolean {
    const stmt = this.db.prepare<[DocumentKind, string]>(
      "DELETE FROM documents WHERE kind = ? AND name = ?",
    );
    return stmt.run(kind, name).changes > 0;
  }

  /** Names of every stored document of `kind`, sorted. */
  listDocumentNames(kind: DocumentKind): string[] {
    const stmt = this.db.prepare<[DocumentKind], { name: string }>(
      "SELECT name FROM documents WHERE kind = ? ORDER BY name",
    );
    return stmt.all(kind).map((row) => row.name);
  }
}
