/**
 * SQLite schema for @kgvec/engine
 *
 * Uses better-sqlite3. Vectors are stored as Float32 BLOBs and scored in
 * process; each collection pins the embedding model and dimension it was
 * built with.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type SqliteDatabase = Database.Database;

// Increment when the schema changes
export const SCHEMA_VERSION = 1;

// ============================================================================
// Schema SQL
// ============================================================================

const SCHEMA_SQL = `
-- Schema metadata for versioning
CREATE TABLE IF NOT EXISTS schema_metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT DEFAULT CURRENT_TIMESTAMP
);

-- One row per vector collection; pins model and dimension
CREATE TABLE IF NOT EXISTS collections (
    name TEXT PRIMARY KEY,
    model_id TEXT NOT NULL,
    dimension INTEGER NOT NULL,
    metric TEXT NOT NULL,
    created_at INTEGER NOT NULL
);

-- Chunk vectors with their text and metadata
CREATE TABLE IF NOT EXISTS vectors (
    collection TEXT NOT NULL,
    chunk_id TEXT NOT NULL,
    document_id TEXT NOT NULL,
    text TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    embedding BLOB NOT NULL,
    ingested_at INTEGER NOT NULL,
    PRIMARY KEY (collection, chunk_id),
    FOREIGN KEY (collection) REFERENCES collections(name) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_vectors_document ON vectors(collection, document_id);

-- Ingestion registry: which documents each store reflects
CREATE TABLE IF NOT EXISTS documents (
    collection TEXT NOT NULL,
    document_id TEXT NOT NULL,
    format TEXT NOT NULL,
    content_hash TEXT NOT NULL,
    chunk_count INTEGER NOT NULL DEFAULT 0,
    ingested_at INTEGER NOT NULL,
    vector_status TEXT NOT NULL DEFAULT 'pending',
    graph_loaded INTEGER NOT NULL DEFAULT 0,
    error TEXT,
    PRIMARY KEY (collection, document_id)
);
`;

// ============================================================================
// Database lifecycle
// ============================================================================

export interface OpenDatabaseOptions {
	readonly?: boolean;
}

/**
 * Open (and create if needed) the engine database. Pass ":memory:" for an
 * in-process database.
 */
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): SqliteDatabase {
	if (path !== ":memory:" && !options.readonly) {
		mkdirSync(dirname(path), { recursive: true });
	}

	const db = new Database(path, { readonly: options.readonly ?? false });
	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	db.pragma("foreign_keys = ON");

	if (!options.readonly) {
		initializeSchema(db);
	}
	return db;
}

export function initializeSchema(db: SqliteDatabase): void {
	db.exec(SCHEMA_SQL);
	db.prepare<[string, string]>(
		`INSERT INTO schema_metadata (key, value) VALUES (?, ?)
		 ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = CURRENT_TIMESTAMP`,
	).run("schema_version", String(SCHEMA_VERSION));
}

export function getSchemaVersion(db: SqliteDatabase): number | null {
	const row = db
		.prepare<[string], { value: string }>("SELECT value FROM schema_metadata WHERE key = ?")
		.get("schema_version");
	return row ? Number(row.value) : null;
}
