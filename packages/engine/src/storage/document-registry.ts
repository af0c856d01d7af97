/**
 * Document registry
 *
 * Tracks, per collection, which documents the vector index reflects and
 * whether the external triplet loader has put them in the graph. The two
 * stores are never reconciled automatically; `complete` only reports it.
 */

import type { DocumentFormat, IngestionRecord, VectorStatus } from "../types";
import type { SqliteDatabase } from "./schema";

export interface DocumentRegistry {
	get(documentId: string): IngestionRecord | null;
	list(): IngestionRecord[];
	/**
	 * Record the start of a (re-)ingestion; resets status to pending. A new
	 * content hash also clears graphLoaded, since the graph holds the old text's facts.
	 */
	begin(documentId: string, format: DocumentFormat, contentHash: string, at: number): void;
	markVectorComplete(documentId: string, chunkCount: number, at: number): void;
	markVectorFailed(documentId: string, error: string): void;
	markGraphLoaded(documentId: string, loaded?: boolean): boolean;
	remove(documentId: string): boolean;
}

interface DocumentRow {
	document_id: string;
	format: DocumentFormat;
	content_hash: string;
	chunk_count: number;
	ingested_at: number;
	vector_status: VectorStatus;
	graph_loaded: number;
	error: string | null;
}

function rowToRecord(row: DocumentRow): IngestionRecord {
	const graphLoaded = row.graph_loaded === 1;
	return {
		documentId: row.document_id,
		format: row.format,
		contentHash: row.content_hash,
		chunkCount: row.chunk_count,
		ingestedAt: row.ingested_at,
		vectorStatus: row.vector_status,
		graphLoaded,
		complete: row.vector_status === "complete" && graphLoaded,
		error: row.error ?? undefined,
	};
}

export function createDocumentRegistry(db: SqliteDatabase, collection: string): DocumentRegistry {
	const columns =
		"document_id, format, content_hash, chunk_count, ingested_at, vector_status, graph_loaded, error";

	const getStmt = db.prepare<[string, string], DocumentRow>(
		`SELECT ${columns} FROM documents WHERE collection = ? AND document_id = ?`,
	);
	const listStmt = db.prepare<[string], DocumentRow>(
		`SELECT ${columns} FROM documents WHERE collection = ? ORDER BY document_id`,
	);
	const beginStmt = db.prepare<{
		collection: string;
		documentId: string;
		format: DocumentFormat;
		contentHash: string;
		at: number;
	}>(`
		INSERT INTO documents (collection, document_id, format, content_hash, chunk_count, ingested_at, vector_status, error)
		VALUES (@collection, @documentId, @format, @contentHash, 0, @at, 'pending', NULL)
		ON CONFLICT(collection, document_id) DO UPDATE SET
			graph_loaded = CASE WHEN content_hash = excluded.content_hash THEN graph_loaded ELSE 0 END,
			format = excluded.format,
			content_hash = excluded.content_hash,
			ingested_at = excluded.ingested_at,
			vector_status = 'pending',
			error = NULL
	`);
	const completeStmt = db.prepare<[number, number, string, string]>(
		`UPDATE documents SET vector_status = 'complete', chunk_count = ?, ingested_at = ?, error = NULL
		 WHERE collection = ? AND document_id = ?`,
	);
	const failStmt = db.prepare<[string, string, string]>(
		`UPDATE documents SET vector_status = 'failed', error = ? WHERE collection = ? AND document_id = ?`,
	);
	const graphStmt = db.prepare<[number, string, string]>(
		"UPDATE documents SET graph_loaded = ? WHERE collection = ? AND document_id = ?",
	);
	const removeStmt = db.prepare<[string, string]>(
		"DELETE FROM documents WHERE collection = ? AND document_id = ?",
	);

	return {
		get(documentId) {
			const row = getStmt.get(collection, documentId);
			return row ? rowToRecord(row) : null;
		},

		list() {
			return listStmt.all(collection).map(rowToRecord);
		},

		begin(documentId, format, contentHash, at) {
			beginStmt.run({ collection, documentId, format, contentHash, at });
		},

		markVectorComplete(documentId, chunkCount, at) {
			completeStmt.run(chunkCount, at, collection, documentId);
		},

		markVectorFailed(documentId, error) {
			failStmt.run(error, collection, documentId);
		},

		markGraphLoaded(documentId, loaded = true) {
			return graphStmt.run(loaded ? 1 : 0, collection, documentId).changes > 0;
		},

		remove(documentId) {
			return removeStmt.run(collection, documentId).changes > 0;
		},
	};
}
