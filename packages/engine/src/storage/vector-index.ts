/**
 * Vector Index Client
 *
 * SQLite persistence with exhaustive in-process similarity search over a
 * lazily loaded per-collection cache.
 *
 * Ordering contract: descending similarity, ties broken by ascending chunk id.
 */

import { VectorStoreError } from "../errors";
import type {
	ChunkMetadata,
	EmbeddingVector,
	VectorEntry,
	VectorFilter,
	VectorHit,
} from "../types";
import type { SqliteDatabase } from "./schema";

// ============================================================================
// Types
// ============================================================================

export type SimilarityMetric = "cosine" | "dot";

export interface VectorIndexClient {
	readonly collection: string;
	readonly modelId: string;
	readonly dimension: number;
	readonly metric: SimilarityMetric;

	/** Insert or replace one chunk vector */
	upsert(entry: VectorEntry): Promise<void>;

	/** Insert or replace many chunk vectors in one transaction */
	upsertMany(entries: readonly VectorEntry[]): Promise<void>;

	/** Remove every chunk of a document; returns the number removed */
	deleteByDocument(documentId: string): Promise<number>;

	/** Top-k chunks by similarity to the query vector */
	search(query: EmbeddingVector, k: number, filter?: VectorFilter): Promise<VectorHit[]>;

	count(filter?: VectorFilter): Promise<number>;

	/** Document ids with at least one chunk */
	listDocuments(): Promise<string[]>;

	close(): Promise<void>;
}

export interface SqliteVectorIndexOptions {
	collection: string;
	modelId: string;
	dimension: number;
	metric?: SimilarityMetric;
	/** Close the database on close() (default: false; the runtime owns it) */
	ownsDatabase?: boolean;
	/** Clock for ingested_at; injected by tests */
	now?: () => number;
}

interface VectorRow {
	chunk_id: string;
	document_id: string;
	text: string;
	metadata: string;
	embedding: Buffer;
	ingested_at: number;
}

interface CachedVector {
	chunkId: string;
	documentId: string;
	text: string;
	metadata: ChunkMetadata;
	vector: Float32Array;
	ingestedAt: number;
}

interface CollectionRow {
	model_id: string;
	dimension: number;
	metric: string;
}

// ============================================================================
// Vector math
// ============================================================================

function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += a[i] * b[i];
	}
	return sum;
}

function normalize(vector: ArrayLike<number>): number[] {
	const values = Array.from(vector);
	const norm = Math.sqrt(dot(values, values));
	return norm === 0 ? values : values.map((v) => v / norm);
}

function serializeVector(vector: ArrayLike<number>): Buffer {
	const floats = Float32Array.from(vector);
	return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

function deserializeVector(blob: Buffer): Float32Array {
	// Copy so the Float32Array is aligned regardless of the Buffer's offset
	const copy = new Uint8Array(blob.byteLength);
	copy.set(blob);
	return new Float32Array(copy.buffer);
}

function parseMetadata(raw: string): ChunkMetadata {
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return {};
	}
	const metadata: ChunkMetadata = {};
	for (const [key, value] of Object.entries(parsed)) {
		if (
			value === null ||
			typeof value === "string" ||
			typeof value === "number" ||
			typeof value === "boolean"
		) {
			metadata[key] = value;
		}
	}
	return metadata;
}

function matchesFilter(entry: CachedVector, filter?: VectorFilter): boolean {
	if (!filter) return true;
	if (filter.documentIds && !filter.documentIds.includes(entry.documentId)) {
		return false;
	}
	if (filter.metadata) {
		for (const [key, expected] of Object.entries(filter.metadata)) {
			if (entry.metadata[key] !== expected) return false;
		}
	}
	return true;
}

export function compareHits(a: VectorHit, b: VectorHit): number {
	if (b.similarity !== a.similarity) return b.similarity - a.similarity;
	return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Open a collection, creating it on first use.
 *
 * @throws VectorStoreError when the collection was built with another model,
 * dimension, or metric
 */
export function createSqliteVectorIndex(
	db: SqliteDatabase,
	options: SqliteVectorIndexOptions,
): VectorIndexClient {
	const { collection, modelId, dimension } = options;
	const metric = options.metric ?? "cosine";
	const now = options.now ?? Date.now;

	const existing = db
		.prepare<[string], CollectionRow>(
			"SELECT model_id, dimension, metric FROM collections WHERE name = ?",
		)
		.get(collection);

	if (existing) {
		if (existing.model_id !== modelId || existing.dimension !== dimension) {
			throw new VectorStoreError(
				`Collection "${collection}" was built with ${existing.model_id} (${existing.dimension} dims); ` +
					`cannot use ${modelId} (${dimension} dims). Re-ingest into a new collection.`,
			);
		}
		if (existing.metric !== metric) {
			throw new VectorStoreError(
				`Collection "${collection}" uses the ${existing.metric} metric, not ${metric}`,
			);
		}
	} else {
		db.prepare<[string, string, number, string, number]>(
			"INSERT INTO collections (name, model_id, dimension, metric, created_at) VALUES (?, ?, ?, ?, ?)",
		).run(collection, modelId, dimension, metric, now());
	}

	// Prepared statements
	const upsertStmt = db.prepare<{
		collection: string;
		chunkId: string;
		documentId: string;
		text: string;
		metadata: string;
		embedding: Buffer;
		ingestedAt: number;
	}>(`
		INSERT INTO vectors (collection, chunk_id, document_id, text, metadata, embedding, ingested_at)
		VALUES (@collection, @chunkId, @documentId, @text, @metadata, @embedding, @ingestedAt)
		ON CONFLICT(collection, chunk_id) DO UPDATE SET
			document_id = excluded.document_id,
			text = excluded.text,
			metadata = excluded.metadata,
			embedding = excluded.embedding,
			ingested_at = excluded.ingested_at
	`);
	const deleteByDocumentStmt = db.prepare<[string, string]>(
		"DELETE FROM vectors WHERE collection = ? AND document_id = ?",
	);
	const getAllStmt = db.prepare<[string], VectorRow>(
		"SELECT chunk_id, document_id, text, metadata, embedding, ingested_at FROM vectors WHERE collection = ?",
	);
	const listDocumentsStmt = db.prepare<[string], { document_id: string }>(
		"SELECT DISTINCT document_id FROM vectors WHERE collection = ? ORDER BY document_id",
	);

	let cache: CachedVector[] | null = null;
	let closed = false;

	function assertOpen(): void {
		if (closed) {
			throw new VectorStoreError(`Vector index "${collection}" is closed`);
		}
	}

	function assertDimension(vector: ArrayLike<number>, what: string): void {
		if (vector.length !== dimension) {
			throw new VectorStoreError(
				`${what} has dimension ${vector.length}; collection "${collection}" expects ${dimension}`,
			);
		}
	}

	function prepareVector(vector: ArrayLike<number>): ArrayLike<number> {
		return metric === "cosine" ? normalize(vector) : vector;
	}

	function loadCache(): CachedVector[] {
		if (cache) return cache;
		cache = getAllStmt.all(collection).map((row) => ({
			chunkId: row.chunk_id,
			documentId: row.document_id,
			text: row.text,
			metadata: parseMetadata(row.metadata),
			vector: deserializeVector(row.embedding),
			ingestedAt: row.ingested_at,
		}));
		return cache;
	}

	function writeEntry(entry: VectorEntry, ingestedAt: number): void {
		assertDimension(entry.vector, `Vector for chunk ${entry.chunkId}`);
		upsertStmt.run({
			collection,
			chunkId: entry.chunkId,
			documentId: entry.documentId,
			text: entry.text,
			metadata: JSON.stringify(entry.metadata ?? {}),
			embedding: serializeVector(prepareVector(entry.vector)),
			ingestedAt,
		});
	}

	const writeMany = db.transaction((entries: readonly VectorEntry[], ingestedAt: number) => {
		for (const entry of entries) {
			writeEntry(entry, ingestedAt);
		}
	});

	return {
		collection,
		modelId,
		dimension,
		metric,

		async upsert(entry: VectorEntry): Promise<void> {
			assertOpen();
			writeEntry(entry, now());
			cache = null;
		},

		async upsertMany(entries: readonly VectorEntry[]): Promise<void> {
			assertOpen();
			if (entries.length === 0) return;
			writeMany(entries, now());
			cache = null;
		},

		async deleteByDocument(documentId: string): Promise<number> {
			assertOpen();
			const result = deleteByDocumentStmt.run(collection, documentId);
			cache = null;
			return result.changes;
		},

		async search(query: EmbeddingVector, k: number, filter?: VectorFilter): Promise<VectorHit[]> {
			assertOpen();
			assertDimension(query, "Query vector");
			if (k <= 0) return [];

			const prepared = prepareVector(query);
			const hits: VectorHit[] = [];

			for (const entry of loadCache()) {
				if (!matchesFilter(entry, filter)) continue;
				hits.push({
					chunkId: entry.chunkId,
					documentId: entry.documentId,
					text: entry.text,
					similarity: dot(prepared, entry.vector),
					metadata: entry.metadata,
					ingestedAt: entry.ingestedAt,
				});
			}

			hits.sort(compareHits);
			return hits.slice(0, k);
		},

		async count(filter?: VectorFilter): Promise<number> {
			assertOpen();
			return loadCache().filter((entry) => matchesFilter(entry, filter)).length;
		},

		async listDocuments(): Promise<string[]> {
			assertOpen();
			return listDocumentsStmt.all(collection).map((row) => row.document_id);
		},

		async close(): Promise<void> {
			if (closed) return;
			closed = true;
			cache = null;
			if (options.ownsDatabase) {
				db.close();
			}
		},
	};
}
