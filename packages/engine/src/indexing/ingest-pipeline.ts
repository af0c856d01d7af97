/**
 * Ingestion Pipeline (vector write path)
 *
 * document -> chunks -> embeddings -> vector index, with a registry row per
 * document recording its content hash and status. Re-ingesting a document
 * replaces all of its chunks; an unchanged, fully written document is skipped.
 *
 * The graph side is loaded by an external triplet loader, which reports back
 * through markGraphLoaded().
 */

import { createHash } from "node:crypto";
import type { Chunker } from "../chunking/chunker";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import type { Embedder } from "../embeddings/embedder";
import {
	BackendTimeoutError,
	ChunkingError,
	ModelUnavailableError,
	errorMessage,
	toError,
} from "../errors";
import type { DocumentRegistry } from "../storage/document-registry";
import type { VectorIndexClient } from "../storage/vector-index";
import { sleep } from "../timeout";
import type { Chunk, Document, EmbeddingVector, IngestionRecord, VectorEntry } from "../types";

// ============================================================================
// Types
// ============================================================================

export type IngestStatus = "ingested" | "unchanged" | "skipped" | "failed";

export interface IngestResult {
	documentId: string;
	status: IngestStatus;
	chunkCount: number;
	/** Why a document was skipped or failed */
	error?: string;
	ms: number;
}

export interface IngestSummary {
	results: IngestResult[];
	ingested: number;
	unchanged: number;
	skipped: number;
	failed: number;
}

export interface IngestOptions {
	/** Re-ingest even when the content hash is unchanged */
	force?: boolean;
	signal?: AbortSignal;
}

export interface IngestPipeline {
	/** @throws ChunkingError, or the embedding/vector error after the document is marked failed */
	ingestDocument(document: Document, options?: IngestOptions): Promise<IngestResult>;
	/** Ingest documents one after another; a failing document never stops the rest */
	ingestAll(
		documents: readonly Document[],
		options?: IngestOptions & { onResult?: (result: IngestResult) => void },
	): Promise<IngestSummary>;
	/** Remove a document's chunks and registry row; returns the chunks removed */
	removeDocument(documentId: string): Promise<number>;
	status(): IngestionRecord[];
	statusOf(documentId: string): IngestionRecord | null;
	/** Flag the graph side of a document as loaded (or not) */
	markGraphLoaded(documentId: string, loaded?: boolean): boolean;
}

export interface IngestPipelineDeps {
	chunker: Chunker;
	embedder: Pick<Embedder, "embed">;
	vectors: VectorIndexClient;
	registry: DocumentRegistry;
	retry?: { maxRetries: number; retryDelayMs: number };
	metrics?: RetrievalMetrics;
	logger?: Logger;
	now?: () => number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Hash of everything that determines a document's chunks: its format, its
 * text, and the chunking parameters.
 */
export function contentHash(document: Document, chunker: Chunker): string {
	const { chunkSize, chunkOverlap, minChunkSize } = chunker.options;
	return createHash("sha256")
		.update(`${document.format}\0${chunkSize}/${chunkOverlap}/${minChunkSize}\0`)
		.update(document.text)
		.digest("hex");
}

function isTransient(error: unknown): boolean {
	return error instanceof ModelUnavailableError || error instanceof BackendTimeoutError;
}

function toEntries(document: Document, chunks: Chunk[], vectors: EmbeddingVector[]): VectorEntry[] {
	return chunks.map((chunk, i) => ({
		chunkId: chunk.id,
		documentId: chunk.documentId,
		text: chunk.text,
		vector: vectors[i],
		metadata: {
			format: document.format,
			index: chunk.index,
			start: chunk.span.start,
			end: chunk.span.end,
			sourcePath: document.sourcePath ?? null,
		},
	}));
}

// ============================================================================
// Implementation
// ============================================================================

export function createIngestPipeline(deps: IngestPipelineDeps): IngestPipeline {
	const { chunker, embedder, vectors, registry, metrics } = deps;
	const logger = (deps.logger ?? nullLogger).child({ component: "ingest" });
	const retry = deps.retry ?? { maxRetries: 3, retryDelayMs: 500 };
	const now = deps.now ?? Date.now;

	async function embedWithRetry(
		documentId: string,
		texts: string[],
		signal?: AbortSignal,
	): Promise<EmbeddingVector[]> {
		for (let attempt = 0; ; attempt++) {
			try {
				return await embedder.embed(texts, { signal });
			} catch (error) {
				if (!isTransient(error) || attempt >= retry.maxRetries) throw error;
				const delay = retry.retryDelayMs * 2 ** attempt;
				metrics?.embeddingRetries.inc();
				logger.warn("Embedding failed, retrying", {
					documentId,
					attempt: attempt + 1,
					delayMs: delay,
					error: errorMessage(error),
				});
				await sleep(delay, signal);
			}
		}
	}

	async function refreshGauge(): Promise<void> {
		metrics?.indexedChunks.set(await vectors.count());
	}

	async function ingestDocument(document: Document, options: IngestOptions = {}): Promise<IngestResult> {
		const started = performance.now();
		const log = logger.child({ documentId: document.id });
		const hash = contentHash(document, chunker);

		const existing = registry.get(document.id);
		if (!options.force && existing?.contentHash === hash && existing.vectorStatus === "complete") {
			metrics?.documentsSkipped.inc();
			log.debug("Document unchanged");
			return {
				documentId: document.id,
				status: "unchanged",
				chunkCount: existing.chunkCount,
				ms: performance.now() - started,
			};
		}

		const chunks = chunker.chunk(document);
		const stop = metrics?.ingestionDuration.start();
		registry.begin(document.id, document.format, hash, now());

		try {
			const embeddings = await embedWithRetry(
				document.id,
				chunks.map((chunk) => chunk.text),
				options.signal,
			);

			// Replace, never append: chunks of the previous version must not survive
			const removed = await vectors.deleteByDocument(document.id);
			await vectors.upsertMany(toEntries(document, chunks, embeddings));

			registry.markVectorComplete(document.id, chunks.length, now());
			metrics?.documentsIngested.inc();
			metrics?.chunksWritten.add(chunks.length);
			await refreshGauge();

			log.info("Document ingested", { chunks: chunks.length, replaced: removed });
			return {
				documentId: document.id,
				status: "ingested",
				chunkCount: chunks.length,
				ms: performance.now() - started,
			};
		} catch (error) {
			registry.markVectorFailed(document.id, errorMessage(error));
			metrics?.ingestionErrors.inc();
			log.error("Document ingestion failed", toError(error));
			throw error;
		} finally {
			stop?.();
		}
	}

	return {
		ingestDocument,

		async ingestAll(documents, options = {}) {
			const results: IngestResult[] = [];

			for (const document of documents) {
				const started = performance.now();
				let result: IngestResult;
				try {
					result = await ingestDocument(document, options);
				} catch (error) {
					if (options.signal?.aborted) throw error;
					const skipped = error instanceof ChunkingError;
					if (skipped) {
						metrics?.documentsSkipped.inc();
						logger.warn("Document skipped", { documentId: document.id, error: errorMessage(error) });
					}
					result = {
						documentId: document.id,
						status: skipped ? "skipped" : "failed",
						chunkCount: 0,
						error: errorMessage(error),
						ms: performance.now() - started,
					};
				}
				results.push(result);
				options.onResult?.(result);
			}

			const count = (status: IngestStatus) => results.filter((r) => r.status === status).length;
			return {
				results,
				ingested: count("ingested"),
				unchanged: count("unchanged"),
				skipped: count("skipped"),
				failed: count("failed"),
			};
		},

		async removeDocument(documentId) {
			const removed = await vectors.deleteByDocument(documentId);
			registry.remove(documentId);
			await refreshGauge();
			logger.info("Document removed", { documentId, chunks: removed });
			return removed;
		},

		status: () => registry.list(),

		statusOf: (documentId) => registry.get(documentId),

		markGraphLoaded(documentId, loaded = true) {
			const updated = registry.markGraphLoaded(documentId, loaded);
			if (!updated) {
				logger.warn("Graph flag set for unknown document", { documentId });
			}
			return updated;
		},
	};
}
