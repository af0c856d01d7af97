/**
 * Embedder
 *
 * Turns texts into frozen, L2-normalized vectors through one pluggable
 * provider. Chunks and queries take the same path, so a question and a
 * chunk with identical text get identical vectors.
 */

import type { Logger } from "../diagnostics/logger";
import { nullLogger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import { ModelUnavailableError, isRetrievalError } from "../errors";
import { withTimeout } from "../timeout";
import type { EmbeddingVector } from "../types";
import { processInBatches, type BatchProgress } from "./batch-processor";
import { EmbeddingCache, type CacheStats } from "./cache";

// ============================================================================
// Types
// ============================================================================

/**
 * Backend that produces raw (not necessarily normalized) vectors.
 * Must return one vector per input, in input order.
 */
export interface EmbeddingProvider {
	readonly modelId: string;
	readonly dimension: number;
	embedRaw(texts: string[], signal: AbortSignal): Promise<number[][]>;
}

export interface EmbedOptions {
	signal?: AbortSignal;
	onProgress?: (progress: BatchProgress) => void;
}

export interface EmbedderOptions {
	/** Texts per provider call (default: 16) */
	batchSize?: number;
	/** Provider calls in flight (default: 2) */
	concurrency?: number;
	/** Cached vectors; 0 disables the cache (default: 5000) */
	cacheSize?: number;
	/** Deadline per provider call (default: 30000) */
	timeoutMs?: number;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

// ============================================================================
// Vector helpers
// ============================================================================

export function l2Normalize(vector: readonly number[]): number[] {
	let norm = 0;
	for (const value of vector) {
		norm += value * value;
	}
	norm = Math.sqrt(norm);
	if (norm === 0) return [...vector];
	return vector.map((value) => value / norm);
}

export function freezeVector(vector: number[]): EmbeddingVector {
	return Object.freeze(vector);
}

// ============================================================================
// Implementation
// ============================================================================

export class Embedder {
	readonly modelId: string;
	readonly dimension: number;

	private readonly cache: EmbeddingCache;
	private readonly batchSize: number;
	private readonly concurrency: number;
	private readonly timeoutMs: number;
	private readonly logger: Logger;
	private readonly metrics?: RetrievalMetrics;

	constructor(
		private readonly provider: EmbeddingProvider,
		options: EmbedderOptions = {},
	) {
		this.modelId = provider.modelId;
		this.dimension = provider.dimension;
		this.batchSize = options.batchSize ?? 16;
		this.concurrency = options.concurrency ?? 2;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.cache = new EmbeddingCache(provider.modelId, { maxSize: options.cacheSize ?? 5000 });
		this.logger = (options.logger ?? nullLogger).child({ component: "embedder", model: this.modelId });
		this.metrics = options.metrics;
	}

	/**
	 * Embed texts, preserving input order.
	 *
	 * @throws ModelUnavailableError when the provider fails or returns malformed vectors
	 * @throws BackendTimeoutError when a provider call exceeds its deadline
	 */
	async embed(texts: readonly string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
		if (texts.length === 0) return [];

		const vectors = new Map<string, EmbeddingVector>();
		const pending: string[] = [];

		for (const text of new Set(texts)) {
			const cached = this.cache.get(text);
			if (cached) {
				vectors.set(text, cached);
				this.metrics?.embeddingCacheHits.inc();
			} else {
				pending.push(text);
				this.metrics?.embeddingCacheMisses.inc();
			}
		}

		if (pending.length > 0) {
			this.logger.debug("Embedding texts", { count: pending.length, cached: vectors.size });

			const fresh = await processInBatches(
				pending,
				(batch) => this.embedBatch(batch, options.signal),
				{ batchSize: this.batchSize, concurrency: this.concurrency, signal: options.signal },
				options.onProgress,
			);

			pending.forEach((text, i) => {
				vectors.set(text, fresh[i]);
				this.cache.set(text, fresh[i]);
			});
		}

		return texts.map((text) => {
			const vector = vectors.get(text);
			if (!vector) {
				throw new ModelUnavailableError(this.modelId, "no vector produced for input");
			}
			return vector;
		});
	}

	/**
	 * Embed a single query through the exact same path as `embed`.
	 */
	async embedQuery(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
		const [vector] = await this.embed([text], options);
		return vector;
	}

	getCacheStats(): CacheStats {
		return this.cache.getStats();
	}

	clearCache(): void {
		this.cache.clear();
	}

	private async embedBatch(batch: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
		let raw: number[][];
		try {
			raw = await withTimeout(
				"embedding",
				this.timeoutMs,
				(callSignal) => this.provider.embedRaw(batch, callSignal),
				signal,
			);
		} catch (error) {
			if (isRetrievalError(error)) throw error;
			throw new ModelUnavailableError(
				this.modelId,
				error instanceof Error ? error.message : String(error),
				{ cause: error },
			);
		}

		if (raw.length !== batch.length) {
			throw new ModelUnavailableError(
				this.modelId,
				`expected ${batch.length} vectors, received ${raw.length}`,
			);
		}

		return raw.map((vector) => {
			if (vector.length !== this.dimension) {
				throw new ModelUnavailableError(
					this.modelId,
					`expected dimension ${this.dimension}, received ${vector.length}`,
				);
			}
			if (!vector.every(Number.isFinite)) {
				throw new ModelUnavailableError(this.modelId, "vector contains non-finite values");
			}
			return freezeVector(l2Normalize(vector));
		});
	}
}
