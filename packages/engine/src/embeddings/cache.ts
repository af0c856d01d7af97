/**
 * Embedding cache
 *
 * Finished vectors keyed by a digest of (model id, text), evicted least
 * recently used first. A capacity of 0 turns caching off.
 */

import { createHash } from "node:crypto";
import type { EmbeddingVector } from "../types";

export interface EmbeddingCacheOptions {
	/** Entries kept before eviction (default: 5000) */
	maxSize?: number;
}

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
	hitRate: number;
}

/** Vectors from different models never share a key */
export function embeddingCacheKey(modelId: string, text: string): string {
	return createHash("sha256").update(`${modelId}\u0000${text}`).digest("hex").slice(0, 16);
}

export class EmbeddingCache {
	readonly maxSize: number;
	// Map iteration order doubles as recency: first key is the eviction candidate
	private readonly entries = new Map<string, EmbeddingVector>();
	private counts = { hits: 0, misses: 0 };

	constructor(
		private readonly modelId: string,
		options: EmbeddingCacheOptions = {},
	) {
		this.maxSize = Math.max(0, options.maxSize ?? 5000);
	}

	get size(): number {
		return this.entries.size;
	}

	get(text: string): EmbeddingVector | undefined {
		const key = embeddingCacheKey(this.modelId, text);
		const vector = this.entries.get(key);
		if (vector === undefined) {
			this.counts.misses += 1;
			return undefined;
		}
		this.counts.hits += 1;
		this.touch(key, vector);
		return vector;
	}

	set(text: string, vector: EmbeddingVector): void {
		if (this.maxSize === 0) return;
		this.touch(embeddingCacheKey(this.modelId, text), vector);
		for (const oldest of this.entries.keys()) {
			if (this.entries.size <= this.maxSize) break;
			this.entries.delete(oldest);
		}
	}

	clear(): void {
		this.entries.clear();
		this.counts = { hits: 0, misses: 0 };
	}

	getStats(): CacheStats {
		const { hits, misses } = this.counts;
		const lookups = hits + misses;
		return {
			size: this.entries.size,
			maxSize: this.maxSize,
			hits,
			misses,
			hitRate: lookups === 0 ? 0 : hits / lookups,
		};
	}

	private touch(key: string, vector: EmbeddingVector): void {
		this.entries.delete(key);
		this.entries.set(key, vector);
	}
}
