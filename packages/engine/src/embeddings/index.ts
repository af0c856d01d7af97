/**
 * Embeddings Module
 *
 * Ollama (default), Voyage AI, and an offline hash provider behind one Embedder.
 */

export {
	Embedder,
	l2Normalize,
	freezeVector,
	type EmbeddingProvider,
	type EmbedOptions,
	type EmbedderOptions,
} from "./embedder";

export {
	OllamaEmbeddingProvider,
	OLLAMA_DEFAULT_BASE,
	trimTrailingSlash,
	type OllamaEmbeddingOptions,
} from "./ollama-provider";

// Value export omitted so importing the engine never loads the Voyage SDK
export type { VoyageEmbeddingProvider, VoyageEmbeddingOptions } from "./voyage-provider";

export { HashEmbeddingProvider, hashEmbedding, tokenize } from "./hash-provider";

export { EmbeddingCache, embeddingCacheKey, type EmbeddingCacheOptions, type CacheStats } from "./cache";

export {
	processInBatches,
	splitIntoBatches,
	type BatchProcessorConfig,
	type BatchProgress,
	type BatchWorker,
} from "./batch-processor";

export { createEmbeddingProvider } from "./factory";
