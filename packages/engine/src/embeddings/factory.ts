/**
 * Build the configured embedding provider. The provider named in config is used as-is;
 * a failing provider surfaces as ModelUnavailableError, never as a silent
 * switch to another model.
 */

import type { EmbeddingConfig } from "../config";
import type { EmbeddingProvider } from "./embedder";
import { HashEmbeddingProvider } from "./hash-provider";
import { OllamaEmbeddingProvider } from "./ollama-provider";

export async function createEmbeddingProvider(
	config: EmbeddingConfig,
	defaultBaseUrl?: string,
): Promise<EmbeddingProvider> {
	switch (config.provider) {
		case "ollama":
			return new OllamaEmbeddingProvider({
				model: config.model,
				dimension: config.dimension,
				device: config.device,
				baseUrl: config.baseUrl ?? defaultBaseUrl,
			});
		case "voyage": {
			// Loaded lazily so deployments without Voyage never import the SDK
			const { VoyageEmbeddingProvider } = await import("./voyage-provider");
			return new VoyageEmbeddingProvider({
				apiKey: config.apiKey,
				model: config.model,
				dimension: config.dimension,
			});
		}
		case "hash":
			return new HashEmbeddingProvider(config.dimension);
	}
}
