/**
 * Ollama embedding provider (`POST /api/embed`).
 */

import { z } from "zod";
import { ModelUnavailableError, errorMessage, toError } from "../errors";
import type { EmbeddingProvider } from "./embedder";

export const OLLAMA_DEFAULT_BASE = "http://localhost:11434";

export interface OllamaEmbeddingOptions {
	model: string;
	dimension: number;
	baseUrl?: string;
	/** "cpu" sets num_gpu = 0 so the embedding model stays off the GPU */
	device?: "cpu" | "gpu";
	/** Injected for tests */
	fetch?: typeof fetch;
}

const EmbedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
});

export function trimTrailingSlash(url: string): string {
	return url.replace(/\/+$/, "");
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
	readonly modelId: string;
	readonly dimension: number;

	private readonly model: string;
	private readonly endpoint: string;
	private readonly device: "cpu" | "gpu";
	private readonly fetchImpl: typeof fetch;

	constructor(options: OllamaEmbeddingOptions) {
		this.model = options.model;
		this.modelId = `ollama/${options.model}`;
		this.dimension = options.dimension;
		this.device = options.device ?? "cpu";
		this.endpoint = `${trimTrailingSlash(options.baseUrl ?? OLLAMA_DEFAULT_BASE)}/api/embed`;
		this.fetchImpl = options.fetch ?? fetch;
	}

	async embedRaw(texts: string[], signal: AbortSignal): Promise<number[][]> {
		let response: Response;
		try {
			response = await this.fetchImpl(this.endpoint, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify({
					model: this.model,
					input: texts,
					truncate: true,
					options: this.device === "cpu" ? { num_gpu: 0 } : undefined,
				}),
				signal,
			});
		} catch (error) {
			if (signal.aborted) throw toError(signal.reason);
			throw new ModelUnavailableError(
				this.modelId,
				`cannot reach ${this.endpoint}: ${errorMessage(error)}`,
				{ cause: error },
			);
		}

		if (!response.ok) {
			const body = await response.text().catch(() => "");
			throw new ModelUnavailableError(
				this.modelId,
				`HTTP ${response.status} from ${this.endpoint}${body ? `: ${body.slice(0, 200)}` : ""}`,
			);
		}

		const parsed = EmbedResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new ModelUnavailableError(this.modelId, "malformed /api/embed response");
		}
		return parsed.data.embeddings;
	}
}
