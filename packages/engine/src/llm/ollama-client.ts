/**
 * Ollama LLM client (`/api/generate`, `/api/tags`).
 */

import { z } from "zod";
import { OLLAMA_DEFAULT_BASE, trimTrailingSlash } from "../embeddings/ollama-provider";
import { ModelUnavailableError, errorMessage, toError } from "../errors";

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
	signal?: AbortSignal;
	system?: string;
	temperature?: number;
	maxTokens?: number;
}

/** Text-completion model used for Cypher translation and answer generation */
export interface LLMProvider {
	readonly modelId: string;
	generate(prompt: string, options?: GenerateOptions): Promise<string>;
	/** Whether the model is installed on the backend, where it can say */
	isModelAvailable?(signal?: AbortSignal): Promise<boolean>;
}

export interface OllamaClientOptions {
	model: string;
	baseUrl?: string;
	temperature?: number;
	maxTokens?: number;
	/** Injected for tests */
	fetch?: typeof fetch;
}

const GenerateResponseSchema = z.object({
	response: z.string(),
	done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
	models: z.array(z.object({ name: z.string() })),
});

// ============================================================================
// Implementation
// ============================================================================

export class OllamaClient implements LLMProvider {
	readonly modelId: string;

	private readonly model: string;
	private readonly baseUrl: string;
	private readonly temperature: number;
	private readonly maxTokens: number;
	private readonly fetchImpl: typeof fetch;

	constructor(options: OllamaClientOptions) {
		this.model = options.model;
		this.modelId = `ollama/${options.model}`;
		this.baseUrl = trimTrailingSlash(options.baseUrl ?? OLLAMA_DEFAULT_BASE);
		this.temperature = options.temperature ?? 0.7;
		this.maxTokens = options.maxTokens ?? 2048;
		this.fetchImpl = options.fetch ?? fetch;
	}

	async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
		const body = await this.request(
			"/api/generate",
			{
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify({
					model: this.model,
					prompt,
					system: options.system,
					stream: false,
					options: {
						temperature: options.temperature ?? this.temperature,
						num_predict: options.maxTokens ?? this.maxTokens,
					},
				}),
			},
			options.signal,
		);

		const parsed = GenerateResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new ModelUnavailableError(this.modelId, "malformed /api/generate response");
		}
		return parsed.data.response.trim();
	}

	async listModels(signal?: AbortSignal): Promise<string[]> {
		const body = await this.request("/api/tags", { method: "GET" }, signal);
		const parsed = TagsResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new ModelUnavailableError(this.modelId, "malformed /api/tags response");
		}
		return parsed.data.models.map((m) => m.name);
	}

	/** Whether the configured model has been pulled; ":latest" is implied */
	async isModelAvailable(signal?: AbortSignal): Promise<boolean> {
		const names = await this.listModels(signal);
		const wanted = this.model.includes(":") ? this.model : `${this.model}:latest`;
		return names.some((name) => name === this.model || name === wanted);
	}

	private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
		const url = `${this.baseUrl}${path}`;
		let response: Response;
		try {
			response = await this.fetchImpl(url, { ...init, signal });
		} catch (error) {
			if (signal?.aborted) throw toError(signal.reason);
			throw new ModelUnavailableError(this.modelId, `cannot reach ${url}: ${errorMessage(error)}`, {
				cause: error,
			});
		}

		if (!response.ok) {
			const text = await response.text().catch(() => "");
			throw new ModelUnavailableError(
				this.modelId,
				`HTTP ${response.status} from ${url}${text ? `: ${text.slice(0, 200)}` : ""}`,
			);
		}
		return response.json();
	}
}
