/**
 * Voyage AI embedding provider
 *
 * Queries and chunks are embedded without an input type so both sides of a
 * comparison live in the same space. Requests are split to the API's
 * 128-item ceiling.
 */

import { VoyageAIClient } from "voyageai";
import { ModelUnavailableError, errorMessage, toError } from "../errors";
import type { EmbeddingProvider } from "./embedder";

export interface VoyageEmbeddingOptions {
	/** Falls back to VOYAGE_AI_API_KEY */
	apiKey?: string;
	model: string;
	dimension: number;
	/** Request timeout in seconds (default: 30) */
	timeoutSeconds?: number;
	/** Injected for tests */
	client?: Pick<VoyageAIClient, "embed">;
}

const MAX_BATCH_SIZE = 128;

export class VoyageEmbeddingProvider implements EmbeddingProvider {
	readonly modelId: string;
	readonly dimension: number;

	private readonly model: string;
	private readonly client: Pick<VoyageAIClient, "embed">;
	private readonly timeoutSeconds: number;

	constructor(options: VoyageEmbeddingOptions) {
		this.model = options.model;
		this.timeoutSeconds = options.timeoutSeconds ?? 30;
		this.modelId = `voyageai/${options.model}`;
		this.dimension = options.dimension;

		if (options.client) {
			this.client = options.client;
		} else {
			const apiKey = options.apiKey ?? process.env.VOYAGE_AI_API_KEY;
			if (!apiKey) {
				throw new ModelUnavailableError(
					this.modelId,
					"Voyage AI API key is required. Set VOYAGE_AI_API_KEY or embedding.apiKey.",
				);
			}
			this.client = new VoyageAIClient({ apiKey });
		}
	}

	async embedRaw(texts: string[], signal: AbortSignal): Promise<number[][]> {
		const vectors: number[][] = [];

		for (let offset = 0; offset < texts.length; offset += MAX_BATCH_SIZE) {
			const batch = texts.slice(offset, offset + MAX_BATCH_SIZE);
			const slots: Array<number[] | undefined> = new Array(batch.length);

			let response: Awaited<ReturnType<VoyageAIClient["embed"]>>;
			try {
				response = await this.client.embed(
					{
						model: this.model,
						input: batch,
						outputDimension: this.dimension,
						truncation: true,
					},
					{ timeoutInSeconds: this.timeoutSeconds },
				);
			} catch (error) {
				if (signal.aborted) throw toError(signal.reason);
				throw new ModelUnavailableError(this.modelId, errorMessage(error), { cause: error });
			}

			for (const item of response.data ?? []) {
				if (item.index !== undefined && item.embedding && item.embedding.length > 0) {
					slots[item.index] = item.embedding;
				}
			}

			for (let i = 0; i < batch.length; i++) {
				const vector = slots[i];
				if (!vector) {
					throw new ModelUnavailableError(
						this.modelId,
						`no embedding returned for item ${offset + i}`,
					);
				}
				vectors.push(vector);
			}
		}

		return vectors;
	}
}
