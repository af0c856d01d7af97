import { describe, expect, test, vi } from "vitest";

vi.mock("voyageai", () => ({
	VoyageAIClient: class {
		embed() {
			throw new Error("network disabled in tests");
		}
	},
}));

import { Embedder, type EmbeddingProvider } from "../embeddings/embedder";
import { HashEmbeddingProvider } from "../embeddings/hash-provider";
import { OllamaEmbeddingProvider } from "../embeddings/ollama-provider";
import { VoyageEmbeddingProvider } from "../embeddings/voyage-provider";
import { processInBatches } from "../embeddings/batch-processor";
import { EmbeddingCache, embeddingCacheKey } from "../embeddings/cache";
import { BackendTimeoutError, ModelUnavailableError } from "../errors";

// ============================================================================
// Helpers
// ============================================================================

class RecordingProvider implements EmbeddingProvider {
	readonly modelId = "recording";
	readonly calls: string[][] = [];

	constructor(
		readonly dimension = 2,
		private readonly vectorFor: (text: string) => number[] = (text) => [text.length, 1],
	) {}

	async embedRaw(texts: string[]): Promise<number[][]> {
		this.calls.push([...texts]);
		return texts.map(this.vectorFor);
	}
}

function cosine(a: readonly number[], b: readonly number[]): number {
	return a.reduce((sum, value, i) => sum + value * b[i], 0);
}

// ============================================================================
// Embedder
// ============================================================================

describe("Embedder", () => {
	test("embedQuery returns exactly the vector embed produces for the same text", async () => {
		const embedder = new Embedder(new HashEmbeddingProvider(64), { cacheSize: 0 });
		const text = "Valve V-12 isolates the secondary loop.";

		const [fromBatch] = await embedder.embed([text, "unrelated text"]);
		const fromQuery = await embedder.embedQuery(text);

		expect(fromQuery).toEqual(fromBatch);
	});

	test("vectors are L2-normalized and frozen", async () => {
		const embedder = new Embedder(new RecordingProvider(2, () => [3, 4]));
		const [vector] = await embedder.embed(["abc"]);

		expect(vector).toEqual([0.6, 0.8]);
		expect(Object.isFrozen(vector)).toBe(true);
	});

	test("splits work into batches of batchSize", async () => {
		const provider = new RecordingProvider();
		const embedder = new Embedder(provider, { batchSize: 2, concurrency: 1, cacheSize: 0 });

		const vectors = await embedder.embed(["a", "bb", "ccc", "dddd", "eeeee"]);

		expect(provider.calls).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
		expect(vectors).toHaveLength(5);
	});

	test("preserves input order and deduplicates repeated texts", async () => {
		const provider = new RecordingProvider(2, (text) => (text === "x" ? [1, 0] : [0, 1]));
		const embedder = new Embedder(provider, { cacheSize: 0 });

		const vectors = await embedder.embed(["x", "y", "x"]);

		expect(provider.calls).toEqual([["x", "y"]]);
		expect(vectors).toEqual([[1, 0], [0, 1], [1, 0]]);
	});

	test("cached texts skip the provider", async () => {
		const provider = new RecordingProvider();
		const embedder = new Embedder(provider);

		await embedder.embed(["same text"]);
		await embedder.embedQuery("same text");

		expect(provider.calls).toHaveLength(1);
		expect(embedder.getCacheStats().hits).toBe(1);
	});

	test("empty input makes no provider call", async () => {
		const provider = new RecordingProvider();
		const embedder = new Embedder(provider);

		expect(await embedder.embed([])).toEqual([]);
		expect(provider.calls).toHaveLength(0);
	});

	test("wrong dimension raises ModelUnavailableError", async () => {
		const embedder = new Embedder(new RecordingProvider(3, () => [1, 2]));
		await expect(embedder.embed(["a"])).rejects.toBeInstanceOf(ModelUnavailableError);
	});

	test("provider failures become ModelUnavailableError", async () => {
		const provider: EmbeddingProvider = {
			modelId: "broken",
			dimension: 2,
			embedRaw: async () => {
				throw new Error("connection refused");
			},
		};
		const embedder = new Embedder(provider);

		await expect(embedder.embed(["a"])).rejects.toThrow(/connection refused/);
		await expect(embedder.embed(["a"])).rejects.toBeInstanceOf(ModelUnavailableError);
	});

	test("a provider that never answers times out", async () => {
		const provider: EmbeddingProvider = {
			modelId: "stuck",
			dimension: 2,
			embedRaw: () => new Promise<number[][]>(() => {}),
		};
		const embedder = new Embedder(provider, { timeoutMs: 20 });

		await expect(embedder.embedQuery("a")).rejects.toBeInstanceOf(BackendTimeoutError);
	});
});

// ============================================================================
// Batch processor
// ============================================================================

describe("processInBatches", () => {
	test("keeps at most `concurrency` batches in flight", async () => {
		let inFlight = 0;
		let peak = 0;

		const results = await processInBatches(
			[1, 2, 3, 4, 5, 6, 7],
			async (batch) => {
				inFlight++;
				peak = Math.max(peak, inFlight);
				await new Promise((resolve) => setTimeout(resolve, 5));
				inFlight--;
				return batch.map((n) => n * 10);
			},
			{ batchSize: 2, concurrency: 2 },
		);

		expect(results).toEqual([10, 20, 30, 40, 50, 60, 70]);
		expect(peak).toBe(2);
	});

	test("rejects with the first batch error", async () => {
		await expect(
			processInBatches(
				[1, 2, 3],
				async (batch) => {
					if (batch.includes(3)) throw new Error("batch failed");
					return batch;
				},
				{ batchSize: 1, concurrency: 1 },
			),
		).rejects.toThrow("batch failed");
	});
});

// ============================================================================
// Providers
// ============================================================================

describe("HashEmbeddingProvider", () => {
	test("lexically similar texts are closer than unrelated ones", async () => {
		const embedder = new Embedder(new HashEmbeddingProvider(256));
		const [a, b, c] = await embedder.embed([
			"the coolant pump feeds the heat exchanger",
			"coolant pump feeds heat exchanger loop",
			"quarterly revenue grew in the northern region",
		]);

		expect(cosine(a, b)).toBeGreaterThan(cosine(a, c));
	});

	test("is deterministic", async () => {
		const provider = new HashEmbeddingProvider(32);
		const controller = new AbortController();
		const first = await provider.embedRaw(["steam turbine"], controller.signal);
		const second = await provider.embedRaw(["steam turbine"], controller.signal);
		expect(first).toEqual(second);
	});
});

describe("OllamaEmbeddingProvider", () => {
	test("posts inputs to /api/embed and keeps the model on CPU", async () => {
		const fetchMock = vi.fn(
			async (_url: string | URL | Request, _init?: RequestInit) =>
				new Response(JSON.stringify({ embeddings: [[1, 0], [0, 1]] }), { status: 200 }),
		);
		const provider = new OllamaEmbeddingProvider({
			model: "bge-m3",
			dimension: 2,
			baseUrl: "http://ollama.test:11434/",
			fetch: fetchMock,
		});

		const vectors = await provider.embedRaw(["a", "b"], new AbortController().signal);

		expect(vectors).toEqual([[1, 0], [0, 1]]);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		const [url, init] = fetchMock.mock.calls[0];
		expect(url).toBe("http://ollama.test:11434/api/embed");
		expect(JSON.parse(String(init?.body))).toEqual({
			model: "bge-m3",
			input: ["a", "b"],
			truncate: true,
			options: { num_gpu: 0 },
		});
	});

	test("HTTP errors raise ModelUnavailableError", async () => {
		const provider = new OllamaEmbeddingProvider({
			model: "bge-m3",
			dimension: 2,
			fetch: async () => new Response("model not found", { status: 404 }),
		});

		await expect(provider.embedRaw(["a"], new AbortController().signal)).rejects.toThrow(
			/HTTP 404/,
		);
	});

	test("unreachable server raises ModelUnavailableError", async () => {
		const provider = new OllamaEmbeddingProvider({
			model: "bge-m3",
			dimension: 2,
			fetch: async () => {
				throw new TypeError("fetch failed");
			},
		});

		await expect(
			provider.embedRaw(["a"], new AbortController().signal),
		).rejects.toBeInstanceOf(ModelUnavailableError);
	});
});

describe("VoyageEmbeddingProvider", () => {
	test("sends inputs without an input type and maps results by index", async () => {
		const embed = vi.fn().mockResolvedValue({
			data: [
				{ index: 1, embedding: [0, 1] },
				{ index: 0, embedding: [1, 0] },
			],
		});
		const provider = new VoyageEmbeddingProvider({
			model: "voyage-3",
			dimension: 2,
			client: { embed },
		});

		const vectors = await provider.embedRaw(["first", "second"], new AbortController().signal);

		expect(vectors).toEqual([[1, 0], [0, 1]]);
		expect(embed).toHaveBeenCalledWith(
			{ model: "voyage-3", input: ["first", "second"], outputDimension: 2, truncation: true },
			{ timeoutInSeconds: 30 },
		);
	});

	test("missing embeddings raise ModelUnavailableError", async () => {
		const embed = vi.fn().mockResolvedValue({ data: [{ index: 0, embedding: [1, 0] }] });
		const provider = new VoyageEmbeddingProvider({ model: "voyage-3", dimension: 2, client: { embed } });

		await expect(
			provider.embedRaw(["first", "second"], new AbortController().signal),
		).rejects.toBeInstanceOf(ModelUnavailableError);
	});

	test("requires an API key when no client is injected", () => {
		const previous = process.env.VOYAGE_AI_API_KEY;
		delete process.env.VOYAGE_AI_API_KEY;
		try {
			expect(() => new VoyageEmbeddingProvider({ model: "voyage-3", dimension: 2 })).toThrow(
				ModelUnavailableError,
			);
		} finally {
			if (previous !== undefined) process.env.VOYAGE_AI_API_KEY = previous;
		}
	});
});

describe("EmbeddingCache", () => {
	test("evicts the least recently used entry", () => {
		const cache = new EmbeddingCache("m", { maxSize: 2 });

		cache.set("a", [1]);
		cache.set("b", [2]);
		cache.get("a");
		cache.set("c", [3]);

		expect(cache.size).toBe(2);
		expect(cache.get("b")).toBeUndefined();
		expect(cache.get("a")).toEqual([1]);
		expect(cache.getStats()).toEqual({ size: 2, maxSize: 2, hits: 2, misses: 1, hitRate: 2 / 3 });
	});

	test("keys depend on the model", () => {
		expect(embeddingCacheKey("m1", "text")).not.toBe(embeddingCacheKey("m2", "text"));
		expect(embeddingCacheKey("m1", "text")).toHaveLength(16);
	});
});
