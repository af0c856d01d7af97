/**
 * Engine configuration
 *
 * One zod schema describes every tunable. Values are layered:
 * schema defaults < JSON config file < environment variables < explicit overrides.
 */

import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";

// ============================================================================
// Schema
// ============================================================================

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ChunkingConfigSchema = z
	.object({
		chunkSize: z.coerce.number().int().positive().default(512),
		chunkOverlap: z.coerce.number().int().nonnegative().default(50),
		minChunkSize: z.coerce.number().int().positive().default(100),
	})
	.refine((c) => c.chunkOverlap < c.minChunkSize, {
		message: "chunkOverlap must be smaller than minChunkSize",
		path: ["chunkOverlap"],
	})
	.refine((c) => c.minChunkSize <= c.chunkSize, {
		message: "minChunkSize must not exceed chunkSize",
		path: ["minChunkSize"],
	})
	// Room to pull the last cut back far enough for a full-size tail
	.refine((c) => c.chunkSize >= 2 * c.minChunkSize - c.chunkOverlap, {
		message: "chunkSize must be at least 2 * minChunkSize - chunkOverlap",
		path: ["chunkSize"],
	});

export const EmbeddingConfigSchema = z.object({
	provider: z.enum(["ollama", "voyage", "hash"]).default("ollama"),
	model: z.string().min(1).default("bge-m3"),
	/** "cpu" keeps the model off the GPU so the LLM can have it */
	device: z.enum(["cpu", "gpu"]).default("cpu"),
	dimension: z.coerce.number().int().positive().default(1024),
	batchSize: z.coerce.number().int().positive().default(16),
	concurrency: z.coerce.number().int().positive().default(2),
	cacheSize: z.coerce.number().int().nonnegative().default(5000),
	/** Ollama endpoint for embeddings; defaults to llm.baseUrl */
	baseUrl: z.string().url().optional(),
	apiKey: z.string().optional(),
});

export const VectorStoreConfigSchema = z.object({
	path: z.string().min(1).default("./data/kgvec.sqlite"),
	collection: z
		.string()
		.regex(/^[A-Za-z0-9_-]+$/, "collection must be alphanumeric")
		.default("documents"),
	metric: z.enum(["cosine", "dot"]).default("cosine"),
});

export const GraphConfigSchema = z.object({
	uri: z.string().min(1).default("bolt://localhost:7687"),
	user: z.string().default("neo4j"),
	password: z.string().default(""),
	database: z.string().optional(),
	/** "llm" translates questions to Cypher; "keyword" matches entity names */
	translator: z.enum(["llm", "keyword"]).default("llm"),
	topK: z.coerce.number().int().positive().default(20),
	maxConnectionPoolSize: z.coerce.number().int().positive().default(10),
});

export const LlmConfigSchema = z.object({
	baseUrl: z.string().url().default("http://localhost:11434"),
	model: z.string().min(1).default("gpt-oss:20b"),
	temperature: z.coerce.number().min(0).max(2).default(0.7),
	maxTokens: z.coerce.number().int().positive().default(2048),
});

export const FusionConfigSchema = z.object({
	/** Weight of the graph score; (1 - alpha) goes to the vector score */
	alpha: z.coerce.number().min(0).max(1).default(0.5),
	/** Fused context size */
	topK: z.coerce.number().int().positive().default(5),
	/** Normalized score assigned to every graph match */
	graphWeight: z.coerce.number().min(0).max(1).default(1),
	/** Candidates requested from the vector index */
	vectorTopK: z.coerce.number().int().positive().default(5),
});

export const TimeoutConfigSchema = z.object({
	graphMs: z.coerce.number().int().positive().default(10_000),
	vectorMs: z.coerce.number().int().positive().default(5_000),
	embeddingMs: z.coerce.number().int().positive().default(30_000),
	translationMs: z.coerce.number().int().positive().default(60_000),
	generationMs: z.coerce.number().int().positive().default(120_000),
});

export const IngestionConfigSchema = z.object({
	maxRetries: z.coerce.number().int().nonnegative().default(3),
	retryDelayMs: z.coerce.number().int().nonnegative().default(500),
});

export const EngineConfigSchema = z.object({
	chunking: ChunkingConfigSchema.default({}),
	embedding: EmbeddingConfigSchema.default({}),
	vectorStore: VectorStoreConfigSchema.default({}),
	graph: GraphConfigSchema.default({}),
	llm: LlmConfigSchema.default({}),
	fusion: FusionConfigSchema.default({}),
	timeouts: TimeoutConfigSchema.default({}),
	ingestion: IngestionConfigSchema.default({}),
	logLevel: LogLevelSchema.default("info"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type FusionConfig = z.infer<typeof FusionConfigSchema>;
export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;

// ============================================================================
// Environment
// ============================================================================

/** Environment variable -> config path */
export const ENV_BINDINGS: ReadonlyArray<readonly [string, readonly [string, string?]]> = [
	["KGVEC_CHUNK_SIZE", ["chunking", "chunkSize"]],
	["KGVEC_CHUNK_OVERLAP", ["chunking", "chunkOverlap"]],
	["KGVEC_MIN_CHUNK_SIZE", ["chunking", "minChunkSize"]],
	["KGVEC_EMBEDDING_PROVIDER", ["embedding", "provider"]],
	["KGVEC_EMBEDDING_MODEL", ["embedding", "model"]],
	["KGVEC_EMBEDDING_DEVICE", ["embedding", "device"]],
	["KGVEC_EMBEDDING_DIMENSION", ["embedding", "dimension"]],
	["KGVEC_EMBEDDING_BATCH_SIZE", ["embedding", "batchSize"]],
	["KGVEC_EMBEDDING_URL", ["embedding", "baseUrl"]],
	["VOYAGE_AI_API_KEY", ["embedding", "apiKey"]],
	["KGVEC_VECTOR_PATH", ["vectorStore", "path"]],
	["KGVEC_VECTOR_COLLECTION", ["vectorStore", "collection"]],
	["KGVEC_VECTOR_METRIC", ["vectorStore", "metric"]],
	["NEO4J_URI", ["graph", "uri"]],
	["NEO4J_USER", ["graph", "user"]],
	["NEO4J_PASSWORD", ["graph", "password"]],
	["NEO4J_DATABASE", ["graph", "database"]],
	["KGVEC_GRAPH_TRANSLATOR", ["graph", "translator"]],
	["KGVEC_GRAPH_TOP_K", ["graph", "topK"]],
	["OLLAMA_BASE_URL", ["llm", "baseUrl"]],
	["OLLAMA_MODEL", ["llm", "model"]],
	["KGVEC_LLM_TEMPERATURE", ["llm", "temperature"]],
	["KGVEC_FUSION_ALPHA", ["fusion", "alpha"]],
	["KGVEC_TOP_K", ["fusion", "topK"]],
	["KGVEC_VECTOR_TOP_K", ["fusion", "vectorTopK"]],
	["KGVEC_LOG_LEVEL", ["logLevel"]],
];

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeDeep(base: RawConfig, override: RawConfig): RawConfig {
	const merged: RawConfig = { ...base };
	for (const [key, value] of Object.entries(override)) {
		if (value === undefined) continue;
		const existing = merged[key];
		merged[key] =
			isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
	}
	return merged;
}

/**
 * Map environment variables onto the raw config shape.
 * `KGVEC_TIMEOUT_MS` sets every backend timeout at once.
 */
export function configFromEnv(env: Record<string, string | undefined>): RawConfig {
	let raw: RawConfig = {};

	for (const [name, [section, key]] of ENV_BINDINGS) {
		const value = env[name];
		if (value === undefined || value.trim() === "") continue;
		raw = mergeDeep(raw, key ? { [section]: { [key]: value.trim() } } : { [section]: value.trim() });
	}

	const timeout = env.KGVEC_TIMEOUT_MS?.trim();
	if (timeout) {
		raw = mergeDeep(
			{
				timeouts: {
					graphMs: timeout,
					vectorMs: timeout,
					embeddingMs: timeout,
					translationMs: timeout,
					generationMs: timeout,
				},
			},
			raw,
		);
	}

	return raw;
}

function readConfigFile(path: string): RawConfig {
	if (!existsSync(path)) {
		throw new ConfigError(`Config file not found: ${path}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Config file ${path} is not valid JSON`, [errorMessage(error)]);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Config file ${path} must contain a JSON object`);
	}
	return parsed;
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
	/** Environment to read (default: process.env) */
	env?: Record<string, string | undefined>;
	/** JSON config file; falls back to the KGVEC_CONFIG variable */
	configPath?: string;
	/** Highest-precedence values, e.g. from CLI flags */
	overrides?: EngineConfigInput;
}

/**
 * Validate a raw config object, reporting every invalid path at once.
 */
export function parseConfig(raw: unknown): EngineConfig {
	const result = EngineConfigSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
		);
		throw new ConfigError("Invalid configuration", issues);
	}
	return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
	const env = options.env ?? process.env;
	const configPath = options.configPath ?? env.KGVEC_CONFIG;

	let raw: RawConfig = configPath ? readConfigFile(configPath) : {};
	raw = mergeDeep(raw, configFromEnv(env));
	if (options.overrides) {
		raw = mergeDeep(raw, options.overrides);
	}

	return parseConfig(raw);
}
