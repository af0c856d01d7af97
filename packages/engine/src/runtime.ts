/**
 * Runtime: builds every client once from configuration and wires them
 * together. Callers (the CLI, tests) own the returned runtime and close it.
 */

import { createChunker, type Chunker } from "./chunking/chunker";
import type { EngineConfig } from "./config";
import { createLogger, type Logger } from "./diagnostics/logger";
import { errorMessage } from "./errors";
import { createRetrievalMetrics, type RetrievalMetrics } from "./diagnostics/metrics";
import { Embedder, type EmbeddingProvider } from "./embeddings/embedder";
import { createEmbeddingProvider } from "./embeddings/factory";
import { createNeo4jGraphClient, type GraphDriver, type GraphQueryClient } from "./graph/neo4j-client";
import { createIngestPipeline, type IngestPipeline } from "./indexing/ingest-pipeline";
import { createAnswerGenerator, type AnswerGenerator } from "./llm/answer-generator";
import { OllamaClient, type LLMProvider } from "./llm/ollama-client";
import {
	KeywordCypherTranslator,
	LlmCypherTranslator,
	type CypherTranslator,
} from "./llm/text-to-cypher";
import { createQueryPlanner, type QueryPlanner } from "./query/planner";
import { createModeRouter, type ModeRouter } from "./query/router";
import { createStrategies, type RetrievalStrategies } from "./query/strategies";
import { createDocumentRegistry, type DocumentRegistry } from "./storage/document-registry";
import { openDatabase, type SqliteDatabase } from "./storage/schema";
import { createSqliteVectorIndex, type VectorIndexClient } from "./storage/vector-index";
import { withTimeout } from "./timeout";

// ============================================================================
// Types
// ============================================================================

export interface RuntimeOverrides {
	logger?: Logger;
	metrics?: RetrievalMetrics;
	/** Replaces the configured embedding backend */
	embeddingProvider?: EmbeddingProvider;
	/** Replaces the neo4j-driver connection */
	graphDriver?: GraphDriver;
	/** Replaces the Ollama LLM */
	llm?: LLMProvider;
	/** Replaces vectorStore.path (":memory:" in tests) */
	databasePath?: string;
	now?: () => number;
}

export interface Runtime {
	config: EngineConfig;
	logger: Logger;
	metrics: RetrievalMetrics;
	db: SqliteDatabase;
	chunker: Chunker;
	embedder: Embedder;
	vectors: VectorIndexClient;
	registry: DocumentRegistry;
	graph: GraphQueryClient;
	llm: LLMProvider;
	translator: CypherTranslator;
	planner: QueryPlanner;
	strategies: RetrievalStrategies;
	router: ModeRouter;
	answers: AnswerGenerator;
	ingestion: IngestPipeline;
	/**
	 * Ask the LLM backend whether its model is installed and warn when it is
	 * not or cannot be reached. Undefined when the provider cannot tell.
	 */
	checkLlm(signal?: AbortSignal): Promise<boolean | undefined>;
	close(): Promise<void>;
}

const LLM_CHECK_MS = 5_000;

// ============================================================================
// Implementation
// ============================================================================

function createTranslator(config: EngineConfig, llm: LLMProvider): CypherTranslator {
	switch (config.graph.translator) {
		case "llm":
			return new LlmCypherTranslator(llm, config.graph.topK);
		case "keyword":
			return new KeywordCypherTranslator(config.graph.topK);
	}
}

export async function createRuntime(
	config: EngineConfig,
	overrides: RuntimeOverrides = {},
): Promise<Runtime> {
	const logger = overrides.logger ?? createLogger({ level: config.logLevel });
	const metrics = overrides.metrics ?? createRetrievalMetrics();
	const { timeouts } = config;

	const provider =
		overrides.embeddingProvider ?? (await createEmbeddingProvider(config.embedding, config.llm.baseUrl));
	const embedder = new Embedder(provider, {
		batchSize: config.embedding.batchSize,
		concurrency: config.embedding.concurrency,
		cacheSize: config.embedding.cacheSize,
		timeoutMs: timeouts.embeddingMs,
		logger,
		metrics,
	});

	const db = openDatabase(overrides.databasePath ?? config.vectorStore.path);
	let vectors: VectorIndexClient;
	try {
		vectors = createSqliteVectorIndex(db, {
			collection: config.vectorStore.collection,
			modelId: embedder.modelId,
			dimension: embedder.dimension,
			metric: config.vectorStore.metric,
			now: overrides.now,
		});
	} catch (error) {
		db.close();
		throw error;
	}
	const registry = createDocumentRegistry(db, config.vectorStore.collection);

	const graph = createNeo4jGraphClient(config.graph, { logger, driver: overrides.graphDriver });
	const llm =
		overrides.llm ??
		new OllamaClient({
			model: config.llm.model,
			baseUrl: config.llm.baseUrl,
			temperature: config.llm.temperature,
			maxTokens: config.llm.maxTokens,
		});
	const translator = createTranslator(config, llm);

	const planner = createQueryPlanner({ translator, embedder, timeouts, logger });
	const strategies = createStrategies({
		planner,
		graph,
		vectors,
		fusion: config.fusion,
		timeouts,
		recency: (documentId) => registry.get(documentId)?.ingestedAt,
		metrics,
		logger,
	});
	const router = createModeRouter({ strategies, metrics, logger });
	const chunker = createChunker(config.chunking);
	const answers = createAnswerGenerator(llm, { timeoutMs: timeouts.generationMs });
	const ingestion = createIngestPipeline({
		chunker,
		embedder,
		vectors,
		registry,
		retry: config.ingestion,
		metrics,
		logger,
		now: overrides.now,
	});

	logger.debug("Runtime ready", {
		embedding: embedder.modelId,
		collection: vectors.collection,
		translator: translator.kind,
		graph: config.graph.uri,
	});

	return {
		config,
		logger,
		metrics,
		db,
		chunker,
		embedder,
		vectors,
		registry,
		graph,
		llm,
		translator,
		planner,
		strategies,
		router,
		answers,
		ingestion,
		async checkLlm(signal) {
			const isAvailable = llm.isModelAvailable?.bind(llm);
			if (!isAvailable) return undefined;
			try {
				const available = await withTimeout("generation", LLM_CHECK_MS, (inner) => isAvailable(inner), signal);
				if (!available) {
					logger.warn("LLM model is not installed; answer generation will fail", { model: llm.modelId });
				}
				return available;
			} catch (error) {
				logger.warn("LLM backend unreachable", { model: llm.modelId, error: errorMessage(error) });
				return false;
			}
		},
		async close() {
			const { counters, gauges } = metrics.registry.snapshot();
			logger.debug("Runtime closing", { component: "runtime", counters, gauges });
			try {
				await graph.close();
			} finally {
				await vectors.close();
				db.close();
			}
		},
	};
}
