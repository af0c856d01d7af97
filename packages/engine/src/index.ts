/**
 * @kgvec/engine
 *
 * Hybrid retrieval over a Neo4j knowledge graph and a SQLite vector index:
 * chunking and embedding on the write path; planning, graph/vector retrieval,
 * fusion and mode routing on the read path.
 */

// Core types & errors
export * from "./types";
export * from "./errors";

// Configuration
export {
	EngineConfigSchema,
	ChunkingConfigSchema,
	EmbeddingConfigSchema,
	GraphConfigSchema,
	FusionConfigSchema,
	TimeoutConfigSchema,
	ENV_BINDINGS,
	configFromEnv,
	parseConfig,
	loadConfig,
	type EngineConfig,
	type EngineConfigInput,
	type ChunkingConfig,
	type EmbeddingConfig,
	type GraphConfig,
	type FusionConfig,
	type TimeoutConfig,
	type LoadConfigOptions,
} from "./config";

// Diagnostics
export {
	createLogger,
	nullLogger,
	redactContext,
	isLogLevel,
	type Logger,
	type LogLevel,
	type LogEntry,
	type LogSink,
	type LoggerOptions,
} from "./diagnostics/logger";
export {
	createMetricsRegistry,
	createRetrievalMetrics,
	type MetricsRegistry,
	type MetricsSnapshot,
	type RetrievalMetrics,
} from "./diagnostics/metrics";

// Write path
export {
	createChunker,
	reconstructText,
	splitText,
	formatChunkId,
	DEFAULT_CHUNKING,
	type Chunker,
} from "./chunking/chunker";
export { normalizeText, stripMarkdown, prepareText } from "./chunking/normalize";
export * from "./embeddings";
export { loadDocument, loadDirectory, documentIdForPath, formatForPath } from "./indexing/document-loader";
export {
	createIngestPipeline,
	contentHash,
	type IngestPipeline,
	type IngestResult,
	type IngestStatus,
	type IngestSummary,
	type IngestOptions,
} from "./indexing/ingest-pipeline";

// Stores
export { openDatabase, getSchemaVersion, SCHEMA_VERSION, type SqliteDatabase } from "./storage/schema";
export {
	createSqliteVectorIndex,
	type VectorIndexClient,
	type SimilarityMetric,
} from "./storage/vector-index";
export { createDocumentRegistry, type DocumentRegistry } from "./storage/document-registry";
export {
	createNeo4jGraphClient,
	adaptNeo4jDriver,
	toGraphValue,
	classifyNeo4jError,
	type GraphQueryClient,
	type GraphDriver,
	type GraphQueryOptions,
} from "./graph/neo4j-client";
export {
	keywordFactsQuery,
	entityNeighborsQuery,
	entityPathsQuery,
	graphStatsQuery,
	DEFAULT_GRAPH_LIMIT,
} from "./graph/queries";

// LLM
export { OllamaClient, type LLMProvider, type GenerateOptions } from "./llm/ollama-client";
export {
	LlmCypherTranslator,
	KeywordCypherTranslator,
	cleanCypherOutput,
	validateReadOnlyCypher,
	extractKeywords,
	type CypherTranslator,
} from "./llm/text-to-cypher";
export {
	answerComparison,
	createAnswerGenerator,
	formatEvidenceContext,
	parseAnswer,
	type AnswerGenerator,
	type ComparisonAnswer,
	type ComparisonAnswers,
	type GeneratedAnswer,
} from "./llm/answer-generator";

// Read path
export { withTimeout } from "./timeout";
export { createQueryPlanner, type QueryPlanner, type RetrievalPlan, type SourceOutcome } from "./query/planner";
export { fuse, contributingSources, type FusionOptions } from "./query/fusion";
export {
	createStrategies,
	GraphStrategy,
	VectorStrategy,
	HybridStrategy,
	type RetrievalStrategy,
	type RetrievalStrategies,
	type RetrieveOptions,
} from "./query/strategies";
export {
	createModeRouter,
	type ModeRouter,
	type RetrievalRequest,
	type RouteResult,
	type CompareResult,
	type CompareSlot,
} from "./query/router";

// Wiring
export { createRuntime, type Runtime, type RuntimeOverrides } from "./runtime";
