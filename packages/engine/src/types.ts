/**
 * Core types for @kgvec/engine
 */

// ============================================================================
// Documents & Chunks
// ============================================================================

/**
 * "pdf" documents arrive as text already extracted upstream;
 * "markdown" documents still carry markup and are cleaned before chunking.
 */
export type DocumentFormat = "pdf" | "markdown";

export interface Document {
	/** Stable identifier, also the provenance key stored on graph relations */
	id: string;
	format: DocumentFormat;
	text: string;
	/** File the text was loaded from, when known */
	sourcePath?: string;
}

export interface TextSpan {
	/** Inclusive offset into the normalized document text */
	start: number;
	/** Exclusive offset */
	end: number;
}

export interface Chunk {
	/** `<documentId>:<index padded to 4>` */
	id: string;
	documentId: string;
	/** 0-based position within the document */
	index: number;
	text: string;
	span: TextSpan;
}

export interface ChunkingOptions {
	chunkSize: number;
	chunkOverlap: number;
	minChunkSize: number;
}

// ============================================================================
// Embeddings
// ============================================================================

/** Frozen, L2-normalized vector. Re-embedding produces a new one. */
export type EmbeddingVector = readonly number[];

// ============================================================================
// Graph
// ============================================================================

/** Fact triplet as stored in the graph. Read-only for the engine. */
export interface GraphFact {
	subject: string;
	predicate: string;
	object: string;
	/** Document the fact was extracted from */
	provenance?: string;
}

/** Plain value produced from a graph result after driver types are unwrapped */
export type GraphValue =
	| null
	| boolean
	| number
	| string
	| GraphValue[]
	| { [key: string]: GraphValue };

export type GraphRow = Record<string, GraphValue>;

/** Structured graph query: Cypher text plus bound parameters */
export interface GraphQuery {
	cypher: string;
	params: Record<string, unknown>;
}

export interface GraphQueryResult {
	rows: GraphRow[];
	query: GraphQuery;
}

// ============================================================================
// Vector Index
// ============================================================================

export type ChunkMetadataValue = string | number | boolean | null;

export type ChunkMetadata = Record<string, ChunkMetadataValue>;

export interface VectorEntry {
	chunkId: string;
	documentId: string;
	text: string;
	vector: EmbeddingVector;
	metadata?: ChunkMetadata;
}

export interface VectorHit {
	chunkId: string;
	documentId: string;
	text: string;
	similarity: number;
	metadata: ChunkMetadata;
	/** Epoch ms when the chunk was written */
	ingestedAt: number;
}

export interface VectorFilter {
	documentIds?: string[];
	/** Exact-match constraints on chunk metadata */
	metadata?: ChunkMetadata;
}

// ============================================================================
// Evidence
// ============================================================================

export type EvidenceSource = "graph" | "vector";

export interface GraphEvidence {
	kind: "graph";
	/** Document the rows were attributed to, when the rows carry provenance */
	documentId?: string;
	/** Grouping key: document id or entity triple */
	entityKey: string;
	rows: GraphRow[];
	query: GraphQuery;
}

export interface VectorEvidence {
	kind: "vector";
	chunkId: string;
	documentId: string;
	text: string;
	similarity: number;
	metadata: ChunkMetadata;
}

export type EvidenceItem = GraphEvidence | VectorEvidence;

/** One fused context entry, holding the evidence of one or both sources */
export interface ScoredEvidence {
	key: string;
	score: number;
	graphScore: number;
	vectorScore: number;
	sources: EvidenceSource[];
	evidence: EvidenceItem[];
	documentId?: string;
	ingestedAt?: number;
}

// ============================================================================
// Retrieval
// ============================================================================

export type RetrievalMode = "graph" | "vector" | "hybrid";

export interface SourceFailure {
	source: EvidenceSource | "translation" | "generation";
	kind: string;
	message: string;
}

export interface RetrievalTimings {
	planMs: number;
	retrieveMs: number;
	totalMs: number;
}

export interface RetrievalResult {
	mode: RetrievalMode;
	question: string;
	items: ScoredEvidence[];
	contributingSources: EvidenceSource[];
	/** True when a hybrid request lost one of its sources */
	degraded: boolean;
	failures: SourceFailure[];
	/** Graph query that was executed, if any */
	query?: GraphQuery;
	timings: RetrievalTimings;
}

// ============================================================================
// Ingestion
// ============================================================================

export type VectorStatus = "pending" | "complete" | "failed";

export interface IngestionRecord {
	documentId: string;
	format: DocumentFormat;
	contentHash: string;
	chunkCount: number;
	ingestedAt: number;
	vectorStatus: VectorStatus;
	graphLoaded: boolean;
	/** Both stores reflect this document */
	complete: boolean;
	error?: string;
}
