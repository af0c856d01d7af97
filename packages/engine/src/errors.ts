/**
 * Error taxonomy for @kgvec/engine
 *
 * Every failure raised by the engine is a RetrievalError with a `kind`
 * discriminant, so callers can branch without instanceof chains.
 */

import type { EvidenceSource, GraphQuery, SourceFailure } from "./types";

export type RetrievalErrorKind =
	| "chunking"
	| "model_unavailable"
	| "graph_query"
	| "vector_store"
	| "timeout"
	| "unanswerable"
	| "config";

export type BackendName =
	| EvidenceSource
	| "embedding"
	| "translation"
	| "generation";

export abstract class RetrievalError extends Error {
	abstract readonly kind: RetrievalErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Document is empty or its id cannot form chunk ids */
export class ChunkingError extends RetrievalError {
	readonly kind = "chunking";

	constructor(
		readonly documentId: string,
		message: string,
	) {
		super(`Cannot chunk document "${documentId}": ${message}`);
	}
}

/** Embedding or LLM backend unreachable or misbehaving */
export class ModelUnavailableError extends RetrievalError {
	readonly kind = "model_unavailable";

	constructor(
		readonly modelId: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`Model ${modelId} unavailable: ${message}`, options);
	}
}

export type GraphFailureReason = "syntax" | "execution" | "unavailable" | "rejected";

export class GraphQueryError extends RetrievalError {
	readonly kind = "graph_query";

	constructor(
		readonly query: GraphQuery,
		readonly reason: GraphFailureReason,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`Graph query failed (${reason}): ${message}`, options);
	}
}

export class VectorStoreError extends RetrievalError {
	readonly kind = "vector_store";
}

export class BackendTimeoutError extends RetrievalError {
	readonly kind = "timeout";

	constructor(
		readonly backend: BackendName,
		readonly timeoutMs: number,
	) {
		super(`${backend} call timed out after ${timeoutMs}ms`);
	}
}

/** Every source a request depended on failed */
export class UnanswerableQuestionError extends RetrievalError {
	readonly kind = "unanswerable";

	constructor(
		readonly question: string,
		readonly failures: SourceFailure[],
	) {
		super(
			`No source could answer "${question}": ${failures
				.map((f) => `${f.source} (${f.kind}: ${f.message})`)
				.join("; ")}`,
		);
	}
}

export class ConfigError extends RetrievalError {
	readonly kind = "config";

	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
	}
}

// ============================================================================
// Helpers
// ============================================================================

export function isRetrievalError(error: unknown): error is RetrievalError {
	return error instanceof RetrievalError;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/** Serializable description of a failed source */
export function toFailure(
	error: unknown,
	source: SourceFailure["source"],
): SourceFailure {
	return {
		source,
		kind: isRetrievalError(error) ? error.kind : "internal",
		message: errorMessage(error),
	};
}
