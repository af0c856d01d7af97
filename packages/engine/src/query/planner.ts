/**
 * Query Planner
 *
 * Turns a question into what each store needs: a Cypher request for the graph
 * and a query embedding for the vector index. In hybrid mode both are planned
 * concurrently and each half settles independently.
 */

import type { TimeoutConfig } from "../config";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { Embedder } from "../embeddings/embedder";
import { toFailure } from "../errors";
import type { CypherTranslator } from "../llm/text-to-cypher";
import { withTimeout } from "../timeout";
import type { EmbeddingVector, GraphQuery, RetrievalMode, SourceFailure } from "../types";

// ============================================================================
// Types
// ============================================================================

/** Result of one source's step: a value, or the failure that replaced it */
export type SourceOutcome<T> =
	| { status: "ok"; value: T; ms: number }
	| { status: "failed"; failure: SourceFailure; error: unknown; ms: number };

export interface RetrievalPlan {
	mode: RetrievalMode;
	question: string;
	/** Present for graph and hybrid plans */
	graph?: SourceOutcome<GraphQuery>;
	/** Present for vector and hybrid plans */
	vector?: SourceOutcome<EmbeddingVector>;
	planMs: number;
}

export interface QueryPlanner {
	/**
	 * Single-source modes rethrow the planning failure; hybrid mode reports
	 * it in the failed half.
	 */
	plan(question: string, mode: RetrievalMode, options?: { signal?: AbortSignal }): Promise<RetrievalPlan>;
}

export interface QueryPlannerDeps {
	translator: CypherTranslator;
	embedder: Pick<Embedder, "embedQuery">;
	timeouts: Pick<TimeoutConfig, "translationMs" | "embeddingMs">;
	logger?: Logger;
}

// ============================================================================
// Helpers
// ============================================================================

/** Run a step and capture its outcome instead of throwing */
export async function settle<T>(
	source: SourceFailure["source"],
	run: () => Promise<T>,
): Promise<SourceOutcome<T>> {
	const started = performance.now();
	try {
		const value = await run();
		return { status: "ok", value, ms: performance.now() - started };
	} catch (error) {
		return {
			status: "failed",
			failure: toFailure(error, source),
			error,
			ms: performance.now() - started,
		};
	}
}

// ============================================================================
// Implementation
// ============================================================================

export function createQueryPlanner(deps: QueryPlannerDeps): QueryPlanner {
	const logger = (deps.logger ?? nullLogger).child({ component: "planner" });
	const { translator, embedder, timeouts } = deps;

	const translate = (question: string, signal?: AbortSignal) =>
		withTimeout(
			"translation",
			timeouts.translationMs,
			(inner) => translator.translate(question, { signal: inner }),
			signal,
		);

	const embed = (question: string, signal?: AbortSignal) =>
		withTimeout("embedding", timeouts.embeddingMs, (inner) => embedder.embedQuery(question, { signal: inner }), signal);

	return {
		async plan(question, mode, options = {}) {
			const started = performance.now();
			const { signal } = options;

			if (mode === "graph") {
				const graphStarted = performance.now();
				const query = await translate(question, signal);
				const ms = performance.now() - graphStarted;
				logger.debug("Planned graph query", { translator: translator.kind, ms: Math.round(ms) });
				return {
					mode,
					question,
					graph: { status: "ok", value: query, ms },
					planMs: performance.now() - started,
				};
			}

			if (mode === "vector") {
				const vectorStarted = performance.now();
				const vector = await embed(question, signal);
				const ms = performance.now() - vectorStarted;
				return {
					mode,
					question,
					vector: { status: "ok", value: vector, ms },
					planMs: performance.now() - started,
				};
			}

			const [graph, vector] = await Promise.all([
				settle("translation", () => translate(question, signal)),
				settle("vector", () => embed(question, signal)),
			]);

			for (const outcome of [graph, vector]) {
				if (outcome.status === "failed") {
					logger.warn("Planning step failed", { ...outcome.failure });
				}
			}

			return { mode, question, graph, vector, planMs: performance.now() - started };
		},
	};
}
