/**
 * Mode Router
 *
 * Dispatches retrieval requests to the strategy of their mode. `compare`
 * runs every mode for one question and reports each independently.
 */

import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import { toFailure } from "../errors";
import type { RetrievalMode, RetrievalResult, SourceFailure } from "../types";
import type { HybridCollection, RetrievalStrategies, RetrieveOptions } from "./strategies";

// ============================================================================
// Types
// ============================================================================

export type RetrievalRequest =
	| { kind: "graph"; question: string }
	| { kind: "vector"; question: string }
	| { kind: "hybrid"; question: string }
	| { kind: "compare"; question: string };

export type CompareSlot =
	| { status: "ok"; result: RetrievalResult; latencyMs: number }
	| { status: "failed"; error: SourceFailure; latencyMs: number };

export type CompareResult = Record<RetrievalMode, CompareSlot>;

export type RouteResult =
	| { kind: RetrievalMode; result: RetrievalResult }
	| { kind: "compare"; comparison: CompareResult };

export interface ModeRouter {
	route(request: RetrievalRequest, options?: RetrieveOptions): Promise<RouteResult>;
	/** @throws the strategy's error in graph and vector mode; UnanswerableQuestionError in hybrid */
	answer(question: string, mode: RetrievalMode, options?: RetrieveOptions): Promise<RetrievalResult>;
	/** Never throws; each mode's failure is reported in its slot */
	compare(question: string, options?: RetrieveOptions): Promise<CompareResult>;
}

export interface ModeRouterDeps {
	strategies: RetrievalStrategies;
	metrics?: RetrievalMetrics;
	logger?: Logger;
}

// ============================================================================
// Implementation
// ============================================================================

export function createModeRouter(deps: ModeRouterDeps): ModeRouter {
	const { strategies, metrics } = deps;
	const logger = (deps.logger ?? nullLogger).child({ component: "router" });

	async function answer(
		question: string,
		mode: RetrievalMode,
		options: RetrieveOptions = {},
	): Promise<RetrievalResult> {
		metrics?.queries[mode].inc();
		const stop = metrics?.queryDuration.start();
		try {
			const result = await strategies[mode].retrieve(question, options);
			logger.info("Query answered", {
				mode,
				items: result.items.length,
				sources: result.contributingSources,
				degraded: result.degraded,
				ms: Math.round(result.timings.totalMs),
			});
			return result;
		} finally {
			stop?.();
		}
	}

	async function compare(question: string, options: RetrieveOptions = {}): Promise<CompareResult> {
		metrics?.queries.compare.inc();
		const stop = metrics?.queryDuration.start();
		const started = performance.now();
		const hybrid = strategies.hybrid;

		try {
			let collection: HybridCollection;
			try {
				collection = await hybrid.collect(question, options);
			} catch (error) {
				const latencyMs = performance.now() - started;
				const failure = toFailure(error, "vector");
				return {
					graph: { status: "failed", error: toFailure(error, "graph"), latencyMs },
					vector: { status: "failed", error: failure, latencyMs },
					hybrid: { status: "failed", error: failure, latencyMs },
				};
			}

			// Both single-source slots reuse the hybrid halves: one call per source
			const { graph, vector } = collection;
			const graphSlot: CompareSlot =
				graph.status === "ok"
					? { status: "ok", result: hybrid.graphResult(collection, graph.value), latencyMs: graph.ms }
					: { status: "failed", error: graph.failure, latencyMs: graph.ms };
			const vectorSlot: CompareSlot =
				vector.status === "ok"
					? { status: "ok", result: hybrid.vectorResult(collection, vector.value), latencyMs: vector.ms }
					: { status: "failed", error: vector.failure, latencyMs: vector.ms };

			const hybridLatency = performance.now() - collection.started;
			let hybridSlot: CompareSlot;
			try {
				hybridSlot = { status: "ok", result: hybrid.assemble(collection), latencyMs: hybridLatency };
			} catch (error) {
				hybridSlot = { status: "failed", error: toFailure(error, "vector"), latencyMs: hybridLatency };
			}

			logger.info("Comparison complete", {
				graph: graphSlot.status,
				vector: vectorSlot.status,
				hybrid: hybridSlot.status,
			});
			return { graph: graphSlot, vector: vectorSlot, hybrid: hybridSlot };
		} finally {
			stop?.();
		}
	}

	return {
		async route(request, options) {
			switch (request.kind) {
				case "compare":
					return { kind: "compare", comparison: await compare(request.question, options) };
				case "graph":
				case "vector":
				case "hybrid":
					return { kind: request.kind, result: await answer(request.question, request.kind, options) };
			}
		},
		answer,
		compare,
	};
}
