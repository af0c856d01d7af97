/**
 * Retrieval Strategies
 *
 * One strategy per retrieval mode behind a common interface. The hybrid
 * strategy runs both sources concurrently and degrades to whichever survives;
 * only when both fail does the request become unanswerable.
 */

import type { FusionConfig, TimeoutConfig } from "../config";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import { UnanswerableQuestionError } from "../errors";
import type { GraphQueryClient } from "../graph/neo4j-client";
import type { VectorIndexClient } from "../storage/vector-index";
import { withTimeout } from "../timeout";
import type {
	EmbeddingVector,
	GraphQuery,
	GraphQueryResult,
	RetrievalMode,
	RetrievalResult,
	SourceFailure,
	VectorFilter,
	VectorHit,
} from "../types";
import { contributingSources, fuse } from "./fusion";
import { settle, type QueryPlanner, type SourceOutcome } from "./planner";

// ============================================================================
// Types
// ============================================================================

export interface RetrieveOptions {
	signal?: AbortSignal;
	/** Restrict vector hits to these documents or metadata values */
	filter?: VectorFilter;
}

export interface RetrievalStrategy {
	readonly mode: RetrievalMode;
	retrieve(question: string, options?: RetrieveOptions): Promise<RetrievalResult>;
}

export interface StrategyDeps {
	planner: QueryPlanner;
	graph: GraphQueryClient;
	vectors: VectorIndexClient;
	fusion: FusionConfig;
	timeouts: Pick<TimeoutConfig, "graphMs" | "vectorMs">;
	/** Ingestion time lookup used to break score ties */
	recency?: (documentId: string) => number | undefined;
	metrics?: RetrievalMetrics;
	logger?: Logger;
}

/** Both halves of a hybrid retrieval, before fusion */
export interface HybridCollection {
	question: string;
	graph: SourceOutcome<GraphQueryResult>;
	vector: SourceOutcome<VectorHit[]>;
	planMs: number;
	retrieveMs: number;
	started: number;
}

// ============================================================================
// Source calls
// ============================================================================

function runGraph(deps: StrategyDeps, query: GraphQuery, signal?: AbortSignal): Promise<GraphQueryResult> {
	return withTimeout(
		"graph",
		deps.timeouts.graphMs,
		(inner) => deps.graph.query(query, { signal: inner, timeoutMs: deps.timeouts.graphMs }),
		signal,
	);
}

function runVector(
	deps: StrategyDeps,
	vector: EmbeddingVector,
	filter: VectorFilter | undefined,
	signal?: AbortSignal,
): Promise<VectorHit[]> {
	return withTimeout(
		"vector",
		deps.timeouts.vectorMs,
		() => deps.vectors.search(vector, deps.fusion.vectorTopK, filter),
		signal,
	);
}

/** Run the retrieval step of a planned source, carrying a planning failure through */
async function afterPlan<P, T>(
	planned: SourceOutcome<P>,
	source: SourceFailure["source"],
	run: (value: P) => Promise<T>,
): Promise<SourceOutcome<T>> {
	if (planned.status === "failed") return planned;
	const value = planned.value;
	const outcome = await settle(source, () => run(value));
	return { ...outcome, ms: outcome.ms + planned.ms };
}

function buildResult(
	deps: StrategyDeps,
	mode: RetrievalMode,
	question: string,
	sources: { graph: GraphQueryResult | null; hits: VectorHit[]; alpha: number },
	extra: { failures: SourceFailure[]; degraded: boolean; planMs: number; retrieveMs: number; started: number },
): RetrievalResult {
	const items = fuse(sources.graph, sources.hits, {
		k: deps.fusion.topK,
		alpha: sources.alpha,
		graphWeight: deps.fusion.graphWeight,
		recency: deps.recency,
	});
	return {
		mode,
		question,
		items,
		contributingSources: contributingSources(items),
		degraded: extra.degraded,
		failures: extra.failures,
		query: sources.graph?.query,
		timings: {
			planMs: extra.planMs,
			retrieveMs: extra.retrieveMs,
			totalMs: performance.now() - extra.started,
		},
	};
}

// ============================================================================
// Strategies
// ============================================================================

export class GraphStrategy implements RetrievalStrategy {
	readonly mode = "graph";

	constructor(private readonly deps: StrategyDeps) {}

	async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const started = performance.now();
		try {
			const plan = await this.deps.planner.plan(question, "graph", options);
			const planned = plan.graph;
			if (planned?.status !== "ok") {
				throw new Error("graph plan missing its query");
			}
			const retrieveStarted = performance.now();
			const graph = await runGraph(this.deps, planned.value, options.signal);
			return buildResult(
				this.deps,
				"graph",
				question,
				{ graph, hits: [], alpha: 1 },
				{
					failures: [],
					degraded: false,
					planMs: plan.planMs,
					retrieveMs: performance.now() - retrieveStarted,
					started,
				},
			);
		} catch (error) {
			this.deps.metrics?.graphFailures.inc();
			throw error;
		}
	}
}

export class VectorStrategy implements RetrievalStrategy {
	readonly mode = "vector";

	constructor(private readonly deps: StrategyDeps) {}

	async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const started = performance.now();
		try {
			const plan = await this.deps.planner.plan(question, "vector", options);
			const planned = plan.vector;
			if (planned?.status !== "ok") {
				throw new Error("vector plan missing its embedding");
			}
			const retrieveStarted = performance.now();
			const hits = await runVector(this.deps, planned.value, options.filter, options.signal);
			return buildResult(
				this.deps,
				"vector",
				question,
				{ graph: null, hits, alpha: 0 },
				{
					failures: [],
					degraded: false,
					planMs: plan.planMs,
					retrieveMs: performance.now() - retrieveStarted,
					started,
				},
			);
		} catch (error) {
			this.deps.metrics?.vectorFailures.inc();
			throw error;
		}
	}
}

export class HybridStrategy implements RetrievalStrategy {
	readonly mode = "hybrid";
	private readonly logger: Logger;

	constructor(private readonly deps: StrategyDeps) {
		this.logger = (deps.logger ?? nullLogger).child({ component: "hybrid" });
	}

	/**
	 * Plan and query both sources. Never throws for a source failure; each
	 * half carries its own outcome and elapsed time (planning included).
	 */
	async collect(question: string, options: RetrieveOptions = {}): Promise<HybridCollection> {
		const started = performance.now();
		const plan = await this.deps.planner.plan(question, "hybrid", options);
		const retrieveStarted = performance.now();

		const graphPlan = plan.graph;
		const vectorPlan = plan.vector;
		if (!graphPlan || !vectorPlan) {
			throw new Error("hybrid plan missing a source");
		}

		const [graph, vector] = await Promise.all([
			afterPlan(graphPlan, "graph", (query) => runGraph(this.deps, query, options.signal)),
			afterPlan(vectorPlan, "vector", (embedding) =>
				runVector(this.deps, embedding, options.filter, options.signal),
			),
		]);

		return {
			question,
			graph,
			vector,
			planMs: plan.planMs,
			retrieveMs: performance.now() - retrieveStarted,
			started,
		};
	}

	/**
	 * Fuse a collection. With one source down the survivor's alpha is used
	 * and the result is marked degraded.
	 *
	 * @throws UnanswerableQuestionError when both sources failed
	 */
	assemble(collection: HybridCollection): RetrievalResult {
		const { graph, vector, question } = collection;
		const failures: SourceFailure[] = [];
		if (graph.status === "failed") {
			failures.push(graph.failure);
			this.deps.metrics?.graphFailures.inc();
		}
		if (vector.status === "failed") {
			failures.push(vector.failure);
			this.deps.metrics?.vectorFailures.inc();
		}

		if (graph.status === "failed" && vector.status === "failed") {
			this.deps.metrics?.unanswerableQueries.inc();
			this.logger.error("Every source failed", undefined, { question });
			throw new UnanswerableQuestionError(question, failures);
		}

		const degraded = failures.length > 0;
		if (degraded) {
			this.deps.metrics?.degradedQueries.inc();
			this.logger.warn("Hybrid query degraded", {
				failed: failures.map((failure) => failure.source),
			});
		}

		const alpha =
			graph.status === "failed" ? 0 : vector.status === "failed" ? 1 : this.deps.fusion.alpha;

		return buildResult(
			this.deps,
			"hybrid",
			question,
			{
				graph: graph.status === "ok" ? graph.value : null,
				hits: vector.status === "ok" ? vector.value : [],
				alpha,
			},
			{
				failures,
				degraded,
				planMs: collection.planMs,
				retrieveMs: collection.retrieveMs,
				started: collection.started,
			},
		);
	}

	async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		return this.assemble(await this.collect(question, options));
	}

	/** Graph-only result built from a collection's graph half */
	graphResult(collection: HybridCollection, graph: GraphQueryResult): RetrievalResult {
		return this.singleSource(collection, "graph", { graph, hits: [], alpha: 1 });
	}

	/** Vector-only result built from a collection's vector half */
	vectorResult(collection: HybridCollection, hits: VectorHit[]): RetrievalResult {
		return this.singleSource(collection, "vector", { graph: null, hits, alpha: 0 });
	}

	private singleSource(
		collection: HybridCollection,
		mode: "graph" | "vector",
		sources: { graph: GraphQueryResult | null; hits: VectorHit[]; alpha: number },
	): RetrievalResult {
		return buildResult(this.deps, mode, collection.question, sources, {
			failures: [],
			degraded: false,
			planMs: collection.planMs,
			retrieveMs: collection.retrieveMs,
			started: collection.started,
		});
	}
}

export interface RetrievalStrategies {
	graph: GraphStrategy;
	vector: VectorStrategy;
	hybrid: HybridStrategy;
}

export function createStrategies(deps: StrategyDeps): RetrievalStrategies {
	return {
		graph: new GraphStrategy(deps),
		vector: new VectorStrategy(deps),
		hybrid: new HybridStrategy(deps),
	};
}
