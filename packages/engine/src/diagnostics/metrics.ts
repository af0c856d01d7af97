/**
 * In-process metrics for @kgvec/engine
 *
 * A registry of named counters, gauges and duration timers. The runtime logs
 * a snapshot when it closes.
 */

export interface Counter {
	inc(): void;
	add(value: number): void;
	get(): number;
}

export interface Gauge {
	set(value: number): void;
	get(): number;
}

export interface DurationStats {
	count: number;
	sum: number;
	min: number;
	max: number;
	avg: number;
	p50: number;
	p90: number;
	p99: number;
}

export interface Timer {
	/** Start a measurement; the returned function records and returns elapsed ms */
	start(): () => number;
	stats(): DurationStats;
}

export interface MetricsSnapshot {
	timestamp: number;
	counters: Record<string, number>;
	gauges: Record<string, number>;
	timers: Record<string, DurationStats>;
}

export interface MetricsRegistry {
	/** Returns the existing metric when the name is already registered */
	counter(name: string): Counter;
	gauge(name: string): Gauge;
	/** `limit` applies when the timer is first registered */
	timer(name: string, limit?: number): Timer;
	snapshot(): MetricsSnapshot;
}

// ============================================================================
// Metric kinds
// ============================================================================

const EMPTY_STATS: DurationStats = { count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p90: 0, p99: 0 };

/** Nearest-rank percentile of an ascending list */
function percentile(sorted: readonly number[], p: number): number {
	const rank = Math.ceil((p / 100) * sorted.length);
	return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
}

function summarize(samples: readonly number[]): DurationStats {
	if (samples.length === 0) return { ...EMPTY_STATS };
	const sorted = [...samples].sort((a, b) => a - b);
	const sum = sorted.reduce((total, value) => total + value, 0);
	return {
		count: sorted.length,
		sum,
		min: sorted[0],
		max: sorted[sorted.length - 1],
		avg: sum / sorted.length,
		p50: percentile(sorted, 50),
		p90: percentile(sorted, 90),
		p99: percentile(sorted, 99),
	};
}

function counter(): Counter {
	let value = 0;
	return {
		inc: () => {
			value += 1;
		},
		add: (amount) => {
			value += amount;
		},
		get: () => value,
	};
}

function gauge(): Gauge {
	let value = 0;
	return {
		set: (next) => {
			value = next;
		},
		get: () => value,
	};
}

/** Samples a timer keeps; older ones drop out of its stats */
export const TIMER_WINDOW = 1000;

function timer(limit = TIMER_WINDOW): Timer {
	const samples: number[] = [];
	return {
		start() {
			const started = performance.now();
			return () => {
				const elapsed = performance.now() - started;
				samples.push(elapsed);
				if (samples.length > limit) samples.shift();
				return elapsed;
			};
		},
		stats: () => summarize(samples),
	};
}

// ============================================================================
// Registry
// ============================================================================

export function createMetricsRegistry(): MetricsRegistry {
	const counters = new Map<string, Counter>();
	const gauges = new Map<string, Gauge>();
	const timers = new Map<string, Timer>();

	function register<T>(store: Map<string, T>, name: string, make: () => T): T {
		const existing = store.get(name);
		if (existing) return existing;
		const metric = make();
		store.set(name, metric);
		return metric;
	}

	const collect = <T, V>(store: Map<string, T>, read: (metric: T) => V): Record<string, V> =>
		Object.fromEntries([...store].map(([name, metric]) => [name, read(metric)]));

	return {
		counter: (name) => register(counters, name, counter),
		gauge: (name) => register(gauges, name, gauge),
		timer: (name, limit) => register(timers, name, () => timer(limit)),
		snapshot: () => ({
			timestamp: Date.now(),
			counters: collect(counters, (c) => c.get()),
			gauges: collect(gauges, (g) => g.get()),
			timers: collect(timers, (t) => t.stats()),
		}),
	};
}

// ============================================================================
// Retrieval metrics
// ============================================================================

export type MetricMode = "graph" | "vector" | "hybrid" | "compare";

export interface RetrievalMetrics {
	// Queries
	queries: Record<MetricMode, Counter>;
	queryDuration: Timer;
	graphFailures: Counter;
	vectorFailures: Counter;
	degradedQueries: Counter;
	unanswerableQueries: Counter;

	// Ingestion
	documentsIngested: Counter;
	documentsSkipped: Counter;
	chunksWritten: Counter;
	ingestionErrors: Counter;
	embeddingRetries: Counter;
	ingestionDuration: Timer;

	// Embedding cache
	embeddingCacheHits: Counter;
	embeddingCacheMisses: Counter;

	indexedChunks: Gauge;

	registry: MetricsRegistry;
}

export function createRetrievalMetrics(
	registry: MetricsRegistry = createMetricsRegistry(),
): RetrievalMetrics {
	return {
		queries: {
			graph: registry.counter("queries_graph"),
			vector: registry.counter("queries_vector"),
			hybrid: registry.counter("queries_hybrid"),
			compare: registry.counter("queries_compare"),
		},
		queryDuration: registry.timer("query_duration_ms"),
		graphFailures: registry.counter("graph_failures"),
		vectorFailures: registry.counter("vector_failures"),
		// hybrid answered from a single source
		degradedQueries: registry.counter("degraded_queries"),
		unanswerableQueries: registry.counter("unanswerable_queries"),

		documentsIngested: registry.counter("documents_ingested"),
		documentsSkipped: registry.counter("documents_skipped"),
		chunksWritten: registry.counter("chunks_written"),
		ingestionErrors: registry.counter("ingestion_errors"),
		embeddingRetries: registry.counter("embedding_retries"),
		ingestionDuration: registry.timer("ingestion_duration_ms"),

		embeddingCacheHits: registry.counter("embedding_cache_hits"),
		embeddingCacheMisses: registry.counter("embedding_cache_misses"),

		indexedChunks: registry.gauge("indexed_chunks"),

		registry,
	};
}
