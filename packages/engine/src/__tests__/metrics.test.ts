import { afterEach, describe, expect, test, vi } from "vitest";
import { createMetricsRegistry, createRetrievalMetrics } from "../diagnostics/metrics";

describe("MetricsRegistry", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("names resolve to the same metric", () => {
		const registry = createMetricsRegistry();

		registry.counter("hits").inc();
		registry.counter("hits").add(4);

		expect(registry.counter("hits").get()).toBe(5);
	});

	test("timers record elapsed time and nearest-rank percentiles", () => {
		const clock = vi.spyOn(performance, "now");
		const timer = createMetricsRegistry().timer("query_ms");

		for (const [start, end] of [
			[0, 30],
			[0, 10],
			[0, 20],
			[0, 40],
		]) {
			clock.mockReturnValueOnce(start).mockReturnValueOnce(end);
			timer.start()();
		}

		expect(timer.stats()).toEqual({ count: 4, sum: 100, min: 10, max: 40, avg: 25, p50: 20, p90: 40, p99: 40 });
	});

	test("timers keep only the most recent samples", () => {
		const clock = vi.spyOn(performance, "now");
		const timer = createMetricsRegistry().timer("bounded_ms", 2);

		for (const elapsed of [5, 7, 9]) {
			clock.mockReturnValueOnce(0).mockReturnValueOnce(elapsed);
			timer.start()();
		}

		expect(timer.stats()).toMatchObject({ count: 2, sum: 16, min: 7, max: 9 });
	});

	test("an unused timer reports zeros", () => {
		expect(createMetricsRegistry().timer("idle").stats().count).toBe(0);
	});

	test("snapshot collects every kind", () => {
		const metrics = createRetrievalMetrics();

		metrics.queries.vector.inc();
		metrics.indexedChunks.set(12);
		const snapshot = metrics.registry.snapshot();

		expect(snapshot.counters.queries_vector).toBe(1);
		expect(snapshot.counters.graph_failures).toBe(0);
		expect(snapshot.gauges).toEqual({ indexed_chunks: 12 });
		expect(Object.keys(snapshot.timers)).toEqual(["query_duration_ms", "ingestion_duration_ms"]);
	});
});
