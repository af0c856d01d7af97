/**
 * Batch Processor
 *
 * Worker pool that splits items into fixed-size batches and runs at most
 * `concurrency` batches at a time. Results come back in input order.
 *
 * The first failing batch rejects the whole run and stops workers from
 * picking up further batches; retry policy belongs to the caller.
 */

// ============================================================================
// Types
// ============================================================================

export interface BatchProcessorConfig {
	/** Maximum items per batch (default: 16) */
	batchSize?: number;
	/** Maximum concurrent batches (default: 2) */
	concurrency?: number;
	/** Stops scheduling new batches once aborted */
	signal?: AbortSignal;
}

export interface BatchProgress {
	total: number;
	processed: number;
	status: "processing" | "complete" | "error";
}

export type BatchWorker<T, R> = (batch: T[], batchIndex: number) => Promise<R[]>;

// ============================================================================
// Implementation
// ============================================================================

const DEFAULT_CONFIG = {
	batchSize: 16,
	concurrency: 2,
};

export function splitIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < items.length; i += batchSize) {
		batches.push(items.slice(i, i + batchSize));
	}
	return batches;
}

/**
 * Run `worker` over `items` in batches with bounded concurrency.
 *
 * @throws the first worker error; the worker must return one result per item
 */
export async function processInBatches<T, R>(
	items: readonly T[],
	worker: BatchWorker<T, R>,
	config: BatchProcessorConfig = {},
	onProgress?: (progress: BatchProgress) => void,
): Promise<R[]> {
	if (items.length === 0) return [];

	const batchSize = config.batchSize ?? DEFAULT_CONFIG.batchSize;
	const concurrency = config.concurrency ?? DEFAULT_CONFIG.concurrency;
	const batches = splitIntoBatches(items, batchSize);
	const results: R[][] = new Array(batches.length);
	const progress: BatchProgress = { total: items.length, processed: 0, status: "processing" };

	let nextBatch = 0;
	let failed = false;

	const runWorker = async (): Promise<void> => {
		while (nextBatch < batches.length && !failed && !config.signal?.aborted) {
			const index = nextBatch++;
			const batch = batches[index];
			try {
				const output = await worker(batch, index);
				if (output.length !== batch.length) {
					throw new Error(
						`Batch ${index} returned ${output.length} results for ${batch.length} items`,
					);
				}
				results[index] = output;
				progress.processed += batch.length;
				onProgress?.({ ...progress });
			} catch (error) {
				failed = true;
				throw error;
			}
		}
	};

	const workers = Array.from({ length: Math.min(concurrency, batches.length) }, () => runWorker());

	try {
		await Promise.all(workers);
	} catch (error) {
		// Let in-flight batches settle before surfacing the failure
		await Promise.allSettled(workers);
		onProgress?.({ ...progress, status: "error" });
		throw error;
	}

	if (config.signal?.aborted) {
		throw config.signal.reason instanceof Error
			? config.signal.reason
			: new Error("Batch processing aborted");
	}

	onProgress?.({ ...progress, status: "complete" });
	const ordered: R[] = [];
	for (const batchResults of results) {
		ordered.push(...batchResults);
	}
	return ordered;
}
