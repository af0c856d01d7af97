/**
 * Overlapping Text Chunker
 *
 * Splits a normalized document into contiguous, overlapping slices.
 *
 * Boundary preference inside the window (start + minChunkSize, start + chunkSize]:
 * 1. paragraph break ("\n\n")
 * 2. sentence terminator (Latin terminators followed by whitespace, or CJK terminators)
 * 3. any whitespace
 * 4. hard cut at chunkSize
 *
 * The next chunk starts exactly chunkOverlap characters before the previous end.
 * The last cut is pulled back when needed so the final chunk is never shorter
 * than minChunkSize unless the whole document is.
 */

import { ChunkingConfigSchema } from "../config";
import { ChunkingError, ConfigError } from "../errors";
import type { Chunk, ChunkingOptions, Document } from "../types";
import { prepareText } from "./normalize";

// ============================================================================
// Types
// ============================================================================

export interface Chunker {
	readonly options: Readonly<ChunkingOptions>;
	/** Normalize and split a document. Pure: same input, same chunks. */
	chunk(document: Document): Chunk[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CHUNKING: Readonly<ChunkingOptions> = {
	chunkSize: 512,
	chunkOverlap: 50,
	minChunkSize: 100,
};

const LATIN_TERMINATORS = new Set([".", "!", "?", ";"]);
const CJK_TERMINATORS = new Set(["。", "！", "？", "；"]);
const WHITESPACE = /\s/;

// ============================================================================
// Boundary detection
// ============================================================================

type BoundaryTest = (text: string, end: number) => boolean;

const isParagraphEnd: BoundaryTest = (text, end) =>
	text[end - 1] === "\n" && text[end - 2] === "\n";

const isSentenceEnd: BoundaryTest = (text, end) => {
	const last = text[end - 1];
	if (CJK_TERMINATORS.has(last)) return true;
	return WHITESPACE.test(last) && LATIN_TERMINATORS.has(text[end - 2]);
};

const isWhitespaceEnd: BoundaryTest = (text, end) => WHITESPACE.test(text[end - 1]);

const BOUNDARY_TESTS: BoundaryTest[] = [isParagraphEnd, isSentenceEnd, isWhitespaceEnd];

/**
 * Latest end offset in [lower, limit] satisfying the strongest boundary test.
 */
function findBoundary(text: string, lower: number, limit: number): number {
	for (const test of BOUNDARY_TESTS) {
		for (let end = limit; end >= lower; end--) {
			if (test(text, end)) return end;
		}
	}
	return limit;
}

export function formatChunkId(documentId: string, index: number): string {
	return `${documentId}:${String(index).padStart(4, "0")}`;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Split already-normalized text into chunk spans.
 */
export function splitText(
	text: string,
	options: ChunkingOptions,
): Array<{ start: number; end: number }> {
	const { chunkSize, chunkOverlap, minChunkSize } = options;
	const length = text.length;
	const spans: Array<{ start: number; end: number }> = [];

	let start = 0;
	while (start < length) {
		const limit = Math.min(start + chunkSize, length);

		if (limit === length) {
			spans.push({ start, end: length });
			break;
		}

		const lower = start + Math.max(minChunkSize, chunkOverlap + 1);
		// Pull the cut back so the remaining tail still reaches minChunkSize
		const tailSafe = length + chunkOverlap - minChunkSize;
		const upper = tailSafe >= lower ? Math.min(limit, tailSafe) : limit;
		const end = findBoundary(text, lower, upper);
		spans.push({ start, end });
		start = end - chunkOverlap;
	}

	return spans;
}

function validateOptions(options: ChunkingOptions): ChunkingOptions {
	const result = ChunkingConfigSchema.safeParse(options);
	if (!result.success) {
		throw new ConfigError(
			"Invalid chunking options",
			result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		);
	}
	return result.data;
}

export function createChunker(
	options: Partial<ChunkingOptions> = {},
): Chunker {
	const resolved = validateOptions({ ...DEFAULT_CHUNKING, ...options });

	return {
		options: resolved,

		chunk(document: Document): Chunk[] {
			if (!document.id.trim()) {
				throw new ChunkingError(document.id, "document id is empty");
			}

			const text = prepareText(document.text, document.format);
			if (text.length === 0) {
				throw new ChunkingError(document.id, "document has no text after normalization");
			}

			return splitText(text, resolved).map(({ start, end }, index) => ({
				id: formatChunkId(document.id, index),
				documentId: document.id,
				index,
				text: text.slice(start, end),
				span: { start, end },
			}));
		},
	};
}

/**
 * Rebuild the normalized text from a document's chunks by dropping each
 * chunk's leading overlap.
 */
export function reconstructText(chunks: readonly Chunk[], chunkOverlap: number): string {
	return chunks
		.map((chunk, i) => (i === 0 ? chunk.text : chunk.text.slice(chunkOverlap)))
		.join("");
}
