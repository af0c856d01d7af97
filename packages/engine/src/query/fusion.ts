/**
 * Fusion Engine
 *
 * Merges graph rows and vector hits into one ranked context. Entries are keyed
 * by document: a document found by both sources becomes a single entry whose
 * score blends both, `alpha * graphScore + (1 - alpha) * vectorScore`.
 *
 * Ordering is total (score, then recency, then key), so the same inputs
 * always produce the same list.
 */

import type {
	EvidenceSource,
	GraphEvidence,
	GraphQueryResult,
	GraphRow,
	ScoredEvidence,
	VectorEvidence,
	VectorHit,
} from "../types";

// ============================================================================
// Types
// ============================================================================

export interface FusionOptions {
	/** Entries to keep */
	k: number;
	/** Weight of the graph score in [0, 1]; 1 = graph only, 0 = vector only */
	alpha: number;
	/** Normalized score given to every graph group (default: 1) */
	graphWeight?: number;
	/** Ingestion time of a document, for tie-breaking entries without a vector hit */
	recency?: (documentId: string) => number | undefined;
}

interface FusionEntry {
	key: string;
	documentId?: string;
	graph?: GraphEvidence;
	vector?: VectorEvidence;
	ingestedAt?: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Row columns that carry the id of the source document, in lookup order */
export const PROVENANCE_COLUMNS = ["source", "document_id", "documentId", "doc_id"] as const;

const ENTITY_COLUMNS = ["subject", "entity", "name"] as const;

// ============================================================================
// Keys
// ============================================================================

export function rowProvenance(row: GraphRow): string | undefined {
	for (const column of PROVENANCE_COLUMNS) {
		const value = row[column];
		if (typeof value === "string" && value.length > 0) return value;
		if (typeof value === "number") return String(value);
	}
	return undefined;
}

/** Grouping key for rows without provenance: the entity they describe */
export function rowEntityKey(row: GraphRow): string {
	for (const column of ENTITY_COLUMNS) {
		const value = row[column];
		if (typeof value === "string" && value.length > 0) return `entity:${value}`;
	}
	return `row:${JSON.stringify(row)}`;
}

function clamp01(value: number): number {
	if (!Number.isFinite(value)) return 0;
	return Math.min(1, Math.max(0, value));
}

// ============================================================================
// Grouping
// ============================================================================

function groupGraphRows(result: GraphQueryResult): Map<string, GraphEvidence> {
	const groups = new Map<string, GraphEvidence>();
	for (const row of result.rows) {
		const documentId = rowProvenance(row);
		const key = documentId ?? rowEntityKey(row);
		const group = groups.get(key);
		if (group) {
			group.rows.push(row);
		} else {
			groups.set(key, {
				kind: "graph",
				documentId,
				entityKey: key,
				rows: [row],
				query: result.query,
			});
		}
	}
	return groups;
}

function bestHitPerDocument(hits: VectorHit[]): Map<string, VectorHit> {
	const best = new Map<string, VectorHit>();
	for (const hit of hits) {
		const current = best.get(hit.documentId);
		if (
			!current ||
			hit.similarity > current.similarity ||
			(hit.similarity === current.similarity && hit.chunkId < current.chunkId)
		) {
			best.set(hit.documentId, hit);
		}
	}
	return best;
}

function toVectorEvidence(hit: VectorHit): VectorEvidence {
	return {
		kind: "vector",
		chunkId: hit.chunkId,
		documentId: hit.documentId,
		text: hit.text,
		similarity: clamp01(hit.similarity),
		metadata: hit.metadata,
	};
}

// ============================================================================
// Ordering
// ============================================================================

export function compareScored(a: ScoredEvidence, b: ScoredEvidence): number {
	if (b.score !== a.score) return b.score - a.score;
	const aTime = a.ingestedAt ?? Number.NEGATIVE_INFINITY;
	const bTime = b.ingestedAt ?? Number.NEGATIVE_INFINITY;
	if (aTime !== bTime) return bTime > aTime ? 1 : -1;
	return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Fuse graph and vector evidence.
 *
 * A source that found nothing for an entry contributes a score of 0, so with
 * alpha 0.5 a vector-only entry scores half its similarity.
 */
export function fuse(
	graph: GraphQueryResult | null,
	vectorHits: VectorHit[],
	options: FusionOptions,
): ScoredEvidence[] {
	const alpha = clamp01(options.alpha);
	const graphWeight = clamp01(options.graphWeight ?? 1);
	const entries = new Map<string, FusionEntry>();

	if (graph) {
		for (const [key, evidence] of groupGraphRows(graph)) {
			entries.set(key, { key, documentId: evidence.documentId, graph: evidence });
		}
	}

	for (const [documentId, hit] of bestHitPerDocument(vectorHits)) {
		const entry = entries.get(documentId);
		if (entry) {
			entry.vector = toVectorEvidence(hit);
			entry.ingestedAt = hit.ingestedAt;
		} else {
			entries.set(documentId, {
				key: documentId,
				documentId,
				vector: toVectorEvidence(hit),
				ingestedAt: hit.ingestedAt,
			});
		}
	}

	const scored: ScoredEvidence[] = [];
	for (const entry of entries.values()) {
		const graphScore = entry.graph ? graphWeight : 0;
		const vectorScore = entry.vector ? entry.vector.similarity : 0;
		const sources: EvidenceSource[] = [];
		if (entry.graph) sources.push("graph");
		if (entry.vector) sources.push("vector");

		const ingestedAt =
			entry.ingestedAt ??
			(entry.documentId !== undefined ? options.recency?.(entry.documentId) : undefined);

		scored.push({
			key: entry.key,
			score: alpha * graphScore + (1 - alpha) * vectorScore,
			graphScore,
			vectorScore,
			sources,
			evidence: [entry.graph, entry.vector].filter(
				(item): item is GraphEvidence | VectorEvidence => item !== undefined,
			),
			documentId: entry.documentId,
			ingestedAt,
		});
	}

	return scored.sort(compareScored).slice(0, Math.max(0, options.k));
}

/** Sources that contributed at least one kept entry, graph first */
export function contributingSources(items: ScoredEvidence[]): EvidenceSource[] {
	const seen = new Set(items.flatMap((item) => item.sources));
	return (["graph", "vector"] as const).filter((source) => seen.has(source));
}
