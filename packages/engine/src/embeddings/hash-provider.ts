/**
 * Hash embedding provider
 *
 * Deterministic token-hashing embedder for offline runs and tests. Similar
 * texts share tokens and therefore dimensions, so cosine similarity still
 * tracks lexical overlap. No network, no model download.
 */

import type { EmbeddingProvider } from "./embedder";

function hashString(str: string): number {
	let hash = 0;
	for (let i = 0; i < str.length; i++) {
		hash = (hash << 5) - hash + str.charCodeAt(i);
		hash |= 0;
	}
	return hash;
}

/** Lowercased word tokens; CJK characters count as single-character tokens. */
export function tokenize(text: string): string[] {
	return (text.toLowerCase().match(/[\p{Script=Han}]|[\p{L}\p{N}]{2,}/gu) ?? []);
}

export function hashEmbedding(text: string, dimension: number): number[] {
	const tokens = tokenize(text);
	const vector = new Array<number>(dimension).fill(0);

	const add = (feature: string, weight: number) => {
		const hash = hashString(feature);
		vector[Math.abs(hash) % dimension] += (hash >= 0 ? 1 : -1) * weight;
	};

	for (const token of tokens) {
		add(token, 0.5);
		add(`${token}_salt1`, 0.3);
		add(`${token}_salt2`, 0.2);
	}
	for (let i = 0; i < tokens.length - 1; i++) {
		add(`${tokens[i]}_${tokens[i + 1]}`, 0.4);
	}

	return vector;
}

export class HashEmbeddingProvider implements EmbeddingProvider {
	readonly modelId: string;

	constructor(readonly dimension = 384) {
		this.modelId = `hash-${dimension}`;
	}

	async embedRaw(texts: string[], _signal?: AbortSignal): Promise<number[][]> {
		return texts.map((text) => hashEmbedding(text, this.dimension));
	}
}
