/**
 * Answer generation over a fused retrieval result.
 *
 * Evidence is rendered with provenance tags so the model (and the reader)
 * can tell which store each item came from.
 */

import { errorMessage, isRetrievalError, ModelUnavailableError } from "../errors";
import { withTimeout } from "../timeout";
import type { CompareResult } from "../query/router";
import type { EvidenceItem, GraphRow, RetrievalMode, RetrievalResult, ScoredEvidence } from "../types";
import type { LLMProvider } from "./ollama-client";

// ============================================================================
// Types
// ============================================================================

export interface GeneratedAnswer {
	answer: string;
	/** Reasoning section when the model produced one */
	thinking?: string;
	/** Sources whose evidence was in the prompt */
	sources: RetrievalResult["contributingSources"];
}

export interface AnswerGenerator {
	generate(result: RetrievalResult, options?: { signal?: AbortSignal }): Promise<GeneratedAnswer>;
}

/** Answer for one compare slot; absent when the slot's retrieval failed */
export type ComparisonAnswer =
	| { status: "ok"; answer: GeneratedAnswer }
	| { status: "failed"; error: string };

export type ComparisonAnswers = Partial<Record<RetrievalMode, ComparisonAnswer>>;

export interface AnswerGeneratorOptions {
	timeoutMs?: number;
	/** Characters of chunk text per evidence item (default: 1200) */
	maxChunkChars?: number;
}

// ============================================================================
// Prompt
// ============================================================================

export const RAG_COT_PROMPT = `You are a question answering assistant. Answer the user's question using only the knowledge context below.

Knowledge context:
{context}

Question: {question}

Reply in this format, thinking first and answering second:

<thinking>
Key points of the question, the relevant context items, and how they combine.
</thinking>

<answer>
The final, complete answer grounded in the context. If the context is not enough, say what is missing.
</answer>`;

export const NO_CONTEXT_ANSWER = "No relevant knowledge was found for this question.";

// ============================================================================
// Formatting
// ============================================================================

function formatRow(row: GraphRow): string {
	const { subject, predicate, object } = row;
	if (typeof subject === "string" && typeof predicate === "string" && typeof object === "string") {
		return `${subject} -[${predicate}]-> ${object}`;
	}
	return JSON.stringify(row);
}

function formatEvidence(item: EvidenceItem, maxChunkChars: number): string[] {
	if (item.kind === "graph") {
		return item.rows.map((row) => `  - ${formatRow(row)}`);
	}
	const text = item.text.length > maxChunkChars ? `${item.text.slice(0, maxChunkChars)}…` : item.text;
	return [`  ${text.replace(/\n/g, "\n  ")}`];
}

function provenanceTag(entry: ScoredEvidence): string {
	return `[${entry.sources.join("+")}]`;
}

/**
 * Render fused evidence as numbered context blocks:
 * `[n] [graph+vector] source=<document> score=<score>` followed by the facts
 * and passages.
 */
export function formatEvidenceContext(result: RetrievalResult, maxChunkChars = 1200): string {
	return result.items
		.map((entry, i) => {
			const header = [
				`[${i + 1}]`,
				provenanceTag(entry),
				`source=${entry.documentId ?? entry.key}`,
				`score=${entry.score.toFixed(3)}`,
			].join(" ");
			const body = entry.evidence.flatMap((item) => formatEvidence(item, maxChunkChars));
			return [header, ...body].join("\n");
		})
		.join("\n\n");
}

/**
 * Split a model reply into its <thinking> and <answer> sections. Replies
 * without tags are treated as all answer.
 */
export function parseAnswer(raw: string): { answer: string; thinking?: string } {
	const thinking = raw.match(/<thinking>([\s\S]*?)<\/thinking>/i)?.[1]?.trim();
	const tagged = raw.match(/<answer>([\s\S]*?)(?:<\/answer>|$)/i)?.[1]?.trim();
	const answer =
		tagged ?? raw.replace(/<thinking>[\s\S]*?<\/thinking>/gi, "").trim();
	return thinking ? { answer, thinking } : { answer };
}

// ============================================================================
// Implementation
// ============================================================================

export function createAnswerGenerator(
	llm: LLMProvider,
	options: AnswerGeneratorOptions = {},
): AnswerGenerator {
	const timeoutMs = options.timeoutMs ?? 120_000;
	const maxChunkChars = options.maxChunkChars ?? 1200;

	return {
		async generate(result, callOptions = {}) {
			if (result.items.length === 0) {
				return { answer: NO_CONTEXT_ANSWER, sources: [] };
			}

			const prompt = RAG_COT_PROMPT.replace("{context}", () =>
				formatEvidenceContext(result, maxChunkChars),
			).replace("{question}", () => result.question);

			let raw: string;
			try {
				raw = await withTimeout(
					"generation",
					timeoutMs,
					(signal) => llm.generate(prompt, { signal }),
					callOptions.signal,
				);
			} catch (error) {
				if (isRetrievalError(error)) throw error;
				throw new ModelUnavailableError(llm.modelId, errorMessage(error), { cause: error });
			}

			return { ...parseAnswer(raw), sources: result.contributingSources };
		},
	};
}

/**
 * Generate an answer for every successful compare slot. Generations run
 * concurrently and fail independently.
 */
export async function answerComparison(
	generator: AnswerGenerator,
	comparison: CompareResult,
	options: { signal?: AbortSignal } = {},
): Promise<ComparisonAnswers> {
	const answers: ComparisonAnswers = {};
	await Promise.all(
		(["graph", "vector", "hybrid"] as const).map(async (mode) => {
			const slot = comparison[mode];
			if (slot.status !== "ok") return;
			try {
				answers[mode] = { status: "ok", answer: await generator.generate(slot.result, options) };
			} catch (error) {
				answers[mode] = { status: "failed", error: errorMessage(error) };
			}
		}),
	);
	return answers;
}
