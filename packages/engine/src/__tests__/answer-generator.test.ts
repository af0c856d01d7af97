import { describe, expect, test } from "vitest";
import { BackendTimeoutError, ModelUnavailableError } from "../errors";
import {
	answerComparison,
	type AnswerGenerator,
	createAnswerGenerator,
	formatEvidenceContext,
	NO_CONTEXT_ANSWER,
	parseAnswer,
} from "../llm/answer-generator";
import type { GenerateOptions, LLMProvider } from "../llm/ollama-client";
import type { RetrievalResult, ScoredEvidence } from "../types";

const GRAPH_QUERY = { cypher: "MATCH (n) RETURN n", params: {} };

const BOTH: ScoredEvidence = {
	key: "manual",
	score: 0.85,
	graphScore: 1,
	vectorScore: 0.7,
	sources: ["graph", "vector"],
	documentId: "manual",
	evidence: [
		{
			kind: "graph",
			documentId: "manual",
			entityKey: "manual",
			rows: [{ subject: "pump", predicate: "feeds", object: "valve", source: "manual" }],
			query: GRAPH_QUERY,
		},
		{
			kind: "vector",
			chunkId: "manual:0000",
			documentId: "manual",
			text: "Line one\nline two",
			similarity: 0.7,
			metadata: {},
		},
	],
};

const GRAPH_ONLY: ScoredEvidence = {
	key: "entity:boiler",
	score: 0.5,
	graphScore: 1,
	vectorScore: 0,
	sources: ["graph"],
	evidence: [{ kind: "graph", entityKey: "entity:boiler", rows: [{ count: 3 }], query: GRAPH_QUERY }],
};

function result(items: ScoredEvidence[]): RetrievalResult {
	return {
		mode: "hybrid",
		question: "What feeds the valve?",
		items,
		contributingSources: items.length > 0 ? ["graph", "vector"] : [],
		degraded: false,
		failures: [],
		timings: { planMs: 1, retrieveMs: 1, totalMs: 2 },
	};
}

class FakeLLM implements LLMProvider {
	readonly modelId = "test/llm";
	prompts: string[] = [];

	constructor(private readonly reply: (options: GenerateOptions) => Promise<string>) {}

	generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
		this.prompts.push(prompt);
		return this.reply(options);
	}
}

describe("formatEvidenceContext", () => {
	test("renders numbered items with provenance tags", () => {
		expect(formatEvidenceContext(result([BOTH, GRAPH_ONLY]))).toBe(
			[
				"[1] [graph+vector] source=manual score=0.850",
				"  - pump -[feeds]-> valve",
				"  Line one",
				"  line two",
				"",
				"[2] [graph] source=entity:boiler score=0.500",
				'  - {"count":3}',
			].join("\n"),
		);
	});

	test("truncates long passages", () => {
		expect(formatEvidenceContext(result([BOTH]), 4)).toContain("\n  Line…");
	});
});

describe("parseAnswer", () => {
	test("splits thinking from the answer", () => {
		expect(parseAnswer("<thinking>\nstep\n</thinking>\n<answer>\nThe pump.\n</answer>")).toEqual({
			answer: "The pump.",
			thinking: "step",
		});
	});

	test("accepts an unterminated answer tag", () => {
		expect(parseAnswer("<answer>The pump")).toEqual({ answer: "The pump" });
	});

	test("untagged replies are all answer", () => {
		expect(parseAnswer("<thinking>hmm</thinking> The pump.")).toEqual({ answer: "The pump.", thinking: "hmm" });
		expect(parseAnswer("The pump.")).toEqual({ answer: "The pump." });
	});
});

describe("AnswerGenerator", () => {
	test("prompts with the context and question", async () => {
		const llm = new FakeLLM(async () => "<answer>The pump feeds the valve.</answer>");

		const answer = await createAnswerGenerator(llm).generate(result([BOTH]));

		expect(answer).toEqual({ answer: "The pump feeds the valve.", sources: ["graph", "vector"] });
		expect(llm.prompts[0]).toContain("[1] [graph+vector] source=manual score=0.850");
		expect(llm.prompts[0]).toContain("Question: What feeds the valve?");
	});

	test("an empty result is answered without calling the model", async () => {
		const llm = new FakeLLM(async () => "unused");

		const answer = await createAnswerGenerator(llm).generate(result([]));

		expect(answer).toEqual({ answer: NO_CONTEXT_ANSWER, sources: [] });
		expect(llm.prompts).toEqual([]);
	});

	test("model errors become ModelUnavailableError", async () => {
		const llm = new FakeLLM(async () => {
			throw new Error("socket hang up");
		});

		const error = await createAnswerGenerator(llm).generate(result([BOTH])).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ModelUnavailableError);
		expect(error instanceof Error ? error.message : "").toBe("Model test/llm unavailable: socket hang up");
	});

	test("a slow model times out", async () => {
		const llm = new FakeLLM(() => new Promise(() => {}));

		await expect(createAnswerGenerator(llm, { timeoutMs: 10 }).generate(result([BOTH]))).rejects.toBeInstanceOf(
			BackendTimeoutError,
		);
	});
});

describe("answerComparison", () => {
	test("answers each retrieved slot on its own", async () => {
		const generator: AnswerGenerator = {
			async generate(retrieved) {
				if (retrieved.mode === "graph") throw new Error("model crashed");
				return { answer: `from ${retrieved.mode}`, sources: retrieved.contributingSources };
			},
		};

		const answers = await answerComparison(generator, {
			graph: { status: "ok", result: { ...result([GRAPH_ONLY]), mode: "graph" }, latencyMs: 1 },
			vector: { status: "ok", result: { ...result([BOTH]), mode: "vector" }, latencyMs: 1 },
			hybrid: {
				status: "failed",
				error: { source: "vector", kind: "unanswerable", message: "no source answered" },
				latencyMs: 1,
			},
		});

		expect(answers).toEqual({
			graph: { status: "failed", error: "model crashed" },
			vector: { status: "ok", answer: { answer: "from vector", sources: ["graph", "vector"] } },
		});
	});
});
