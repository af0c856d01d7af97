import { describe, expect, test } from "vitest";
import { GraphQueryError } from "../errors";
import { entityPathsQuery, keywordFactsQuery } from "../graph/queries";
import type { GenerateOptions, LLMProvider } from "../llm/ollama-client";
import {
	cleanCypherOutput,
	extractKeywords,
	KeywordCypherTranslator,
	LlmCypherTranslator,
	validateReadOnlyCypher,
} from "../llm/text-to-cypher";

class ScriptedLLM implements LLMProvider {
	readonly modelId = "test/scripted";
	readonly prompts: string[] = [];
	readonly options: GenerateOptions[] = [];

	constructor(private readonly reply: string) {}

	async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
		this.prompts.push(prompt);
		this.options.push(options);
		return this.reply;
	}
}

const QUERY = "MATCH (s:Entity)-[r:RELATION]->(o:Entity)\nRETURN s.name AS subject\nLIMIT 20";

describe("cleanCypherOutput", () => {
	test("strips fences and a trailing semicolon", () => {
		expect(cleanCypherOutput("```cypher\n" + QUERY + ";\n```")).toBe(QUERY);
	});

	test("drops reasoning blocks and leading prose", () => {
		const raw = `<think>the user wants pumps</think>Here is the query:\n${QUERY}`;

		expect(cleanCypherOutput(raw)).toBe(QUERY);
	});

	test("removes a Cypher: label", () => {
		expect(cleanCypherOutput("Cypher: MATCH (n) RETURN n")).toBe("MATCH (n) RETURN n");
	});
});

describe("validateReadOnlyCypher", () => {
	test("accepts read queries", () => {
		expect(() => validateReadOnlyCypher(QUERY)).not.toThrow();
		expect(() => validateReadOnlyCypher("OPTIONAL MATCH (n) RETURN n")).not.toThrow();
	});

	test("rejects write clauses", () => {
		let caught: unknown;
		try {
			validateReadOnlyCypher("MATCH (n) DETACH DELETE n");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(GraphQueryError);
		expect(caught instanceof GraphQueryError ? caught.reason : null).toBe("rejected");
		expect(caught instanceof Error ? caught.message : "").toBe(
			"Graph query failed (rejected): write clause DETACH is not allowed",
		);
	});

	test("ignores write keywords inside string literals", () => {
		expect(() =>
			validateReadOnlyCypher(`MATCH (s:Entity) WHERE s.name CONTAINS "create account" RETURN s`),
		).not.toThrow();
	});

	test("rejects text that is not a query", () => {
		expect(() => validateReadOnlyCypher("I cannot answer that.")).toThrow(GraphQueryError);
		expect(() => validateReadOnlyCypher("")).toThrow(GraphQueryError);
	});
});

describe("extractKeywords", () => {
	test("drops stopwords, punctuation and duplicates", () => {
		expect(extractKeywords("What is the pressure of the pump? The PUMP!")).toEqual(["pressure", "pump"]);
	});

	test("keeps at most eight keywords", () => {
		expect(extractKeywords("alpha beta gamma delta epsilon zeta eta theta iota kappa")).toHaveLength(8);
	});
});

describe("LlmCypherTranslator", () => {
	test("prompts with the question and returns the cleaned query", async () => {
		const llm = new ScriptedLLM("```\nMATCH (n:Entity) RETURN n.name AS subject\n```");
		const translator = new LlmCypherTranslator(llm, 15);

		const query = await translator.translate("Which valves exist?");

		expect(query).toEqual({ cypher: "MATCH (n:Entity) RETURN n.name AS subject\nLIMIT 15", params: {} });
		expect(llm.prompts[0]).toContain("Question: Which valves exist?");
		expect(llm.prompts[0]).toContain("LIMIT 15");
		expect(llm.options[0].temperature).toBe(0);
	});

	test("keeps an existing LIMIT", async () => {
		const translator = new LlmCypherTranslator(new ScriptedLLM(QUERY));

		expect((await translator.translate("q")).cypher).toBe(QUERY);
	});

	test("question text with $ patterns is inserted literally", () => {
		const translator = new LlmCypherTranslator(new ScriptedLLM(QUERY));

		expect(translator.buildPrompt("cost in $& terms")).toContain("Question: cost in $& terms");
	});

	test("refuses a generated write query", async () => {
		const translator = new LlmCypherTranslator(new ScriptedLLM("CREATE (n:Entity {name: 'x'})"));

		await expect(translator.translate("add x")).rejects.toBeInstanceOf(GraphQueryError);
	});
});

describe("KeywordCypherTranslator", () => {
	test("builds a parametrized keyword query", async () => {
		const query = await new KeywordCypherTranslator(10).translate("Who maintains the boiler?");

		expect(query.params.keywords).toEqual(["maintains", "boiler"]);
		expect(query.cypher).toContain("ANY(keyword IN $keywords WHERE");
		expect(String(query.params.limit)).toBe("10");
	});

	test("a question of only stopwords is rejected", async () => {
		await expect(new KeywordCypherTranslator().translate("what is the")).rejects.toBeInstanceOf(
			GraphQueryError,
		);
	});
});

describe("graph queries", () => {
	test("keyword queries lowercase their keywords", () => {
		expect(keywordFactsQuery(["Pump", "VALVE"]).params.keywords).toEqual(["pump", "valve"]);
	});

	test("path depth is bounded", () => {
		expect(entityPathsQuery("a", "b", 2).cypher).toContain("[:RELATION*1..2]");
		expect(() => entityPathsQuery("a", "b", 7)).toThrow(RangeError);
	});
});
