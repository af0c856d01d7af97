import { describe, expect, test } from "vitest";
import { parseCliArgs, parsePromptLine, UsageError } from "../commands";

describe("parsePromptLine", () => {
	test("plain questions default to hybrid", () => {
		expect(parsePromptLine("  What feeds the valve?  ")).toEqual({
			kind: "ask",
			mode: "hybrid",
			question: "What feeds the valve?",
		});
	});

	test("mode prefixes select the strategy", () => {
		expect(parsePromptLine("kg who maintains the boiler")).toEqual({
			kind: "ask",
			mode: "graph",
			question: "who maintains the boiler",
		});
		expect(parsePromptLine("VECTOR pump pressure").kind === "ask").toBe(true);
		expect(parsePromptLine("hybrid-all pump")).toMatchObject({ mode: "hybrid", question: "pump" });
		expect(parsePromptLine("compare what connects A and B?")).toMatchObject({
			mode: "compare",
			question: "what connects A and B?",
		});
	});

	test("a prefix without a question is invalid", () => {
		expect(parsePromptLine("vector")).toEqual({ kind: "invalid", message: "Usage: vector <question>" });
	});

	test("entity lookups take the rest of the line", () => {
		expect(parsePromptLine("entity feed pump")).toEqual({ kind: "entity", name: "feed pump" });
		expect(parsePromptLine("entity")).toEqual({ kind: "invalid", message: "Usage: entity <name>" });
	});

	test("control words", () => {
		expect(parsePromptLine("")).toEqual({ kind: "empty" });
		expect(parsePromptLine("exit")).toEqual({ kind: "quit" });
		expect(parsePromptLine("?")).toEqual({ kind: "help" });
	});

	test("words that only look like prefixes are questions", () => {
		expect(parsePromptLine("constructor of the pump")).toEqual({
			kind: "ask",
			mode: "hybrid",
			question: "constructor of the pump",
		});
	});
});

describe("parseCliArgs", () => {
	test("no command starts the interactive prompt", () => {
		expect(parseCliArgs([])).toEqual({ command: { kind: "interactive" }, configPath: undefined, logLevel: undefined });
	});

	test("ask joins the question and reads its mode", () => {
		expect(parseCliArgs(["ask", "-m", "compare", "what", "feeds", "the", "valve?", "--no-answer"])).toEqual({
			command: { kind: "ask", mode: "compare", question: "what feeds the valve?", generate: false },
			configPath: undefined,
			logLevel: undefined,
		});
	});

	test("global options apply to every command", () => {
		expect(parseCliArgs(["-c", "kgvec.json", "-v", "status"])).toEqual({
			command: { kind: "status" },
			configPath: "kgvec.json",
			logLevel: "debug",
		});
	});

	test("ingest flags", () => {
		expect(parseCliArgs(["ingest", "./docs", "-f", "-r"]).command).toEqual({
			kind: "ingest",
			directory: "./docs",
			force: true,
			recursive: true,
		});
	});

	test("graph-loaded can clear the flag", () => {
		expect(parseCliArgs(["graph-loaded", "manual", "--unset"]).command).toEqual({
			kind: "graph-loaded",
			documentId: "manual",
			loaded: false,
		});
	});

	test("--help wins over the command", () => {
		expect(parseCliArgs(["ask", "--help"]).command).toEqual({ kind: "help" });
	});

	test("usage errors", () => {
		expect(() => parseCliArgs(["ask", "-m", "fuzzy", "q"])).toThrow(
			new UsageError('unknown mode "fuzzy" (expected graph, vector, hybrid or compare)'),
		);
		expect(() => parseCliArgs(["remove"])).toThrow(new UsageError("remove needs a document id"));
		expect(() => parseCliArgs(["launch"])).toThrow(new UsageError('unknown command "launch"'));
		expect(() => parseCliArgs(["status", "--bogus"])).toThrow(UsageError);
	});
});
