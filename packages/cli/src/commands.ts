/**
 * Command parsing for the kgvec CLI: process arguments and the lines typed
 * at the interactive prompt.
 */

import { parseArgs } from "node:util";
import type { LogLevel, RetrievalMode } from "@kgvec/engine";

// =========================================
// TYPES
// =========================================

export type AskMode = RetrievalMode | "compare";

export type CliCommand =
	| { kind: "ingest"; directory: string; force: boolean; recursive: boolean }
	| { kind: "ask"; mode: AskMode; question: string; generate: boolean }
	| { kind: "status" }
	| { kind: "remove"; documentId: string }
	| { kind: "graph-loaded"; documentId: string; loaded: boolean }
	| { kind: "interactive" }
	| { kind: "help" };

export interface CliInvocation {
	command: CliCommand;
	configPath?: string;
	logLevel?: LogLevel;
}

export type PromptCommand =
	| { kind: "ask"; mode: AskMode; question: string }
	| { kind: "entity"; name: string }
	| { kind: "help" }
	| { kind: "quit" }
	| { kind: "empty" }
	| { kind: "invalid"; message: string };

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

// =========================================
// PROMPT COMMANDS
// =========================================

const PROMPT_PREFIXES = new Map<string, AskMode>([
	["kg", "graph"],
	["graph", "graph"],
	["vector", "vector"],
	["hybrid", "hybrid"],
	["hybrid-all", "hybrid"],
	["compare", "compare"],
]);

export const PROMPT_HELP = [
	"<question>            hybrid retrieval (default)",
	"kg <question>         graph only (alias: graph)",
	"vector <question>     vector only",
	"hybrid <question>     graph + vector (alias: hybrid-all)",
	"compare <question>    run every mode side by side",
	"entity <name>         relations of one entity",
	"help                  this list",
	"quit                  leave (alias: exit)",
].join("\n");

function isAskMode(value: string): value is AskMode {
	return value === "graph" || value === "vector" || value === "hybrid" || value === "compare";
}

/** Interpret one line typed at the interactive prompt */
export function parsePromptLine(line: string): PromptCommand {
	const trimmed = line.trim();
	if (!trimmed) return { kind: "empty" };

	const match = trimmed.match(/^(\S+)(?:\s+([\s\S]*))?$/);
	const head = (match?.[1] ?? "").toLowerCase();
	const rest = (match?.[2] ?? "").trim();

	if (head === "quit" || head === "exit") return { kind: "quit" };
	if (head === "help" || head === "?") return { kind: "help" };

	if (head === "entity") {
		return rest ? { kind: "entity", name: rest } : { kind: "invalid", message: "Usage: entity <name>" };
	}

	const mode = PROMPT_PREFIXES.get(head);
	if (mode) {
		return rest
			? { kind: "ask", mode, question: rest }
			: { kind: "invalid", message: `Usage: ${head} <question>` };
	}

	return { kind: "ask", mode: "hybrid", question: trimmed };
}

// =========================================
// PROCESS ARGUMENTS
// =========================================

export const CLI_USAGE = [
	"Usage: kgvec [options] <command>",
	"",
	"Commands:",
	"  (none)                          interactive prompt",
	"  ingest <dir> [--force] [-r]     chunk, embed and index .md/.markdown/.txt/.pdf files",
	"  ask [-m mode] <question...>     answer one question (mode: graph|vector|hybrid|compare)",
	"  status                          per-document ingestion status and store totals",
	"  remove <documentId>             delete a document's chunks",
	"  graph-loaded <documentId>       record that the document's triplets are in the graph",
	"",
	"Options:",
	"  -c, --config <file>   JSON config file (default: $KGVEC_CONFIG)",
	"  -m, --mode <mode>     retrieval mode for ask (default: hybrid)",
	"      --no-answer       print retrieved evidence without generating an answer",
	"      --unset           with graph-loaded: clear the flag instead",
	"  -f, --force           re-ingest unchanged documents",
	"  -r, --recursive       descend into subdirectories",
	"  -v, --verbose         debug logging",
	"  -h, --help            show this help",
].join("\n");

function readArgs(argv: readonly string[]) {
	try {
		return parseArgs({
			args: [...argv],
			allowPositionals: true,
			strict: true,
			options: {
				config: { type: "string", short: "c" },
				mode: { type: "string", short: "m" },
				"no-answer": { type: "boolean" },
				unset: { type: "boolean" },
				force: { type: "boolean", short: "f" },
				recursive: { type: "boolean", short: "r" },
				verbose: { type: "boolean", short: "v" },
				help: { type: "boolean", short: "h" },
			},
		});
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}
}

export function parseCliArgs(argv: readonly string[]): CliInvocation {
	const parsed = readArgs(argv);
	const { values, positionals } = parsed;
	const base = {
		configPath: values.config,
		logLevel: values.verbose ? ("debug" as const) : undefined,
	};

	if (values.help) return { ...base, command: { kind: "help" } };

	if (positionals.length === 0) return { ...base, command: { kind: "interactive" } };

	const [name, ...args] = positionals;
	const requireArg = (what: string): string => {
		const value = args.join(" ").trim();
		if (!value) throw new UsageError(`${name} needs ${what}`);
		return value;
	};

	switch (name) {
		case "ingest":
			return {
				...base,
				command: {
					kind: "ingest",
					directory: requireArg("a directory"),
					force: values.force ?? false,
					recursive: values.recursive ?? false,
				},
			};
		case "ask": {
			const mode = values.mode ?? "hybrid";
			if (!isAskMode(mode)) {
				throw new UsageError(`unknown mode "${mode}" (expected graph, vector, hybrid or compare)`);
			}
			return {
				...base,
				command: {
					kind: "ask",
					mode,
					question: requireArg("a question"),
					generate: !values["no-answer"],
				},
			};
		}
		case "status":
			return { ...base, command: { kind: "status" } };
		case "remove":
			return { ...base, command: { kind: "remove", documentId: requireArg("a document id") } };
		case "graph-loaded":
			return {
				...base,
				command: {
					kind: "graph-loaded",
					documentId: requireArg("a document id"),
					loaded: !values.unset,
				},
			};
		case "help":
			return { ...base, command: { kind: "help" } };
		default:
			throw new UsageError(`unknown command "${name}"`);
	}
}
