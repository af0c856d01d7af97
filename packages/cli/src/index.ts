/**
 * kgvec CLI
 *
 * Ingests document directories into the vector index and answers questions
 * over the graph and vector stores, one-shot or at an interactive prompt.
 * Logs go to stderr; results go to stdout.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import {
	answerComparison,
	createLogger,
	createRuntime,
	entityNeighborsQuery,
	graphStatsQuery,
	isRetrievalError,
	loadConfig,
	loadDirectory,
	UnanswerableQuestionError,
	type LogSink,
	type Runtime,
} from "@kgvec/engine";
import {
	CLI_USAGE,
	parseCliArgs,
	parsePromptLine,
	PROMPT_HELP,
	UsageError,
	type AskMode,
	type CliCommand,
	type CliInvocation,
} from "./commands";
import {
	formatAnswer,
	formatComparison,
	formatIngestResult,
	formatResult,
	formatRow,
	formatStatus,
	type StoreTotals,
} from "./render";

// =========================================
// HELPERS
// =========================================

const stderrSink: LogSink = (_level, line, error) => {
	process.stderr.write(`${line}\n`);
	if (error?.stack) {
		process.stderr.write(`${error.stack}\n`);
	}
};

function print(text: string): void {
	process.stdout.write(`${text}\n`);
}

function describeError(error: unknown): string {
	if (error instanceof UnanswerableQuestionError) {
		return [
			"No source could answer this question:",
			...error.failures.map((f) => `  ${f.source}: ${f.kind}: ${f.message}`),
		].join("\n");
	}
	return error instanceof Error ? error.message : String(error);
}

function number(value: unknown): number {
	return typeof value === "number" ? value : Number(value ?? 0);
}

async function storeTotals(runtime: Runtime): Promise<StoreTotals> {
	const chunks = await runtime.vectors.count();
	try {
		const { rows } = await runtime.graph.query(graphStatsQuery(), {
			timeoutMs: runtime.config.timeouts.graphMs,
		});
		const [row] = rows;
		return { chunks, graph: { entities: number(row?.entities), relations: number(row?.relations) } };
	} catch (error) {
		return { chunks, graph: { error: describeError(error) } };
	}
}

// =========================================
// COMMANDS
// =========================================

async function ask(
	runtime: Runtime,
	mode: AskMode,
	question: string,
	generate: boolean,
	signal?: AbortSignal,
): Promise<void> {
	if (mode === "compare") {
		const comparison = await runtime.router.compare(question, { signal });
		const answers = generate ? await answerComparison(runtime.answers, comparison, { signal }) : {};
		print(formatComparison(comparison, answers));
		return;
	}

	const result = await runtime.router.answer(question, mode, { signal });
	print(formatResult(result));
	if (generate) {
		const answer = await runtime.answers.generate(result, { signal });
		print(formatAnswer(answer));
	}
}

async function entity(runtime: Runtime, name: string): Promise<void> {
	const { rows } = await runtime.graph.query(entityNeighborsQuery(name, runtime.config.graph.topK), {
		timeoutMs: runtime.config.timeouts.graphMs,
	});
	if (rows.length === 0) {
		print(pc.dim(`No relations found for "${name}".`));
		return;
	}
	print(rows.map((row) => `• ${formatRow(row)}`).join("\n"));
}

async function ingest(runtime: Runtime, command: Extract<CliCommand, { kind: "ingest" }>): Promise<number> {
	const documents = await loadDirectory(command.directory, { recursive: command.recursive });
	if (documents.length === 0) {
		p.log.warn(`No .md, .markdown, .txt or .pdf files in ${pc.dim(command.directory)}`);
		return 0;
	}

	const s = p.spinner();
	s.start(`Ingesting ${documents.length} documents...`);
	const summary = await runtime.ingestion.ingestAll(documents, {
		force: command.force,
		onResult: (result) => s.message(`${result.documentId}: ${result.status}`),
	});
	s.stop(
		`Ingested ${summary.ingested}, unchanged ${summary.unchanged}, skipped ${summary.skipped}, failed ${summary.failed}`,
	);

	print(summary.results.map((result) => formatIngestResult(result)).join("\n"));
	return summary.failed > 0 ? 1 : 0;
}

async function interactive(runtime: Runtime): Promise<void> {
	p.intro(`${pc.bgCyan(pc.black(" kgvec "))} ${pc.dim("graph + vector retrieval")}`);
	p.log.info(pc.dim("Type a question, or 'help' for commands."));
	if ((await runtime.checkLlm()) === false) {
		p.log.warn(`LLM ${runtime.llm.modelId} is not available; questions will show evidence but answers will fail`);
	}

	for (;;) {
		const line = await p.text({ message: "Question", placeholder: "compare what connects A and B?" });
		if (p.isCancel(line)) break;

		const command = parsePromptLine(line);
		if (command.kind === "quit") break;
		if (command.kind === "empty") continue;
		if (command.kind === "help") {
			p.note(PROMPT_HELP, "Commands");
			continue;
		}
		if (command.kind === "invalid") {
			p.log.warn(command.message);
			continue;
		}

		try {
			if (command.kind === "entity") {
				await entity(runtime, command.name);
			} else {
				await ask(runtime, command.mode, command.question, true);
			}
		} catch (error) {
			p.log.error(describeError(error));
		}
	}

	p.outro("Bye");
}

async function run(runtime: Runtime, command: CliCommand): Promise<number> {
	switch (command.kind) {
		case "help":
			print(CLI_USAGE);
			return 0;
		case "interactive":
			await interactive(runtime);
			return 0;
		case "ingest":
			return ingest(runtime, command);
		case "ask": {
			const controller = new AbortController();
			const onInterrupt = () => controller.abort(new Error("interrupted"));
			process.once("SIGINT", onInterrupt);
			try {
				await ask(runtime, command.mode, command.question, command.generate, controller.signal);
				return 0;
			} finally {
				process.off("SIGINT", onInterrupt);
			}
		}
		case "status":
			print(formatStatus(runtime.ingestion.status(), await storeTotals(runtime)));
			return 0;
		case "remove": {
			const removed = await runtime.ingestion.removeDocument(command.documentId);
			print(`Removed ${removed} chunks of ${command.documentId}`);
			return 0;
		}
		case "graph-loaded": {
			const updated = runtime.ingestion.markGraphLoaded(command.documentId, command.loaded);
			if (!updated) {
				p.log.error(`Unknown document ${command.documentId}; ingest it first.`);
				return 1;
			}
			print(`${command.documentId}: graph ${command.loaded ? "loaded" : "not loaded"}`);
			return 0;
		}
	}
}

// =========================================
// MAIN
// =========================================

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
	let invocation: CliInvocation;
	try {
		invocation = parseCliArgs(argv);
	} catch (error) {
		if (error instanceof UsageError) {
			process.stderr.write(`${error.message}\n\n${CLI_USAGE}\n`);
			return 2;
		}
		throw error;
	}

	if (invocation.command.kind === "help") {
		print(CLI_USAGE);
		return 0;
	}

	let runtime: Runtime;
	try {
		const config = loadConfig({
			configPath: invocation.configPath,
			overrides: invocation.logLevel ? { logLevel: invocation.logLevel } : undefined,
		});
		const logger = createLogger({ level: config.logLevel, sink: stderrSink });
		runtime = await createRuntime(config, { logger });
	} catch (error) {
		p.log.error(describeError(error));
		return 1;
	}

	try {
		return await run(runtime, invocation.command);
	} catch (error) {
		if (!isRetrievalError(error)) throw error;
		p.log.error(describeError(error));
		return 1;
	} finally {
		await runtime.close();
	}
}
