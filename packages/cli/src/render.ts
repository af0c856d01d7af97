/**
 * Terminal rendering of retrieval results, comparisons and status tables.
 * Pure functions: every formatter takes the color set to use, so output can
 * be checked without escape codes.
 */

import pc from "picocolors";
import type {
	CompareResult,
	ComparisonAnswers,
	GeneratedAnswer,
	GraphRow,
	IngestionRecord,
	IngestResult,
	RetrievalResult,
	ScoredEvidence,
} from "@kgvec/engine";

export type Colors = ReturnType<typeof pc.createColors>;

const PREVIEW_CHARS = 160;

function preview(text: string): string {
	const flat = text.replace(/\s+/g, " ").trim();
	return flat.length > PREVIEW_CHARS ? `${flat.slice(0, PREVIEW_CHARS)}…` : flat;
}

function ms(value: number): string {
	return `${Math.round(value)}ms`;
}

export function formatRow(row: GraphRow): string {
	const { subject, predicate, object } = row;
	if (typeof subject === "string" && typeof predicate === "string" && typeof object === "string") {
		return `(${subject}) -[${predicate}]-> (${object})`;
	}
	return Object.entries(row)
		.map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
		.join(" ");
}

function formatItem(item: ScoredEvidence, index: number, c: Colors): string[] {
	const tag = c.cyan(`[${item.sources.join("+")}]`);
	const lines = [
		`${c.bold(`${index + 1}.`)} ${tag} ${item.documentId ?? item.key} ${c.dim(`score ${item.score.toFixed(3)}`)}`,
	];
	for (const evidence of item.evidence) {
		if (evidence.kind === "graph") {
			for (const row of evidence.rows) {
				lines.push(`   ${c.dim("•")} ${formatRow(row)}`);
			}
		} else {
			lines.push(`   ${c.dim(`${evidence.chunkId} (${evidence.similarity.toFixed(3)})`)} ${preview(evidence.text)}`);
		}
	}
	return lines;
}

export function formatResult(result: RetrievalResult, c: Colors = pc): string {
	const sources = result.contributingSources.length > 0 ? result.contributingSources.join(", ") : "none";
	const lines = [
		`${c.bold("Mode:")} ${result.mode}   ${c.bold("Sources:")} ${sources}${result.degraded ? `   ${c.yellow("(degraded)")}` : ""}`,
	];

	for (const failure of result.failures) {
		lines.push(c.yellow(`! ${failure.source} failed (${failure.kind}): ${failure.message}`));
	}

	if (result.query?.cypher) {
		lines.push(c.bold("Cypher:"), ...result.query.cypher.split("\n").map((line) => `   ${c.dim(line)}`));
	}

	if (result.items.length === 0) {
		lines.push(c.dim("No evidence found."));
	} else {
		lines.push(c.bold("Evidence:"));
		result.items.forEach((item, i) => lines.push(...formatItem(item, i, c)));
	}

	const { planMs, retrieveMs, totalMs } = result.timings;
	lines.push(c.dim(`plan ${ms(planMs)} · retrieve ${ms(retrieveMs)} · total ${ms(totalMs)}`));
	return lines.join("\n");
}

export function formatAnswer(answer: GeneratedAnswer, c: Colors = pc): string {
	return `${c.bold(c.green("Answer:"))}\n${answer.answer}`;
}

export function formatComparison(
	comparison: CompareResult,
	answers: ComparisonAnswers = {},
	c: Colors = pc,
): string {
	const sections: string[] = [];
	for (const mode of ["graph", "vector", "hybrid"] as const) {
		const slot = comparison[mode];
		const header = c.bold(`── ${mode} (${ms(slot.latencyMs)}) ──`);
		if (slot.status === "ok") {
			const answer = answers[mode];
			const parts = [header, formatResult(slot.result, c)];
			if (answer?.status === "ok") parts.push(formatAnswer(answer.answer, c));
			if (answer?.status === "failed") parts.push(c.red(`answer failed: ${answer.error}`));
			sections.push(parts.join("\n"));
		} else {
			sections.push(`${header}\n${c.red(`failed (${slot.error.kind}): ${slot.error.message}`)}`);
		}
	}
	return sections.join("\n\n");
}

export function formatIngestResult(result: IngestResult, c: Colors = pc): string {
	switch (result.status) {
		case "ingested":
			return `${c.green("✓")} ${result.documentId} ${c.dim(`${result.chunkCount} chunks, ${ms(result.ms)}`)}`;
		case "unchanged":
			return `${c.dim("=")} ${result.documentId} ${c.dim("unchanged")}`;
		case "skipped":
			return `${c.yellow("-")} ${result.documentId} ${c.yellow(`skipped: ${result.error ?? ""}`)}`;
		case "failed":
			return `${c.red("✗")} ${result.documentId} ${c.red(result.error ?? "failed")}`;
	}
}

export interface StoreTotals {
	chunks: number;
	graph: { entities: number; relations: number } | { error: string };
}

export function formatStatus(records: IngestionRecord[], totals: StoreTotals, c: Colors = pc): string {
	const lines = [`${c.bold("Vector chunks:")} ${totals.chunks}`];
	lines.push(
		"error" in totals.graph
			? `${c.bold("Graph:")} ${c.yellow(`unavailable (${totals.graph.error})`)}`
			: `${c.bold("Graph:")} ${totals.graph.entities} entities, ${totals.graph.relations} relations`,
	);

	if (records.length === 0) {
		lines.push(c.dim("No documents ingested."));
		return lines.join("\n");
	}

	lines.push(c.bold("Documents:"));
	for (const record of records) {
		const state = record.complete
			? c.green("complete")
			: record.vectorStatus === "failed"
				? c.red(`failed: ${record.error ?? "unknown error"}`)
				: c.yellow(`${record.vectorStatus}, graph ${record.graphLoaded ? "loaded" : "not loaded"}`);
		lines.push(`  ${record.documentId} ${c.dim(`${record.format}, ${record.chunkCount} chunks`)} ${state}`);
	}
	return lines.join("\n");
}
