/**
 * Question -> Cypher translation
 *
 * Two translators share one interface:
 * - LlmCypherTranslator asks the LLM for a query, then cleans and validates it
 * - KeywordCypherTranslator builds a parametrized keyword match without an LLM
 *
 * Both only ever produce read queries.
 */

import { GraphQueryError } from "../errors";
import { DEFAULT_GRAPH_LIMIT, keywordFactsQuery } from "../graph/queries";
import type { GraphQuery } from "../types";
import type { LLMProvider } from "./ollama-client";
import stopwords from "./stopwords.json";

// ============================================================================
// Types
// ============================================================================

export interface CypherTranslator {
	readonly kind: "llm" | "keyword";
	translate(question: string, options?: { signal?: AbortSignal }): Promise<GraphQuery>;
}

// ============================================================================
// Constants
// ============================================================================

export const CYPHER_GENERATION_PROMPT = `Task: Write one Cypher query that retrieves facts answering the user's question.

Schema:
- Node label: Entity (property: name)
- Relationship type: RELATION (properties: name, source)
  source is the id of the document the fact was extracted from.

Rules:
1. Return only the Cypher query, no explanation and no code fences.
2. Match names fuzzily with toLower() and CONTAINS.
3. Use the key terms of the question, in the question's own language.
4. Always return subject, predicate, object and source columns.
5. End with LIMIT {limit}.
6. Never modify the graph.

Template:
MATCH (s:Entity)-[r:RELATION]->(o:Entity)
WHERE toLower(s.name) CONTAINS toLower("keyword") OR toLower(o.name) CONTAINS toLower("keyword")
RETURN s.name AS subject, r.name AS predicate, o.name AS object, r.source AS source
LIMIT {limit}

Question: {question}

Cypher:`;

const QUERY_START = /\b(OPTIONAL\s+MATCH|MATCH|WITH|UNWIND|CALL|RETURN)\b/i;
const WRITE_CLAUSE = /\b(CREATE|MERGE|DELETE|DETACH|SET|REMOVE|DROP|FOREACH|LOAD\s+CSV)\b/i;
const STRING_LITERAL = /'(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*"|`[^`]*`/g;

const STOPWORDS = new Set([...stopwords.en, ...stopwords.zh]);
const MAX_KEYWORDS = 8;

// ============================================================================
// Cleanup & validation
// ============================================================================

/**
 * Strip what chat models wrap around a query: reasoning blocks, markdown
 * fences, a leading "cypher" language tag or "Cypher:" label, prose before
 * the first clause, and a trailing semicolon.
 */
export function cleanCypherOutput(raw: string): string {
	let text = raw
		.replace(/<think(?:ing)?>[\s\S]*?<\/think(?:ing)?>/gi, "")
		.replace(/```(?:cypher)?/gi, "")
		.trim()
		.replace(/^cypher\s*:?\s*\n?/i, "");

	const start = text.search(QUERY_START);
	if (start > 0) {
		text = text.slice(start);
	}

	return text.trim().replace(/;\s*$/, "").trim();
}

/**
 * @throws GraphQueryError ("rejected") when the text is not a read-only query
 */
export function validateReadOnlyCypher(cypher: string): void {
	const query: GraphQuery = { cypher, params: {} };
	if (!cypher || cypher.search(QUERY_START) !== 0) {
		throw new GraphQueryError(query, "rejected", "translation did not produce a Cypher query");
	}
	const withoutLiterals = cypher.replace(STRING_LITERAL, "''");
	const write = withoutLiterals.match(WRITE_CLAUSE);
	if (write) {
		throw new GraphQueryError(query, "rejected", `write clause ${write[1].toUpperCase()} is not allowed`);
	}
}

function ensureLimit(cypher: string, limit: number): string {
	return /\bLIMIT\b/i.test(cypher.replace(STRING_LITERAL, "''")) ? cypher : `${cypher}\nLIMIT ${limit}`;
}

/**
 * Content words of a question: punctuation removed, lowercased, stopwords and
 * single characters dropped, de-duplicated in order.
 */
export function extractKeywords(question: string): string[] {
	const words = question
		.toLowerCase()
		.replace(/[^\p{L}\p{N}\s_-]/gu, " ")
		.split(/\s+/)
		.filter((word) => word.length > 1 && !STOPWORDS.has(word));
	return [...new Set(words)].slice(0, MAX_KEYWORDS);
}

// ============================================================================
// Implementation
// ============================================================================

export class LlmCypherTranslator implements CypherTranslator {
	readonly kind = "llm";

	constructor(
		private readonly llm: LLMProvider,
		private readonly limit = DEFAULT_GRAPH_LIMIT,
	) {}

	buildPrompt(question: string): string {
		return CYPHER_GENERATION_PROMPT.replaceAll("{limit}", String(this.limit)).replace(
			"{question}",
			() => question,
		);
	}

	async translate(question: string, options: { signal?: AbortSignal } = {}): Promise<GraphQuery> {
		const raw = await this.llm.generate(this.buildPrompt(question), {
			signal: options.signal,
			temperature: 0,
		});
		const cypher = cleanCypherOutput(raw);
		validateReadOnlyCypher(cypher);
		return { cypher: ensureLimit(cypher, this.limit), params: {} };
	}
}

export class KeywordCypherTranslator implements CypherTranslator {
	readonly kind = "keyword";

	constructor(private readonly limit = DEFAULT_GRAPH_LIMIT) {}

	async translate(question: string): Promise<GraphQuery> {
		const keywords = extractKeywords(question);
		if (keywords.length === 0) {
			throw new GraphQueryError(
				{ cypher: "", params: {} },
				"rejected",
				`no searchable keywords in "${question}"`,
			);
		}
		return keywordFactsQuery(keywords, this.limit);
	}
}
