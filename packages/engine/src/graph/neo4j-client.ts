/**
 * Graph Query Client
 *
 * Runs structured Cypher requests against Neo4j in read transactions and
 * returns rows of plain values. Driver types (Integer, Node, Relationship,
 * Path, temporal values) never leave this module.
 */

import neo4j, {
	Neo4jError,
	isDate,
	isDateTime,
	isDuration,
	isInt,
	isLocalDateTime,
	isLocalTime,
	isNode,
	isPath,
	isPoint,
	isRelationship,
	isTime,
	type Driver,
} from "neo4j-driver";
import type { GraphConfig } from "../config";
import { nullLogger, type Logger } from "../diagnostics/logger";
import { GraphQueryError, errorMessage, type GraphFailureReason } from "../errors";
import type { GraphQuery, GraphQueryResult, GraphRow, GraphValue } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface GraphQueryOptions {
	signal?: AbortSignal;
	/** Server-side transaction timeout */
	timeoutMs?: number;
}

export interface GraphQueryClient {
	query(request: GraphQuery, options?: GraphQueryOptions): Promise<GraphQueryResult>;
	verifyConnectivity(): Promise<void>;
	close(): Promise<void>;
}

/** Minimal driver surface; the production adapter wraps neo4j-driver */
export interface GraphDriver {
	read(
		cypher: string,
		params: Record<string, unknown>,
		options: { timeoutMs?: number },
	): Promise<Array<Record<string, unknown>>>;
	verifyConnectivity(): Promise<void>;
	close(): Promise<void>;
}

// ============================================================================
// Value normalization
// ============================================================================

function isTemporalOrSpatial(value: object): boolean {
	return (
		isDate(value) ||
		isDateTime(value) ||
		isLocalDateTime(value) ||
		isTime(value) ||
		isLocalTime(value) ||
		isDuration(value) ||
		isPoint(value)
	);
}

function propertiesToGraphValue(properties: object): { [key: string]: GraphValue } {
	const out: { [key: string]: GraphValue } = {};
	for (const [key, value] of Object.entries(properties)) {
		out[key] = toGraphValue(value);
	}
	return out;
}

/**
 * Convert a driver value into a plain JSON-compatible value.
 * Integers outside the safe range become decimal strings.
 */
export function toGraphValue(value: unknown): GraphValue {
	if (value === null || value === undefined) return null;
	if (typeof value === "string" || typeof value === "boolean") return value;
	if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
	if (typeof value === "bigint") {
		return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
			? Number(value)
			: value.toString();
	}
	if (typeof value !== "object") return String(value);

	if (isInt(value)) {
		return value.inSafeRange() ? value.toNumber() : value.toString();
	}
	if (isNode(value)) {
		return {
			labels: [...value.labels],
			properties: propertiesToGraphValue(value.properties),
		};
	}
	if (isRelationship(value)) {
		return {
			type: value.type,
			properties: propertiesToGraphValue(value.properties),
		};
	}
	if (isPath(value)) {
		return {
			nodes: [value.start, ...value.segments.map((segment) => segment.end)].map(toGraphValue),
			relationships: value.segments.map((segment) => toGraphValue(segment.relationship)),
		};
	}
	if (isTemporalOrSpatial(value)) {
		return String(value);
	}
	if (Array.isArray(value)) {
		return value.map(toGraphValue);
	}
	return propertiesToGraphValue(value);
}

export function toGraphRow(record: Record<string, unknown>): GraphRow {
	const row: GraphRow = {};
	for (const [key, value] of Object.entries(record)) {
		row[key] = toGraphValue(value);
	}
	return row;
}

// ============================================================================
// Error mapping
// ============================================================================

const UNAVAILABLE_CODES = new Set([
	"ServiceUnavailable",
	"SessionExpired",
	"Neo.ClientError.Security.Unauthorized",
	"Neo.ClientError.Database.DatabaseNotFound",
]);

export function classifyNeo4jError(error: unknown): GraphFailureReason {
	if (!(error instanceof Neo4jError)) return "execution";
	if (UNAVAILABLE_CODES.has(error.code)) return "unavailable";
	if (error.code.startsWith("Neo.ClientError.Statement.")) return "syntax";
	return "execution";
}

export function toGraphQueryError(error: unknown, query: GraphQuery): GraphQueryError {
	if (error instanceof GraphQueryError) return error;
	return new GraphQueryError(query, classifyNeo4jError(error), errorMessage(error), {
		cause: error,
	});
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Wrap a neo4j-driver Driver. Every call opens a READ session, so write
 * clauses are rejected by the server even if they get past translation.
 */
export function adaptNeo4jDriver(driver: Driver, database?: string): GraphDriver {
	return {
		async read(cypher, params, options) {
			const session = driver.session({
				database,
				defaultAccessMode: neo4j.session.READ,
			});
			try {
				const result = await session.executeRead(async (tx) => await tx.run(cypher, params), {
					timeout: options.timeoutMs,
				});
				return result.records.map((record) => record.toObject());
			} finally {
				await session.close();
			}
		},

		async verifyConnectivity() {
			await driver.getServerInfo({ database });
		},

		close: () => driver.close(),
	};
}

export interface Neo4jGraphClientOptions {
	logger?: Logger;
	/** Injected in tests; defaults to a neo4j-driver connection */
	driver?: GraphDriver;
}

export function createNeo4jGraphClient(
	config: Pick<GraphConfig, "uri" | "user" | "password" | "database" | "maxConnectionPoolSize">,
	options: Neo4jGraphClientOptions = {},
): GraphQueryClient {
	const logger = (options.logger ?? nullLogger).child({ component: "graph", uri: config.uri });
	const driver =
		options.driver ??
		adaptNeo4jDriver(
			neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
				maxConnectionPoolSize: config.maxConnectionPoolSize,
			}),
			config.database,
		);

	return {
		async query(request: GraphQuery, queryOptions: GraphQueryOptions = {}): Promise<GraphQueryResult> {
			if (queryOptions.signal?.aborted) {
				throw new GraphQueryError(request, "execution", "query cancelled before start");
			}

			const started = performance.now();
			try {
				const records = await driver.read(request.cypher, request.params, {
					timeoutMs: queryOptions.timeoutMs,
				});
				const rows = records.map(toGraphRow);
				logger.debug("Graph query complete", {
					rows: rows.length,
					ms: Math.round(performance.now() - started),
				});
				return { rows, query: request };
			} catch (error) {
				const mapped = toGraphQueryError(error, request);
				logger.warn("Graph query failed", { reason: mapped.reason, message: mapped.message });
				throw mapped;
			}
		},

		async verifyConnectivity(): Promise<void> {
			try {
				await driver.verifyConnectivity();
			} catch (error) {
				throw new GraphQueryError(
					{ cypher: "", params: {} },
					"unavailable",
					`cannot reach ${config.uri}: ${errorMessage(error)}`,
					{ cause: error },
				);
			}
		},

		close: () => driver.close(),
	};
}
