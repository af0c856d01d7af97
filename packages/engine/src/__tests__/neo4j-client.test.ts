import { int, Node, Relationship } from "neo4j-driver";
import { newError } from "neo4j-driver-core";
import { describe, expect, test } from "vitest";
import { createLogger } from "../diagnostics/logger";
import { GraphQueryError } from "../errors";
import {
	classifyNeo4jError,
	createNeo4jGraphClient,
	toGraphRow,
	toGraphValue,
	type GraphDriver,
} from "../graph/neo4j-client";
import type { GraphQuery } from "../types";

const CONFIG = {
	uri: "bolt://localhost:7687",
	user: "neo4j",
	password: "test-secret",
	maxConnectionPoolSize: 2,
};

const QUERY: GraphQuery = { cypher: "MATCH (n) RETURN n LIMIT $limit", params: { limit: int(5) } };

function fakeDriver(read: GraphDriver["read"]): GraphDriver & { closed: boolean } {
	const driver = {
		closed: false,
		read,
		async verifyConnectivity() {},
		async close() {
			driver.closed = true;
		},
	};
	return driver;
}

describe("toGraphValue", () => {
	test("integers become numbers, or strings outside the safe range", () => {
		expect(toGraphValue(int(42))).toBe(42);
		expect(toGraphValue(int("9223372036854775807"))).toBe("9223372036854775807");
		expect(toGraphValue(10n)).toBe(10);
	});

	test("nodes and relationships become plain objects", () => {
		const node = new Node(int(1), ["Entity"], { name: "pump", rank: int(3) });
		const rel = new Relationship(int(7), int(1), int(2), "RELATION", { name: "feeds", source: "manual" });

		expect(toGraphValue(node)).toEqual({ labels: ["Entity"], properties: { name: "pump", rank: 3 } });
		expect(toGraphValue(rel)).toEqual({ type: "RELATION", properties: { name: "feeds", source: "manual" } });
	});

	test("nested lists and maps are converted recursively", () => {
		expect(toGraphRow({ names: ["a", int(2)], meta: { count: int(1), empty: null }, missing: undefined })).toEqual({
			names: ["a", 2],
			meta: { count: 1, empty: null },
			missing: null,
		});
	});
});

describe("classifyNeo4jError", () => {
	test("maps driver codes to failure reasons", () => {
		expect(classifyNeo4jError(newError("gone", "ServiceUnavailable"))).toBe("unavailable");
		expect(classifyNeo4jError(newError("bad auth", "Neo.ClientError.Security.Unauthorized"))).toBe(
			"unavailable",
		);
		expect(classifyNeo4jError(newError("typo", "Neo.ClientError.Statement.SyntaxError"))).toBe("syntax");
		expect(classifyNeo4jError(newError("oom", "Neo.TransientError.General.OutOfMemoryError"))).toBe(
			"execution",
		);
		expect(classifyNeo4jError(new Error("plain"))).toBe("execution");
	});
});

describe("Neo4jGraphClient", () => {
	test("returns normalized rows with the executed query", async () => {
		const calls: Array<{ cypher: string; timeoutMs?: number }> = [];
		const driver = fakeDriver(async (cypher, _params, options) => {
			calls.push({ cypher, timeoutMs: options.timeoutMs });
			return [{ subject: "pump", count: int(2) }];
		});
		const client = createNeo4jGraphClient(CONFIG, { driver });

		const result = await client.query(QUERY, { timeoutMs: 1500 });

		expect(result).toEqual({ rows: [{ subject: "pump", count: 2 }], query: QUERY });
		expect(calls).toEqual([{ cypher: QUERY.cypher, timeoutMs: 1500 }]);
	});

	test("driver errors become GraphQueryError with the query attached", async () => {
		const client = createNeo4jGraphClient(CONFIG, {
			driver: fakeDriver(async () => {
				throw newError("Invalid input 'MATC'", "Neo.ClientError.Statement.SyntaxError");
			}),
		});

		const error = await client.query(QUERY).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(GraphQueryError);
		expect(error instanceof GraphQueryError ? [error.reason, error.query] : []).toEqual(["syntax", QUERY]);
	});

	test("an aborted signal stops the query before it reaches the driver", async () => {
		let reached = false;
		const client = createNeo4jGraphClient(CONFIG, {
			driver: fakeDriver(async () => {
				reached = true;
				return [];
			}),
		});
		const controller = new AbortController();
		controller.abort();

		await expect(client.query(QUERY, { signal: controller.signal })).rejects.toBeInstanceOf(GraphQueryError);
		expect(reached).toBe(false);
	});

	test("connectivity failures are reported as unavailable", async () => {
		const driver = fakeDriver(async () => []);
		driver.verifyConnectivity = async () => {
			throw new Error("connection refused");
		};
		const client = createNeo4jGraphClient(CONFIG, { driver });

		const error = await client.verifyConnectivity().catch((e: unknown) => e);

		expect(error instanceof GraphQueryError ? error.reason : null).toBe("unavailable");
	});

	test("failures are logged without the password", async () => {
		const logger = createLogger({ console: false, storeEntries: true });
		const client = createNeo4jGraphClient(CONFIG, {
			logger,
			driver: fakeDriver(async () => {
				throw newError("gone", "ServiceUnavailable");
			}),
		});

		await client.query(QUERY).catch(() => undefined);

		const [entry] = logger.getEntries();
		expect(entry.level).toBe("warn");
		expect(entry.context).toMatchObject({ component: "graph", reason: "unavailable" });
		expect(JSON.stringify(entry.context)).not.toContain("test-secret");
	});

	test("close releases the driver", async () => {
		const driver = fakeDriver(async () => []);
		await createNeo4jGraphClient(CONFIG, { driver }).close();

		expect(driver.closed).toBe(true);
	});
});
