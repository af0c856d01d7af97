import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { configFromEnv, loadConfig, parseConfig } from "../config";
import { ConfigError } from "../errors";

describe("parseConfig", () => {
	test("fills every section with defaults", () => {
		const config = parseConfig({});

		expect(config.chunking).toEqual({ chunkSize: 512, chunkOverlap: 50, minChunkSize: 100 });
		expect(config.embedding).toMatchObject({ provider: "ollama", model: "bge-m3", dimension: 1024 });
		expect(config.graph).toMatchObject({ uri: "bolt://localhost:7687", user: "neo4j", translator: "llm" });
		expect(config.fusion).toEqual({ alpha: 0.5, topK: 5, graphWeight: 1, vectorTopK: 5 });
		expect(config.logLevel).toBe("info");
	});

	test("reports every invalid path", () => {
		let caught: unknown;
		try {
			parseConfig({ fusion: { alpha: 2 }, embedding: { provider: "openai" } });
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(ConfigError);
		const issues = caught instanceof ConfigError ? caught.issues : [];
		expect(issues.some((issue) => issue.startsWith("fusion.alpha:"))).toBe(true);
		expect(issues.some((issue) => issue.startsWith("embedding.provider:"))).toBe(true);
	});

	test("rejects an overlap that is not smaller than the minimum chunk", () => {
		expect(() => parseConfig({ chunking: { chunkOverlap: 100, minChunkSize: 100 } })).toThrow(
			/chunking\.chunkOverlap: chunkOverlap must be smaller than minChunkSize/,
		);
	});
});

describe("configFromEnv", () => {
	test("maps variables onto config paths", () => {
		const raw = configFromEnv({
			KGVEC_CHUNK_SIZE: "256",
			NEO4J_URI: "bolt://graph:7687",
			KGVEC_LOG_LEVEL: "debug",
			UNRELATED: "x",
		});

		expect(raw).toEqual({
			chunking: { chunkSize: "256" },
			graph: { uri: "bolt://graph:7687" },
			logLevel: "debug",
		});
	});

	test("KGVEC_TIMEOUT_MS sets all timeouts and yields to specific values", () => {
		const config = parseConfig(configFromEnv({ KGVEC_TIMEOUT_MS: "2500" }));

		expect(config.timeouts).toEqual({
			graphMs: 2500,
			vectorMs: 2500,
			embeddingMs: 2500,
			translationMs: 2500,
			generationMs: 2500,
		});
	});

	test("blank values are ignored", () => {
		expect(configFromEnv({ NEO4J_PASSWORD: "  " })).toEqual({});
	});
});

describe("loadConfig", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kgvec-config-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("environment overrides the file and overrides win over both", () => {
		const path = join(dir, "kgvec.json");
		writeFileSync(
			path,
			JSON.stringify({ fusion: { alpha: 0.2, topK: 8 }, graph: { password: "test-secret" } }),
		);

		const config = loadConfig({
			configPath: path,
			env: { KGVEC_FUSION_ALPHA: "0.7" },
			overrides: { fusion: { topK: 3 } },
		});

		expect(config.fusion.alpha).toBe(0.7);
		expect(config.fusion.topK).toBe(3);
		expect(config.graph.password).toBe("test-secret");
	});

	test("reads the file named by KGVEC_CONFIG", () => {
		const path = join(dir, "env.json");
		writeFileSync(path, JSON.stringify({ vectorStore: { collection: "manuals" } }));

		expect(loadConfig({ env: { KGVEC_CONFIG: path } }).vectorStore.collection).toBe("manuals");
	});

	test("missing and malformed files raise ConfigError", () => {
		expect(() => loadConfig({ configPath: join(dir, "absent.json"), env: {} })).toThrow(ConfigError);

		const bad = join(dir, "bad.json");
		writeFileSync(bad, "{ not json");
		expect(() => loadConfig({ configPath: bad, env: {} })).toThrow(ConfigError);
	});
});
