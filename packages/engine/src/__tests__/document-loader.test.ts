import { copyFileSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { documentIdForPath, formatForPath, loadDirectory, loadDocument } from "../indexing/document-loader";

const PDF_FIXTURE = fileURLToPath(new URL("./fixtures/pump-note.pdf", import.meta.url));

describe("document loader", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kgvec-docs-"));
		writeFileSync(join(dir, "b-guide.txt"), "Open the valve slowly.");
		writeFileSync(join(dir, "a-manual.md"), "# Pump\n\nThe pump feeds the valve.");
		writeFileSync(join(dir, "scan.docx"), "binary");
		mkdirSync(join(dir, "sub"));
		writeFileSync(join(dir, "sub", "c-notes.markdown"), "Notes.");
		mkdirSync(join(dir, ".cache"));
		writeFileSync(join(dir, ".cache", "d-hidden.md"), "Hidden.");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("maps extensions to formats", () => {
		expect(formatForPath("a.md")).toBe("markdown");
		expect(formatForPath("A.MARKDOWN")).toBe("markdown");
		expect(formatForPath("a.txt")).toBe("pdf");
		expect(formatForPath("a.pdf")).toBe("pdf");
		expect(formatForPath("a.docx")).toBeNull();
	});

	test("document ids drop directory and extension", () => {
		expect(documentIdForPath("/docs/pump-manual.md")).toBe("pump-manual");
	});

	test("loads supported files of one directory in path order", async () => {
		const documents = await loadDirectory(dir);

		expect(documents.map((d) => [d.id, d.format])).toEqual([
			["a-manual", "markdown"],
			["b-guide", "pdf"],
		]);
		expect(documents[1]).toEqual({
			id: "b-guide",
			format: "pdf",
			text: "Open the valve slowly.",
			sourcePath: join(dir, "b-guide.txt"),
		});
	});

	test("recursive loading skips hidden directories", async () => {
		const documents = await loadDirectory(dir, { recursive: true });

		expect(documents.map((d) => d.id)).toEqual(["a-manual", "b-guide", "c-notes"]);
	});

	test("PDF files are read through text extraction", async () => {
		const path = join(dir, "pump-note.pdf");
		copyFileSync(PDF_FIXTURE, path);

		expect(await loadDocument(path)).toEqual({
			id: "pump-note",
			format: "pdf",
			text: "The pump feeds the valve.",
			sourcePath: path,
		});
	});

	test("unreadable PDFs name the file", async () => {
		const path = join(dir, "broken.pdf");
		writeFileSync(path, "not a pdf");

		await expect(loadDocument(path)).rejects.toThrow(`Cannot read PDF ${path}`);
	});

	test("unsupported files are refused", async () => {
		await expect(loadDocument(join(dir, "scan.docx"))).rejects.toThrow("Unsupported document type");
	});
});
