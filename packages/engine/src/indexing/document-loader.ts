/**
 * Document loader: reads source files into Documents.
 *
 * `.md` / `.markdown` files are markdown. `.pdf` files are read through
 * pdf-parse, one paragraph per page; `.txt` files hold PDF text extracted
 * elsewhere. The document id is the file name without its extension, which is
 * also the provenance id the triplet loader writes on graph relations.
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { errorMessage } from "../errors";
import type { Document, DocumentFormat } from "../types";

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
	".md": "markdown",
	".markdown": "markdown",
	".txt": "pdf",
	".pdf": "pdf",
};

export function formatForPath(path: string): DocumentFormat | null {
	return FORMAT_BY_EXTENSION[extname(path).toLowerCase()] ?? null;
}

export function documentIdForPath(path: string): string {
	return basename(path, extname(path));
}

/** Page texts of a PDF, blank pages dropped */
export async function extractPdfText(data: Uint8Array): Promise<string> {
	const { PDFParse } = await import("pdf-parse");
	const parser = new PDFParse({ data });
	try {
		const result = await parser.getText();
		return result.pages
			.map((page) => page.text.trim())
			.filter((text) => text.length > 0)
			.join("\n\n");
	} finally {
		await parser.destroy();
	}
}

async function readText(path: string): Promise<string> {
	if (extname(path).toLowerCase() !== ".pdf") return readFile(path, "utf8");
	try {
		return await extractPdfText(new Uint8Array(await readFile(path)));
	} catch (error) {
		throw new Error(`Cannot read PDF ${path}: ${errorMessage(error)}`, { cause: error });
	}
}

export async function loadDocument(path: string): Promise<Document> {
	const format = formatForPath(path);
	if (!format) {
		throw new Error(`Unsupported document type: ${path}`);
	}
	return {
		id: documentIdForPath(path),
		format,
		text: await readText(path),
		sourcePath: path,
	};
}

export interface LoadDirectoryOptions {
	/** Descend into subdirectories (default: false) */
	recursive?: boolean;
}

/** Load every supported file of a directory, sorted by path */
export async function loadDirectory(
	directory: string,
	options: LoadDirectoryOptions = {},
): Promise<Document[]> {
	const paths: string[] = [];

	async function walk(dir: string): Promise<void> {
		const entries = await readdir(dir, { withFileTypes: true });
		for (const entry of entries) {
			const path = join(dir, entry.name);
			if (entry.isDirectory()) {
				if (options.recursive && !entry.name.startsWith(".")) await walk(path);
			} else if (entry.isFile() && formatForPath(entry.name)) {
				paths.push(path);
			}
		}
	}

	await walk(directory);
	paths.sort();

	const documents: Document[] = [];
	for (const path of paths) {
		documents.push(await loadDocument(path));
	}
	return documents;
}
