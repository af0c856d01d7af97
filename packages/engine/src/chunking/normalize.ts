/**
 * Text normalization applied before chunking.
 *
 * Chunk spans index into the normalized text, so every transformation
 * happens here and nowhere else.
 */

import type { DocumentFormat } from "../types";

const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function normalizeText(text: string): string {
	return text
		.replace(/\r\n?/g, "\n")
		.replace(CONTROL_CHARS, "")
		.replace(/[ \t]+\n/g, "\n")
		.replace(/\n{3,}/g, "\n\n")
		.trim();
}

/**
 * Strip markdown syntax while keeping the readable text and paragraph breaks.
 */
export function stripMarkdown(text: string): string {
	return (
		text
			// code fences: keep the code, drop the fence lines
			.replace(/^[ \t]*(```|~~~)[^\n]*$/gm, "")
			// images before links, both keep their visible text
			.replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
			.replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
			// reference-style link definitions
			.replace(/^[ \t]*\[[^\]]+\]:[ \t]*\S+.*$/gm, "")
			.replace(/^[ \t]{0,3}#{1,6}[ \t]+/gm, "")
			.replace(/^[ \t]*(?:-{3,}|\*{3,}|_{3,})[ \t]*$/gm, "")
			.replace(/^[ \t]*>[ \t]?/gm, "")
			.replace(/(\*\*|__)(?=\S)([^\n]*?\S)\1/g, "$2")
			.replace(/(?<![\w*])\*(?=\S)([^*\n]*?\S)\*(?![\w*])/g, "$1")
			.replace(/`([^`\n]+)`/g, "$1")
			.replace(/<\/?[A-Za-z][^>\n]*>/g, "")
	);
}

export function prepareText(text: string, format: DocumentFormat): string {
	return normalizeText(format === "markdown" ? stripMarkdown(text) : text);
}
