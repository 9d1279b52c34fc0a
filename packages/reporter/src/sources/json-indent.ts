import { AZURE_METADATA } from "@instance-reporter/shared";
import { jsonParseError } from "./issues.js";

function isJsonWhitespace(ch: string): boolean {
	return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/** Index just past the string literal starting at `start`. */
function stringEnd(text: string, start: number): number {
	let i = start + 1;
	while (i < text.length) {
		if (text[i] === "\\") {
			i += 2;
		} else if (text[i] === "\"") {
			return i + 1;
		} else {
			i++;
		}
	}
	return i;
}

function skipWhitespace(text: string, from: number): number {
	let i = from;
	while (i < text.length && isJsonWhitespace(text[i])) {
		i++;
	}
	return i;
}

/**
 * Re-indent a JSON document. Tokens are copied as written, so numbers keep
 * every digit and object keys keep their order; only whitespace changes.
 * Empty objects and arrays stay on one line.
 * Returns null when the text is not valid JSON.
 */
export function prettyPrintJson(text: string, indent: number = AZURE_METADATA.INDENT): string | null {
	if (jsonParseError(text) !== null) {
		return null;
	}

	const newline = (depth: number): string => `\n${" ".repeat(indent * depth)}`;
	let out = "";
	let depth = 0;
	let i = 0;

	while (i < text.length) {
		const ch = text[i];
		if (ch === "\"") {
			const end = stringEnd(text, i);
			out += text.slice(i, end);
			i = end;
			continue;
		}

		if (ch === "{" || ch === "[") {
			const close = ch === "{" ? "}" : "]";
			const next = skipWhitespace(text, i + 1);
			if (text[next] === close) {
				out += ch + close;
				i = next + 1;
				continue;
			}
			depth++;
			out += ch + newline(depth);
		} else if (ch === "}" || ch === "]") {
			depth--;
			out += newline(depth) + ch;
		} else if (ch === ",") {
			out += `,${newline(depth)}`;
		} else if (ch === ":") {
			out += ": ";
		} else if (!isJsonWhitespace(ch)) {
			out += ch;
		}
		i++;
	}

	return out;
}
