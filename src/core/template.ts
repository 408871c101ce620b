import { TemplateError } from "./errors.js";

export type Lookup = (name: string) => string | undefined;

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;

/**
 * Shell-style parameter substitution. Names the lookup does not know expand
 * to an empty string; only malformed expressions raise.
 */
export function substitute(text: string, lookup: Lookup): string {
	if (!text.includes("$")) {
		return text;
	}

	let output = "";
	let index = 0;
	while (index < text.length) {
		const char = text[index];
		if (char !== "$") {
			output += char;
			index += 1;
			continue;
		}

		const next = text[index + 1];
		if (next === "$") {
			output += "$";
			index += 2;
			continue;
		}

		if (next === "{") {
			const close = closingBrace(text, index + 2);
			if (close === -1) {
				throw new TemplateError("unterminated substitution", index);
			}
			output += expand(text.slice(index + 2, close), lookup, index);
			index = close + 1;
			continue;
		}

		if (next !== undefined && NAME_START.test(next)) {
			let end = index + 1;
			while (end < text.length && NAME_PART.test(text[end])) {
				end += 1;
			}
			output += lookup(text.slice(index + 1, end)) ?? "";
			index = end;
			continue;
		}

		output += char;
		index += 1;
	}
	return output;
}

function expand(expression: string, lookup: Lookup, offset: number): string {
	if (expression.startsWith("#") && isName(expression.slice(1))) {
		return String((lookup(expression.slice(1)) ?? "").length);
	}

	let end = 0;
	while (end < expression.length && NAME_PART.test(expression[end])) {
		end += 1;
	}
	const name = expression.slice(0, end);
	if (!isName(name)) {
		throw new TemplateError("bad substitution", offset);
	}

	const raw = lookup(name);
	const value = raw ?? "";
	const operation = expression.slice(end);
	const argument = (skip: number): string => substitute(operation.slice(skip), lookup);

	if (operation === "") {
		return value;
	}
	if (operation.startsWith(":-") || operation.startsWith(":=")) {
		return value === "" ? argument(2) : value;
	}
	if (operation.startsWith("-") || operation.startsWith("=")) {
		return raw === undefined ? argument(1) : value;
	}
	switch (operation) {
		case "^^":
			return value.toUpperCase();
		case ",,":
			return value.toLowerCase();
		case "^":
			return value.charAt(0).toUpperCase() + value.slice(1);
		case ",":
			return value.charAt(0).toLowerCase() + value.slice(1);
	}
	if (operation.startsWith("##")) {
		return trimPrefix(value, globPattern(argument(2)), true);
	}
	if (operation.startsWith("#")) {
		return trimPrefix(value, globPattern(argument(1)), false);
	}
	if (operation.startsWith("%%")) {
		return trimSuffix(value, globPattern(argument(2)), true);
	}
	if (operation.startsWith("%")) {
		return trimSuffix(value, globPattern(argument(1)), false);
	}
	if (operation.startsWith("/")) {
		const all = operation.startsWith("//");
		const [search, replacement = ""] = operation.slice(all ? 2 : 1).split("/", 2);
		if (search === "") {
			return value;
		}
		return all ? value.split(search).join(replacement) : value.replace(search, () => replacement);
	}

	const slice = operation.match(/^:\s*(-?\d+)(?::(\d+))?$/);
	if (slice) {
		const start = Number(slice[1]);
		const from = start < 0 ? Math.max(value.length + start, 0) : start;
		return slice[2] === undefined ? value.slice(from) : value.slice(from, from + Number(slice[2]));
	}

	throw new TemplateError("bad substitution", offset);
}

// Index of the brace closing a `${` opened just before `from`, or -1.
function closingBrace(text: string, from: number): number {
	let depth = 0;
	for (let i = from; i < text.length; i += 1) {
		if (text[i] === "$" && text[i + 1] === "$") {
			i += 1;
		} else if (text[i] === "$" && text[i + 1] === "{") {
			depth += 1;
			i += 1;
		} else if (text[i] === "}") {
			if (depth === 0) {
				return i;
			}
			depth -= 1;
		}
	}
	return -1;
}

function isName(value: string): boolean {
	return value.length > 0 && NAME_START.test(value[0]) && [...value].every((c) => NAME_PART.test(c));
}

function globPattern(glob: string): RegExp {
	const source = [...glob]
		.map((char) => {
			if (char === "*") {
				return ".*";
			}
			if (char === "?") {
				return ".";
			}
			return char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
		})
		.join("");
	return new RegExp(`^${source}$`, "s");
}

function trimPrefix(value: string, pattern: RegExp, longest: boolean): string {
	for (let i = 0; i <= value.length; i += 1) {
		const length = longest ? value.length - i : i;
		if (pattern.test(value.slice(0, length))) {
			return value.slice(length);
		}
	}
	return value;
}

function trimSuffix(value: string, pattern: RegExp, longest: boolean): string {
	for (let i = 0; i <= value.length; i += 1) {
		const start = longest ? i : value.length - i;
		if (pattern.test(value.slice(start))) {
			return value.slice(0, start);
		}
	}
	return value;
}
