import debugCreator from "debug";
import { PACKAGE_NAME, SEARCH_TYPES } from "./const.js";
import type { FieldFilter, SearchType } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:query`);

const searchTypes: ReadonlySet<string> = new Set(SEARCH_TYPES);

const isSearchType = (val: string): val is SearchType => searchTypes.has(val);

/**
 * Splits a query on whitespace. Double quotes group words, also after
 * a field name: `artist:"David Bowie" low` -> ['artist:David Bowie', 'low'].
 * `\"` and `\\` stand for a literal quote and backslash.
 * An unterminated quote runs to the end of the query.
 */
export function tokenize(query: string): string[] {
	const tokens: string[] = [];
	const chars = [...query];
	let current = "";
	let inQuotes = false;
	let hasToken = false;

	for (let i = 0; i < chars.length; i++) {
		const char = chars[i];
		const next = chars[i + 1];
		if (char === "\\" && (next === '"' || next === "\\")) {
			current += next;
			hasToken = true;
			i++;
		} else if (char === '"') {
			inQuotes = !inQuotes;
			hasToken = true;
		} else if (!inQuotes && /\s/.test(char)) {
			if (hasToken) {
				tokens.push(current);
			}
			current = "";
			hasToken = false;
		} else {
			current += char;
			hasToken = true;
		}
	}
	if (hasToken) {
		tokens.push(current);
	}
	return tokens;
}

/**
 * Splits a `field:value` token. The field must be a known search type
 * (case-insensitive); anything else is not a field token.
 */
export function parseFieldToken(
	token: string,
): { field: SearchType; value: string } | undefined {
	const idx = token.indexOf(":");
	if (idx <= 0) {
		return undefined;
	}
	const field = token.substring(0, idx).toLowerCase();
	if (!isSearchType(field)) {
		return undefined;
	}
	return { field, value: token.substring(idx + 1) };
}

/**
 * Parses a free-text query into search filters.
 *
 * - `field:value` is a filter on a known field. Values with spaces
 *   are quoted: `artist:"David Bowie"`.
 * - Runs of bare words search `any`, so `artist:bowie heroes`
 *   matches the artist "bowie" and "heroes" in any tag.
 * - Tokens naming an unknown field are bare words.
 * - Filters left without a value are dropped.
 *
 * An empty query yields no filters.
 * @example
 * parseQuery("heroes album:low") // [{ field: "any", value: "heroes" }, { field: "album", value: "low" }]
 */
export function parseQuery(query: string): FieldFilter[] {
	const filters: FieldFilter[] = [];
	let words: FieldFilter | undefined;
	for (const token of tokenize(query)) {
		const fieldToken = parseFieldToken(token);
		if (fieldToken) {
			filters.push({ field: fieldToken.field, value: fieldToken.value });
			words = undefined;
			continue;
		}
		if (!words) {
			words = { field: "any", value: "" };
			filters.push(words);
		}
		words.value = words.value ? `${words.value} ${token}` : token;
	}

	const result = filters.filter((filter) => filter.value.trim() !== "");
	debug("query=%o, filters=%o", query, result);
	return result;
}

/**
 * Flattens filters into the `type query` pairs `mpc search` takes.
 */
export function toMpcArgs(filters: FieldFilter[]): string[] {
	return filters.flatMap((filter) => [filter.field, filter.value]);
}

const quoteValue = (value: string): string =>
	/[\s"\\]/.test(value) ? `"${value.replace(/["\\]/g, "\\$&")}"` : value;

/**
 * Formats filters back into query text that {@link parseQuery} reads
 * back unchanged. Used to build launcher autocompletions.
 */
export function formatQuery(filters: FieldFilter[]): string {
	return filters.map(({ field, value }) => `${field}:${quoteValue(value)}`).join(" ");
}
