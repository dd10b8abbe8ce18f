import { describe, expect, it } from "vitest";
import {
	formatQuery,
	parseFieldToken,
	parseQuery,
	toMpcArgs,
	tokenize,
} from "../lib/query.js";

describe("tokenize", () => {
	it("should split on whitespace", () => {
		expect(tokenize("  david   bowie ")).toEqual(["david", "bowie"]);
	});

	it("should group quoted words, also after a field name", () => {
		expect(tokenize('artist:"David Bowie" low')).toEqual([
			"artist:David Bowie",
			"low",
		]);
		expect(tokenize('"heroes live"')).toEqual(["heroes live"]);
	});

	it("should read escaped quotes and backslashes literally", () => {
		expect(tokenize('album:"12\\" Singles" AC\\\\DC')).toEqual([
			'album:12" Singles',
			"AC\\DC",
		]);
		expect(tokenize("AC\\DC")).toEqual(["AC\\DC"]);
	});

	it("should run an unterminated quote to the end", () => {
		expect(tokenize('album:"Station to')).toEqual(["album:Station to"]);
	});
});

describe("parseFieldToken", () => {
	it("should split known fields case-insensitively", () => {
		expect(parseFieldToken("Artist:Bowie")).toEqual({
			field: "artist",
			value: "Bowie",
		});
		expect(parseFieldToken("modified-since:2024-01-01")).toEqual({
			field: "modified-since",
			value: "2024-01-01",
		});
	});

	it("should keep colons in the value", () => {
		expect(parseFieldToken("title:Part:2")).toEqual({
			field: "title",
			value: "Part:2",
		});
	});

	it("should reject unknown fields and bare words", () => {
		expect(parseFieldToken("colour:blue")).toBeUndefined();
		expect(parseFieldToken(":blue")).toBeUndefined();
		expect(parseFieldToken("bowie")).toBeUndefined();
	});
});

describe("parseQuery", () => {
	it("should extract a field/value pair", () => {
		expect(parseQuery("artist:Bowie")).toEqual([
			{ field: "artist", value: "Bowie" },
		]);
	});

	it("should treat a query without fields as a plain search", () => {
		expect(parseQuery("heroes")).toEqual([{ field: "any", value: "heroes" }]);
		expect(parseQuery("  let's   dance ")).toEqual([
			{ field: "any", value: "let's dance" },
		]);
	});

	it("should fall back to a plain search for unknown fields", () => {
		expect(parseQuery("colour:blue monday")).toEqual([
			{ field: "any", value: "colour:blue monday" },
		]);
	});

	it("should search unknown field tokens in any field", () => {
		expect(parseQuery("artist:Bowie colour:blue")).toEqual([
			{ field: "artist", value: "Bowie" },
			{ field: "any", value: "colour:blue" },
		]);
	});

	it("should return no filters for an empty query", () => {
		expect(parseQuery("")).toEqual([]);
		expect(parseQuery("   ")).toEqual([]);
		expect(parseQuery('""')).toEqual([]);
	});

	it("should search words following a field in any field", () => {
		expect(parseQuery("artist:bowie heroes")).toEqual([
			{ field: "artist", value: "bowie" },
			{ field: "any", value: "heroes" },
		]);
		expect(parseQuery("artist:bowie let's dance album:low")).toEqual([
			{ field: "artist", value: "bowie" },
			{ field: "any", value: "let's dance" },
			{ field: "album", value: "low" },
		]);
	});

	it("should search leading words in any field", () => {
		expect(parseQuery("heroes album:low")).toEqual([
			{ field: "any", value: "heroes" },
			{ field: "album", value: "low" },
		]);
	});

	it("should take quoted field values whole", () => {
		expect(parseQuery('artist:"David Bowie" heroes')).toEqual([
			{ field: "artist", value: "David Bowie" },
			{ field: "any", value: "heroes" },
		]);
	});

	it("should combine several fields", () => {
		expect(parseQuery('Artist:Bowie album:"Station to Station"')).toEqual([
			{ field: "artist", value: "Bowie" },
			{ field: "album", value: "Station to Station" },
		]);
	});

	it("should drop fields that have no value yet", () => {
		expect(parseQuery("heroes artist:")).toEqual([
			{ field: "any", value: "heroes" },
		]);
		expect(parseQuery("artist:")).toEqual([]);
	});
});

describe("toMpcArgs", () => {
	it("should flatten filters into type/query pairs", () => {
		expect(
			toMpcArgs([
				{ field: "any", value: "heroes" },
				{ field: "artist", value: "David Bowie" },
			]),
		).toEqual(["any", "heroes", "artist", "David Bowie"]);
	});

	it("should return no arguments for no filters", () => {
		expect(toMpcArgs([])).toEqual([]);
	});
});

describe("formatQuery", () => {
	it("should quote values containing spaces", () => {
		expect(
			formatQuery([
				{ field: "album", value: "Low" },
				{ field: "artist", value: "David Bowie" },
			]),
		).toBe('album:Low artist:"David Bowie"');
	});

	it("should produce a query that parses back to the same filters", () => {
		const filters = [
			{ field: "album" as const, value: "Station to Station" },
			{ field: "artist" as const, value: "David Bowie" },
		];
		expect(parseQuery(formatQuery(filters))).toEqual(filters);
	});

	it("should escape quotes and backslashes in values", () => {
		const filters = [
			{ field: "album" as const, value: '12" Singles' },
			{ field: "artist" as const, value: "AC\\DC" },
		];
		const query = formatQuery(filters);
		expect(query).toBe('album:"12\\" Singles" artist:"AC\\\\DC"');
		expect(parseQuery(query)).toEqual(filters);
	});
});
