// CHANGE: Specs for the suppression engine (decide, normalize, merge)
// WHY: Every reported issue passes through shouldIgnore; merge layers project and CLI rules
// INVARIANT: normalize and shouldIgnore never throw; merge never mutates; wildcard is sticky

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	type IgnoreConfig,
	type IgnoreSpec,
	mergeIgnoreConfig,
	normalizeIgnoreConfig,
	shouldIgnore,
	WILDCARD,
} from "../../../src/core/lint/index.js";
import { issue } from "../../utils/builders.js";

const spec = (
	ids: IgnoreSpec["ids"],
	byFilename: Record<string, string[]> = {},
): IgnoreSpec => ({
	ids,
	byFilename: new Map(
		Object.entries(byFilename).map(([id, globs]) => [id, new Set(globs)]),
	),
});

describe("shouldIgnore", () => {
	it("keeps issues of linters without rules", () => {
		expect(shouldIgnore("other", issue(), new Map())).toBe(false);
	});

	it("hides everything from a wildcard linter", () => {
		const config: IgnoreConfig = new Map([["dummy", spec(WILDCARD)]]);
		expect(shouldIgnore("dummy", issue({ id: "ANY" }), config)).toBe(true);
	});

	it("hides issues whose id is listed", () => {
		const config: IgnoreConfig = new Map([["dummy", spec(new Set(["D001"]))]]);
		expect(shouldIgnore("dummy", issue({ id: "D001" }), config)).toBe(true);
		expect(shouldIgnore("dummy", issue({ id: "D002" }), config)).toBe(false);
	});

	it("matches filename globs against the full filename", () => {
		const matching: IgnoreConfig = new Map([
			["dummy", spec(new Set(), { D001: ["*/README.*"] })],
		]);
		const unrelated: IgnoreConfig = new Map([
			["dummy", spec(new Set(), { D001: ["*.txt"] })],
		]);
		const target = issue({ id: "D001", filename: "/x/README.md" });
		expect(shouldIgnore("dummy", target, matching)).toBe(true);
		expect(shouldIgnore("dummy", target, unrelated)).toBe(false);
	});

	it("only applies globs to the issue id they are registered for", () => {
		const config: IgnoreConfig = new Map([
			["dummy", spec(new Set(), { D002: ["*"] })],
		]);
		expect(shouldIgnore("dummy", issue({ id: "D001" }), config)).toBe(false);
	});
});

describe("normalizeIgnoreConfig", () => {
	it("turns string ids into single-element sets", () => {
		const config = normalizeIgnoreConfig({ dummy: { ids: "D001" } });
		expect(config.get("dummy")).toEqual(spec(new Set(["D001"])));
	});

	it("keeps wildcard and drops filename rules under it", () => {
		const config = normalizeIgnoreConfig({
			dummy: { ids: "*", by_filename: { D001: "*.md" } },
		});
		expect(config.get("dummy")).toEqual(spec(WILDCARD));
	});

	it("normalizes list and scalar glob values", () => {
		const config = normalizeIgnoreConfig({
			dummy: { ids: ["A", "B"], by_filename: { C: "*.md", D: ["a/*", "b/*"] } },
		});
		expect(config.get("dummy")).toEqual(
			spec(new Set(["A", "B"]), { C: ["*.md"], D: ["a/*", "b/*"] }),
		);
	});

	it("defaults missing keys to empty collections", () => {
		expect(normalizeIgnoreConfig({ dummy: {} }).get("dummy")).toEqual(
			spec(new Set()),
		);
	});

	it("drops entries that are not mappings", () => {
		const config = normalizeIgnoreConfig({ bad: "nope", list: [1], ok: { ids: [] } });
		expect([...config.keys()]).toEqual(["ok"]);
	});

	it("returns an empty config for non-mapping documents", () => {
		expect(normalizeIgnoreConfig(null).size).toBe(0);
		expect(normalizeIgnoreConfig("text").size).toBe(0);
		expect(normalizeIgnoreConfig([1, 2]).size).toBe(0);
	});

	it("ignores non-string members", () => {
		const config = normalizeIgnoreConfig({ dummy: { ids: ["A", 3, null] } });
		expect(config.get("dummy")).toEqual(spec(new Set(["A"])));
	});

	it("never throws for arbitrary input", () => {
		fc.assert(
			fc.property(fc.anything(), (raw) => {
				expect(normalizeIgnoreConfig(raw)).toBeInstanceOf(Map);
			}),
		);
	});
});

describe("mergeIgnoreConfig", () => {
	it("unions id sets", () => {
		const merged = mergeIgnoreConfig(
			new Map([["A", spec(new Set(["x"]))]]),
			new Map([["A", spec(new Set(["y"]))]]),
		);
		expect(merged.get("A")).toEqual(spec(new Set(["x", "y"])));
	});

	it("lets an overlay wildcard win", () => {
		const merged = mergeIgnoreConfig(
			new Map([["A", spec(new Set(["x"]), { x: ["*.md"] })]]),
			new Map([["A", spec(WILDCARD)]]),
		);
		expect(merged.get("A")).toEqual(spec(WILDCARD));
	});

	it("keeps a base wildcard", () => {
		const merged = mergeIgnoreConfig(
			new Map([["A", spec(WILDCARD)]]),
			new Map([["A", spec(new Set(["y"]), { y: ["*.md"] })]]),
		);
		expect(merged.get("A")).toEqual(spec(WILDCARD));
	});

	it("unions glob sets per issue id", () => {
		const merged = mergeIgnoreConfig(
			new Map([["A", spec(new Set(), { x: ["*.md"] })]]),
			new Map([["A", spec(new Set(), { x: ["*.txt"], y: ["*"] })]]),
		);
		expect(merged.get("A")).toEqual(
			spec(new Set(), { x: ["*.md", "*.txt"], y: ["*"] }),
		);
	});

	it("adds linters present only in the overlay", () => {
		const merged = mergeIgnoreConfig(
			new Map([["A", spec(new Set(["x"]))]]),
			new Map([["B", spec(new Set(["y"]))]]),
		);
		expect([...merged.keys()]).toEqual(["A", "B"]);
	});

	it("does not mutate its inputs", () => {
		const base: IgnoreConfig = new Map([["A", spec(new Set(["x"]), { x: ["*.md"] })]]);
		const overlay: IgnoreConfig = new Map([["A", spec(new Set(["y"]), { x: ["*.txt"] })]]);
		const merged = mergeIgnoreConfig(base, overlay);
		expect(base.get("A")).toEqual(spec(new Set(["x"]), { x: ["*.md"] }));
		expect(overlay.get("A")).toEqual(spec(new Set(["y"]), { x: ["*.txt"] }));
		merged.get("A")?.byFilename.get("x")?.add("*.rst");
		expect(base.get("A")?.byFilename.get("x")).toEqual(new Set(["*.md"]));
	});

	it("keeps wildcard sticky whichever side carries it", () => {
		const idSet = fc.uniqueArray(fc.string({ maxLength: 4 }), { maxLength: 4 });
		fc.assert(
			fc.property(idSet, fc.boolean(), (ids, wildcardOnBase) => {
				const wild: IgnoreConfig = new Map([["A", spec(WILDCARD)]]);
				const plain: IgnoreConfig = new Map([["A", spec(new Set(ids))]]);
				const merged = wildcardOnBase
					? mergeIgnoreConfig(wild, plain)
					: mergeIgnoreConfig(plain, wild);
				expect(merged.get("A")?.ids).toBe(WILDCARD);
				expect(merged.get("A")?.byFilename.size).toBe(0);
			}),
		);
	});
});
