import { describe, expect, it } from "vitest";
import { DEFAULT_COMPARE_BAR_OPTIONS, resolveOptions } from "../src/plot/options.ts";
import { DEFAULT_COLORS, DEFAULT_PADDING, DEFAULT_THEME } from "../src/plot/types.ts";

/* OPTIONS
/*----------------------------------------------------- */

describe("resolveOptions", () => {
	it("should fill every default", () => {
		expect(resolveOptions("cases")).toEqual({
			countField: undefined,
			compareTarget: undefined,
			splitFraction: 0.1,
			aimValue: undefined,
			ascending: true,
			title: "",
			ylabel: "cases",
			colors: { primary: "lightblue", highlight: "#6baed6", aim: "blue" },
			flip: true,
			dimensions: { width: 800, height: 500 },
			padding: { top: 40, right: 60, bottom: 50, left: 140 },
		});
	});

	it("should merge colors and padding per key", () => {
		const resolved = resolveOptions("cases", {
			colors: { primary: "grey", aim: undefined },
			padding: { left: 10 },
		});
		expect(resolved.colors).toEqual({ primary: "grey", highlight: "#6baed6", aim: "blue" });
		expect(resolved.padding).toEqual({ top: 40, right: 60, bottom: 50, left: 10 });
	});

	it("should keep explicit falsy values", () => {
		const resolved = resolveOptions("cases", { ascending: false, flip: false, title: "" });
		expect(resolved.ascending).toBe(false);
		expect(resolved.flip).toBe(false);
	});

	it("should leave the defaults untouched", () => {
		resolveOptions("cases", { colors: { primary: "grey" } });
		expect(DEFAULT_COMPARE_BAR_OPTIONS.colors.primary).toBe("lightblue");
	});

	it("should resolve to fresh objects rather than the defaults", () => {
		const resolved = resolveOptions("cases");
		expect(resolved.colors).not.toBe(DEFAULT_COLORS);
		expect(resolved.padding).not.toBe(DEFAULT_PADDING);
	});
});

describe("defaults", () => {
	it("should be frozen", () => {
		expect(Object.isFrozen(DEFAULT_COMPARE_BAR_OPTIONS)).toBe(true);
		expect(Object.isFrozen(DEFAULT_COLORS)).toBe(true);
		expect(Object.isFrozen(DEFAULT_PADDING)).toBe(true);
		expect(Object.isFrozen(DEFAULT_THEME)).toBe(true);
		expect(Object.isFrozen(DEFAULT_THEME.aimDash)).toBe(true);
	});

	it("should refuse writes", () => {
		expect(Reflect.set(DEFAULT_THEME, "insideHjust", 0)).toBe(false);
		expect(Reflect.set(DEFAULT_COLORS, "primary", "red")).toBe(false);
		expect(DEFAULT_THEME.insideHjust).toBe(1.5);
		expect(DEFAULT_COLORS.primary).toBe("lightblue");
	});
});
