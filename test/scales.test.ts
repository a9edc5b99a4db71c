import { describe, expect, it } from "vitest";
import {
	bandScale,
	computeNiceTicks,
	computeValueDomain,
	linearScale,
} from "../src/plot/scales.ts";

/* SCALES
/*----------------------------------------------------- */

describe("linearScale", () => {
	it("should map domain values to range values", () => {
		const scale = linearScale([0, 100], [0, 500]);
		expect(scale(0)).toBe(0);
		expect(scale(50)).toBe(250);
		expect(scale(100)).toBe(500);
	});

	it("should handle inverted ranges (top=height, bottom=0)", () => {
		const scale = linearScale([0, 100], [400, 0]);
		expect(scale(0)).toBe(400);
		expect(scale(100)).toBe(0);
		expect(scale(50)).toBe(200);
	});

	it("should return midpoint when domain span is zero", () => {
		const scale = linearScale([5, 5], [0, 100]);
		expect(scale(5)).toBe(50);
	});

	it("should preserve domain and range on the function object", () => {
		const scale = linearScale([10, 20], [100, 200]);
		expect(scale.domain).toEqual([10, 20]);
		expect(scale.range).toEqual([100, 200]);
	});
});

describe("bandScale", () => {
	it("should map categories to band centers", () => {
		const scale = bandScale(["A", "B", "C"], [0, 300]);
		expect(scale("A")).toBe(50);
		expect(scale("B")).toBe(150);
		expect(scale("C")).toBe(250);
		expect(scale.bandwidth).toBe(100);
	});

	it("should return range start for unknown categories", () => {
		const scale = bandScale(["A"], [50, 150]);
		expect(scale("unknown")).toBe(50);
	});

	it("should keep the first band of a repeated category", () => {
		const scale = bandScale(["A", "A"], [0, 200]);
		expect(scale("A")).toBe(50);
	});

	it("should handle empty domain", () => {
		const scale = bandScale([], [0, 100]);
		expect(scale.bandwidth).toBe(0);
	});
});

describe("computeNiceTicks", () => {
	it("should produce human-readable tick values", () => {
		expect(computeNiceTicks(0, 100, 5)).toEqual([0, 20, 40, 60, 80, 100]);
	});

	it("should return single-element array when min equals max", () => {
		expect(computeNiceTicks(42, 42, 5)).toEqual([42]);
	});

	it("should cover fractional ranges", () => {
		const ticks = computeNiceTicks(0, 1, 5);
		expect(ticks[0]).toBeLessThanOrEqual(0);
		expect(ticks[ticks.length - 1]).toBeGreaterThanOrEqual(1);
	});
});

describe("computeValueDomain", () => {
	it("should start at zero for positive values", () => {
		expect(computeValueDomain([10, 100, 5])).toEqual([0, 100]);
	});

	it("should stretch to include the aim value", () => {
		expect(computeValueDomain([10, 100, 5], 150)).toEqual([0, 150]);
		expect(computeValueDomain([5], -10)).toEqual([-10, 5]);
	});

	it("should include negative values", () => {
		expect(computeValueDomain([-20, 30])).toEqual([-20, 30]);
	});

	it("should fall back to [0, 1] when everything is zero", () => {
		expect(computeValueDomain([0, 0])).toEqual([0, 1]);
		expect(computeValueDomain([])).toEqual([0, 1]);
	});
});
