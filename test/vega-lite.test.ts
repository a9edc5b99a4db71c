import { describe, expect, it } from "vitest";
import { buildCompareBarSpec } from "../src/plot/charts/compare-bar.ts";
import { renderVegaLite, toVegaLiteSpec } from "../src/plot/adapters/vega-lite.ts";
import type { CompareBarOptions } from "../src/plot/types.ts";
import { SAMPLE } from "./test-utils.ts";

function convert(options: CompareBarOptions = {}) {
	return toVegaLiteSpec(buildCompareBarSpec(SAMPLE, "cat", "val", options));
}

/* VEGA-LITE ADAPTER
/*----------------------------------------------------- */

describe("toVegaLiteSpec", () => {
	it("should size the view to the plot area", () => {
		const vl = convert();
		expect(vl.$schema).toBe("https://vega.github.io/schema/vega-lite/v5.json");
		expect(vl.width).toBe(600);
		expect(vl.height).toBe(410);
		expect(vl.padding).toEqual({ top: 40, right: 60, bottom: 50, left: 140 });
	});

	it("should carry one data row per bar in axis order", () => {
		const vl = convert({ compareTarget: "A" });
		expect(vl.data).toEqual({
			values: [
				{ label: "C", value: 5, text: "5", fill: "primary", insideLabel: false },
				{ label: "A", value: 10, text: "10", fill: "highlight", insideLabel: false },
				{ label: "B", value: 100, text: "100", fill: "primary", insideLabel: true },
			],
		});
	});

	it("should layer bars and both label sets", () => {
		const vl = convert();
		expect(vl.layer).toHaveLength(3);
		expect(vl.layer[0]).toMatchObject({
			mark: { type: "bar", color: "lightblue", width: { band: 0.8 } },
			encoding: {
				x: { field: "value", type: "quantitative", title: "val" },
				y: { field: "label", type: "nominal", sort: ["B", "A", "C"] },
			},
		});
	});

	it("should place inside labels right-aligned and outside labels left-aligned", () => {
		const vl = convert();
		expect(vl.layer[1]).toMatchObject({
			transform: [{ filter: "datum.insideLabel" }],
			mark: { type: "text", align: "right", dx: -5 },
			encoding: { text: { field: "text" } },
		});
		expect(vl.layer[2]).toMatchObject({
			transform: [{ filter: "!datum.insideLabel" }],
			mark: { type: "text", align: "left", dx: 5 },
		});
	});

	it("should color bars by class when comparing", () => {
		const vl = convert({ compareTarget: "B" });
		expect(vl.layer[0]).toMatchObject({
			encoding: {
				color: {
					field: "fill",
					scale: { domain: ["primary", "highlight"], range: ["lightblue", "#6baed6"] },
					legend: null,
				},
			},
		});
	});

	it("should add a dashed rule for the aim value", () => {
		const vl = convert({ aimValue: 50 });
		expect(vl.layer).toHaveLength(4);
		expect(vl.layer[0]).toMatchObject({
			mark: { type: "rule", color: "blue", strokeWidth: 1, strokeDash: [6, 4] },
			encoding: { x: { datum: 50, type: "quantitative" } },
		});
	});

	it("should put categories on x when not flipped", () => {
		const vl = convert({ flip: false, aimValue: 20 });
		expect(vl.layer[0]).toMatchObject({ encoding: { y: { datum: 20 } } });
		expect(vl.layer[1]).toMatchObject({
			encoding: {
				x: { field: "label", sort: ["C", "A", "B"] },
				y: { field: "value" },
			},
		});
		expect(vl.layer[2]).toMatchObject({ mark: { baseline: "top", dy: 5 } });
		expect(vl.layer[3]).toMatchObject({ mark: { baseline: "bottom", dy: -5 } });
	});

	it("should set the title only when given", () => {
		expect(convert().title).toBeUndefined();
		expect(convert({ title: "Cases" }).title).toBe("Cases");
	});
});

describe("renderVegaLite", () => {
	it("should render the layered spec to SVG", async () => {
		const svg = await renderVegaLite(
			buildCompareBarSpec(SAMPLE, "cat", "val", { compareTarget: "B", aimValue: 50 }),
		);
		expect(svg).toContain("<svg");
		expect(svg).toContain("</svg>");
	}, 20_000);
});
