/* VEGA-LITE ADAPTER
/*-----------------------------------------------------
/* Converts a ChartSpec to a layered Vega-Lite specification.
/* Rendering compiles it with vega-lite and draws it with a
/* headless vega View.
/* ==================================================== */

import type { TopLevelSpec } from "vega-lite";
import { ComparebarError } from "../../errors/index.ts";
import { composeLayers, formatValue } from "../layers.ts";
import type {
	BarLayer,
	ChartComposition,
	ChartSpec,
	DisplayRow,
	Layer,
	RuleLayer,
	TextLayer,
} from "../types.ts";

export type VegaLiteSpec = Extract<TopLevelSpec, { layer: unknown }>;
type VegaLiteLayer = VegaLiteSpec["layer"][number];
type VegaLiteUnit = Extract<VegaLiteLayer, { mark: unknown }>;
type VegaLiteEncoding = NonNullable<VegaLiteUnit["encoding"]>;
type PositionDef = NonNullable<VegaLiteEncoding["x"]>;

const VEGA_LITE_SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json";

interface VegaLiteRow {
	label: string;
	value: number;
	text: string;
	fill: "primary" | "highlight";
	insideLabel: boolean;
}

function toRows(rows: DisplayRow[]): VegaLiteRow[] {
	return rows.map((row) => ({
		label: row.displayLabel,
		value: row.value,
		text: formatValue(row.value),
		fill: row.highlighted ? "highlight" : "primary",
		insideLabel: row.insideLabel,
	}));
}

function positionEncoding(chart: ChartComposition): Pick<VegaLiteEncoding, "x" | "y"> {
	// Vega-Lite lists nominal y values top-down; flipped charts put the first category at the bottom
	const sort = chart.flip ? [...chart.categories].reverse() : [...chart.categories];
	const category: PositionDef = {
		field: "label",
		type: "nominal",
		sort,
		axis: { title: chart.labels.x || null, ticks: false, domain: false },
	};
	const value: PositionDef = {
		field: "value",
		type: "quantitative",
		title: chart.labels.y,
		scale: { nice: false, zero: true },
	};
	return chart.flip ? { x: value, y: category } : { x: category, y: value };
}

function buildRuleLayer(layer: RuleLayer, flip: boolean): VegaLiteLayer {
	return {
		// One row, so the line is drawn once rather than per category
		data: { values: [{ aim: layer.value }] },
		mark: {
			type: "rule",
			color: layer.color,
			strokeWidth: layer.width,
			strokeDash: layer.dash,
		},
		encoding: flip
			? { x: { datum: layer.value, type: "quantitative" } }
			: { y: { datum: layer.value, type: "quantitative" } },
	};
}

function buildBarLayer(layer: BarLayer, chart: ChartComposition): VegaLiteLayer {
	const { fill } = layer;
	if (fill.mode === "uniform") {
		return {
			mark: { type: "bar", color: fill.color, width: { band: layer.bandWidth } },
			encoding: positionEncoding(chart),
		};
	}
	return {
		mark: { type: "bar", width: { band: layer.bandWidth } },
		encoding: {
			...positionEncoding(chart),
			color: {
				field: "fill",
				type: "nominal",
				scale: { domain: ["primary", "highlight"], range: [fill.primary, fill.highlight] },
				legend: null,
			},
		},
	};
}

// hjust becomes a pixel offset along the value axis, measured in font sizes
function buildTextLayer(layer: TextLayer, chart: ChartComposition): VegaLiteLayer {
	const inside = layer.placement === "inside";
	const shift = (inside ? layer.hjust - 1 : layer.hjust) * layer.size;
	return {
		transform: [{ filter: inside ? "datum.insideLabel" : "!datum.insideLabel" }],
		mark: chart.flip
			? {
					type: "text",
					align: inside ? "right" : "left",
					baseline: "middle",
					dx: -shift,
					fontSize: layer.size,
					color: chart.theme.textColor,
				}
			: {
					type: "text",
					align: "center",
					baseline: inside ? "top" : "bottom",
					dy: shift,
					fontSize: layer.size,
					color: chart.theme.textColor,
				},
		encoding: {
			...positionEncoding(chart),
			text: { field: "text", type: "nominal" },
		},
	};
}

function buildLayer(layer: Layer, chart: ChartComposition): VegaLiteLayer {
	switch (layer.kind) {
		case "rule":
			return buildRuleLayer(layer, chart.flip);
		case "bar":
			return buildBarLayer(layer, chart);
		case "text":
			return buildTextLayer(layer, chart);
	}
}

export function toVegaLiteSpec(spec: ChartSpec): VegaLiteSpec {
	const chart = composeLayers(spec);
	const { dimensions, padding, theme } = chart;

	const result: VegaLiteSpec = {
		$schema: VEGA_LITE_SCHEMA,
		width: dimensions.width - padding.left - padding.right,
		height: dimensions.height - padding.top - padding.bottom,
		padding: { ...padding },
		data: { values: toRows(spec.rows) },
		layer: chart.layers.map((layer) => buildLayer(layer, chart)),
		config: {
			font: theme.fontFamily,
			view: { stroke: null },
			axis: {
				grid: false,
				labelFontSize: theme.tickLabelSize,
				titleFontSize: theme.axisTitleSize,
			},
			title: { fontSize: theme.titleSize },
		},
	};

	if (chart.labels.title) result.title = chart.labels.title;

	return result;
}

export async function renderVegaLite(spec: ChartSpec): Promise<string> {
	let vegaLite: typeof import("vega-lite");
	let vega: typeof import("vega");

	try {
		vegaLite = await import("vega-lite");
	} catch (error) {
		throw new ComparebarError(
			"vega-lite could not be loaded",
			"install it: npm install vega-lite vega",
			{ cause: error },
		);
	}

	try {
		vega = await import("vega");
	} catch (error) {
		throw new ComparebarError(
			"vega could not be loaded",
			"install it: npm install vega-lite vega",
			{ cause: error },
		);
	}

	const compiled = vegaLite.compile(toVegaLiteSpec(spec));
	const view = new vega.View(vega.parse(compiled.spec), { renderer: "none" });
	return await view.toSVG();
}
