/* LAYER COMPOSITION
/*-----------------------------------------------------
/* Turns a ChartSpec into the ordered layer list and the
/* scale/theme directives every renderer draws from.
/* ==================================================== */

import type {
	BarFill,
	ChartComposition,
	ChartSpec,
	Layer,
} from "./types.ts";

export function composeLayers(spec: ChartSpec): ChartComposition {
	const { theme, colors } = spec;
	const layers: Layer[] = [];

	if (spec.aimValue !== undefined) {
		layers.push({
			kind: "rule",
			value: spec.aimValue,
			color: colors.aim,
			width: theme.aimLineWidth,
			dash: theme.aimDash,
		});
	}

	const fill: BarFill =
		spec.compareTarget === undefined
			? { mode: "uniform", color: colors.primary }
			: { mode: "byClass", primary: colors.primary, highlight: colors.highlight };

	layers.push({
		kind: "bar",
		rows: spec.rows,
		fill,
		bandWidth: theme.barWidth,
	});

	layers.push({
		kind: "text",
		placement: "inside",
		rows: spec.rows.filter((row) => row.insideLabel),
		hjust: theme.insideHjust,
		size: theme.valueLabelSize,
	});

	layers.push({
		kind: "text",
		placement: "outside",
		rows: spec.rows.filter((row) => !row.insideLabel),
		hjust: theme.outsideHjust,
		size: theme.valueLabelSize,
	});

	return {
		layers,
		categories: spec.categories,
		labels: { title: spec.title, x: spec.xlabel, y: spec.ylabel },
		valueScale: { expand: 0 },
		theme,
		flip: spec.flip,
		dimensions: spec.dimensions,
		padding: spec.padding,
	};
}

// Value label text: integers verbatim, otherwise at most two decimals
export function formatValue(value: number): string {
	if (Number.isInteger(value)) return String(value);
	return String(Number(value.toFixed(2)));
}

export function fillColor(fill: BarFill, highlighted: boolean): string {
	if (fill.mode === "uniform") return fill.color;
	return highlighted ? fill.highlight : fill.primary;
}
