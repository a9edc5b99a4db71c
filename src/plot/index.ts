/* PLOT MODULE
/*-----------------------------------------------------
/* Public API surface for the plot subsystem.
/* ==================================================== */

export { PlotBuilder, PlotResult, compareBar, safeCompareBar } from "./plot.ts";
export { buildCompareBarSpec } from "./charts/compare-bar.ts";
export { composeLayers, formatValue } from "./layers.ts";
export {
	DEFAULT_COMPARE_BAR_OPTIONS,
	resolveOptions,
	type ResolvedCompareBarOptions,
} from "./options.ts";
export { renderSvg } from "./svg.ts";
export {
	bandScale,
	computeNiceTicks,
	computeValueDomain,
	linearScale,
	type BandScale,
	type LinearScale,
} from "./scales.ts";
export type {
	BarFill,
	BarLayer,
	ChartColors,
	ChartComposition,
	ChartSpec,
	ChartTheme,
	ColumnData,
	CompareBarOptions,
	Dataset,
	DefaultTheme,
	Dimensions,
	DisplayRow,
	LabelPlacement,
	Layer,
	Padding,
	Row,
	RuleLayer,
	TextLayer,
} from "./types.ts";
export {
	DEFAULT_COLORS,
	DEFAULT_DIMENSIONS,
	DEFAULT_PADDING,
	DEFAULT_THEME,
} from "./types.ts";
export {
	toVegaLiteSpec,
	renderVegaLite,
	type VegaLiteSpec,
} from "./adapters/vega-lite.ts";
