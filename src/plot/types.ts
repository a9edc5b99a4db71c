/* PLOT TYPES
/*-----------------------------------------------------
/* Neutral intermediate representation for comparison bar charts.
/* The builder produces ChartSpec, the renderers consume it.
/* ==================================================== */

export type Row = Readonly<Record<string, unknown>>;

export type Dataset = readonly Row[];

export type ColumnData = Readonly<Record<string, ArrayLike<unknown>>>;

export interface DisplayRow {
	category: string;
	displayLabel: string;
	value: number;
	count?: string | number | boolean;
	insideLabel: boolean;
	highlighted: boolean;
	/** Position of the source row in the input dataset */
	index: number;
}

export interface ChartColors {
	primary: string;
	highlight: string;
	aim: string;
}

export interface Padding {
	top: number;
	right: number;
	bottom: number;
	left: number;
}

export interface Dimensions {
	width: number;
	height: number;
}

export interface ChartTheme {
	fontFamily: string;
	textColor: string;
	axisColor: string;
	titleSize: number;
	axisTitleSize: number;
	tickLabelSize: number;
	valueLabelSize: number;
	axisLineWidth: number;
	barWidth: number;
	aimLineWidth: number;
	aimDash: [number, number];
	/** Horizontal label offset, in label widths, for labels drawn inside a bar */
	insideHjust: number;
	/** Horizontal label offset, in label widths, for labels drawn past a bar */
	outsideHjust: number;
}

export interface ChartSpec {
	rows: DisplayRow[];
	categories: string[];
	threshold: number;
	splitFraction: number;
	aimValue?: number;
	compareTarget?: string;
	highlightLabel?: string;
	title: string;
	xlabel: string;
	ylabel: string;
	colors: ChartColors;
	flip: boolean;
	ascending: boolean;
	dimensions: Dimensions;
	padding: Padding;
	theme: ChartTheme;
}

export interface CompareBarOptions {
	/** Field whose value annotates each category as "{category} (N={count})" */
	countField?: string;
	/** Substring of the category label to highlight */
	compareTarget?: string;
	/** Fraction of the largest value below which labels go outside the bar (default: 0.1) */
	splitFraction?: number;
	/** Position of the dashed reference line */
	aimValue?: number;
	/** Sort bars by ascending value (default: true) */
	ascending?: boolean;
	title?: string;
	/** Value axis title (default: the value field name) */
	ylabel?: string;
	colors?: Partial<ChartColors>;
	/** Draw bars horizontally (default: true) */
	flip?: boolean;
	width?: number;
	height?: number;
	padding?: Partial<Padding>;
}

/* LAYERS
/*----------------------------------------------------- */

export interface RuleLayer {
	kind: "rule";
	value: number;
	color: string;
	width: number;
	dash: [number, number];
}

export type BarFill =
	| { mode: "uniform"; color: string }
	| { mode: "byClass"; primary: string; highlight: string };

export interface BarLayer {
	kind: "bar";
	rows: DisplayRow[];
	fill: BarFill;
	bandWidth: number;
}

export type LabelPlacement = "inside" | "outside";

export interface TextLayer {
	kind: "text";
	placement: LabelPlacement;
	rows: DisplayRow[];
	hjust: number;
	size: number;
}

export type Layer = RuleLayer | BarLayer | TextLayer;

export interface ChartComposition {
	layers: Layer[];
	categories: string[];
	labels: { title: string; x: string; y: string };
	valueScale: { expand: number };
	theme: ChartTheme;
	flip: boolean;
	dimensions: Dimensions;
	padding: Padding;
}

export const DEFAULT_DIMENSIONS: Readonly<Dimensions> = Object.freeze({ width: 800, height: 500 });
export const DEFAULT_PADDING: Readonly<Padding> = Object.freeze({
	top: 40,
	right: 60,
	bottom: 50,
	left: 140,
});
export const DEFAULT_COLORS: Readonly<ChartColors> = Object.freeze({
	primary: "lightblue",
	highlight: "#6baed6",
	aim: "blue",
});

/** Frozen default style; charts take a mutable copy */
export type DefaultTheme = Readonly<Omit<ChartTheme, "aimDash">> & {
	readonly aimDash: readonly [number, number];
};

export const DEFAULT_THEME: DefaultTheme = Object.freeze({
	fontFamily: "system-ui, -apple-system, sans-serif",
	textColor: "#333",
	axisColor: "#333",
	titleSize: 14,
	axisTitleSize: 12,
	tickLabelSize: 10,
	valueLabelSize: 10,
	axisLineWidth: 0.5,
	barWidth: 0.8,
	aimLineWidth: 1,
	aimDash: Object.freeze([6, 4] as const),
	insideHjust: 1.5,
	outsideHjust: -0.5,
});
