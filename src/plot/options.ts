/* COMPARE BAR OPTIONS
/*-----------------------------------------------------
/* Defaults and resolution of user-facing chart options.
/* ==================================================== */

import {
	DEFAULT_COLORS,
	DEFAULT_DIMENSIONS,
	DEFAULT_PADDING,
	type ChartColors,
	type CompareBarOptions,
	type Dimensions,
	type Padding,
} from "./types.ts";

/** Default chart options */
export const DEFAULT_COMPARE_BAR_OPTIONS = Object.freeze({
	splitFraction: 0.1,
	ascending: true,
	title: "",
	flip: true,
	colors: DEFAULT_COLORS,
	width: DEFAULT_DIMENSIONS.width,
	height: DEFAULT_DIMENSIONS.height,
	padding: DEFAULT_PADDING,
} as const);

/** Options with every default filled in */
export interface ResolvedCompareBarOptions {
	countField: string | undefined;
	compareTarget: string | undefined;
	splitFraction: number;
	aimValue: number | undefined;
	ascending: boolean;
	title: string;
	ylabel: string;
	colors: ChartColors;
	flip: boolean;
	dimensions: Dimensions;
	padding: Padding;
}

/**
 * Merge user options over the defaults. Colors and padding merge per key,
 * so an explicit `undefined` keeps the default. `ylabel` falls back to the
 * value field name.
 */
export function resolveOptions(
	valueField: string,
	options: CompareBarOptions = {},
): ResolvedCompareBarOptions {
	const defaults = DEFAULT_COMPARE_BAR_OPTIONS;
	return {
		countField: options.countField,
		compareTarget: options.compareTarget,
		splitFraction: options.splitFraction ?? defaults.splitFraction,
		aimValue: options.aimValue,
		ascending: options.ascending ?? defaults.ascending,
		title: options.title ?? defaults.title,
		ylabel: options.ylabel ?? valueField,
		colors: {
			primary: options.colors?.primary ?? defaults.colors.primary,
			highlight: options.colors?.highlight ?? defaults.colors.highlight,
			aim: options.colors?.aim ?? defaults.colors.aim,
		},
		flip: options.flip ?? defaults.flip,
		dimensions: {
			width: options.width ?? defaults.width,
			height: options.height ?? defaults.height,
		},
		padding: {
			top: options.padding?.top ?? defaults.padding.top,
			right: options.padding?.right ?? defaults.padding.right,
			bottom: options.padding?.bottom ?? defaults.padding.bottom,
			left: options.padding?.left ?? defaults.padding.left,
		},
	};
}

