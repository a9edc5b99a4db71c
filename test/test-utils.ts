/**
 * Shared fixtures for chart tests.
 */

import type { CompareBarOptions } from "../src/plot/types.ts";

export const SAMPLE = [
	{ cat: "A", val: 10 },
	{ cat: "B", val: 100 },
	{ cat: "C", val: 5 },
];

export const HOSPITALS = [
	{ inst: "Tawau HF", cases: 62, total: 2088 },
	{ inst: "Kota HF", cases: 48, total: 1510 },
	{ inst: "Lahad HF", cases: 4, total: 130 },
	{ inst: "National", cases: 55, total: 9120 },
];

/** A 400x300 frame with no padding, so pixel positions are easy to derive */
export const BARE_FRAME: CompareBarOptions = {
	width: 400,
	height: 300,
	padding: { top: 0, right: 0, bottom: 0, left: 0 },
};

export function countOccurrences(text: string, fragment: string): number {
	return text.split(fragment).length - 1;
}
