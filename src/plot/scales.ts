/* SCALES
/*-----------------------------------------------------
/* Pure functions for mapping data domains to pixel ranges.
/* ==================================================== */

export interface LinearScale {
	(value: number): number;
	domain: [number, number];
	range: [number, number];
}

export interface BandScale {
	(value: string): number;
	domain: string[];
	range: [number, number];
	/** Full width of one category band */
	bandwidth: number;
}

export function linearScale(
	domain: [number, number],
	range: [number, number],
): LinearScale {
	const [d0, d1] = domain;
	const [r0, r1] = range;
	const span = d1 - d0;

	const map = (value: number): number => {
		if (span === 0) return (r0 + r1) / 2;
		return r0 + ((value - d0) / span) * (r1 - r0);
	};

	return Object.assign(map, { domain, range });
}

// Maps each category to the center of its band; unknown categories map to the range start
export function bandScale(
	domain: string[],
	range: [number, number],
): BandScale {
	const [r0, r1] = range;
	const bandwidth = domain.length > 0 ? (r1 - r0) / domain.length : 0;

	const lookup = new Map<string, number>();
	for (let i = 0; i < domain.length; i++) {
		const category = domain[i];
		if (category !== undefined && !lookup.has(category)) {
			lookup.set(category, r0 + i * bandwidth + bandwidth / 2);
		}
	}

	const map = (value: string): number => lookup.get(value) ?? r0;

	return Object.assign(map, { domain, range, bandwidth });
}

// Compute human-readable tick values for a numeric axis
export function computeNiceTicks(
	min: number,
	max: number,
	targetCount: number,
): number[] {
	if (min === max) return [min];

	const range = max - min;
	const roughStep = range / targetCount;

	// Snap to a "nice" step: 1, 2, 5 × 10^n
	const magnitude = 10 ** Math.floor(Math.log10(roughStep));
	const normalized = roughStep / magnitude;

	let niceStep: number;
	if (normalized <= 1.5) niceStep = 1 * magnitude;
	else if (normalized <= 3.5) niceStep = 2 * magnitude;
	else if (normalized <= 7.5) niceStep = 5 * magnitude;
	else niceStep = 10 * magnitude;

	const niceMin = Math.floor(min / niceStep) * niceStep;
	const niceMax = Math.ceil(max / niceStep) * niceStep;

	const ticks: number[] = [];
	for (let v = niceMin; v <= niceMax + niceStep * 0.5; v += niceStep) {
		ticks.push(Math.round(v * 1e10) / 1e10);
	}

	return ticks;
}

/**
 * Value-axis domain for bars: always spans zero and the aim line,
 * with no expansion past the data.
 */
export function computeValueDomain(
	values: number[],
	aimValue?: number,
): [number, number] {
	let min = 0;
	let max = 0;
	for (const v of values) {
		if (v < min) min = v;
		if (v > max) max = v;
	}
	if (aimValue !== undefined) {
		if (aimValue < min) min = aimValue;
		if (aimValue > max) max = aimValue;
	}
	return min === max ? [0, 1] : [min, max];
}
