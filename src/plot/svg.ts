/* SVG RENDERER
/*-----------------------------------------------------
/* Zero-dep SVG string renderer.
/* Takes a ChartSpec and returns a complete SVG string.
/* ==================================================== */

import { composeLayers, fillColor, formatValue } from "./layers.ts";
import {
	bandScale,
	computeNiceTicks,
	computeValueDomain,
	linearScale,
	type BandScale,
	type LinearScale,
} from "./scales.ts";
import type {
	BarLayer,
	ChartComposition,
	ChartSpec,
	ChartTheme,
	RuleLayer,
	TextLayer,
} from "./types.ts";

// Average glyph width as a fraction of font size, for label offsets
const CHAR_WIDTH_RATIO = 0.6;
const TICK_LENGTH = 5;

interface Frame {
	valueScale: LinearScale;
	categoryScale: BandScale;
	plotWidth: number;
	plotHeight: number;
	flip: boolean;
	theme: ChartTheme;
}

export function renderSvg(spec: ChartSpec): string {
	const chart = composeLayers(spec);
	const { dimensions, padding, theme } = chart;
	const plotWidth = dimensions.width - padding.left - padding.right;
	const plotHeight = dimensions.height - padding.top - padding.bottom;

	const parts: string[] = [];
	parts.push(svgOpen(dimensions.width, dimensions.height, theme.fontFamily));

	if (chart.labels.title) {
		parts.push(renderTitle(chart.labels.title, dimensions.width, padding.top, theme));
	}

	const frame = buildFrame(spec, chart, plotWidth, plotHeight);

	parts.push(`<g transform="translate(${padding.left},${padding.top})">`);

	for (const layer of chart.layers) {
		switch (layer.kind) {
			case "rule":
				parts.push(renderRule(layer, frame));
				break;
			case "bar":
				parts.push(renderBars(layer, frame));
				break;
			case "text":
				parts.push(renderLabels(layer, frame));
				break;
		}
	}

	parts.push(renderValueAxis(frame, chart.labels.y));
	parts.push(renderCategoryAxis(frame));

	parts.push("</g>");
	parts.push("</svg>");
	return parts.filter((part) => part.length > 0).join("\n");
}

function svgOpen(width: number, height: number, fontFamily: string): string {
	return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" font-family="${fontFamily}">`;
}

function renderTitle(
	title: string,
	totalWidth: number,
	paddingTop: number,
	theme: ChartTheme,
): string {
	const x = totalWidth / 2;
	const y = paddingTop / 2;
	return `<text x="${px(x)}" y="${px(y)}" text-anchor="middle" font-size="${theme.titleSize}" fill="${theme.textColor}">${escapeXml(title)}</text>`;
}

// --- Scale construction ---

function buildFrame(
	spec: ChartSpec,
	chart: ChartComposition,
	plotWidth: number,
	plotHeight: number,
): Frame {
	const domain = computeValueDomain(
		spec.rows.map((row) => row.value),
		spec.aimValue,
	);

	// Flipped: first category at the bottom, values grow rightwards
	const valueScale = chart.flip
		? linearScale(domain, [0, plotWidth])
		: linearScale(domain, [plotHeight, 0]);
	const categoryScale = chart.flip
		? bandScale([...chart.categories].reverse(), [0, plotHeight])
		: bandScale(chart.categories, [0, plotWidth]);

	return {
		valueScale,
		categoryScale,
		plotWidth,
		plotHeight,
		flip: chart.flip,
		theme: chart.theme,
	};
}

// --- Layer renderers ---

function renderRule(layer: RuleLayer, frame: Frame): string {
	const v = px(frame.valueScale(layer.value));
	const dash = layer.dash.join(" ");
	const [x1, y1, x2, y2]: [number, number, number, number] = frame.flip
		? [v, 0, v, frame.plotHeight]
		: [0, v, frame.plotWidth, v];
	return `<line x1="${x1}" y1="${y1}" x2="${x2}" y2="${y2}" stroke="${layer.color}" stroke-width="${layer.width}" stroke-dasharray="${dash}"/>`;
}

function renderBars(layer: BarLayer, frame: Frame): string {
	const { valueScale, categoryScale } = frame;
	const thickness = categoryScale.bandwidth * layer.bandWidth;
	const base = valueScale(0);
	const parts: string[] = [];

	for (const row of layer.rows) {
		const center = categoryScale(row.displayLabel);
		const end = valueScale(row.value);
		const start = Math.min(base, end);
		const length = Math.abs(end - base);
		const color = fillColor(layer.fill, row.highlighted);

		const rect = frame.flip
			? { x: start, y: center - thickness / 2, width: length, height: thickness }
			: { x: center - thickness / 2, y: start, width: thickness, height: length };

		parts.push(
			`<rect x="${px(rect.x)}" y="${px(rect.y)}" width="${px(rect.width)}" height="${px(rect.height)}" fill="${color}"/>`,
		);
	}
	return parts.join("\n");
}

// hjust shifts a label along the value axis by multiples of its own extent:
// 1.5 pulls it back inside the bar end, -0.5 pushes it just past it
function renderLabels(layer: TextLayer, frame: Frame): string {
	const { valueScale, categoryScale, theme } = frame;
	const parts: string[] = [];

	for (const row of layer.rows) {
		const text = formatValue(row.value);
		const center = categoryScale(row.displayLabel);
		const end = valueScale(row.value);

		if (frame.flip) {
			const width = estimateTextWidth(text, layer.size);
			const x = end - layer.hjust * width;
			const y = center + layer.size * 0.35;
			parts.push(
				`<text x="${px(x)}" y="${px(y)}" font-size="${layer.size}" fill="${theme.textColor}">${escapeXml(text)}</text>`,
			);
		} else {
			const y = end + layer.hjust * layer.size;
			parts.push(
				`<text x="${px(center)}" y="${px(y)}" text-anchor="middle" font-size="${layer.size}" fill="${theme.textColor}">${escapeXml(text)}</text>`,
			);
		}
	}
	return parts.join("\n");
}

// --- Axes ---

function renderValueAxis(frame: Frame, label: string): string {
	const { valueScale, theme, plotWidth, plotHeight } = frame;
	const parts: string[] = [];
	const [d0, d1] = valueScale.domain;
	const ticks = computeNiceTicks(d0, d1, 5).filter((t) => t >= d0 && t <= d1);
	const stroke = `stroke="${theme.axisColor}"`;
	const tickText = `font-size="${theme.tickLabelSize}" fill="${theme.textColor}"`;

	if (frame.flip) {
		parts.push(
			`<line x1="0" y1="${plotHeight}" x2="${plotWidth}" y2="${plotHeight}" ${stroke} stroke-width="${theme.axisLineWidth}"/>`,
		);
		for (const tick of ticks) {
			const x = px(valueScale(tick));
			parts.push(
				`<line x1="${x}" y1="${plotHeight}" x2="${x}" y2="${plotHeight + TICK_LENGTH}" ${stroke}/>`,
			);
			parts.push(
				`<text x="${x}" y="${plotHeight + 18}" text-anchor="middle" ${tickText}>${formatTickValue(tick)}</text>`,
			);
		}
		if (label) {
			parts.push(
				`<text x="${px(plotWidth / 2)}" y="${plotHeight + 40}" text-anchor="middle" font-size="${theme.axisTitleSize}" fill="${theme.textColor}">${escapeXml(label)}</text>`,
			);
		}
	} else {
		parts.push(
			`<line x1="0" y1="0" x2="0" y2="${plotHeight}" ${stroke} stroke-width="${theme.axisLineWidth}"/>`,
		);
		for (const tick of ticks) {
			const y = px(valueScale(tick));
			parts.push(`<line x1="${-TICK_LENGTH}" y1="${y}" x2="0" y2="${y}" ${stroke}/>`);
			parts.push(
				`<text x="-10" y="${px(y + 4)}" text-anchor="end" ${tickText}>${formatTickValue(tick)}</text>`,
			);
		}
		if (label) {
			const midY = px(plotHeight / 2);
			parts.push(
				`<text x="-50" y="${midY}" text-anchor="middle" font-size="${theme.axisTitleSize}" fill="${theme.textColor}" transform="rotate(-90, -50, ${midY})">${escapeXml(label)}</text>`,
			);
		}
	}

	return parts.join("\n");
}

// Category axis: tick labels only, no line and no ticks
function renderCategoryAxis(frame: Frame): string {
	const { categoryScale, theme, plotHeight } = frame;
	const parts: string[] = [];
	const tickText = `font-size="${theme.tickLabelSize}" fill="${theme.textColor}"`;

	for (const category of categoryScale.domain) {
		const c = px(categoryScale(category));
		parts.push(
			frame.flip
				? `<text x="-8" y="${px(c + 4)}" text-anchor="end" ${tickText}>${escapeXml(category)}</text>`
				: `<text x="${c}" y="${plotHeight + 18}" text-anchor="middle" ${tickText}>${escapeXml(category)}</text>`,
		);
	}
	return parts.join("\n");
}

// --- Helpers ---

function estimateTextWidth(text: string, fontSize: number): number {
	return text.length * fontSize * CHAR_WIDTH_RATIO;
}

function px(value: number): number {
	return Math.round(value * 100) / 100;
}

function formatTickValue(value: number): string {
	if (Math.abs(value) >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
	if (Math.abs(value) >= 1_000) return `${(value / 1_000).toFixed(1)}k`;
	if (Number.isInteger(value)) return String(value);
	return value.toFixed(2);
}

export function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}
