/* PLOT BUILDER
/*-----------------------------------------------------
/* Fluent API for constructing comparison bar charts from
/* rows or columnar data. Returns PlotResult which can
/* render to SVG, Vega-Lite or raw JSON.
/* ==================================================== */

import { writeFile } from "node:fs/promises";
import { ComparebarError } from "../errors/index.ts";
import { err, ok, type Result } from "../types/result.ts";
import {
	renderVegaLite,
	toVegaLiteSpec,
	type VegaLiteSpec,
} from "./adapters/vega-lite.ts";
import { buildCompareBarSpec } from "./charts/compare-bar.ts";
import { composeLayers, formatValue } from "./layers.ts";
import { renderSvg } from "./svg.ts";
import type {
	ChartComposition,
	ChartSpec,
	ColumnData,
	CompareBarOptions,
	Dataset,
	Row,
} from "./types.ts";

export class PlotResult {
	constructor(private readonly spec: ChartSpec) {}

	toJSON(): ChartSpec {
		return this.spec;
	}

	toLayers(): ChartComposition {
		return composeLayers(this.spec);
	}

	toSVG(): string {
		return renderSvg(this.spec);
	}

	toVegaLite(): VegaLiteSpec {
		return toVegaLiteSpec(this.spec);
	}

	async toVegaLiteSVG(): Promise<string> {
		return renderVegaLite(this.spec);
	}

	async toFile(path: string): Promise<void> {
		await writeFile(path, this.toSVG(), "utf8");
	}

	/** Print the display rows as a table */
	print(): void {
		const rows = this.spec.rows.map((row) => ({
			label: row.displayLabel,
			value: formatValue(row.value),
			placement: row.insideLabel ? "inside" : "outside",
			highlight: row.highlighted ? "*" : "",
		}));
		const keys = ["label", "value", "placement", "highlight"] as const;
		const widths = keys.map((k) =>
			Math.max(k.length, ...rows.map((r) => r[k].length)),
		);

		const header = keys.map((k, i) => k.padEnd(widths[i] ?? 0)).join(" │ ");
		const rule = (joint: string) => widths.map((w) => "─".repeat(w)).join(`─${joint}─`);

		console.log(`┌─${rule("┬")}─┐`);
		console.log(`│ ${header} │`);
		console.log(`├─${rule("┼")}─┤`);

		for (const row of rows) {
			const line = keys.map((k, i) => row[k].padEnd(widths[i] ?? 0)).join(" │ ");
			console.log(`│ ${line} │`);
		}

		console.log(`└─${rule("┴")}─┘`);
		console.log(`\nthreshold: ${formatValue(this.spec.threshold)}`);
	}
}

export class PlotBuilder {
	private readonly rows: Dataset;

	constructor(data: Dataset | ColumnData) {
		this.rows = isDataset(data) ? data : columnsToRows(data);
	}

	compareBar(
		categoryField: string,
		valueField: string,
		options?: CompareBarOptions,
	): PlotResult {
		return compareBar(this.rows, categoryField, valueField, options);
	}
}

/** Build a comparison bar chart from rows */
export function compareBar(
	data: Dataset | null | undefined,
	categoryField: string | undefined,
	valueField: string | undefined,
	options?: CompareBarOptions,
): PlotResult {
	return new PlotResult(
		buildCompareBarSpec(data, categoryField, valueField, options),
	);
}

/** Like compareBar, but returns chart errors instead of throwing them */
export function safeCompareBar(
	data: Dataset | null | undefined,
	categoryField: string | undefined,
	valueField: string | undefined,
	options?: CompareBarOptions,
): Result<PlotResult, ComparebarError> {
	try {
		return ok(compareBar(data, categoryField, valueField, options));
	} catch (error) {
		if (error instanceof ComparebarError) return err(error);
		throw error;
	}
}

function isDataset(data: Dataset | ColumnData): data is Dataset {
	return Array.isArray(data);
}

// Columns of unequal length are cut to the shortest
function columnsToRows(columns: ColumnData): Row[] {
	const names = Object.keys(columns);
	let length = Number.POSITIVE_INFINITY;
	for (const name of names) {
		length = Math.min(length, columns[name]?.length ?? 0);
	}
	if (names.length === 0) length = 0;

	const rows: Row[] = [];
	for (let i = 0; i < length; i++) {
		const row: Record<string, unknown> = {};
		for (const name of names) {
			row[name] = columns[name]?.[i];
		}
		rows.push(row);
	}
	return rows;
}
