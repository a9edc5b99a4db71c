/* COMPARE BAR CHART BUILDER
/*-----------------------------------------------------
/* Produces a ChartSpec for comparison bar charts from rows:
/* label text, inside/outside label split, highlight and order.
/* ==================================================== */

import { ColumnNotFoundError, TypeMismatchError, ValidationError } from "../../errors/index.ts";
import { resolveOptions, type ResolvedCompareBarOptions } from "../options.ts";
import {
	DEFAULT_THEME,
	type ChartSpec,
	type CompareBarOptions,
	type Dataset,
	type DisplayRow,
	type Row,
} from "../types.ts";

const OPERATION = "compareBar";

type CountValue = string | number | boolean;

interface SourceRow {
	category: string;
	value: number;
	count?: CountValue;
}

export function buildCompareBarSpec(
	data: Dataset | null | undefined,
	categoryField: string | undefined,
	valueField: string | undefined,
	options: CompareBarOptions = {},
): ChartSpec {
	if (data == null || data.length === 0) {
		throw new ValidationError(
			OPERATION,
			["'data' must be provided"],
			"pass a non-empty array of rows",
		);
	}

	if (!categoryField || !valueField) {
		throw new ValidationError(
			OPERATION,
			missingFieldIssues(categoryField, valueField),
			"both the category field and the value field should be specified",
		);
	}

	const resolved = resolveOptions(valueField, options);
	validateOptions(resolved);

	const source = data.map((row, index) =>
		readRow(row, index, categoryField, valueField, resolved.countField),
	);

	// Threshold comes from the rows as given, before any sorting
	const threshold = resolved.splitFraction * maxValue(source);
	const target = resolved.compareTarget || undefined;

	const rows: DisplayRow[] = source.map((row, index) => {
		const display: DisplayRow = {
			category: row.category,
			displayLabel:
				row.count === undefined
					? row.category
					: `${row.category} (N=${String(row.count)})`,
			value: row.value,
			insideLabel: row.value > threshold,
			highlighted: false,
			index,
		};
		if (row.count !== undefined) display.count = row.count;
		return display;
	});

	// Labels key the category axis, so each bar needs its own
	const duplicates = duplicateLabels(rows);
	if (duplicates.length > 0) {
		throw new ValidationError(
			OPERATION,
			duplicates.map((label) => `category label '${label}' appears more than once`),
			"category labels must be unique; aggregate the rows or add a count field",
		);
	}

	let highlightLabel: string | undefined;
	if (target !== undefined) {
		const match = rows.find((row) => row.displayLabel.includes(target));
		if (match) {
			match.highlighted = true;
			highlightLabel = match.displayLabel;
		}
	}

	// Array#sort is stable, so equal values keep their input order
	const ordered = resolved.ascending
		? [...rows].sort((a, b) => a.value - b.value)
		: rows;

	const spec: ChartSpec = {
		rows: ordered,
		categories: ordered.map((row) => row.displayLabel),
		threshold,
		splitFraction: resolved.splitFraction,
		title: resolved.title,
		xlabel: "",
		ylabel: resolved.ylabel,
		colors: resolved.colors,
		flip: resolved.flip,
		ascending: resolved.ascending,
		dimensions: resolved.dimensions,
		padding: resolved.padding,
		theme: { ...DEFAULT_THEME, aimDash: [...DEFAULT_THEME.aimDash] },
	};
	if (resolved.aimValue !== undefined) spec.aimValue = resolved.aimValue;
	if (target !== undefined) spec.compareTarget = target;
	if (highlightLabel !== undefined) spec.highlightLabel = highlightLabel;
	return spec;
}

function missingFieldIssues(
	categoryField: string | undefined,
	valueField: string | undefined,
): string[] {
	const issues: string[] = [];
	if (!categoryField) issues.push("category field is not specified");
	if (!valueField) issues.push("value field is not specified");
	return issues;
}

function duplicateLabels(rows: DisplayRow[]): string[] {
	const seen = new Set<string>();
	const repeated = new Set<string>();
	for (const row of rows) {
		if (seen.has(row.displayLabel)) repeated.add(row.displayLabel);
		seen.add(row.displayLabel);
	}
	return [...repeated];
}

function validateOptions(options: ResolvedCompareBarOptions): void {
	const issues: string[] = [];
	const { splitFraction, aimValue } = options;
	if (!Number.isFinite(splitFraction) || splitFraction <= 0 || splitFraction > 1) {
		issues.push(`splitFraction must be in (0, 1], got ${splitFraction}`);
	}
	if (aimValue !== undefined && !Number.isFinite(aimValue)) {
		issues.push(`aimValue must be a finite number, got ${aimValue}`);
	}
	if (issues.length > 0) {
		throw new ValidationError(OPERATION, issues);
	}
}

function readRow(
	row: Row,
	index: number,
	categoryField: string,
	valueField: string,
	countField: string | undefined,
): SourceRow {
	const category = readField(row, index, categoryField);
	if (!isLabelValue(category)) {
		throw new TypeMismatchError(
			categoryField,
			describeType(category),
			["string", "number", "boolean"],
			index,
		);
	}

	const result: SourceRow = {
		category: String(category),
		value: toNumber(readField(row, index, valueField), valueField, index),
	};

	if (countField) {
		const count = readField(row, index, countField);
		if (!isLabelValue(count)) {
			throw new TypeMismatchError(
				countField,
				describeType(count),
				["string", "number", "boolean"],
				index,
			);
		}
		result.count = count;
	}

	return result;
}

function readField(row: Row, index: number, field: string): unknown {
	if (!Object.hasOwn(row, field)) {
		throw new ColumnNotFoundError(field, Object.keys(row), index);
	}
	return row[field];
}

function isLabelValue(value: unknown): value is CountValue {
	return (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	);
}

function toNumber(raw: unknown, field: string, index: number): number {
	if (typeof raw === "number" && Number.isFinite(raw)) return raw;
	if (typeof raw === "string" && raw.trim() !== "") {
		const parsed = Number(raw);
		if (Number.isFinite(parsed)) return parsed;
	}
	throw new TypeMismatchError(
		field,
		describeType(raw),
		["number", "numeric string"],
		index,
	);
}

function describeType(value: unknown): string {
	if (value === null) return "null";
	if (typeof value === "number") return String(value);
	if (typeof value === "string") return `string '${value}'`;
	return typeof value;
}

function maxValue(rows: SourceRow[]): number {
	let max = rows[0]?.value ?? 0;
	for (let i = 1; i < rows.length; i++) {
		const v = rows[i]?.value ?? max;
		if (v > max) max = v;
	}
	return max;
}
